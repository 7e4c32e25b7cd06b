/**
 * @fileoverview CLI argument parser for the ledger server
 *
 * Flags override the stored process configuration for one run; they are not written
 * back to config.json.
 *
 * Examples:
 *   node dist/index.js
 *   node dist/index.js --port=3001 --host=127.0.0.1
 *   node dist/index.js --data-dir=/var/lib/filament-ledger --debug
 *   node dist/index.js --recognition-url="http://localhost:8000"
 */

/**
 * Configuration parsed from CLI arguments
 */
export interface CliOptions {
  port?: number;
  host?: string;
  dataDir?: string;
  recognitionUrl?: string;
  debug: boolean;
}

/**
 * Validation result for CLI options
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Parse command-line arguments
 *
 * @param args argv to read; defaults to process.argv
 */
export function parseCliArguments(args: readonly string[] = process.argv): CliOptions {
  return {
    port: parseNumberArgument(args, '--port'),
    host: parseStringArgument(args, '--host'),
    dataDir: parseStringArgument(args, '--data-dir'),
    recognitionUrl: parseStringArgument(args, '--recognition-url'),
    debug: args.includes('--debug')
  };
}

/**
 * Value of a `--flag=value` argument with surrounding quotes removed.
 * Everything after the first "=" belongs to the value.
 */
function parseStringArgument(args: readonly string[], flag: string): string | undefined {
  const arg = args.find(a => a.startsWith(`${flag}=`));
  if (!arg) {
    return undefined;
  }

  const value = arg.slice(flag.length + 1).replace(/^["']|["']$/g, '');
  return value === '' ? undefined : value;
}

function parseNumberArgument(args: readonly string[], flag: string): number | undefined {
  const value = parseStringArgument(args, flag);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Validate parsed options
 */
export function validateCliOptions(options: CliOptions): ValidationResult {
  const errors: string[] = [];

  if (options.port !== undefined) {
    if (!Number.isInteger(options.port) || options.port < 1 || options.port > 65535) {
      errors.push('Port must be an integer between 1 and 65535');
    }
  }

  if (options.recognitionUrl !== undefined) {
    try {
      const url = new URL(options.recognitionUrl);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        errors.push('Recognition URL must use http or https');
      }
    } catch {
      errors.push(`Recognition URL is not a valid URL: ${options.recognitionUrl}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
