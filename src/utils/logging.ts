/**
 * @fileoverview Logging utilities for namespaced console output
 *
 * Verbose output is off unless DEBUG is set, NODE_ENV is development, or the
 * DebugMode config key turns it on at runtime through setVerboseLogging().
 */

let verboseOverride = false;

/**
 * Enable or disable verbose output regardless of environment
 */
export function setVerboseLogging(enabled: boolean): void {
  verboseOverride = enabled;
}

/**
 * Whether verbose messages are currently written
 */
export function isVerboseLogging(): boolean {
  return verboseOverride || Boolean(process.env.DEBUG) || process.env.NODE_ENV === 'development';
}

/**
 * Log verbose debug message with namespace
 */
export function logVerbose(namespace: string, message: string, ...args: unknown[]): void {
  if (isVerboseLogging()) {
    console.debug(`[${namespace}]`, message, ...args);
  }
}

/**
 * Log info message with namespace
 */
export function logInfo(namespace: string, message: string, ...args: unknown[]): void {
  console.info(`[${namespace}]`, message, ...args);
}

/**
 * Log warning message with namespace
 */
export function logWarning(namespace: string, message: string, ...args: unknown[]): void {
  console.warn(`[${namespace}]`, message, ...args);
}

/**
 * Log error message with namespace
 */
export function logError(namespace: string, message: string, ...args: unknown[]): void {
  console.error(`[${namespace}]`, message, ...args);
}
