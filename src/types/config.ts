/**
 * @fileoverview Process configuration for the ledger service.
 *
 * Process configuration is what the service needs to run (where to listen, which
 * recognition service to call); it lives in data/config.json. The inventory settings
 * (default diameter, low-stock threshold, currency, language) are ledger data and live in
 * the inventory store instead.
 *
 * Configuration Keys:
 * - ServerPort: HTTP port (1-65535)
 * - ServerHost: interface to bind
 * - RecognitionServiceUrl: base URL of the label-recognition service, empty to disable
 * - RecognitionTimeoutMs: recognition request timeout
 * - DebugMode: verbose logging
 *
 * @module types/config
 */

/**
 * Application configuration interface
 * All properties are readonly to enforce immutability
 */
export interface AppConfig {
  readonly ServerPort: number;
  readonly ServerHost: string;
  readonly RecognitionServiceUrl: string;
  readonly RecognitionTimeoutMs: number;
  readonly DebugMode: boolean;
}

/**
 * Mutable version of AppConfig for internal modifications
 */
export type MutableAppConfig = { -readonly [K in keyof AppConfig]: AppConfig[K] };

export const DEFAULT_CONFIG: AppConfig = {
  ServerPort: 3000,
  ServerHost: '0.0.0.0',
  RecognitionServiceUrl: '',
  RecognitionTimeoutMs: 30000,
  DebugMode: false
};

export const CONFIG_KEYS = [
  'ServerPort',
  'ServerHost',
  'RecognitionServiceUrl',
  'RecognitionTimeoutMs',
  'DebugMode'
] as const satisfies ReadonlyArray<keyof AppConfig>;

/**
 * Configuration update event data
 */
export interface ConfigUpdateEvent {
  readonly previous: Readonly<AppConfig>;
  readonly current: Readonly<AppConfig>;
  readonly changedKeys: ReadonlyArray<keyof AppConfig>;
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isHttpUrlOrEmpty(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  if (value === '') {
    return true;
  }
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function isTimeout(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1000 && value <= 300000;
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

const CONFIG_VALIDATORS: { readonly [K in keyof AppConfig]: (value: unknown) => value is AppConfig[K] } = {
  ServerPort: isPort,
  ServerHost: isNonEmptyString,
  RecognitionServiceUrl: isHttpUrlOrEmpty,
  RecognitionTimeoutMs: isTimeout,
  DebugMode: isBoolean
};

/**
 * Type guard to validate config key
 */
export function isValidConfigKey(key: string): key is keyof AppConfig {
  return CONFIG_KEYS.some(configKey => configKey === key);
}

/**
 * Check a single value against its key's rule
 */
export function isValidConfigValue<K extends keyof AppConfig>(key: K, value: unknown): value is AppConfig[K] {
  return CONFIG_VALIDATORS[key](value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard to validate an entire config object: every key present and valid
 */
export function isValidConfig(config: unknown): config is AppConfig {
  if (!isRecord(config)) {
    return false;
  }
  return CONFIG_KEYS.every(key => isValidConfigValue(key, config[key]));
}

function pick<K extends keyof AppConfig>(source: Record<string, unknown>, key: K): AppConfig[K] {
  const value = source[key];
  return isValidConfigValue(key, value) ? value : DEFAULT_CONFIG[key];
}

/**
 * Keep valid known keys, replace missing or invalid values with defaults, drop the rest
 */
export function sanitizeConfig(config: unknown): AppConfig {
  const source = isRecord(config) ? config : {};
  return {
    ServerPort: pick(source, 'ServerPort'),
    ServerHost: pick(source, 'ServerHost'),
    RecognitionServiceUrl: pick(source, 'RecognitionServiceUrl'),
    RecognitionTimeoutMs: pick(source, 'RecognitionTimeoutMs'),
    DebugMode: pick(source, 'DebugMode')
  };
}
