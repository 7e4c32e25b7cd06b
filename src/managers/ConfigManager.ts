/**
 * @fileoverview Process configuration manager with automatic persistence.
 *
 * Holds the live AppConfig in memory and mirrors it to data/config.json:
 * - Load sanitizes the file: unknown keys are dropped, invalid values fall back to
 *   defaults, and a file that needed cleaning is written back
 * - Changes are saved with a 100 ms debounce behind a lock file
 * - `configUpdated` fires with the previous and current config, and `config:<key>` fires
 *   for each changed key
 *
 * One manager per data directory; the process-wide instance comes from getConfigManager().
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import {
  AppConfig,
  CONFIG_KEYS,
  ConfigUpdateEvent,
  DEFAULT_CONFIG,
  MutableAppConfig,
  isValidConfigKey,
  sanitizeConfig
} from '../types/config';
import { AppError, ErrorCode, isMissingFileError } from '../utils/error.utils';
import { logError, logInfo, logVerbose, logWarning } from '../utils/logging';
import { getDataPath } from '../utils/setup';

const NAMESPACE = 'ConfigManager';

const SAVE_DEBOUNCE_MS = 100;

export const CONFIG_FILE_NAME = 'config.json';

export class ConfigManager extends EventEmitter {
  private static instance: ConfigManager | null = null;

  private readonly configPath: string;
  private readonly lockFilePath: string;
  private currentConfig: MutableAppConfig;
  private isSaving = false;
  private pendingSave: NodeJS.Timeout | null = null;
  private configLoaded = false;

  constructor(dataPath: string) {
    super();
    this.configPath = path.join(dataPath, CONFIG_FILE_NAME);
    this.lockFilePath = path.join(dataPath, 'config.lock');
    this.currentConfig = { ...DEFAULT_CONFIG };
  }

  /**
   * Process-wide instance for the configured data directory
   */
  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager(getDataPath());
    }
    return ConfigManager.instance;
  }

  /**
   * Gets the complete current configuration (readonly)
   */
  public getConfig(): Readonly<AppConfig> {
    return Object.freeze({ ...this.currentConfig });
  }

  public get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.currentConfig[key];
  }

  public isConfigLoaded(): boolean {
    return this.configLoaded;
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Sets a specific configuration value and triggers save
   * @throws AppError CONFIG_INVALID when the value breaks the key's rule
   */
  public set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    const next: MutableAppConfig = { ...this.currentConfig };
    next[key] = value;
    this.apply(next);
  }

  /**
   * Updates multiple configuration values at once
   * @throws AppError CONFIG_INVALID when any value breaks its key's rule
   */
  public updateConfig(updates: Partial<AppConfig>): void {
    this.apply({ ...this.currentConfig, ...updates });
  }

  public resetToDefaults(): void {
    this.apply({ ...DEFAULT_CONFIG });
  }

  /**
   * Loads configuration from file. A missing file keeps the defaults.
   */
  public async load(): Promise<void> {
    try {
      const content = await fs.promises.readFile(this.configPath, 'utf8');
      const loadedData: unknown = JSON.parse(content);
      const sanitized = sanitizeConfig(loadedData);

      this.replace(sanitized);
      if (this.needsResave(loadedData, sanitized)) {
        logWarning(NAMESPACE, 'Config file contained unknown or invalid values, rewriting it');
        this.scheduleSave();
      }
      logVerbose(NAMESPACE, `Loaded ${this.configPath}`);
    } catch (error) {
      if (isMissingFileError(error)) {
        logInfo(NAMESPACE, `No config file at ${this.configPath}, using defaults`);
      } else {
        const appError = new AppError(
          `Failed to load config file ${this.configPath}`,
          ErrorCode.CONFIG_LOAD_FAILED,
          { configPath: this.configPath },
          error instanceof Error ? error : undefined
        );
        logError(NAMESPACE, appError.message, error);
        this.emit('loadError', appError);
      }
    } finally {
      this.configLoaded = true;
      this.emit('config-loaded');
    }
  }

  /**
   * Forces an immediate save to file (bypasses scheduled save)
   */
  public async forceSave(): Promise<void> {
    if (this.pendingSave) {
      clearTimeout(this.pendingSave);
      this.pendingSave = null;
    }
    await this.saveToFile();
  }

  /**
   * Flush pending changes and release listeners
   */
  public async dispose(): Promise<void> {
    if (this.pendingSave) {
      clearTimeout(this.pendingSave);
      this.pendingSave = null;
      try {
        await this.saveToFile();
      } catch (error) {
        logError(NAMESPACE, 'Failed to save config during shutdown', error);
      }
    }

    this.removeAllListeners();
    if (ConfigManager.instance === this) {
      ConfigManager.instance = null;
    }
  }

  private apply(candidate: Partial<AppConfig>): void {
    const sanitized = sanitizeConfig(candidate);
    const invalid = CONFIG_KEYS.filter(key => sanitized[key] !== candidate[key]);
    if (invalid.length > 0) {
      throw new AppError(
        `Invalid configuration value for ${invalid.join(', ')}`,
        ErrorCode.CONFIG_INVALID,
        { keys: invalid }
      );
    }
    if (this.replace(sanitized).length > 0) {
      this.scheduleSave();
    }
  }

  /**
   * Swap in a new config and emit events for the keys that changed
   */
  private replace(next: AppConfig): Array<keyof AppConfig> {
    const previous: AppConfig = { ...this.currentConfig };
    const changedKeys = CONFIG_KEYS.filter(key => previous[key] !== next[key]);
    this.currentConfig = { ...next };

    if (changedKeys.length > 0) {
      this.emitUpdateEvent(previous, changedKeys);
    }
    return changedKeys;
  }

  private needsResave(loadedData: unknown, sanitized: AppConfig): boolean {
    if (typeof loadedData !== 'object' || loadedData === null || Array.isArray(loadedData)) {
      return true;
    }
    const keys = Object.keys(loadedData);
    if (keys.some(key => !isValidConfigKey(key))) {
      return true;
    }
    const stored = new Map<string, unknown>(Object.entries(loadedData));
    return CONFIG_KEYS.some(key => stored.get(key) !== sanitized[key]);
  }

  private scheduleSave(): void {
    if (this.pendingSave) {
      clearTimeout(this.pendingSave);
    }

    this.pendingSave = setTimeout(() => {
      this.pendingSave = null;
      this.saveToFile().catch(error => {
        logError(NAMESPACE, 'Failed to save config', error);
      });
    }, SAVE_DEBOUNCE_MS);
  }

  private async saveToFile(): Promise<void> {
    if (this.isSaving) {
      this.scheduleSave();
      return;
    }

    this.isSaving = true;
    try {
      await fs.promises.mkdir(path.dirname(this.configPath), { recursive: true });
      await fs.promises.writeFile(this.lockFilePath, '');
      await fs.promises.writeFile(this.configPath, JSON.stringify(this.currentConfig, null, 2), 'utf8');
      this.emit('configSaved', this.getConfig());
    } catch (error) {
      const appError = new AppError(
        `Failed to save config file ${this.configPath}`,
        ErrorCode.CONFIG_SAVE_FAILED,
        { configPath: this.configPath },
        error instanceof Error ? error : undefined
      );
      this.emit('saveError', appError);
      throw appError;
    } finally {
      try {
        await fs.promises.rm(this.lockFilePath, { force: true });
      } catch (lockError) {
        logWarning(NAMESPACE, 'Failed to remove config lock file', lockError);
      }
      this.isSaving = false;
    }
  }

  private emitUpdateEvent(previous: AppConfig, changedKeys: ReadonlyArray<keyof AppConfig>): void {
    const updateEvent: ConfigUpdateEvent = {
      previous: Object.freeze({ ...previous }),
      current: this.getConfig(),
      changedKeys
    };

    this.emit('configUpdated', updateEvent);
    changedKeys.forEach(key => {
      this.emit(`config:${key}`, this.currentConfig[key], previous[key]);
    });
  }
}

/**
 * Export singleton instance getter for convenience
 */
export function getConfigManager(): ConfigManager {
  return ConfigManager.getInstance();
}
