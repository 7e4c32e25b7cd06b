/**
 * @fileoverview Tests for ConfigManager
 * Tests configuration loading, saving, validation, and event emission
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CONFIG, type ConfigUpdateEvent } from '../types/config';
import { AppError, ErrorCode } from '../utils/error.utils';
import { setDataPath } from '../utils/setup';
import { CONFIG_FILE_NAME, ConfigManager, getConfigManager } from './ConfigManager';

describe('ConfigManager', () => {
  let dataDir: string;
  let configManager: ConfigManager;

  const configPath = (): string => path.join(dataDir, CONFIG_FILE_NAME);
  const readStored = async (): Promise<unknown> => JSON.parse(await fs.promises.readFile(configPath(), 'utf8'));

  beforeEach(async () => {
    dataDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'ledger-config-'));
    configManager = new ConfigManager(dataDir);
  });

  afterEach(async () => {
    await configManager.dispose();
    setDataPath(null);
    await fs.promises.rm(dataDir, { recursive: true, force: true });
  });

  describe('Singleton Pattern', () => {
    it('should return the same instance from getConfigManager', async () => {
      setDataPath(dataDir);
      const instance1 = getConfigManager();
      const instance2 = getConfigManager();

      expect(instance1).toBe(instance2);
      expect(instance1.getConfigPath()).toBe(configPath());

      await instance1.dispose();
      expect(getConfigManager()).not.toBe(instance1);
      await getConfigManager().dispose();
    });

    it('should extend EventEmitter', () => {
      expect(configManager).toBeInstanceOf(EventEmitter);
    });
  });

  describe('Configuration Loading', () => {
    it('should use defaults when no file exists', async () => {
      const loaded = jest.fn();
      const loadError = jest.fn();
      configManager.on('config-loaded', loaded);
      configManager.on('loadError', loadError);

      expect(configManager.isConfigLoaded()).toBe(false);
      await configManager.load();

      expect(configManager.isConfigLoaded()).toBe(true);
      expect(configManager.getConfig()).toEqual(DEFAULT_CONFIG);
      expect(loaded).toHaveBeenCalledTimes(1);
      expect(loadError).not.toHaveBeenCalled();
      expect(fs.existsSync(configPath())).toBe(false);
    });

    it('should load stored values', async () => {
      await fs.promises.writeFile(configPath(), JSON.stringify({
        ...DEFAULT_CONFIG,
        ServerPort: 8080,
        RecognitionServiceUrl: 'http://localhost:8000'
      }));

      await configManager.load();

      expect(configManager.get('ServerPort')).toBe(8080);
      expect(configManager.get('RecognitionServiceUrl')).toBe('http://localhost:8000');
    });

    it('should drop unknown keys, replace invalid values and rewrite the file', async () => {
      await fs.promises.writeFile(configPath(), JSON.stringify({
        ServerPort: 8080,
        ServerHost: '',
        WebSocketPort: 3001
      }));

      await configManager.load();
      await configManager.forceSave();

      expect(configManager.getConfig()).toEqual({ ...DEFAULT_CONFIG, ServerPort: 8080 });
      expect(await readStored()).toEqual({ ...DEFAULT_CONFIG, ServerPort: 8080 });
    });

    it('should keep defaults and report a file that is not JSON', async () => {
      await fs.promises.writeFile(configPath(), '{ broken');
      const loadError = jest.fn();
      configManager.on('loadError', loadError);

      await configManager.load();

      expect(configManager.getConfig()).toEqual(DEFAULT_CONFIG);
      expect(loadError).toHaveBeenCalledWith(expect.objectContaining({ code: ErrorCode.CONFIG_LOAD_FAILED }));
      expect(await fs.promises.readFile(configPath(), 'utf8')).toBe('{ broken');
    });
  });

  describe('Configuration Updates', () => {
    it('should emit configUpdated and per-key events', () => {
      const updated = jest.fn<(event: ConfigUpdateEvent) => void>();
      const portChanged = jest.fn();
      configManager.on('configUpdated', updated);
      configManager.on('config:ServerPort', portChanged);

      configManager.set('ServerPort', 4000);

      expect(portChanged).toHaveBeenCalledWith(4000, 3000);
      const event = updated.mock.calls[0]?.[0];
      expect(event?.changedKeys).toEqual(['ServerPort']);
      expect(event?.previous.ServerPort).toBe(3000);
      expect(event?.current.ServerPort).toBe(4000);
    });

    it('should not emit when nothing changes', () => {
      const updated = jest.fn();
      configManager.on('configUpdated', updated);

      configManager.updateConfig({ ServerPort: DEFAULT_CONFIG.ServerPort });

      expect(updated).not.toHaveBeenCalled();
    });

    it('should reject invalid values without changing anything', () => {
      expect(() => configManager.set('ServerPort', 70000)).toThrow(AppError);
      expect(() => configManager.updateConfig({ RecognitionServiceUrl: 'ftp://host', DebugMode: true })).toThrow(
        'Invalid configuration value for RecognitionServiceUrl'
      );
      expect(configManager.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should reset to defaults', () => {
      configManager.updateConfig({ ServerPort: 4000, DebugMode: true });
      configManager.resetToDefaults();
      expect(configManager.getConfig()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('Configuration Saving', () => {
    it('should write the file on forceSave and emit configSaved', async () => {
      const saved = jest.fn();
      configManager.on('configSaved', saved);
      configManager.set('DebugMode', true);

      await configManager.forceSave();

      expect(await readStored()).toEqual({ ...DEFAULT_CONFIG, DebugMode: true });
      expect(saved).toHaveBeenCalledTimes(1);
      expect(fs.existsSync(path.join(dataDir, 'config.lock'))).toBe(false);
    });

    it('should flush a pending save on dispose', async () => {
      configManager.set('ServerHost', '127.0.0.1');
      await configManager.dispose();

      expect(await readStored()).toEqual({ ...DEFAULT_CONFIG, ServerHost: '127.0.0.1' });
    });
  });
});
