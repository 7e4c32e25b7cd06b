/**
 * @fileoverview Data directory setup and initialization utilities
 *
 * The data directory stores:
 * - config.json: process configuration
 * - inventory.json: the inventory snapshot (spools, usage records, material colors, settings)
 */

import * as fs from 'fs';
import * as path from 'path';
import { logInfo } from './logging';

let dataPathOverride: string | null = null;

/**
 * Use a specific data directory for the rest of the process (the --data-dir flag)
 */
export function setDataPath(dataPath: string | null): void {
  dataPathOverride = dataPath === null ? null : path.resolve(dataPath);
}

/**
 * Get the data directory path: --data-dir, then DATA_DIR, then ./data
 *
 * @returns Absolute path to data directory
 */
export function getDataPath(): string {
  if (dataPathOverride) {
    return dataPathOverride;
  }
  const customPath = process.env.DATA_DIR;
  if (customPath) {
    return path.resolve(customPath);
  }
  return path.join(process.cwd(), 'data');
}

/**
 * Ensure the data directory exists
 *
 * @returns The data directory path
 */
export function ensureDataDirectory(): string {
  const dataPath = getDataPath();

  if (!fs.existsSync(dataPath)) {
    logInfo('Setup', `Creating data directory: ${dataPath}`);
    fs.mkdirSync(dataPath, { recursive: true });
  }

  return dataPath;
}

/**
 * Check if the data directory is writable
 */
export function isDataDirectoryWritable(dataPath: string): boolean {
  try {
    fs.accessSync(dataPath, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Initialize the data directory on application startup
 *
 * @throws Error if data directory cannot be created or is not writable
 */
export function initializeDataDirectory(): string {
  const dataPath = ensureDataDirectory();

  if (!isDataDirectoryWritable(dataPath)) {
    throw new Error(`Data directory is not writable: ${dataPath}`);
  }

  logInfo('Setup', `Data directory initialized: ${dataPath}`);
  return dataPath;
}
