/**
 * @fileoverview Access to the inventory settings singleton.
 *
 * The store holds at most one settings record. The first read creates it from defaults
 * so every caller sees the same logical instance; updates validate a partial patch and
 * write the merged record in place.
 */

import type { InventoryStore } from '../store/InventoryStore';
import { DEFAULT_SETTINGS, type InventorySettings } from '../types/inventory';
import { SettingsPatchSchema } from '../schemas/inventory.schemas';
import { ErrorCode, guardWrite } from '../utils/error.utils';
import { logInfo } from '../utils/logging';
import { parseOrThrow } from '../utils/validation.utils';

const NAMESPACE = 'SettingsService';

export class SettingsService {
  constructor(private readonly store: InventoryStore) {}

  /**
   * Current settings, created from defaults on first read
   */
  public async get(): Promise<InventorySettings> {
    const existing = await this.store.getSettings();
    if (existing) {
      return existing;
    }

    await guardWrite('saveSettings', () => this.store.saveSettings(DEFAULT_SETTINGS));
    logInfo(NAMESPACE, 'Created default settings');
    return DEFAULT_SETTINGS;
  }

  /**
   * Validate and apply a partial update
   * @throws AppError INVALID_INPUT for an unknown key or an out-of-range value
   */
  public async update(patch: unknown): Promise<InventorySettings> {
    const validated = parseOrThrow(SettingsPatchSchema, patch, ErrorCode.INVALID_INPUT);
    const current = await this.get();

    const next: InventorySettings = {
      defaultDiameter: validated.defaultDiameter ?? current.defaultDiameter,
      lowStockThreshold: validated.lowStockThreshold ?? current.lowStockThreshold,
      currency: validated.currency ?? current.currency,
      language: validated.language ?? current.language
    };

    await guardWrite('saveSettings', () => this.store.saveSettings(next));
    return next;
  }

  /**
   * Overwrite the singleton with a complete, already validated record (used by import)
   */
  public async overwrite(settings: InventorySettings): Promise<void> {
    await guardWrite('saveSettings', () => this.store.saveSettings(settings));
  }
}
