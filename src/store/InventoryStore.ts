/**
 * @fileoverview Persistence boundary for the filament ledger.
 *
 * The ledger services never hold state of their own: every read goes through this
 * interface and every committed transition is one call on it. Implementations serialize
 * their writes; callers issue cascades explicitly (delete each owned usage record, then
 * the spool) using the ownership index.
 *
 * @module store/InventoryStore
 */

import type {
  InventorySettings,
  MaterialColorEntry,
  Spool,
  UsageRecord
} from '../types/inventory';

export type Predicate<T> = (value: T) => boolean;

export interface InventoryStore {
  // Spools
  listSpools(predicate?: Predicate<Spool>): Promise<Spool[]>;
  getSpool(id: string): Promise<Spool | null>;
  insertSpool(spool: Spool): Promise<void>;
  updateSpool(spool: Spool): Promise<void>;
  /** Fails while the spool still owns usage records */
  deleteSpool(id: string): Promise<void>;

  // Usage records
  listUsageRecords(predicate?: Predicate<UsageRecord>): Promise<UsageRecord[]>;
  getUsageRecord(id: string): Promise<UsageRecord | null>;
  /** Ownership index: ids of the records a spool owns, oldest insert first */
  usageRecordIdsFor(spoolId: string): Promise<string[]>;
  insertUsageRecord(record: UsageRecord): Promise<void>;
  deleteUsageRecord(id: string): Promise<void>;

  // Material colors, keyed by case-insensitive material name
  listMaterialColors(): Promise<MaterialColorEntry[]>;
  getMaterialColor(material: string): Promise<MaterialColorEntry | null>;
  insertMaterialColor(entry: MaterialColorEntry): Promise<void>;
  updateMaterialColor(entry: MaterialColorEntry): Promise<void>;
  deleteMaterialColor(material: string): Promise<void>;

  // Settings singleton
  getSettings(): Promise<InventorySettings | null>;
  saveSettings(settings: InventorySettings): Promise<void>;
}
