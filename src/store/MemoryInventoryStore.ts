/**
 * @fileoverview In-process InventoryStore.
 *
 * Keeps every entity in insertion-ordered maps plus an ownership index from spool id to
 * usage record ids. Integrity rules enforced here:
 * - identities are unique per entity kind (material colors ignoring case)
 * - a usage record may only reference an existing spool (or none)
 * - a spool that still owns usage records cannot be deleted
 *
 * Also the base of FileInventoryStore, which persists a snapshot after each mutation.
 */

import type {
  InventorySettings,
  MaterialColorEntry,
  Spool,
  UsageRecord
} from '../types/inventory';
import type { StoreSnapshot } from '../schemas/inventory.schemas';
import { unknownSpoolError, writeFailedError } from '../utils/error.utils';
import type { InventoryStore, Predicate } from './InventoryStore';

function materialKey(material: string): string {
  return material.trim().toLowerCase();
}

export class MemoryInventoryStore implements InventoryStore {
  private readonly spools = new Map<string, Spool>();
  private readonly usageRecords = new Map<string, UsageRecord>();
  private readonly ownership = new Map<string, Set<string>>();
  private readonly materialColors = new Map<string, MaterialColorEntry>();
  private settings: InventorySettings | null = null;

  // ==========================================================================
  // SPOOLS
  // ==========================================================================

  public async listSpools(predicate?: Predicate<Spool>): Promise<Spool[]> {
    const all = Array.from(this.spools.values());
    return predicate ? all.filter(predicate) : all;
  }

  public async getSpool(id: string): Promise<Spool | null> {
    return this.spools.get(id) ?? null;
  }

  public async insertSpool(spool: Spool): Promise<void> {
    this.putSpool(spool);
  }

  public async updateSpool(spool: Spool): Promise<void> {
    if (!this.spools.has(spool.id)) {
      throw unknownSpoolError(spool.id);
    }
    this.spools.set(spool.id, spool);
  }

  public async deleteSpool(id: string): Promise<void> {
    if (!this.spools.has(id)) {
      throw unknownSpoolError(id);
    }
    const owned = this.ownership.get(id);
    if (owned && owned.size > 0) {
      throw writeFailedError(`Spool ${id} still owns ${owned.size} usage records`, {
        spoolId: id,
        usageRecords: owned.size
      });
    }
    this.spools.delete(id);
    this.ownership.delete(id);
  }

  // ==========================================================================
  // USAGE RECORDS
  // ==========================================================================

  public async listUsageRecords(predicate?: Predicate<UsageRecord>): Promise<UsageRecord[]> {
    const all = Array.from(this.usageRecords.values());
    return predicate ? all.filter(predicate) : all;
  }

  public async getUsageRecord(id: string): Promise<UsageRecord | null> {
    return this.usageRecords.get(id) ?? null;
  }

  public async usageRecordIdsFor(spoolId: string): Promise<string[]> {
    return Array.from(this.ownership.get(spoolId) ?? []);
  }

  public async insertUsageRecord(record: UsageRecord): Promise<void> {
    this.putUsageRecord(record);
  }

  public async deleteUsageRecord(id: string): Promise<void> {
    const record = this.usageRecords.get(id);
    if (!record) {
      throw writeFailedError(`Usage record ${id} does not exist`, { usageRecordId: id });
    }
    this.usageRecords.delete(id);
    if (record.spoolId !== null) {
      this.ownership.get(record.spoolId)?.delete(id);
    }
  }

  // ==========================================================================
  // MATERIAL COLORS
  // ==========================================================================

  public async listMaterialColors(): Promise<MaterialColorEntry[]> {
    return Array.from(this.materialColors.values());
  }

  public async getMaterialColor(material: string): Promise<MaterialColorEntry | null> {
    return this.materialColors.get(materialKey(material)) ?? null;
  }

  public async insertMaterialColor(entry: MaterialColorEntry): Promise<void> {
    this.putMaterialColor(entry);
  }

  public async updateMaterialColor(entry: MaterialColorEntry): Promise<void> {
    const key = materialKey(entry.material);
    const existing = this.materialColors.get(key);
    if (!existing) {
      throw writeFailedError(`Material color for ${entry.material} does not exist`, { material: entry.material });
    }
    // the first spelling of a material name is kept
    this.materialColors.set(key, { material: existing.material, colorHex: entry.colorHex });
  }

  public async deleteMaterialColor(material: string): Promise<void> {
    if (!this.materialColors.delete(materialKey(material))) {
      throw writeFailedError(`Material color for ${material} does not exist`, { material });
    }
  }

  // ==========================================================================
  // SETTINGS
  // ==========================================================================

  public async getSettings(): Promise<InventorySettings | null> {
    return this.settings;
  }

  public async saveSettings(settings: InventorySettings): Promise<void> {
    this.settings = settings;
  }

  // ==========================================================================
  // SNAPSHOTS
  // ==========================================================================

  /**
   * Plain copy of every entity, in insertion order
   */
  public snapshot(): StoreSnapshot {
    return {
      spools: Array.from(this.spools.values()),
      usageRecords: Array.from(this.usageRecords.values()),
      materialColors: Array.from(this.materialColors.values()),
      settings: this.settings
    };
  }

  /**
   * Replace the whole content with a snapshot, applying the same integrity rules as the
   * individual inserts
   */
  protected hydrate(snapshot: StoreSnapshot): void {
    this.spools.clear();
    this.usageRecords.clear();
    this.ownership.clear();
    this.materialColors.clear();
    this.settings = snapshot.settings;

    snapshot.spools.forEach(spool => this.putSpool(spool));
    snapshot.usageRecords.forEach(record => this.putUsageRecord(record));
    snapshot.materialColors.forEach(entry => this.putMaterialColor(entry));
  }

  // ==========================================================================
  // INSERT PRIMITIVES
  // ==========================================================================

  private putSpool(spool: Spool): void {
    if (this.spools.has(spool.id)) {
      throw writeFailedError(`Spool ${spool.id} already exists`, { spoolId: spool.id });
    }
    this.spools.set(spool.id, spool);
  }

  private putUsageRecord(record: UsageRecord): void {
    if (this.usageRecords.has(record.id)) {
      throw writeFailedError(`Usage record ${record.id} already exists`, { usageRecordId: record.id });
    }
    if (record.spoolId !== null && !this.spools.has(record.spoolId)) {
      throw unknownSpoolError(record.spoolId);
    }

    this.usageRecords.set(record.id, record);
    if (record.spoolId !== null) {
      const owned = this.ownership.get(record.spoolId) ?? new Set<string>();
      owned.add(record.id);
      this.ownership.set(record.spoolId, owned);
    }
  }

  private putMaterialColor(entry: MaterialColorEntry): void {
    const key = materialKey(entry.material);
    if (this.materialColors.has(key)) {
      throw writeFailedError(`Material color for ${entry.material} already exists`, { material: entry.material });
    }
    this.materialColors.set(key, entry);
  }
}
