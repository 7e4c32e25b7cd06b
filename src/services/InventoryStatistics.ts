/**
 * @fileoverview Read-only aggregates over the ledger: usage summary, usage by material
 * and low-stock reminders.
 *
 * Orphaned usage records (no owning spool) never count. Cost is attributed per record
 * as price * mass / initialMass of the owning spool; spools without a price add nothing.
 */

import type { InventoryStore } from '../store/InventoryStore';
import type { Spool, SpoolView, UsageRecord } from '../types/inventory';
import { roundGrams } from '../utils/conversion.utils';
import type { MaterialColorRegistry } from './MaterialColorRegistry';
import type { SettingsService } from './SettingsService';
import { describeSpool } from './spool-transitions';

/**
 * Half-open time window [from, to) over usage timestamps
 */
export interface DateRange {
  readonly from?: string;
  readonly to?: string;
}

export interface UsageSummary {
  readonly spoolsUsed: number;
  readonly usageRecords: number;
  readonly totalMassUsed: number;
  readonly totalCost: string; // decimal text, two places
  readonly currency: string;
  readonly printingDays: number;
  readonly activeRemainingMass: number;
  readonly lowStockCount: number;
}

export interface MaterialUsage {
  readonly material: string;
  readonly colorHex: string;
  readonly mass: number;
  readonly percentage: number;
}

export interface StockReminder {
  readonly view: SpoolView;
  /** null when the spool has no usage to extrapolate from */
  readonly daysUntilEmpty: number | null;
}

/**
 * Number of most recent records averaged over a week for the depletion estimate
 */
const RECENT_USAGE_WINDOW = 7;

function withinRange(record: UsageRecord, range: DateRange): boolean {
  const at = Date.parse(record.recordedAt);
  if (range.from !== undefined && at < Date.parse(range.from)) {
    return false;
  }
  if (range.to !== undefined && at >= Date.parse(range.to)) {
    return false;
  }
  return true;
}

/**
 * Share of a spool's purchase price attributed to one consumption
 */
export function recordCost(spool: Spool, mass: number): number {
  if (spool.price === null || spool.initialMass <= 0) {
    return 0;
  }
  const price = Number(spool.price);
  if (!Number.isFinite(price) || price <= 0) {
    return 0;
  }
  return (price * mass) / spool.initialMass;
}

/**
 * Whole days until a spool runs out at the average daily rate of its most recent records
 */
export function estimateDaysUntilEmpty(spool: Spool, records: readonly UsageRecord[]): number | null {
  if (records.length === 0) {
    return null;
  }
  const recent = [...records]
    .sort((a, b) => Date.parse(b.recordedAt) - Date.parse(a.recordedAt))
    .slice(0, RECENT_USAGE_WINDOW);
  const dailyAverage = recent.reduce((sum, record) => sum + record.mass, 0) / RECENT_USAGE_WINDOW;
  if (dailyAverage <= 0) {
    return null;
  }
  return Math.floor(spool.remainingMass / dailyAverage);
}

/**
 * Soonest first; spools without an estimate last
 */
export function compareDaysUntilEmpty(a: number | null, b: number | null): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? 1 : -1;
  }
  return a - b;
}

export class InventoryStatistics {
  constructor(
    private readonly store: InventoryStore,
    private readonly settings: SettingsService,
    private readonly registry: MaterialColorRegistry
  ) {}

  public async summary(range: DateRange = {}): Promise<UsageSummary> {
    const [spools, settings] = await Promise.all([this.store.listSpools(), this.settings.get()]);
    const spoolsById = new Map(spools.map(spool => [spool.id, spool]));
    const records = await this.ownedRecords(spoolsById, range);

    let totalMass = 0;
    let totalCost = 0;
    const spoolsUsed = new Set<string>();
    const days = new Set<string>();

    for (const { record, spool } of records) {
      totalMass += record.mass;
      totalCost += recordCost(spool, record.mass);
      spoolsUsed.add(spool.id);
      days.add(new Date(record.recordedAt).toISOString().slice(0, 10));
    }

    const active = spools.filter(spool => !spool.archived);
    return {
      spoolsUsed: spoolsUsed.size,
      usageRecords: records.length,
      totalMassUsed: roundGrams(totalMass),
      totalCost: totalCost.toFixed(2),
      currency: settings.currency,
      printingDays: days.size,
      activeRemainingMass: roundGrams(active.reduce((sum, spool) => sum + spool.remainingMass, 0)),
      lowStockCount: active.filter(spool => describeSpool(spool, settings).isLowStock).length
    };
  }

  /**
   * Usage grouped by material ignoring case, largest first. The group is named after the
   * first spool seen with that material.
   */
  public async usageByMaterial(range: DateRange = {}): Promise<MaterialUsage[]> {
    const spools = await this.store.listSpools();
    const spoolsById = new Map(spools.map(spool => [spool.id, spool]));
    const records = await this.ownedRecords(spoolsById, range);

    const groups = new Map<string, { material: string; mass: number }>();
    for (const { record, spool } of records) {
      const key = spool.material.toLowerCase();
      const group = groups.get(key) ?? { material: spool.material, mass: 0 };
      group.mass += record.mass;
      groups.set(key, group);
    }

    const total = Array.from(groups.values()).reduce((sum, group) => sum + group.mass, 0);
    const result: MaterialUsage[] = [];
    for (const group of groups.values()) {
      result.push({
        material: group.material,
        colorHex: await this.registry.colorFor(group.material),
        mass: roundGrams(group.mass),
        percentage: total > 0 ? (group.mass / total) * 100 : 0
      });
    }
    return result.sort((a, b) => b.mass - a.mass);
  }

  /**
   * Active low-stock spools with their depletion estimate, soonest first
   */
  public async reminders(): Promise<StockReminder[]> {
    const [spools, settings] = await Promise.all([
      this.store.listSpools(spool => !spool.archived),
      this.settings.get()
    ]);

    const reminders: StockReminder[] = [];
    for (const spool of spools) {
      const view = describeSpool(spool, settings);
      if (!view.isLowStock) {
        continue;
      }
      const records = await this.store.listUsageRecords(record => record.spoolId === spool.id);
      reminders.push({ view, daysUntilEmpty: estimateDaysUntilEmpty(spool, records) });
    }

    return reminders.sort((a, b) => compareDaysUntilEmpty(a.daysUntilEmpty, b.daysUntilEmpty));
  }

  private async ownedRecords(
    spoolsById: ReadonlyMap<string, Spool>,
    range: DateRange
  ): Promise<Array<{ record: UsageRecord; spool: Spool }>> {
    const records = await this.store.listUsageRecords(record => withinRange(record, range));
    const owned: Array<{ record: UsageRecord; spool: Spool }> = [];
    for (const record of records) {
      const spool = record.spoolId === null ? undefined : spoolsById.get(record.spoolId);
      if (spool) {
        owned.push({ record, spool });
      }
    }
    return owned;
  }
}
