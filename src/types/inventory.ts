/**
 * @fileoverview Core data model for the filament inventory ledger.
 *
 * Every entity is a plain readonly value record. Services never mutate a record in place:
 * transitions return a new record and the persistence boundary stores it. Timestamps are
 * ISO 8601 strings with an offset and monetary values are decimal text, so a record can be
 * written to disk or exported without any conversion step.
 *
 * Key Types:
 * - Spool: a physical filament roll, the aggregate root of the ledger
 * - UsageRecord: an immutable consumption event owned by one spool
 * - MaterialColorEntry: material name to chart color binding
 * - InventorySettings: the process-wide settings singleton
 * - LedgerNotice: non-fatal information returned alongside a successful result
 *
 * @module types/inventory
 */

import type { AppError } from '../utils/error.utils';

/**
 * Standard filament diameters in millimetres
 */
export const STANDARD_DIAMETERS = [1.75, 2.85, 3.0] as const;

export type FilamentDiameter = (typeof STANDARD_DIAMETERS)[number];

export const DEFAULT_DIAMETER: FilamentDiameter = 1.75;

/**
 * Default color for a spool created without one
 */
export const DEFAULT_SPOOL_COLOR = '#CCCCCC';

/**
 * A physical roll of filament
 */
export interface Spool {
  readonly id: string;
  readonly brand: string;
  readonly material: string;
  readonly colorName: string;
  readonly colorHex: string; // #RRGGBB
  readonly diameter: FilamentDiameter;
  readonly initialMass: number; // grams, > 0
  readonly remainingMass: number; // grams, 0..initialMass
  readonly tareMass: number | null; // empty reel, grams
  readonly density: number | null; // g/cm³ override
  readonly minTemp: number | null; // °C nozzle
  readonly maxTemp: number | null; // °C nozzle
  readonly bedTemp: number | null; // °C
  readonly price: string | null; // decimal text, e.g. "24.99"
  readonly acquiredAt: string; // ISO 8601
  readonly archived: boolean;
  readonly note: string | null;
}

/**
 * Usage categories, stored by their wire value
 */
export const USAGE_CATEGORIES = ['print', 'failed_print', 'calibration', 'manual_adjustment'] as const;

export type UsageCategory = (typeof USAGE_CATEGORIES)[number];

/**
 * Immutable consumption event
 * A record whose spoolId is null is orphaned and never counted in aggregates
 */
export interface UsageRecord {
  readonly id: string;
  readonly spoolId: string | null;
  readonly mass: number; // grams, > 0
  readonly recordedAt: string; // ISO 8601
  readonly label: string | null;
  readonly category: UsageCategory;
}

/**
 * Material to chart color binding
 * Material names are unique ignoring case
 */
export interface MaterialColorEntry {
  readonly material: string;
  readonly colorHex: string;
}

export const LANGUAGES = ['system', 'en', 'zh_Hans'] as const;

export type Language = (typeof LANGUAGES)[number];

/**
 * Settings singleton
 */
export interface InventorySettings {
  readonly defaultDiameter: FilamentDiameter;
  readonly lowStockThreshold: number; // percent
  readonly currency: string;
  readonly language: Language;
}

export const DEFAULT_SETTINGS: InventorySettings = {
  defaultDiameter: DEFAULT_DIAMETER,
  lowStockThreshold: 20,
  currency: '$',
  language: 'system'
};

/**
 * Input accepted when adding a spool
 * Optional attributes fall back to defaults (diameter comes from settings)
 */
export interface NewSpoolInput {
  readonly brand?: string;
  readonly material: string;
  readonly colorName?: string;
  readonly colorHex?: string;
  readonly diameter?: FilamentDiameter;
  readonly initialMass: number;
  readonly tareMass?: number | null;
  readonly density?: number | null;
  readonly minTemp?: number | null;
  readonly maxTemp?: number | null;
  readonly bedTemp?: number | null;
  readonly price?: string | null;
  readonly acquiredAt?: string;
  readonly note?: string | null;
}

/**
 * Editable spool attributes
 * Material is fixed once the spool exists and stock goes through a revision
 */
export type SpoolDetailsPatch = Partial<
  Pick<
    Spool,
    | 'brand'
    | 'colorName'
    | 'colorHex'
    | 'diameter'
    | 'tareMass'
    | 'density'
    | 'minTemp'
    | 'maxTemp'
    | 'bedTemp'
    | 'price'
    | 'acquiredAt'
    | 'note'
  >
>;

/**
 * Derived read-only view of a spool
 */
export interface SpoolView {
  readonly spool: Spool;
  readonly remainingPercentage: number;
  readonly isLowStock: boolean;
  readonly remainingLengthMeters: number;
}

/**
 * Filter for spool listings
 */
export interface SpoolQuery {
  readonly archived?: boolean;
  readonly material?: string;
}

// ============================================================================
// NOTICES
// ============================================================================

export type LedgerNoticeCode = 'CLAMPED_TO_AVAILABLE';

/**
 * Non-fatal notice reported next to a successful result
 */
export interface LedgerNotice {
  readonly code: LedgerNoticeCode;
  readonly message: string;
  readonly spoolId: string;
  readonly requestedMass: number;
  readonly recordedMass: number;
}

// ============================================================================
// LEDGER OPERATIONS
// ============================================================================

/**
 * Identity source for new entities (UUID v4 in production)
 */
export type IdGenerator = () => string;

/**
 * Clock used for default timestamps
 */
export type Clock = () => Date;

/**
 * One consumption request handed to the usage recorder
 */
export interface UsageEntry {
  readonly spoolId: string;
  readonly massGrams: number;
  readonly recordedAt?: string;
  readonly label?: string | null;
  readonly category?: UsageCategory;
}

/**
 * Per-entry result of a usage batch; entries succeed or fail independently
 */
export type UsageOutcome =
  | {
      readonly status: 'recorded';
      readonly record: UsageRecord;
      readonly spool: Spool;
      readonly notices: readonly LedgerNotice[];
    }
  | {
      readonly status: 'rejected';
      readonly entryIndex: number;
      readonly error: AppError;
    };

/**
 * Result of reconciling a scale reading with the ledger
 */
export interface WeighInResult {
  readonly spool: Spool;
  readonly netMass: number;
  readonly record: UsageRecord | null;
}

// ============================================================================
// RECONCILIATION
// ============================================================================

export type ImportPolicy = 'merge' | 'replace';

/**
 * Counts reported after a committed import
 */
export interface ImportReport {
  readonly policy: ImportPolicy;
  readonly spoolsCreated: number;
  readonly spoolsSkipped: number;
  readonly usageRecordsCreated: number;
  readonly usageRecordsSkipped: number;
  readonly materialColorsCreated: number;
  readonly materialColorsSkipped: number;
  readonly settingsUpdated: boolean;
}
