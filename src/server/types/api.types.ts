/**
 * @fileoverview Response payloads of the ledger HTTP API.
 *
 * Every response carries `success`; failures add `error` (a readable reason), `code`
 * (an ErrorCode) and, when available, `context`.
 */

import type {
  ImportReport,
  InventorySettings,
  LedgerNotice,
  MaterialColorEntry,
  Spool,
  SpoolView,
  UsageRecord
} from '../../types/inventory';
import type { MaterialUsage, StockReminder, UsageSummary } from '../../services/InventoryStatistics';
import type { SpoolSuggestion } from '../../services/RecognitionService';
import type { ErrorCode } from '../../utils/error.utils';

export interface StandardAPIResponse {
  readonly success: boolean;
  readonly message?: string;
  readonly error?: string;
  readonly code?: ErrorCode;
  readonly context?: Record<string, unknown>;
}

/**
 * Spool attributes flattened together with the derived reads
 */
export type SpoolPayload = Spool & {
  readonly remainingPercentage: number;
  readonly isLowStock: boolean;
  readonly remainingLengthMeters: number;
};

export function toSpoolPayload(view: SpoolView): SpoolPayload {
  return {
    ...view.spool,
    remainingPercentage: view.remainingPercentage,
    isLowStock: view.isLowStock,
    remainingLengthMeters: view.remainingLengthMeters
  };
}

export interface HealthResponse extends StandardAPIResponse {
  readonly status: 'ok';
  readonly importing: boolean;
}

export interface SpoolResponse extends StandardAPIResponse {
  readonly spool: SpoolPayload;
}

export interface SpoolListResponse extends StandardAPIResponse {
  readonly spools: SpoolPayload[];
}

export interface SpoolDeleteResponse extends StandardAPIResponse {
  readonly spoolId: string;
  readonly deletedUsageRecords: number;
}

export interface UsageHistoryResponse extends StandardAPIResponse {
  readonly usage: UsageRecord[];
}

export interface WeighInResponse extends StandardAPIResponse {
  readonly spool: SpoolPayload;
  readonly netMass: number;
  readonly record: UsageRecord | null;
}

export type UsageOutcomePayload =
  | {
      readonly status: 'recorded';
      readonly record: UsageRecord;
      readonly spool: SpoolPayload;
      readonly notices: readonly LedgerNotice[];
    }
  | {
      readonly status: 'rejected';
      readonly entryIndex: number;
      readonly code: ErrorCode;
      readonly error: string;
    };

export interface UsageBatchResponse extends StandardAPIResponse {
  readonly recorded: number;
  readonly rejected: number;
  readonly outcomes: UsageOutcomePayload[];
}

export interface MaterialColorListResponse extends StandardAPIResponse {
  readonly materialColors: MaterialColorEntry[];
}

export interface MaterialColorResponse extends StandardAPIResponse {
  readonly materialColor: MaterialColorEntry;
}

export interface SettingsResponse extends StandardAPIResponse {
  readonly settings: InventorySettings;
}

export interface SummaryResponse extends StandardAPIResponse {
  readonly summary: UsageSummary;
}

export interface MaterialUsageResponse extends StandardAPIResponse {
  readonly materials: MaterialUsage[];
}

export interface RemindersResponse extends StandardAPIResponse {
  readonly reminders: Array<{
    readonly spool: SpoolPayload;
    readonly daysUntilEmpty: StockReminder['daysUntilEmpty'];
  }>;
}

export interface ImportResponse extends StandardAPIResponse {
  readonly report: ImportReport;
}

export interface RecognitionResponse extends StandardAPIResponse {
  readonly suggestion: SpoolSuggestion | null;
  readonly confidence: number | null;
}
