/**
 * @fileoverview Write path for consumption: turns usage entries into immutable usage
 * records and applies each one to its spool.
 *
 * Entries in a batch are processed in order and independently. An entry with a bad shape,
 * a non-positive amount or an unknown spool is rejected on its own; the others still
 * commit. A request above the remaining mass is clamped to exactly the remaining mass
 * and reported with a CLAMPED_TO_AVAILABLE notice. Storage failures are not per-entry:
 * they abort the batch with WRITE_FAILED.
 *
 * Per committed entry the record is inserted first, then the spool is updated, so the
 * sum of a spool's record masses stays equal to initialMass - remainingMass.
 */

import type { InventoryStore } from '../store/InventoryStore';
import type {
  LedgerNotice,
  Spool,
  UsageCategory,
  UsageEntry,
  UsageOutcome,
  UsageRecord,
  WeighInResult
} from '../types/inventory';
import { UsageEntrySchema } from '../schemas/inventory.schemas';
import {
  ErrorCode,
  guardWrite,
  invalidAmountError,
  invalidInputError,
  isAppError,
  unknownSpoolError
} from '../utils/error.utils';
import { netMass } from '../utils/conversion.utils';
import { logVerbose } from '../utils/logging';
import { validate } from '../utils/validation.utils';
import { resolveLedgerOptions, type LedgerOptions, type ResolvedLedgerOptions } from './ledger-options';
import { applyConsumption, fitConsumption } from './spool-transitions';

const NAMESPACE = 'UsageRecorder';

const WEIGH_IN_LABEL = 'Weigh-in';

export interface WeighInOptions {
  readonly recordedAt?: string;
  readonly label?: string | null;
}

interface CommittedUsage {
  readonly record: UsageRecord;
  readonly spool: Spool;
  readonly notices: LedgerNotice[];
}

export class UsageRecorder {
  private readonly options: ResolvedLedgerOptions;

  constructor(
    private readonly store: InventoryStore,
    options?: LedgerOptions
  ) {
    this.options = resolveLedgerOptions(options);
  }

  /**
   * Record a batch of usage entries, one outcome per entry in input order
   */
  public async recordUsage(entries: readonly unknown[]): Promise<UsageOutcome[]> {
    const outcomes: UsageOutcome[] = [];

    for (const [entryIndex, raw] of entries.entries()) {
      const parsed = validate(UsageEntrySchema, raw, ErrorCode.INVALID_INPUT);
      if (!parsed.success) {
        outcomes.push({ status: 'rejected', entryIndex, error: parsed.error });
        continue;
      }

      try {
        const committed = await this.applyEntry(parsed.data);
        outcomes.push({ status: 'recorded', ...committed });
      } catch (error) {
        if (isAppError(error) && error.code !== ErrorCode.WRITE_FAILED) {
          outcomes.push({ status: 'rejected', entryIndex, error });
          continue;
        }
        throw error;
      }
    }

    return outcomes;
  }

  /**
   * Reconcile a gross scale reading: the drop from the current remaining mass becomes a
   * manual_adjustment record. A reading at or above the remaining mass records nothing.
   * @throws AppError INVALID_INPUT when the spool has no tare or the reading is negative
   */
  public async recordWeighIn(
    spoolId: string,
    grossMassGrams: number,
    options: WeighInOptions = {}
  ): Promise<WeighInResult> {
    const spool = await this.store.getSpool(spoolId);
    if (!spool) {
      throw unknownSpoolError(spoolId);
    }
    if (spool.tareMass === null) {
      throw invalidInputError(`Spool ${spoolId} has no tare mass; set one before weighing`, { spoolId });
    }
    if (!Number.isFinite(grossMassGrams) || grossMassGrams < 0) {
      throw invalidInputError(`Scale reading must be a non-negative number, got ${grossMassGrams}`, {
        spoolId,
        grossMassGrams
      });
    }

    const measured = netMass(grossMassGrams, spool.tareMass);
    const consumed = spool.remainingMass - measured;
    if (consumed <= 0) {
      logVerbose(NAMESPACE, `Weigh-in of ${spoolId} shows no consumption (${measured} g net)`);
      return { spool, netMass: measured, record: null };
    }

    const committed = await this.applyEntry({
      spoolId,
      massGrams: consumed,
      recordedAt: options.recordedAt,
      label: options.label === undefined ? WEIGH_IN_LABEL : options.label,
      category: 'manual_adjustment'
    });
    return { spool: committed.spool, netMass: measured, record: committed.record };
  }

  private async applyEntry(entry: UsageEntry): Promise<CommittedUsage> {
    if (!(entry.massGrams > 0)) {
      throw invalidAmountError(`Usage mass must be greater than 0 g, got ${entry.massGrams}`, {
        spoolId: entry.spoolId,
        massGrams: entry.massGrams
      });
    }

    const spool = await this.store.getSpool(entry.spoolId);
    if (!spool) {
      throw unknownSpoolError(entry.spoolId);
    }
    if (spool.remainingMass <= 0) {
      throw invalidAmountError(`Spool ${spool.id} is empty`, { spoolId: spool.id, massGrams: entry.massGrams });
    }

    const fit = fitConsumption(spool, entry.massGrams);
    const notices: LedgerNotice[] = [];
    if (fit.clamped) {
      notices.push({
        code: 'CLAMPED_TO_AVAILABLE',
        message: `Requested ${entry.massGrams} g but spool ${spool.id} only had ${fit.mass} g; recorded ${fit.mass} g`,
        spoolId: spool.id,
        requestedMass: entry.massGrams,
        recordedMass: fit.mass
      });
    }

    const category: UsageCategory = entry.category ?? 'print';
    const record: UsageRecord = {
      id: this.options.generateId(),
      spoolId: spool.id,
      mass: fit.mass,
      recordedAt: entry.recordedAt ?? this.options.now().toISOString(),
      label: entry.label ?? null,
      category
    };
    const updated = applyConsumption(spool, fit.mass);

    await guardWrite('insertUsageRecord', () => this.store.insertUsageRecord(record), {
      spoolId: spool.id,
      committed: 0,
      total: 2
    });
    await guardWrite('updateSpool', () => this.store.updateSpool(updated), {
      spoolId: spool.id,
      committed: 1,
      total: 2
    });

    logVerbose(
      NAMESPACE,
      `Recorded ${record.mass} g on ${spool.id}; ${updated.remainingMass} g left${updated.archived ? ' (archived)' : ''}`
    );
    return { record, spool: updated, notices };
  }
}
