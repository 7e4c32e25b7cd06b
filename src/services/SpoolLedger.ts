/**
 * @fileoverview Spool lifecycle service: creation, attribute edits, stock revision,
 * archive/restore and cascading delete. Adding a spool of a material the registry has
 * not seen yet binds a color to that material.
 *
 * Each operation reads the spool from the store, runs one pure transition from
 * spool-transitions and commits the result with a single write. A rejected transition
 * throws before anything is written.
 */

import type { InventoryStore } from '../store/InventoryStore';
import type { Spool, SpoolQuery, SpoolView } from '../types/inventory';
import { NewSpoolInputSchema, SpoolDetailsPatchSchema } from '../schemas/inventory.schemas';
import { ErrorCode, guardWrite, unknownSpoolError } from '../utils/error.utils';
import { logInfo, logVerbose } from '../utils/logging';
import { parseOrThrow } from '../utils/validation.utils';
import type { MaterialColorRegistry } from './MaterialColorRegistry';
import type { SettingsService } from './SettingsService';
import { resolveLedgerOptions, type LedgerOptions, type ResolvedLedgerOptions } from './ledger-options';
import {
  applyDetails,
  archiveSpool,
  assertMassInvariant,
  createSpool,
  describeSpool,
  restoreSpool,
  reviseStock
} from './spool-transitions';

const NAMESPACE = 'SpoolLedger';

export interface SpoolDeletionResult {
  readonly spoolId: string;
  readonly deletedUsageRecords: number;
}

export class SpoolLedger {
  private readonly options: ResolvedLedgerOptions;

  constructor(
    private readonly store: InventoryStore,
    private readonly settings: SettingsService,
    private readonly registry: MaterialColorRegistry,
    options?: LedgerOptions
  ) {
    this.options = resolveLedgerOptions(options);
  }

  /**
   * Create a spool with full stock
   * @throws AppError INVALID_INPUT for a malformed input or a non-positive initial mass
   */
  public async addSpool(input: unknown): Promise<Spool> {
    const validated = parseOrThrow(NewSpoolInputSchema, input, ErrorCode.INVALID_INPUT);
    const settings = await this.settings.get();

    const spool = createSpool(validated, {
      id: this.options.generateId(),
      now: this.options.now().toISOString(),
      defaultDiameter: settings.defaultDiameter
    });

    await guardWrite('insertSpool', () => this.store.insertSpool(spool), { spoolId: spool.id });
    await this.registry.colorFor(spool.material);
    logVerbose(NAMESPACE, `Added spool ${spool.id} (${spool.material}, ${spool.initialMass} g)`);
    return spool;
  }

  /**
   * Insert a spool that already has an identity and a stock level (import path)
   * @throws AppError INVALID_AMOUNT when the spool breaks the mass invariant
   */
  public async adoptSpool(spool: Spool): Promise<void> {
    assertMassInvariant(spool);
    await guardWrite('insertSpool', () => this.store.insertSpool(spool), { spoolId: spool.id });
  }

  public async findSpool(id: string): Promise<Spool | null> {
    return this.store.getSpool(id);
  }

  /**
   * @throws AppError UNKNOWN_SPOOL
   */
  public async getSpool(id: string): Promise<Spool> {
    const spool = await this.store.getSpool(id);
    if (!spool) {
      throw unknownSpoolError(id);
    }
    return spool;
  }

  public async listSpools(query: SpoolQuery = {}): Promise<Spool[]> {
    const material = query.material?.trim().toLowerCase();
    return this.store.listSpools(spool =>
      (query.archived === undefined || spool.archived === query.archived) &&
      (material === undefined || material === '' || spool.material.toLowerCase() === material)
    );
  }

  public async describe(id: string): Promise<SpoolView> {
    const [spool, settings] = await Promise.all([this.getSpool(id), this.settings.get()]);
    return describeSpool(spool, settings);
  }

  public async listViews(query: SpoolQuery = {}): Promise<SpoolView[]> {
    const [spools, settings] = await Promise.all([this.listSpools(query), this.settings.get()]);
    return spools.map(spool => describeSpool(spool, settings));
  }

  /**
   * Edit descriptive attributes. Material and masses are not editable here.
   */
  public async updateDetails(id: string, patch: unknown): Promise<Spool> {
    const validated = parseOrThrow(SpoolDetailsPatchSchema, patch, ErrorCode.INVALID_INPUT);
    const spool = await this.getSpool(id);
    return this.commit(applyDetails(spool, validated));
  }

  /**
   * Restate the initial stock, keeping the amount consumed so far
   * @throws AppError INVALID_AMOUNT when newInitialMass is not positive
   */
  public async reviseStock(id: string, newInitialMass: number): Promise<Spool> {
    const spool = await this.getSpool(id);
    const revised = reviseStock(spool, newInitialMass);
    logVerbose(NAMESPACE, `Revised stock of ${id}: ${spool.initialMass} g -> ${newInitialMass} g`);
    return this.commit(revised);
  }

  public async archive(id: string): Promise<Spool> {
    const spool = await this.getSpool(id);
    return spool.archived ? spool : this.commit(archiveSpool(spool));
  }

  public async restore(id: string): Promise<Spool> {
    const spool = await this.getSpool(id);
    return spool.archived ? this.commit(restoreSpool(spool)) : spool;
  }

  /**
   * Permanently delete a spool, deleting each of its usage records first
   */
  public async deleteSpool(id: string): Promise<SpoolDeletionResult> {
    await this.getSpool(id);
    const recordIds = await this.store.usageRecordIdsFor(id);

    let deleted = 0;
    for (const recordId of recordIds) {
      await guardWrite('deleteUsageRecord', () => this.store.deleteUsageRecord(recordId), {
        spoolId: id,
        committed: deleted,
        total: recordIds.length + 1
      });
      deleted++;
    }
    await guardWrite('deleteSpool', () => this.store.deleteSpool(id), {
      spoolId: id,
      committed: deleted,
      total: recordIds.length + 1
    });

    logInfo(NAMESPACE, `Deleted spool ${id} and ${deleted} usage records`);
    return { spoolId: id, deletedUsageRecords: deleted };
  }

  private async commit(spool: Spool): Promise<Spool> {
    await guardWrite('updateSpool', () => this.store.updateSpool(spool), { spoolId: spool.id });
    return spool;
  }
}
