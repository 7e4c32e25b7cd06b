/**
 * @fileoverview Export of the whole inventory to a portable document, and import of such
 * a document under a merge or replace policy.
 *
 * Import runs through a guarded state machine:
 *
 *   idle -> validating -> applying_merge | applying_replace -> committed | failed
 *           validating -> failed  (malformed document, unsupported version)
 *
 * The document is validated completely before the first write, so a rejected document
 * has no side effects. Once writes begin they are not rolled back: a storage failure
 * leaves the writes made so far in place and reports how many of the planned writes
 * were committed. Merge is keyed on identity, so re-running a failed merge completes it.
 *
 * Only one import runs at a time; a second call while one is in flight is rejected with
 * IMPORT_IN_PROGRESS.
 */

import { EventEmitter } from 'events';
import type { InventoryStore } from '../store/InventoryStore';
import type {
  ImportPolicy,
  ImportReport,
  MaterialColorEntry,
  Spool,
  UsageRecord
} from '../types/inventory';
import {
  CURRENT_EXPORT_VERSION,
  ExportDocumentSchema,
  type ExportDocument,
  type ExportedSpool
} from '../schemas/inventory.schemas';
import {
  AppError,
  ErrorCode,
  schemaInvalidError,
  writeFailedError
} from '../utils/error.utils';
import { logError, logInfo, logVerbose } from '../utils/logging';
import { parseOrThrow } from '../utils/validation.utils';
import type { SettingsService } from './SettingsService';
import type { SpoolLedger } from './SpoolLedger';
import { resolveLedgerOptions, type LedgerOptions, type ResolvedLedgerOptions } from './ledger-options';

const NAMESPACE = 'InventoryReconciler';

export type ReconcilerState =
  | 'idle'
  | 'validating'
  | 'applying_merge'
  | 'applying_replace'
  | 'committed'
  | 'failed';

const TRANSITIONS: Readonly<Record<ReconcilerState, readonly ReconcilerState[]>> = {
  idle: ['validating'],
  validating: ['applying_merge', 'applying_replace', 'failed'],
  applying_merge: ['committed', 'failed'],
  applying_replace: ['committed', 'failed'],
  committed: ['validating'],
  failed: ['validating']
};

const BUSY_STATES: readonly ReconcilerState[] = ['validating', 'applying_merge', 'applying_replace'];

export interface ReconcilerStateChange {
  readonly from: ReconcilerState;
  readonly to: ReconcilerState;
}

/**
 * Counter shared by the steps of one import
 */
interface WriteProgress {
  readonly policy: ImportPolicy;
  readonly total: number;
  committed: number;
}

interface MutableReport {
  spoolsCreated: number;
  spoolsSkipped: number;
  usageRecordsCreated: number;
  usageRecordsSkipped: number;
  materialColorsCreated: number;
  materialColorsSkipped: number;
  settingsUpdated: boolean;
}

function emptyReport(): MutableReport {
  return {
    spoolsCreated: 0,
    spoolsSkipped: 0,
    usageRecordsCreated: 0,
    usageRecordsSkipped: 0,
    materialColorsCreated: 0,
    materialColorsSkipped: 0,
    settingsUpdated: false
  };
}

function splitExportedSpool(exported: ExportedSpool): { spool: Spool; records: UsageRecord[] } {
  const { usage, ...spool } = exported;
  return {
    spool,
    records: usage.map(record => ({ ...record, spoolId: spool.id }))
  };
}

export class InventoryReconciler extends EventEmitter {
  private state: ReconcilerState = 'idle';
  private readonly options: ResolvedLedgerOptions;

  constructor(
    private readonly store: InventoryStore,
    private readonly ledger: SpoolLedger,
    private readonly settings: SettingsService,
    options?: LedgerOptions
  ) {
    super();
    this.options = resolveLedgerOptions(options);
  }

  public getState(): ReconcilerState {
    return this.state;
  }

  public isImporting(): boolean {
    return BUSY_STATES.includes(this.state);
  }

  // ==========================================================================
  // EXPORT
  // ==========================================================================

  /**
   * Every spool (archived included) with its usage records, every material color and
   * the settings record. Orphaned usage records have no owning spool and are left out.
   */
  public async exportDocument(): Promise<ExportDocument> {
    const [spools, records, materialColors, settings] = await Promise.all([
      this.store.listSpools(),
      this.store.listUsageRecords(record => record.spoolId !== null),
      this.store.listMaterialColors(),
      this.settings.get()
    ]);

    const usageBySpool = new Map<string, UsageRecord[]>();
    for (const record of records) {
      if (record.spoolId === null) {
        continue;
      }
      const owned = usageBySpool.get(record.spoolId) ?? [];
      owned.push(record);
      usageBySpool.set(record.spoolId, owned);
    }

    return {
      version: CURRENT_EXPORT_VERSION,
      exportedAt: this.options.now().toISOString(),
      spools: spools.map(spool => ({
        ...spool,
        usage: (usageBySpool.get(spool.id) ?? []).map(({ spoolId: _owner, ...record }) => record)
      })),
      materialColors,
      settings
    };
  }

  public async exportJson(): Promise<string> {
    return JSON.stringify(await this.exportDocument(), null, 2);
  }

  // ==========================================================================
  // IMPORT
  // ==========================================================================

  /**
   * Import a document (parsed JSON or JSON text)
   * @throws AppError IMPORT_IN_PROGRESS, SCHEMA_INVALID, or WRITE_FAILED with
   *   context.committed / context.total
   */
  public async importDocument(input: unknown, policy: ImportPolicy): Promise<ImportReport> {
    if (this.isImporting()) {
      throw new AppError('An import is already running', ErrorCode.IMPORT_IN_PROGRESS, { state: this.state });
    }

    this.transition('validating');
    let document: ExportDocument;
    try {
      document = this.parseDocument(input);
    } catch (error) {
      this.transition('failed');
      throw error;
    }

    this.transition(policy === 'replace' ? 'applying_replace' : 'applying_merge');
    try {
      const report = policy === 'replace'
        ? await this.applyReplace(document)
        : await this.applyMerge(document);
      this.transition('committed');
      logInfo(
        NAMESPACE,
        `Import (${policy}) committed: ${report.spoolsCreated} spools, ${report.usageRecordsCreated} usage records, ` +
        `${report.materialColorsCreated} material colors created`
      );
      return report;
    } catch (error) {
      this.transition('failed');
      logError(NAMESPACE, `Import (${policy}) failed`, error);
      throw error;
    }
  }

  private parseDocument(input: unknown): ExportDocument {
    let raw = input;
    if (typeof input === 'string') {
      try {
        raw = JSON.parse(input);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw schemaInvalidError(`Document is not valid JSON: ${reason}`);
      }
    }
    return parseOrThrow(ExportDocumentSchema, raw, ErrorCode.SCHEMA_INVALID);
  }

  private async applyMerge(document: ExportDocument): Promise<ImportReport> {
    const report = emptyReport();
    const existingSpoolIds = new Set((await this.store.listSpools()).map(spool => spool.id));
    const existingRecordIds = new Set((await this.store.listUsageRecords()).map(record => record.id));
    const existingMaterials = new Set(
      (await this.store.listMaterialColors()).map(entry => entry.material.trim().toLowerCase())
    );

    // Plan every write before the first one so a failure can report committed / total
    const spoolWrites: Array<{ spool: Spool; records: UsageRecord[] }> = [];
    for (const exported of document.spools) {
      if (existingSpoolIds.has(exported.id)) {
        report.spoolsSkipped++;
        report.usageRecordsSkipped += exported.usage.length;
        continue;
      }
      const { spool, records } = splitExportedSpool(exported);
      const fresh = records.filter(record => !existingRecordIds.has(record.id));
      report.usageRecordsSkipped += records.length - fresh.length;
      spoolWrites.push({ spool, records: fresh });
    }

    const colorWrites: MaterialColorEntry[] = [];
    for (const entry of document.materialColors) {
      const key = entry.material.trim().toLowerCase();
      if (existingMaterials.has(key)) {
        report.materialColorsSkipped++;
        continue;
      }
      existingMaterials.add(key);
      colorWrites.push(entry);
    }

    const progress: WriteProgress = {
      policy: 'merge',
      committed: 0,
      total:
        spoolWrites.reduce((sum, write) => sum + 1 + write.records.length, 0) +
        colorWrites.length +
        (document.settings ? 1 : 0)
    };

    await this.createSpools(spoolWrites, progress, report);
    await this.createMaterialColors(colorWrites, progress, report);
    await this.overwriteSettings(document, progress, report);

    return { policy: 'merge', ...report };
  }

  private async applyReplace(document: ExportDocument): Promise<ImportReport> {
    const report = emptyReport();
    const [spools, records, materialColors] = await Promise.all([
      this.store.listSpools(),
      this.store.listUsageRecords(),
      this.store.listMaterialColors()
    ]);
    const spoolWrites = document.spools.map(splitExportedSpool);

    const progress: WriteProgress = {
      policy: 'replace',
      committed: 0,
      total:
        records.length +
        spools.length +
        materialColors.length +
        spoolWrites.reduce((sum, write) => sum + 1 + write.records.length, 0) +
        document.materialColors.length +
        (document.settings ? 1 : 0)
    };

    for (const spool of spools) {
      const recordIds = await this.store.usageRecordIdsFor(spool.id);
      for (const recordId of recordIds) {
        await this.step(progress, `delete usage record ${recordId}`, () => this.store.deleteUsageRecord(recordId));
      }
      await this.step(progress, `delete spool ${spool.id}`, () => this.store.deleteSpool(spool.id));
    }
    for (const orphan of records.filter(record => record.spoolId === null)) {
      await this.step(progress, `delete usage record ${orphan.id}`, () => this.store.deleteUsageRecord(orphan.id));
    }
    for (const entry of materialColors) {
      await this.step(progress, `delete material color ${entry.material}`, () =>
        this.store.deleteMaterialColor(entry.material)
      );
    }

    await this.createSpools(spoolWrites, progress, report);
    await this.createMaterialColors(document.materialColors, progress, report);
    await this.overwriteSettings(document, progress, report);

    return { policy: 'replace', ...report };
  }

  private async createSpools(
    writes: ReadonlyArray<{ spool: Spool; records: UsageRecord[] }>,
    progress: WriteProgress,
    report: MutableReport
  ): Promise<void> {
    for (const { spool, records } of writes) {
      await this.step(progress, `create spool ${spool.id}`, () => this.ledger.adoptSpool(spool));
      report.spoolsCreated++;
      for (const record of records) {
        await this.step(progress, `create usage record ${record.id}`, () => this.store.insertUsageRecord(record));
        report.usageRecordsCreated++;
      }
    }
  }

  private async createMaterialColors(
    entries: readonly MaterialColorEntry[],
    progress: WriteProgress,
    report: MutableReport
  ): Promise<void> {
    for (const entry of entries) {
      await this.step(progress, `create material color ${entry.material}`, () =>
        this.store.insertMaterialColor(entry)
      );
      report.materialColorsCreated++;
    }
  }

  private async overwriteSettings(
    document: ExportDocument,
    progress: WriteProgress,
    report: MutableReport
  ): Promise<void> {
    const settings = document.settings;
    if (!settings) {
      return;
    }
    await this.step(progress, 'overwrite settings', () => this.settings.overwrite(settings));
    report.settingsUpdated = true;
  }

  /**
   * Run one planned write. Any failure becomes WRITE_FAILED carrying the progress so far.
   */
  private async step(progress: WriteProgress, operation: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw writeFailedError(
        `Import stopped at "${operation}": ${reason}`,
        {
          policy: progress.policy,
          operation,
          committed: progress.committed,
          total: progress.total
        },
        error
      );
    }
    progress.committed++;
    logVerbose(NAMESPACE, `${operation} (${progress.committed}/${progress.total})`);
  }

  private transition(to: ReconcilerState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new AppError(`Invalid reconciler transition ${from} -> ${to}`, ErrorCode.UNKNOWN, { from, to });
    }
    this.state = to;
    const change: ReconcilerStateChange = { from, to };
    this.emit('state-changed', change);
  }
}
