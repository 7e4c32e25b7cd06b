/**
 * @fileoverview InventoryStore persisted as a JSON snapshot in the data directory.
 *
 * Every mutation updates the in-memory maps and then rewrites the whole snapshot
 * (write to a temporary file, then rename over the old one). Writes are chained so two
 * mutations never write the file at the same time. A failed write surfaces as
 * WRITE_FAILED and the in-memory state is put back to what it was before the mutation,
 * so memory and file never hold a change the caller was told did not happen. Callers
 * await each mutation before issuing the next one.
 */

import * as fs from 'fs';
import * as path from 'path';
import type {
  InventorySettings,
  MaterialColorEntry,
  Spool,
  UsageRecord
} from '../types/inventory';
import { StoreSnapshotSchema } from '../schemas/inventory.schemas';
import { AppError, ErrorCode, guardWrite, isMissingFileError } from '../utils/error.utils';
import { parseOrThrow } from '../utils/validation.utils';
import { logInfo, logVerbose, logWarning } from '../utils/logging';
import { MemoryInventoryStore } from './MemoryInventoryStore';

const NAMESPACE = 'FileInventoryStore';

export const INVENTORY_FILE_NAME = 'inventory.json';

export class FileInventoryStore extends MemoryInventoryStore {
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    super();
    this.filePath = filePath;
  }

  /**
   * Open the store kept in a data directory, loading the existing snapshot if there is one
   */
  public static async open(dataPath: string): Promise<FileInventoryStore> {
    const store = new FileInventoryStore(path.join(dataPath, INVENTORY_FILE_NAME));
    await store.load();
    return store;
  }

  public getFilePath(): string {
    return this.filePath;
  }

  /**
   * Load the snapshot from disk. A missing file is an empty inventory.
   * @throws AppError SCHEMA_INVALID when the file is not a valid snapshot
   */
  public async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        logInfo(NAMESPACE, `No inventory file at ${this.filePath}, starting empty`);
        return;
      }
      throw new AppError(
        `Failed to read inventory file ${this.filePath}`,
        ErrorCode.CONFIG_LOAD_FAILED,
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new AppError(
        `Inventory file ${this.filePath} is not valid JSON`,
        ErrorCode.SCHEMA_INVALID,
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
    }

    const snapshot = parseOrThrow(StoreSnapshotSchema, raw, ErrorCode.SCHEMA_INVALID);
    this.hydrate(snapshot);
    logInfo(
      NAMESPACE,
      `Loaded ${snapshot.spools.length} spools and ${snapshot.usageRecords.length} usage records`
    );
  }

  /**
   * Wait for every queued write to finish
   */
  public async flush(): Promise<void> {
    await this.writeChain;
  }

  // ==========================================================================
  // PERSISTING MUTATIONS
  // ==========================================================================

  public override async insertSpool(spool: Spool): Promise<void> {
    await this.mutate('insertSpool', () => super.insertSpool(spool));
  }

  public override async updateSpool(spool: Spool): Promise<void> {
    await this.mutate('updateSpool', () => super.updateSpool(spool));
  }

  public override async deleteSpool(id: string): Promise<void> {
    await this.mutate('deleteSpool', () => super.deleteSpool(id));
  }

  public override async insertUsageRecord(record: UsageRecord): Promise<void> {
    await this.mutate('insertUsageRecord', () => super.insertUsageRecord(record));
  }

  public override async deleteUsageRecord(id: string): Promise<void> {
    await this.mutate('deleteUsageRecord', () => super.deleteUsageRecord(id));
  }

  public override async insertMaterialColor(entry: MaterialColorEntry): Promise<void> {
    await this.mutate('insertMaterialColor', () => super.insertMaterialColor(entry));
  }

  public override async updateMaterialColor(entry: MaterialColorEntry): Promise<void> {
    await this.mutate('updateMaterialColor', () => super.updateMaterialColor(entry));
  }

  public override async deleteMaterialColor(material: string): Promise<void> {
    await this.mutate('deleteMaterialColor', () => super.deleteMaterialColor(material));
  }

  public override async saveSettings(settings: InventorySettings): Promise<void> {
    await this.mutate('saveSettings', () => super.saveSettings(settings));
  }

  /**
   * Apply a mutation in memory and write it out; a failed write undoes the mutation
   */
  private async mutate(operation: string, apply: () => Promise<void>): Promise<void> {
    const before = this.snapshot();
    await apply();
    try {
      await this.persist(operation);
    } catch (error) {
      this.hydrate(before);
      logWarning(NAMESPACE, `${operation} was not saved and has been undone`);
      throw error;
    }
  }

  private persist(operation: string): Promise<void> {
    const data = JSON.stringify(this.snapshot(), null, 2);
    const write = this.writeChain.then(() =>
      guardWrite(`${operation} (${path.basename(this.filePath)})`, () => this.writeFile(data), {
        filePath: this.filePath
      })
    );
    // a failed write must not block the ones queued after it
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private async writeFile(data: string): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(tempPath, data, 'utf8');
    await fs.promises.rename(tempPath, this.filePath);
    logVerbose(NAMESPACE, `Wrote ${this.filePath}`);
  }
}
