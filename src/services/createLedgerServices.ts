/**
 * @fileoverview Wires the ledger services around one InventoryStore.
 */

import type { InventoryStore } from '../store/InventoryStore';
import { InventoryReconciler } from './InventoryReconciler';
import { InventoryStatistics } from './InventoryStatistics';
import type { LedgerOptions } from './ledger-options';
import { MaterialColorRegistry, type MaterialColorRegistryOptions } from './MaterialColorRegistry';
import type { RecognitionService } from './RecognitionService';
import { SettingsService } from './SettingsService';
import { SpoolLedger } from './SpoolLedger';
import { UsageRecorder } from './UsageRecorder';

export interface LedgerServices {
  readonly store: InventoryStore;
  readonly settings: SettingsService;
  readonly ledger: SpoolLedger;
  readonly recorder: UsageRecorder;
  readonly registry: MaterialColorRegistry;
  readonly reconciler: InventoryReconciler;
  readonly statistics: InventoryStatistics;
  /** null when no recognition service is configured */
  readonly recognition: RecognitionService | null;
}

export interface LedgerServicesOptions extends LedgerOptions, MaterialColorRegistryOptions {
  readonly recognition?: RecognitionService | null;
}

export function createLedgerServices(store: InventoryStore, options: LedgerServicesOptions = {}): LedgerServices {
  const ledgerOptions: LedgerOptions = { generateId: options.generateId, now: options.now };
  const settings = new SettingsService(store);
  const registry = new MaterialColorRegistry(store, { random: options.random });
  const ledger = new SpoolLedger(store, settings, registry, ledgerOptions);

  return {
    store,
    settings,
    ledger,
    recorder: new UsageRecorder(store, ledgerOptions),
    registry,
    reconciler: new InventoryReconciler(store, ledger, settings, ledgerOptions),
    statistics: new InventoryStatistics(store, settings, registry),
    recognition: options.recognition ?? null
  };
}
