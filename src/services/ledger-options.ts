/**
 * @fileoverview Injectable identity and clock sources shared by the ledger services.
 * Tests pass fixed generators to make usage batches and imports reproducible.
 */

import { randomUUID } from 'crypto';
import type { Clock, IdGenerator } from '../types/inventory';

export interface LedgerOptions {
  readonly generateId?: IdGenerator;
  readonly now?: Clock;
}

export interface ResolvedLedgerOptions {
  readonly generateId: IdGenerator;
  readonly now: Clock;
}

export function resolveLedgerOptions(options: LedgerOptions = {}): ResolvedLedgerOptions {
  return {
    generateId: options.generateId ?? (() => randomUUID()),
    now: options.now ?? (() => new Date())
  };
}
