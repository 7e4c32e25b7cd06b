/**
 * @fileoverview Shared builders for ledger tests.
 */

import type { Spool, UsageRecord } from '../types/inventory';

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

export function fixedClock(): Date {
  return new Date(FIXED_NOW.getTime());
}

/**
 * UUID-shaped identity numbered n, e.g. testId(1) = 00000000-0000-4000-8000-000000000001
 */
export function testId(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

/**
 * Deterministic id source starting at testId(first)
 */
export function sequentialIds(first = 1): () => string {
  let next = first;
  return () => testId(next++);
}

export function makeSpool(overrides: Partial<Spool> = {}): Spool {
  return {
    id: testId(1),
    brand: 'Acme',
    material: 'PLA',
    colorName: 'Red',
    colorHex: '#FF0000',
    diameter: 1.75,
    initialMass: 1000,
    remainingMass: 1000,
    tareMass: null,
    density: null,
    minTemp: null,
    maxTemp: null,
    bedTemp: null,
    price: null,
    acquiredAt: '2024-01-01T00:00:00.000Z',
    archived: false,
    note: null,
    ...overrides
  };
}

export function makeUsageRecord(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    id: testId(101),
    spoolId: testId(1),
    mass: 10,
    recordedAt: '2024-04-01T10:00:00.000Z',
    label: null,
    category: 'print',
    ...overrides
  };
}
