/**
 * @fileoverview Tests for pure spool transitions and derived reads
 */

import { describe, it, expect } from '@jest/globals';
import { makeSpool } from '../__tests__/fixtures';
import { DEFAULT_SETTINGS } from '../types/inventory';
import { ErrorCode } from '../utils/error.utils';
import {
  applyConsumption,
  applyDetails,
  archiveSpool,
  assertMassInvariant,
  createSpool,
  describeSpool,
  effectiveDensity,
  fitConsumption,
  isLowStock,
  remainingLength,
  remainingPercentage,
  restoreSpool,
  reviseStock
} from './spool-transitions';

const context = { id: 'new-spool', now: '2024-05-01T12:00:00.000Z', defaultDiameter: 1.75 } as const;

describe('createSpool', () => {
  it('should start with full stock and defaults', () => {
    const spool = createSpool({ material: ' PETG ', initialMass: 750 }, context);
    expect(spool).toEqual({
      id: 'new-spool',
      brand: '',
      material: 'PETG',
      colorName: '',
      colorHex: '#CCCCCC',
      diameter: 1.75,
      initialMass: 750,
      remainingMass: 750,
      tareMass: null,
      density: null,
      minTemp: null,
      maxTemp: null,
      bedTemp: null,
      price: null,
      acquiredAt: '2024-05-01T12:00:00.000Z',
      archived: false,
      note: null
    });
  });

  it('should keep supplied attributes', () => {
    const spool = createSpool(
      { material: 'ABS', initialMass: 1000, diameter: 2.85, price: '19.90', tareMass: 220 },
      context
    );
    expect(spool.diameter).toBe(2.85);
    expect(spool.price).toBe('19.90');
    expect(spool.tareMass).toBe(220);
  });

  it('should reject a non-positive initial mass', () => {
    expect(() => createSpool({ material: 'PLA', initialMass: 0 }, context)).toThrow(
      'Initial mass must be greater than 0 g, got 0'
    );
    expect(() => createSpool({ material: 'PLA', initialMass: -5 }, context)).toThrow(
      expect.objectContaining({ code: ErrorCode.INVALID_INPUT })
    );
  });
});

describe('applyConsumption', () => {
  it('should subtract the consumed mass', () => {
    const next = applyConsumption(makeSpool(), 29.86);
    expect(next.remainingMass).toBeCloseTo(970.14, 10);
    expect(next.archived).toBe(false);
  });

  it('should archive a spool that reaches zero', () => {
    const next = applyConsumption(makeSpool({ remainingMass: 50 }), 50);
    expect(next.remainingMass).toBe(0);
    expect(next.archived).toBe(true);
  });

  it('should not go below zero', () => {
    expect(applyConsumption(makeSpool({ remainingMass: 5 }), 20).remainingMass).toBe(0);
  });

  it('should reject non-positive amounts with INVALID_AMOUNT and leave the spool untouched', () => {
    const spool = makeSpool();
    expect(() => applyConsumption(spool, 0)).toThrow(expect.objectContaining({ code: ErrorCode.INVALID_AMOUNT }));
    expect(() => applyConsumption(spool, -3)).toThrow('Consumed mass must be greater than 0 g, got -3');
    expect(spool.remainingMass).toBe(1000);
  });
});

describe('reviseStock', () => {
  it('should keep the consumed amount', () => {
    const next = reviseStock(makeSpool({ initialMass: 1000, remainingMass: 800 }), 1200);
    expect(next.initialMass).toBe(1200);
    expect(next.remainingMass).toBe(1000);
  });

  it('should floor the remaining mass at zero', () => {
    const next = reviseStock(makeSpool({ initialMass: 1000, remainingMass: 300 }), 500);
    expect(next.remainingMass).toBe(0);
  });

  it('should reject non-positive stock', () => {
    expect(() => reviseStock(makeSpool(), 0)).toThrow(expect.objectContaining({ code: ErrorCode.INVALID_AMOUNT }));
  });
});

describe('fitConsumption', () => {
  it('should pass requests that fit', () => {
    expect(fitConsumption(makeSpool({ remainingMass: 100 }), 40)).toEqual({ mass: 40, clamped: false });
  });

  it('should clamp requests above the remaining mass', () => {
    expect(fitConsumption(makeSpool({ remainingMass: 50 }), 200)).toEqual({ mass: 50, clamped: true });
  });
});

describe('archive and restore', () => {
  it('should toggle the archived flag', () => {
    const archived = archiveSpool(makeSpool());
    expect(archived.archived).toBe(true);
    expect(restoreSpool(archived).archived).toBe(false);
  });

  it('should return the same value when nothing changes', () => {
    const spool = makeSpool();
    expect(restoreSpool(spool)).toBe(spool);
    const archived = makeSpool({ archived: true });
    expect(archiveSpool(archived)).toBe(archived);
  });
});

describe('applyDetails', () => {
  it('should change only the supplied fields', () => {
    const next = applyDetails(makeSpool(), { brand: 'Other', note: 'dry first', tareMass: 180 });
    expect(next).toEqual(makeSpool({ brand: 'Other', note: 'dry first', tareMass: 180 }));
  });

  it('should allow clearing nullable fields', () => {
    const next = applyDetails(makeSpool({ price: '20.00' }), { price: null });
    expect(next.price).toBeNull();
  });

  it('should reject a negative tare and a non-positive density', () => {
    expect(() => applyDetails(makeSpool(), { tareMass: -1 })).toThrow('Tare mass must not be negative, got -1');
    expect(() => applyDetails(makeSpool(), { density: 0 })).toThrow('Density must be greater than 0, got 0');
  });
});

describe('assertMassInvariant', () => {
  it('should accept spools within bounds', () => {
    expect(() => assertMassInvariant(makeSpool({ remainingMass: 0 }))).not.toThrow();
  });

  it('should reject remaining above initial', () => {
    expect(() => assertMassInvariant(makeSpool({ id: 'x', remainingMass: 1001 }))).toThrow(
      'Spool x has remaining mass 1001 outside 0..1000 g'
    );
  });
});

describe('derived reads', () => {
  it('should compute the remaining percentage and low-stock flag', () => {
    const spool = makeSpool({ remainingMass: 150 });
    expect(remainingPercentage(spool)).toBe(15);
    expect(isLowStock(spool, 20)).toBe(true);
    expect(isLowStock(spool, 15)).toBe(false);
  });

  it('should prefer the density override', () => {
    expect(effectiveDensity(makeSpool())).toBe(1.24);
    expect(effectiveDensity(makeSpool({ density: 1.3 }))).toBe(1.3);
  });

  it('should compute remaining length in metres', () => {
    expect(remainingLength(makeSpool())).toBeCloseTo(335.3, 0);
    expect(remainingLength(makeSpool({ remainingMass: 0 }))).toBe(0);
  });

  it('should describe a spool with the settings threshold', () => {
    const view = describeSpool(makeSpool({ remainingMass: 100 }), DEFAULT_SETTINGS);
    expect(view.remainingPercentage).toBe(10);
    expect(view.isLowStock).toBe(true);
  });
});
