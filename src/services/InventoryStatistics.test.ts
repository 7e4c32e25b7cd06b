/**
 * @fileoverview Tests for usage aggregates and stock reminders
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { makeSpool, makeUsageRecord, testId } from '../__tests__/fixtures';
import { MemoryInventoryStore } from '../store/MemoryInventoryStore';
import { InventoryStatistics, compareDaysUntilEmpty, estimateDaysUntilEmpty, recordCost } from './InventoryStatistics';
import { MaterialColorRegistry } from './MaterialColorRegistry';
import { SettingsService } from './SettingsService';

const A = testId(1);
const B = testId(2);
const C = testId(3);
const D = testId(4);

describe('recordCost', () => {
  it('should attribute the price proportionally to the mass', () => {
    expect(recordCost(makeSpool({ price: '20.00', initialMass: 1000 }), 250)).toBe(5);
  });

  it('should be zero without a usable price', () => {
    expect(recordCost(makeSpool({ price: null }), 250)).toBe(0);
    expect(recordCost(makeSpool({ price: '0' }), 250)).toBe(0);
  });
});

describe('estimateDaysUntilEmpty', () => {
  it('should average the seven most recent records over a week', () => {
    const records = Array.from({ length: 9 }, (_, day) =>
      makeUsageRecord({ id: testId(200 + day), mass: day < 2 ? 1000 : 10, recordedAt: `2024-04-0${day + 1}T10:00:00.000Z` })
    );
    // the two oldest (1000 g each) fall outside the window: 7 * 10 g / 7 days = 10 g a day
    expect(estimateDaysUntilEmpty(makeSpool({ remainingMass: 95 }), records)).toBe(9);
  });

  it('should be null without usage', () => {
    expect(estimateDaysUntilEmpty(makeSpool(), [])).toBeNull();
  });
});

describe('compareDaysUntilEmpty', () => {
  it('should order estimates ascending', () => {
    expect(compareDaysUntilEmpty(2, 5)).toBeLessThan(0);
    expect(compareDaysUntilEmpty(5, 2)).toBeGreaterThan(0);
  });

  it('should put missing estimates last and treat two of them as equal', () => {
    expect(compareDaysUntilEmpty(null, 3)).toBe(1);
    expect(compareDaysUntilEmpty(3, null)).toBe(-1);
    expect(compareDaysUntilEmpty(null, null)).toBe(0);
  });

  it('should sort a mixed list without losing order between missing estimates', () => {
    const sorted = [null, 4, null, 1].map((days, index) => ({ days, index }))
      .sort((a, b) => compareDaysUntilEmpty(a.days, b.days));
    expect(sorted.map(entry => entry.index)).toEqual([3, 1, 0, 2]);
  });
});

describe('InventoryStatistics', () => {
  let store: MemoryInventoryStore;
  let statistics: InventoryStatistics;

  beforeEach(async () => {
    store = new MemoryInventoryStore();
    const settings = new SettingsService(store);
    statistics = new InventoryStatistics(store, settings, new MaterialColorRegistry(store));

    await store.insertSpool(makeSpool({ id: A, material: 'PLA', initialMass: 1000, remainingMass: 900, price: '20.00' }));
    await store.insertSpool(makeSpool({ id: B, material: 'PETG', initialMass: 500, remainingMass: 50 }));
    await store.insertSpool(makeSpool({ id: C, material: 'pla', initialMass: 1000, remainingMass: 0, archived: true, price: '10' }));

    await store.insertUsageRecord(makeUsageRecord({ id: testId(11), spoolId: A, mass: 60, recordedAt: '2024-04-01T10:00:00.000Z' }));
    await store.insertUsageRecord(makeUsageRecord({ id: testId(12), spoolId: A, mass: 40, recordedAt: '2024-04-01T18:00:00.000Z' }));
    await store.insertUsageRecord(makeUsageRecord({ id: testId(13), spoolId: B, mass: 450, recordedAt: '2024-04-03T09:00:00.000Z' }));
    await store.insertUsageRecord(makeUsageRecord({ id: testId(14), spoolId: C, mass: 1000, recordedAt: '2024-03-15T00:00:00.000Z' }));
    await store.insertUsageRecord(makeUsageRecord({ id: testId(15), spoolId: null, mass: 99, recordedAt: '2024-04-02T00:00:00.000Z' }));
  });

  describe('summary', () => {
    it('should aggregate every owned record', async () => {
      expect(await statistics.summary()).toEqual({
        spoolsUsed: 3,
        usageRecords: 4,
        totalMassUsed: 1550,
        totalCost: '12.00',
        currency: '$',
        printingDays: 3,
        activeRemainingMass: 950,
        lowStockCount: 1
      });
    });

    it('should restrict records to a half-open range', async () => {
      const summary = await statistics.summary({ from: '2024-04-01T00:00:00.000Z', to: '2024-04-03T09:00:00.000Z' });
      expect(summary).toMatchObject({
        spoolsUsed: 1,
        usageRecords: 2,
        totalMassUsed: 100,
        totalCost: '2.00',
        printingDays: 1
      });
    });
  });

  describe('usageByMaterial', () => {
    it('should group materials ignoring case, largest first, with registry colors', async () => {
      const materials = await statistics.usageByMaterial();
      expect(materials.map(({ material, colorHex, mass }) => ({ material, colorHex, mass }))).toEqual([
        { material: 'PLA', colorHex: '#7FD4B0', mass: 1100 },
        { material: 'PETG', colorHex: '#B88A5A', mass: 450 }
      ]);
      expect(materials[0]?.percentage).toBeCloseTo(70.97, 2);
      expect(await store.getMaterialColor('petg')).toEqual({ material: 'PETG', colorHex: '#B88A5A' });
    });

    it('should return nothing for an empty range', async () => {
      expect(await statistics.usageByMaterial({ from: '2025-01-01T00:00:00.000Z' })).toEqual([]);
    });
  });

  describe('reminders', () => {
    it('should list active low-stock spools, soonest first', async () => {
      await store.insertSpool(makeSpool({ id: D, material: 'ABS', initialMass: 1000, remainingMass: 100 }));

      const reminders = await statistics.reminders();
      expect(reminders.map(reminder => [reminder.view.spool.id, reminder.daysUntilEmpty])).toEqual([
        [B, 0],
        [D, null]
      ]);
    });
  });
});
