/**
 * @fileoverview Tests for the in-process inventory store and its integrity rules
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { makeSpool, makeUsageRecord } from '../__tests__/fixtures';
import { DEFAULT_SETTINGS } from '../types/inventory';
import { ErrorCode } from '../utils/error.utils';
import { MemoryInventoryStore } from './MemoryInventoryStore';

describe('MemoryInventoryStore', () => {
  let store: MemoryInventoryStore;

  beforeEach(() => {
    store = new MemoryInventoryStore();
  });

  describe('spools', () => {
    it('should insert, read, filter and update spools', async () => {
      await store.insertSpool(makeSpool({ id: 'a' }));
      await store.insertSpool(makeSpool({ id: 'b', archived: true }));

      expect(await store.getSpool('a')).toEqual(makeSpool({ id: 'a' }));
      expect(await store.getSpool('missing')).toBeNull();
      expect((await store.listSpools(spool => spool.archived)).map(spool => spool.id)).toEqual(['b']);

      await store.updateSpool(makeSpool({ id: 'a', remainingMass: 10 }));
      expect((await store.getSpool('a'))?.remainingMass).toBe(10);
    });

    it('should reject a duplicate id with WRITE_FAILED', async () => {
      await store.insertSpool(makeSpool({ id: 'a' }));
      await expect(store.insertSpool(makeSpool({ id: 'a' }))).rejects.toMatchObject({
        code: ErrorCode.WRITE_FAILED,
        message: 'Spool a already exists'
      });
    });

    it('should reject updates and deletes of unknown spools', async () => {
      await expect(store.updateSpool(makeSpool({ id: 'x' }))).rejects.toMatchObject({ code: ErrorCode.UNKNOWN_SPOOL });
      await expect(store.deleteSpool('x')).rejects.toMatchObject({ code: ErrorCode.UNKNOWN_SPOOL });
    });

    it('should refuse to delete a spool that still owns usage records', async () => {
      await store.insertSpool(makeSpool({ id: 'a' }));
      await store.insertUsageRecord(makeUsageRecord({ id: 'u1', spoolId: 'a' }));

      await expect(store.deleteSpool('a')).rejects.toMatchObject({
        code: ErrorCode.WRITE_FAILED,
        message: 'Spool a still owns 1 usage records'
      });

      await store.deleteUsageRecord('u1');
      await store.deleteSpool('a');
      expect(await store.listSpools()).toEqual([]);
    });
  });

  describe('usage records', () => {
    it('should track ownership per spool', async () => {
      await store.insertSpool(makeSpool({ id: 'a' }));
      await store.insertUsageRecord(makeUsageRecord({ id: 'u1', spoolId: 'a' }));
      await store.insertUsageRecord(makeUsageRecord({ id: 'u2', spoolId: 'a' }));
      await store.insertUsageRecord(makeUsageRecord({ id: 'u3', spoolId: null }));

      expect(await store.usageRecordIdsFor('a')).toEqual(['u1', 'u2']);
      expect(await store.usageRecordIdsFor('none')).toEqual([]);
      expect((await store.getUsageRecord('u3'))?.spoolId).toBeNull();
    });

    it('should reject records for unknown spools', async () => {
      await expect(store.insertUsageRecord(makeUsageRecord({ spoolId: 'ghost' }))).rejects.toMatchObject({
        code: ErrorCode.UNKNOWN_SPOOL
      });
    });

    it('should reject duplicate record ids and unknown deletes', async () => {
      await store.insertSpool(makeSpool());
      await store.insertUsageRecord(makeUsageRecord({ id: 'u1' }));
      await expect(store.insertUsageRecord(makeUsageRecord({ id: 'u1' }))).rejects.toMatchObject({
        code: ErrorCode.WRITE_FAILED
      });
      await expect(store.deleteUsageRecord('nope')).rejects.toMatchObject({ code: ErrorCode.WRITE_FAILED });
    });
  });

  describe('material colors', () => {
    it('should treat names as unique ignoring case', async () => {
      await store.insertMaterialColor({ material: 'PLA', colorHex: '#111111' });
      expect(await store.getMaterialColor('pla')).toEqual({ material: 'PLA', colorHex: '#111111' });
      await expect(store.insertMaterialColor({ material: 'pla', colorHex: '#222222' })).rejects.toMatchObject({
        code: ErrorCode.WRITE_FAILED
      });
    });

    it('should keep the first spelling on update', async () => {
      await store.insertMaterialColor({ material: 'PETG', colorHex: '#111111' });
      await store.updateMaterialColor({ material: 'petg', colorHex: '#333333' });
      expect(await store.listMaterialColors()).toEqual([{ material: 'PETG', colorHex: '#333333' }]);
    });

    it('should reject updates and deletes of unknown materials', async () => {
      await expect(store.updateMaterialColor({ material: 'ASA', colorHex: '#000000' })).rejects.toMatchObject({
        code: ErrorCode.WRITE_FAILED
      });
      await expect(store.deleteMaterialColor('ASA')).rejects.toMatchObject({ code: ErrorCode.WRITE_FAILED });
    });
  });

  describe('settings and snapshots', () => {
    it('should start without settings', async () => {
      expect(await store.getSettings()).toBeNull();
      await store.saveSettings(DEFAULT_SETTINGS);
      expect(await store.getSettings()).toEqual(DEFAULT_SETTINGS);
    });

    it('should snapshot every entity in insertion order', async () => {
      await store.insertSpool(makeSpool({ id: 'b' }));
      await store.insertSpool(makeSpool({ id: 'a' }));
      await store.insertUsageRecord(makeUsageRecord({ id: 'u1', spoolId: 'a' }));
      await store.insertMaterialColor({ material: 'PLA', colorHex: '#111111' });

      const snapshot = store.snapshot();
      expect(snapshot.spools.map(spool => spool.id)).toEqual(['b', 'a']);
      expect(snapshot.usageRecords).toEqual([makeUsageRecord({ id: 'u1', spoolId: 'a' })]);
      expect(snapshot.materialColors).toEqual([{ material: 'PLA', colorHex: '#111111' }]);
      expect(snapshot.settings).toBeNull();
    });
  });
});
