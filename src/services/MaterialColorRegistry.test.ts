/**
 * @fileoverview Tests for material color bindings
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryInventoryStore } from '../store/MemoryInventoryStore';
import { ErrorCode } from '../utils/error.utils';
import {
  DEFAULT_MATERIALS,
  FALLBACK_MATERIAL_COLOR,
  MATERIAL_PALETTE,
  MaterialColorRegistry
} from './MaterialColorRegistry';

describe('MaterialColorRegistry', () => {
  let store: MemoryInventoryStore;
  let registry: MaterialColorRegistry;

  beforeEach(() => {
    store = new MemoryInventoryStore();
    registry = new MaterialColorRegistry(store, { random: () => 0.35 });
  });

  describe('ensureSeeded', () => {
    it('should seed the default materials cycling through the palette', async () => {
      expect(await registry.ensureSeeded()).toBe(true);
      const entries = await registry.list();
      expect(entries).toHaveLength(DEFAULT_MATERIALS.length);
      expect(entries[0]).toEqual({ material: 'PLA', colorHex: '#7FD4B0' });
      expect(entries[9]).toEqual({ material: 'HIPS', colorHex: '#A0CBE8' });
      expect(entries[10]).toEqual({ material: 'Wood', colorHex: '#7FD4B0' });
    });

    it('should give the same entries when seeded twice', async () => {
      await registry.ensureSeeded();
      const once = await registry.list();

      expect(await registry.ensureSeeded()).toBe(false);
      expect(await registry.list()).toEqual(once);
    });

    it('should not seed a registry that has entries', async () => {
      await store.insertMaterialColor({ material: 'Custom', colorHex: '#123456' });
      expect(await registry.ensureSeeded()).toBe(false);
      expect(await registry.list()).toEqual([{ material: 'Custom', colorHex: '#123456' }]);
    });
  });

  describe('colorFor', () => {
    it('should return an existing binding ignoring case', async () => {
      await store.insertMaterialColor({ material: 'PETG', colorHex: '#123456' });
      expect(await registry.colorFor('petg')).toBe('#123456');
    });

    it('should allocate the first unused palette color and store it', async () => {
      await store.insertMaterialColor({ material: 'PLA', colorHex: MATERIAL_PALETTE[0] });
      expect(await registry.colorFor(' Nylon ')).toBe('#B88A5A');
      expect(await store.getMaterialColor('nylon')).toEqual({ material: 'Nylon', colorHex: '#B88A5A' });
    });

    it('should pick a palette color at random once the palette is used up', async () => {
      await registry.ensureSeeded();
      expect(await registry.colorFor('Nylon')).toBe('#8A7BC4');
    });

    it('should return the fallback for a blank name without storing it', async () => {
      expect(await registry.colorFor('   ')).toBe(FALLBACK_MATERIAL_COLOR);
      expect(await registry.list()).toEqual([]);
    });
  });

  describe('setColor', () => {
    it('should update an existing binding keeping its spelling', async () => {
      await store.insertMaterialColor({ material: 'PLA', colorHex: '#111111' });
      expect(await registry.setColor('pla', '#abcdef')).toEqual({ material: 'PLA', colorHex: '#ABCDEF' });
      expect(await registry.colorFor('PLA')).toBe('#ABCDEF');
    });

    it('should create a binding when absent', async () => {
      expect(await registry.setColor('ASA', '#010203')).toEqual({ material: 'ASA', colorHex: '#010203' });
    });

    it('should reject malformed colors and blank materials', async () => {
      await expect(registry.setColor('PLA', 'red')).rejects.toMatchObject({ code: ErrorCode.INVALID_INPUT });
      await expect(registry.setColor(' ', '#010203')).rejects.toMatchObject({ code: ErrorCode.INVALID_INPUT });
    });
  });
});
