/**
 * @fileoverview Material name to chart color registry.
 *
 * Lookups ignore case. A material seen for the first time is bound to the first palette
 * color no other material uses, or to a random palette color when every one is taken;
 * the binding is persisted, so a lookup can write. A bound color only changes through
 * setColor().
 */

import type { InventoryStore } from '../store/InventoryStore';
import type { MaterialColorEntry } from '../types/inventory';
import { MaterialColorEntrySchema } from '../schemas/inventory.schemas';
import { ErrorCode, guardWrite } from '../utils/error.utils';
import { logInfo, logVerbose } from '../utils/logging';
import { parseOrThrow } from '../utils/validation.utils';

const NAMESPACE = 'MaterialColorRegistry';

export const MATERIAL_PALETTE = [
  '#7FD4B0',
  '#B88A5A',
  '#8BC5D9',
  '#8A7BC4',
  '#F6C85F',
  '#FF6F61',
  '#6B9B7A',
  '#C4A574',
  '#F28E2B',
  '#A0CBE8'
] as const;

/**
 * Color reported for a blank material name
 */
export const FALLBACK_MATERIAL_COLOR = MATERIAL_PALETTE[0];

export const DEFAULT_MATERIALS = [
  'PLA', 'PLA+', 'ABS', 'PETG', 'TPU', 'ASA', 'PA',
  'PC', 'PVA', 'HIPS', 'Wood', 'Carbon', 'Silk', 'Matte'
] as const;

export interface MaterialColorRegistryOptions {
  /** Uniform [0, 1) source for the exhausted-palette pick */
  readonly random?: () => number;
}

export class MaterialColorRegistry {
  private readonly random: () => number;

  constructor(
    private readonly store: InventoryStore,
    options: MaterialColorRegistryOptions = {}
  ) {
    this.random = options.random ?? Math.random;
  }

  /**
   * Seed the default materials, cycling through the palette. Does nothing unless the
   * registry is completely empty.
   * @returns whether anything was seeded
   */
  public async ensureSeeded(): Promise<boolean> {
    const existing = await this.store.listMaterialColors();
    if (existing.length > 0) {
      return false;
    }

    for (const [index, material] of DEFAULT_MATERIALS.entries()) {
      const entry = { material, colorHex: MATERIAL_PALETTE[index % MATERIAL_PALETTE.length] };
      await guardWrite('insertMaterialColor', () => this.store.insertMaterialColor(entry), {
        committed: index,
        total: DEFAULT_MATERIALS.length
      });
    }

    logInfo(NAMESPACE, `Seeded ${DEFAULT_MATERIALS.length} default material colors`);
    return true;
  }

  /**
   * Color bound to a material, allocating and persisting a binding when absent
   */
  public async colorFor(material: string): Promise<string> {
    const name = material.trim();
    if (name === '') {
      return FALLBACK_MATERIAL_COLOR;
    }

    const existing = await this.store.getMaterialColor(name);
    if (existing) {
      return existing.colorHex;
    }

    const colorHex = await this.allocateColor();
    await guardWrite('insertMaterialColor', () => this.store.insertMaterialColor({ material: name, colorHex }), {
      material: name
    });
    logVerbose(NAMESPACE, `Assigned ${colorHex} to ${name}`);
    return colorHex;
  }

  /**
   * Manual override of a material's color; creates the binding when absent
   * @throws AppError INVALID_INPUT for a blank material or a malformed color
   */
  public async setColor(material: string, colorHex: string): Promise<MaterialColorEntry> {
    const entry = parseOrThrow(MaterialColorEntrySchema, { material, colorHex }, ErrorCode.INVALID_INPUT);

    const existing = await this.store.getMaterialColor(entry.material);
    if (existing) {
      await guardWrite('updateMaterialColor', () => this.store.updateMaterialColor(entry), {
        material: entry.material
      });
      return { material: existing.material, colorHex: entry.colorHex };
    }

    await guardWrite('insertMaterialColor', () => this.store.insertMaterialColor(entry), {
      material: entry.material
    });
    return entry;
  }

  public async list(): Promise<MaterialColorEntry[]> {
    return this.store.listMaterialColors();
  }

  private async allocateColor(): Promise<string> {
    const used = new Set(
      (await this.store.listMaterialColors()).map(entry => entry.colorHex.toUpperCase())
    );
    const unused = MATERIAL_PALETTE.find(color => !used.has(color));
    if (unused) {
      return unused;
    }

    const index = Math.min(
      MATERIAL_PALETTE.length - 1,
      Math.floor(this.random() * MATERIAL_PALETTE.length)
    );
    return MATERIAL_PALETTE[index];
  }
}
