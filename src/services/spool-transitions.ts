/**
 * @fileoverview Pure state transitions and derived reads for a single spool.
 *
 * Every transition takes a spool value and returns a new one; nothing here touches
 * persistence. Validation happens before any field is computed, so a rejected
 * transition throws and the caller still holds the unchanged spool.
 *
 * Mass invariant kept by every transition: 0 <= remainingMass <= initialMass.
 *
 * @module services/spool-transitions
 */

import type {
  InventorySettings,
  NewSpoolInput,
  FilamentDiameter,
  Spool,
  SpoolDetailsPatch,
  SpoolView
} from '../types/inventory';
import { DEFAULT_SPOOL_COLOR } from '../types/inventory';
import { invalidAmountError, invalidInputError } from '../utils/error.utils';
import { densityForMaterial, massToLength } from '../utils/conversion.utils';

/**
 * Identity and clock values a new spool needs
 */
export interface SpoolCreationContext {
  readonly id: string;
  readonly now: string;
  readonly defaultDiameter: FilamentDiameter;
}

/**
 * Result of fitting a requested consumption to what the spool holds
 */
export interface ConsumptionFit {
  readonly mass: number;
  readonly clamped: boolean;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function keep<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

/**
 * Build a new spool with full stock
 * @throws AppError INVALID_INPUT when initialMass is not positive
 */
export function createSpool(input: NewSpoolInput, context: SpoolCreationContext): Spool {
  if (!isPositive(input.initialMass)) {
    throw invalidInputError(`Initial mass must be greater than 0 g, got ${input.initialMass}`, {
      initialMass: input.initialMass
    });
  }

  return {
    id: context.id,
    brand: input.brand ?? '',
    material: input.material.trim(),
    colorName: input.colorName ?? '',
    colorHex: input.colorHex ?? DEFAULT_SPOOL_COLOR,
    diameter: input.diameter ?? context.defaultDiameter,
    initialMass: input.initialMass,
    remainingMass: input.initialMass,
    tareMass: input.tareMass ?? null,
    density: input.density ?? null,
    minTemp: input.minTemp ?? null,
    maxTemp: input.maxTemp ?? null,
    bedTemp: input.bedTemp ?? null,
    price: input.price ?? null,
    acquiredAt: input.acquiredAt ?? context.now,
    archived: false,
    note: input.note ?? null
  };
}

/**
 * Subtract consumed filament. Reaching zero archives the spool in the same transition.
 * @throws AppError INVALID_AMOUNT when massGrams is not positive
 */
export function applyConsumption(spool: Spool, massGrams: number): Spool {
  if (!isPositive(massGrams)) {
    throw invalidAmountError(`Consumed mass must be greater than 0 g, got ${massGrams}`, {
      spoolId: spool.id,
      massGrams
    });
  }

  const remainingMass = Math.max(0, spool.remainingMass - massGrams);
  return {
    ...spool,
    remainingMass,
    archived: remainingMass === 0 ? true : spool.archived
  };
}

/**
 * Restate the initial stock while keeping the amount already consumed
 * @throws AppError INVALID_AMOUNT when newInitialMass is not positive
 */
export function reviseStock(spool: Spool, newInitialMass: number): Spool {
  if (!isPositive(newInitialMass)) {
    throw invalidAmountError(`Initial mass must be greater than 0 g, got ${newInitialMass}`, {
      spoolId: spool.id,
      newInitialMass
    });
  }

  const consumedSoFar = spool.initialMass - spool.remainingMass;
  const remainingMass = Math.min(Math.max(0, newInitialMass - consumedSoFar), newInitialMass);

  return {
    ...spool,
    initialMass: newInitialMass,
    remainingMass
  };
}

/**
 * Clamp a requested consumption to the remaining mass
 */
export function fitConsumption(spool: Spool, requestedMass: number): ConsumptionFit {
  if (requestedMass > spool.remainingMass) {
    return { mass: spool.remainingMass, clamped: true };
  }
  return { mass: requestedMass, clamped: false };
}

export function archiveSpool(spool: Spool): Spool {
  return spool.archived ? spool : { ...spool, archived: true };
}

export function restoreSpool(spool: Spool): Spool {
  return spool.archived ? { ...spool, archived: false } : spool;
}

/**
 * Apply an attribute edit. Mass fields are not part of the patch.
 * @throws AppError INVALID_INPUT for non-positive tare or density
 */
export function applyDetails(spool: Spool, patch: SpoolDetailsPatch): Spool {
  if (patch.tareMass !== undefined && patch.tareMass !== null && !(patch.tareMass >= 0)) {
    throw invalidInputError(`Tare mass must not be negative, got ${patch.tareMass}`, { tareMass: patch.tareMass });
  }
  if (patch.density !== undefined && patch.density !== null && !isPositive(patch.density)) {
    throw invalidInputError(`Density must be greater than 0, got ${patch.density}`, { density: patch.density });
  }

  return {
    ...spool,
    brand: keep(patch.brand, spool.brand),
    colorName: keep(patch.colorName, spool.colorName),
    colorHex: keep(patch.colorHex, spool.colorHex),
    diameter: keep(patch.diameter, spool.diameter),
    tareMass: keep(patch.tareMass, spool.tareMass),
    density: keep(patch.density, spool.density),
    minTemp: keep(patch.minTemp, spool.minTemp),
    maxTemp: keep(patch.maxTemp, spool.maxTemp),
    bedTemp: keep(patch.bedTemp, spool.bedTemp),
    price: keep(patch.price, spool.price),
    acquiredAt: keep(patch.acquiredAt, spool.acquiredAt),
    note: keep(patch.note, spool.note)
  };
}

/**
 * Check the mass invariant on a spool coming from outside the ledger (import, disk)
 * @throws AppError INVALID_AMOUNT when the spool breaks it
 */
export function assertMassInvariant(spool: Spool): void {
  if (!isPositive(spool.initialMass)) {
    throw invalidAmountError(`Spool ${spool.id} has initial mass ${spool.initialMass}; it must be greater than 0 g`, {
      spoolId: spool.id
    });
  }
  if (!(spool.remainingMass >= 0 && spool.remainingMass <= spool.initialMass)) {
    throw invalidAmountError(
      `Spool ${spool.id} has remaining mass ${spool.remainingMass} outside 0..${spool.initialMass} g`,
      { spoolId: spool.id }
    );
  }
}

// ============================================================================
// DERIVED READS
// ============================================================================

export function remainingPercentage(spool: Spool): number {
  if (spool.initialMass <= 0) {
    return 0;
  }
  return (spool.remainingMass / spool.initialMass) * 100;
}

export function isLowStock(spool: Spool, lowStockThreshold: number): boolean {
  return remainingPercentage(spool) < lowStockThreshold;
}

/**
 * Density of the spool: its own override, otherwise the material table
 */
export function effectiveDensity(spool: Spool): number {
  return spool.density ?? densityForMaterial(spool.material);
}

/**
 * Remaining filament length in metres (0 for an empty spool)
 */
export function remainingLength(spool: Spool): number {
  if (spool.remainingMass <= 0) {
    return 0;
  }
  return massToLength(spool.remainingMass, spool.diameter, effectiveDensity(spool));
}

export function describeSpool(spool: Spool, settings: InventorySettings): SpoolView {
  return {
    spool,
    remainingPercentage: remainingPercentage(spool),
    isLowStock: isLowStock(spool, settings.lowStockThreshold),
    remainingLengthMeters: remainingLength(spool)
  };
}
