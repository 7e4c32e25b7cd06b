/**
 * @fileoverview Unit conversion between filament length, mass, and gross/net spool weight.
 *
 * All functions are pure. Length and mass are related through the filament's circular
 * cross-section and the material density:
 *
 *   area (cm²)  = π · (diameterMm / 20)²
 *   mass (g)    = lengthCm · area · density
 *
 * Net mass is the filament alone; gross mass includes the empty reel (tare).
 *
 * @module utils/conversion
 */

import { invalidInputError } from './error.utils';

/**
 * Material densities in g/cm³
 */
export const MATERIAL_DENSITIES: Readonly<Record<string, number>> = {
  PLA: 1.24,
  PETG: 1.27,
  ABS: 1.04,
  TPU: 1.2
};

/**
 * Density used for materials missing from the table.
 * PLA is the most common material, so unknown materials are approximated as PLA.
 */
export const FALLBACK_DENSITY = MATERIAL_DENSITIES.PLA;

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidInputError(`${name} must be a positive number, got ${value}`, { [name]: value });
  }
}

/**
 * Cross-sectional area of a filament strand in cm²
 */
export function crossSectionAreaCm2(diameterMm: number): number {
  const radiusCm = diameterMm / 20;
  return Math.PI * radiusCm * radiusCm;
}

/**
 * Convert a filament length in metres to grams
 * @throws AppError INVALID_INPUT when any argument is not positive
 */
export function lengthToMass(lengthMeters: number, diameterMm: number, densityGPerCm3: number): number {
  assertPositive('lengthMeters', lengthMeters);
  assertPositive('diameterMm', diameterMm);
  assertPositive('density', densityGPerCm3);

  const lengthCm = lengthMeters * 100;
  return lengthCm * crossSectionAreaCm2(diameterMm) * densityGPerCm3;
}

/**
 * Convert a filament mass in grams to metres
 * @throws AppError INVALID_INPUT when any argument is not positive
 */
export function massToLength(massGrams: number, diameterMm: number, densityGPerCm3: number): number {
  assertPositive('massGrams', massGrams);
  assertPositive('diameterMm', diameterMm);
  assertPositive('density', densityGPerCm3);

  const lengthCm = massGrams / (crossSectionAreaCm2(diameterMm) * densityGPerCm3);
  return lengthCm / 100;
}

/**
 * Net filament mass from a scale reading.
 * A reading below the tare is a weighing error, not a failure, and yields 0.
 */
export function netMass(grossMass: number, tareMass: number): number {
  return Math.max(0, grossMass - tareMass);
}

/**
 * Gross mass of a spool holding the given net mass
 */
export function grossMass(netMassGrams: number, tareMass: number): number {
  return netMassGrams + tareMass;
}

/**
 * Density for a material name, case-insensitive, falling back to PLA
 */
export function densityForMaterial(materialName: string): number {
  const key = materialName.trim().toUpperCase();
  return MATERIAL_DENSITIES[key] ?? FALLBACK_DENSITY;
}

/**
 * Round grams to two decimals for display and storage of derived values
 */
export function roundGrams(value: number): number {
  return Math.round(value * 100) / 100;
}
