/**
 * @fileoverview Zod schemas for ledger entities, ledger inputs, the on-disk store snapshot
 * and the portable export document.
 *
 * Entity schemas accept records written by older builds: optional attributes may be
 * missing and default to null, and an unknown usage category reads as "print".
 *
 * Key exports:
 * - Entity schemas: SpoolRecordSchema, UsageRecordSchema, MaterialColorEntrySchema, SettingsSchema
 * - Input schemas: NewSpoolInputSchema, SpoolDetailsPatchSchema, UsageEntrySchema, SettingsPatchSchema
 * - Documents: StoreSnapshotSchema, ExportDocumentSchema
 */

import { z } from 'zod';
import {
  DEFAULT_SPOOL_COLOR,
  LANGUAGES,
  USAGE_CATEGORIES
} from '../types/inventory';
import {
  DecimalStringSchema,
  DiameterSchema,
  HexColorSchema,
  IdentitySchema,
  NonNegativeNumberSchema,
  PercentageSchema,
  PositiveNumberSchema,
  TemperatureSchema,
  TimestampSchema
} from '../utils/validation.utils';

/**
 * Export document versions this build reads
 */
export const SUPPORTED_EXPORT_VERSIONS = ['1.0'] as const;

export const CURRENT_EXPORT_VERSION = '1.0';

const MaterialNameSchema = z.string().trim().min(1, 'Material is required');

const UsageCategorySchema = z.enum(USAGE_CATEGORIES).catch('print');

function withinInitialMass(spool: { initialMass: number; remainingMass: number }): boolean {
  return spool.remainingMass <= spool.initialMass;
}

const massInvariantMessage = {
  message: 'Remaining mass must not exceed initial mass',
  path: ['remainingMass']
};

// ============================================================================
// ENTITY SCHEMAS
// ============================================================================

const SpoolFieldsSchema = z.object({
  id: IdentitySchema,
  brand: z.string().default(''),
  material: MaterialNameSchema,
  colorName: z.string().default(''),
  colorHex: HexColorSchema.default(DEFAULT_SPOOL_COLOR),
  diameter: DiameterSchema,
  initialMass: PositiveNumberSchema,
  remainingMass: NonNegativeNumberSchema,
  tareMass: NonNegativeNumberSchema.nullable().default(null),
  density: PositiveNumberSchema.nullable().default(null),
  minTemp: TemperatureSchema.nullable().default(null),
  maxTemp: TemperatureSchema.nullable().default(null),
  bedTemp: TemperatureSchema.nullable().default(null),
  price: DecimalStringSchema.nullable().default(null),
  acquiredAt: TimestampSchema,
  archived: z.boolean().default(false),
  note: z.string().nullable().default(null)
});

/**
 * Stored spool
 */
export const SpoolRecordSchema = SpoolFieldsSchema.refine(withinInitialMass, massInvariantMessage);

const UsageFieldsSchema = z.object({
  id: IdentitySchema,
  mass: PositiveNumberSchema,
  recordedAt: TimestampSchema,
  label: z.string().nullable().default(null),
  category: UsageCategorySchema
});

/**
 * Stored usage record; a null spoolId marks an orphan
 */
export const UsageRecordSchema = UsageFieldsSchema.extend({
  spoolId: IdentitySchema.nullable()
});

export const MaterialColorEntrySchema = z.object({
  material: MaterialNameSchema,
  colorHex: HexColorSchema
});

export const SettingsSchema = z.object({
  defaultDiameter: DiameterSchema,
  lowStockThreshold: PercentageSchema,
  currency: z.string().trim().min(1, 'Currency symbol is required'),
  language: z.enum(LANGUAGES)
});

// ============================================================================
// INPUT SCHEMAS
// ============================================================================

/**
 * Spool creation input; mass rules are checked again by the ledger transition
 */
export const NewSpoolInputSchema = z.object({
  brand: z.string().optional(),
  material: MaterialNameSchema,
  colorName: z.string().optional(),
  colorHex: HexColorSchema.optional(),
  diameter: DiameterSchema.optional(),
  initialMass: z.number({ invalid_type_error: 'Initial mass must be a number' }).finite(),
  tareMass: NonNegativeNumberSchema.nullable().optional(),
  density: PositiveNumberSchema.nullable().optional(),
  minTemp: TemperatureSchema.nullable().optional(),
  maxTemp: TemperatureSchema.nullable().optional(),
  bedTemp: TemperatureSchema.nullable().optional(),
  price: DecimalStringSchema.nullable().optional(),
  acquiredAt: TimestampSchema.optional(),
  note: z.string().nullable().optional()
});

/**
 * Attribute edit; material and masses are rejected as unrecognized keys
 */
export const SpoolDetailsPatchSchema = z.object({
  brand: z.string(),
  colorName: z.string(),
  colorHex: HexColorSchema,
  diameter: DiameterSchema,
  tareMass: NonNegativeNumberSchema.nullable(),
  density: PositiveNumberSchema.nullable(),
  minTemp: TemperatureSchema.nullable(),
  maxTemp: TemperatureSchema.nullable(),
  bedTemp: TemperatureSchema.nullable(),
  price: DecimalStringSchema.nullable(),
  acquiredAt: TimestampSchema,
  note: z.string().nullable()
}).partial().strict();

/**
 * Usage entry shape; the amount rule is the recorder's, so any finite number passes here
 */
export const UsageEntrySchema = z.object({
  spoolId: z.string().min(1, 'spoolId is required'),
  massGrams: z.number({ invalid_type_error: 'massGrams must be a number' }).finite(),
  recordedAt: TimestampSchema.optional(),
  label: z.string().nullable().optional(),
  category: z.enum(USAGE_CATEGORIES).optional()
});

export const SettingsPatchSchema = SettingsSchema.partial().strict();

// ============================================================================
// DOCUMENTS
// ============================================================================

/**
 * On-disk snapshot of the file-backed store
 */
export const StoreSnapshotSchema = z.object({
  spools: z.array(SpoolRecordSchema).default([]),
  usageRecords: z.array(UsageRecordSchema).default([]),
  materialColors: z.array(MaterialColorEntrySchema).default([]),
  settings: SettingsSchema.nullable().default(null)
});

export const ExportedSpoolSchema = SpoolFieldsSchema.extend({
  usage: z.array(UsageFieldsSchema).default([])
}).refine(withinInitialMass, massInvariantMessage);

/**
 * Portable export document. Identity collisions inside one document are rejected.
 */
export const ExportDocumentSchema = z.object({
  version: z.string({ required_error: 'Export version is required' }).refine(
    version => SUPPORTED_EXPORT_VERSIONS.some(supported => supported === version),
    version => ({ message: `Unsupported export version "${version}"` })
  ),
  exportedAt: TimestampSchema,
  spools: z.array(ExportedSpoolSchema),
  materialColors: z.array(MaterialColorEntrySchema).default([]),
  settings: SettingsSchema.nullable().default(null)
}).superRefine((document, ctx) => {
  const spoolIds = new Set<string>();
  const usageIds = new Set<string>();

  document.spools.forEach((spool, spoolIndex) => {
    if (spoolIds.has(spool.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate spool id ${spool.id}`,
        path: ['spools', spoolIndex, 'id']
      });
    }
    spoolIds.add(spool.id);

    spool.usage.forEach((record, usageIndex) => {
      if (usageIds.has(record.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate usage record id ${record.id}`,
          path: ['spools', spoolIndex, 'usage', usageIndex, 'id']
        });
      }
      usageIds.add(record.id);
    });
  });

  const materials = new Set<string>();
  document.materialColors.forEach((entry, index) => {
    const key = entry.material.toLowerCase();
    if (materials.has(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate material color for ${entry.material}`,
        path: ['materialColors', index, 'material']
      });
    }
    materials.add(key);
  });
});

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type StoreSnapshot = z.infer<typeof StoreSnapshotSchema>;
export type ExportDocument = z.infer<typeof ExportDocumentSchema>;
export type ExportedSpool = z.infer<typeof ExportedSpoolSchema>;
export type ExportedUsageRecord = ExportedSpool['usage'][number];
export type ValidatedSettingsPatch = z.infer<typeof SettingsPatchSchema>;
