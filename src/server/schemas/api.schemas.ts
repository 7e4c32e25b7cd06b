/**
 * @fileoverview Zod validation schemas for ledger HTTP requests (bodies and query strings).
 *
 * Entity-level rules (spool input, edits, usage entries, settings) live in
 * schemas/inventory.schemas and are applied by the services; the schemas here only shape
 * the HTTP envelope around them.
 */

import { z } from 'zod';
import { TimestampSchema } from '../../utils/validation.utils';

/**
 * Query string flag: "true" / "false"
 */
const BooleanQuerySchema = z.enum(['true', 'false']).transform(value => value === 'true');

export const SpoolListQuerySchema = z.object({
  archived: BooleanQuerySchema.optional(),
  material: z.string().trim().min(1).optional()
});

export const StockRevisionRequestSchema = z.object({
  initialMass: z.number({
    required_error: 'initialMass is required',
    invalid_type_error: 'initialMass must be a number'
  })
});

export const WeighInRequestSchema = z.object({
  grossMass: z.number({
    required_error: 'grossMass is required',
    invalid_type_error: 'grossMass must be a number'
  }),
  recordedAt: TimestampSchema.optional(),
  label: z.string().nullable().optional()
});

/**
 * Usage batch; each entry is validated on its own by the recorder
 */
export const UsageBatchRequestSchema = z.object({
  entries: z.array(z.unknown()).min(1, 'At least one usage entry is required')
});

export const MaterialColorRequestSchema = z.object({
  colorHex: z.string({ required_error: 'colorHex is required' })
});

export const DateRangeQuerySchema = z.object({
  from: TimestampSchema.optional(),
  to: TimestampSchema.optional()
}).refine(
  range => range.from === undefined || range.to === undefined || Date.parse(range.from) <= Date.parse(range.to),
  { message: '"from" must not be after "to"', path: ['from'] }
);

export const ImportQuerySchema = z.object({
  policy: z.enum(['merge', 'replace']).default('merge')
});

export type ValidatedSpoolListQuery = z.infer<typeof SpoolListQuerySchema>;
export type ValidatedDateRangeQuery = z.infer<typeof DateRangeQuerySchema>;
