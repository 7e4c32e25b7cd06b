/**
 * @fileoverview Zod-based validation utilities and the shared schemas for ledger data.
 *
 * Key Features:
 * - Validation result types (success/failure with detailed issues)
 * - validate(schema, data) and parseOrThrow(schema, data, code) for service boundaries
 * - Primitive schemas reused by entity, request, and document schemas
 *
 * Common Schemas:
 * - IdentitySchema: UUID identity
 * - PositiveNumberSchema / NonNegativeNumberSchema: finite masses and densities
 * - PercentageSchema: 0-100
 * - HexColorSchema: #RRGGBB (normalized to upper case)
 * - DecimalStringSchema: exact decimal text for money
 * - TimestampSchema: ISO 8601 with offset
 * - DiameterSchema: one of the standard filament diameters
 */

import { z, ZodError } from 'zod';
import { AppError, ErrorCode, fromZodError } from './error.utils';
import { STANDARD_DIAMETERS, type FilamentDiameter } from '../types/inventory';

// ============================================================================
// VALIDATION RESULT TYPES
// ============================================================================

/**
 * Success validation result
 */
export interface ValidationSuccess<T> {
  success: true;
  data: T;
}

/**
 * Failed validation result
 */
export interface ValidationFailure {
  success: false;
  error: AppError;
  issues?: Array<{
    path: string;
    message: string;
    code: string;
  }>;
}

/**
 * Validation result union type
 */
export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

/**
 * Any schema producing T, whatever its input shape (defaults and transforms included)
 */
export type AnySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// CORE VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate data against a schema with detailed error info
 */
export function validate<T>(
  schema: AnySchema<T>,
  data: unknown,
  code: ErrorCode = ErrorCode.VALIDATION
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return {
      success: true,
      data: result.data
    };
  }

  return {
    success: false,
    error: fromZodError(result.error, code),
    issues: result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code
    }))
  };
}

/**
 * Parse data or throw an AppError carrying the given code
 */
export function parseOrThrow<T>(
  schema: AnySchema<T>,
  data: unknown,
  code: ErrorCode = ErrorCode.VALIDATION
): T {
  const result = validate(schema, data, code);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

// ============================================================================
// COMMON VALIDATION SCHEMAS
// ============================================================================

/**
 * UUID identity
 */
export const IdentitySchema = z.string().uuid('Identity must be a UUID');

/**
 * Positive number schema
 */
export const PositiveNumberSchema = z.number()
  .finite('Value must be finite')
  .positive('Value must be positive');

/**
 * Non-negative number schema
 */
export const NonNegativeNumberSchema = z.number()
  .finite('Value must be finite')
  .min(0, 'Value must not be negative');

/**
 * Percentage schema (0-100)
 */
export const PercentageSchema = z.number()
  .min(0, 'Percentage must be at least 0')
  .max(100, 'Percentage must be at most 100');

/**
 * #RRGGBB color, stored upper case
 */
export const HexColorSchema = z.string()
  .regex(/^#[0-9a-fA-F]{6}$/, 'Color must be a #RRGGBB hex string')
  .transform(value => value.toUpperCase());

/**
 * Exact decimal text for monetary values
 */
export const DecimalStringSchema = z.string()
  .regex(/^\d+(\.\d+)?$/, 'Amount must be decimal text such as "24.99"');

/**
 * ISO 8601 timestamp with offset
 */
export const TimestampSchema = z.string().datetime({ offset: true, message: 'Timestamp must be ISO 8601' });

/**
 * Whole-degree temperature
 */
export const TemperatureSchema = z.number().int('Temperature must be a whole number').min(0).max(500);

/**
 * Standard filament diameter
 */
export const DiameterSchema = z.number().refine(
  (value): value is FilamentDiameter => isStandardDiameter(value),
  { message: `Diameter must be one of ${STANDARD_DIAMETERS.join(', ')} mm` }
);

/**
 * Check whether a number is a standard filament diameter
 */
export function isStandardDiameter(value: number): value is FilamentDiameter {
  return STANDARD_DIAMETERS.some(diameter => diameter === value);
}

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Format validation errors for display
 */
export function formatValidationErrors(error: ZodError): string {
  const messages = error.issues.map(issue => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return messages.join('\n');
}
