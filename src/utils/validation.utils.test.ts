/**
 * @fileoverview Tests for validation helpers and shared schemas
 */

import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { AppError, ErrorCode } from './error.utils';
import {
  DecimalStringSchema,
  DiameterSchema,
  HexColorSchema,
  TimestampSchema,
  formatValidationErrors,
  isStandardDiameter,
  parseOrThrow,
  validate
} from './validation.utils';

describe('validate', () => {
  it('should return data on success', () => {
    const result = validate(z.number(), 5);
    expect(result).toEqual({ success: true, data: 5 });
  });

  it('should return the error and issues on failure', () => {
    const result = validate(z.object({ name: z.string() }), {}, ErrorCode.INVALID_INPUT);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(result.issues).toEqual([{ path: 'name', message: 'Required', code: 'invalid_type' }]);
    }
  });
});

describe('parseOrThrow', () => {
  it('should throw an AppError with the requested code', () => {
    expect(() => parseOrThrow(z.string(), 1, ErrorCode.SCHEMA_INVALID)).toThrow(AppError);
    try {
      parseOrThrow(z.string(), 1, ErrorCode.SCHEMA_INVALID);
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.SCHEMA_INVALID });
    }
  });
});

describe('shared schemas', () => {
  it('should upper-case hex colors', () => {
    expect(HexColorSchema.parse('#ff8800')).toBe('#FF8800');
    expect(HexColorSchema.safeParse('ff8800').success).toBe(false);
    expect(HexColorSchema.safeParse('#FF88').success).toBe(false);
  });

  it('should accept decimal text only', () => {
    expect(DecimalStringSchema.safeParse('24.99').success).toBe(true);
    expect(DecimalStringSchema.safeParse('24').success).toBe(true);
    expect(DecimalStringSchema.safeParse('-1').success).toBe(false);
    expect(DecimalStringSchema.safeParse('1e3').success).toBe(false);
  });

  it('should accept ISO timestamps with an offset', () => {
    expect(TimestampSchema.safeParse('2024-03-01T10:00:00Z').success).toBe(true);
    expect(TimestampSchema.safeParse('2024-03-01T10:00:00+02:00').success).toBe(true);
    expect(TimestampSchema.safeParse('yesterday').success).toBe(false);
  });

  it('should accept only standard diameters', () => {
    expect(DiameterSchema.safeParse(1.75).success).toBe(true);
    expect(DiameterSchema.safeParse(2.85).success).toBe(true);
    expect(DiameterSchema.safeParse(2).success).toBe(false);
    expect(isStandardDiameter(3)).toBe(true);
  });
});

describe('formatValidationErrors', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ a: z.string(), b: z.number() }).safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toBe('a: Required\nb: Required');
    }
  });
});
