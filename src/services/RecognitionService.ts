/**
 * @fileoverview Client for the optional label-recognition service.
 *
 * Posts a spool label photo as multipart form data to `<baseUrl>/api/v1/recognize` and
 * returns the service's best guess at the spool attributes. The service is untrusted
 * and never required: every failure (network, timeout, HTTP error, malformed body,
 * `success: false`) resolves to null and logs a warning. Nothing returned here is
 * committed directly; toSpoolSuggestion() keeps only values that parse and validate.
 *
 * @module services/RecognitionService
 */

import { z } from 'zod';
import type { FilamentDiameter, NewSpoolInput } from '../types/inventory';
import { timeoutError } from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';
import { isStandardDiameter, validate } from '../utils/validation.utils';

const NAMESPACE = 'RecognitionService';

export const DEFAULT_RECOGNITION_TIMEOUT_MS = 30000;

const RecognizedFieldsSchema = z.object({
  brand: z.string().nullish(),
  material: z.string().nullish(),
  colorName: z.string().nullish(),
  colorHex: z.string().nullish(),
  weight: z.string().nullish(),
  diameter: z.number().nullish(),
  temperatureInfo: z.string().nullish()
});

const RecognitionResponseSchema = z.object({
  success: z.boolean(),
  data: RecognizedFieldsSchema.nullish(),
  confidence: z.number().nullish(),
  error: z.string().nullish()
});

export type RecognizedFields = z.infer<typeof RecognizedFieldsSchema>;

export interface RecognitionResult {
  readonly fields: RecognizedFields;
  readonly confidence: number | null;
}

/**
 * Subset of spool creation input derived from a recognition result
 */
export type SpoolSuggestion = Partial<Omit<NewSpoolInput, 'acquiredAt' | 'note' | 'price' | 'density' | 'tareMass'>>;

export interface RecognitionImage {
  readonly data: Uint8Array;
  readonly mimeType?: string;
  readonly fileName?: string;
}

export class RecognitionService {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  /**
   * @param serverUrl - Base URL of the recognition service (e.g. http://localhost:8000)
   */
  constructor(serverUrl: string, timeoutMs: number = DEFAULT_RECOGNITION_TIMEOUT_MS) {
    this.endpoint = serverUrl.replace(/\/+$/, '') + '/api/v1/recognize';
    this.timeoutMs = timeoutMs;
  }

  public getEndpoint(): string {
    return this.endpoint;
  }

  /**
   * Ask the service to read a label photo
   * @returns the recognized fields, or null when the service gives no usable answer
   */
  async recognize(image: RecognitionImage): Promise<RecognitionResult | null> {
    const form = new FormData();
    form.append(
      'image',
      new Blob([image.data], { type: image.mimeType ?? 'image/jpeg' }),
      image.fileName ?? 'image.jpg'
    );

    try {
      const response = await this.fetchWithTimeout(this.endpoint, {
        method: 'POST',
        headers: { Accept: 'application/json' },
        body: form
      });

      if (!response.ok) {
        logWarning(NAMESPACE, `Recognition request failed: HTTP ${response.status}`);
        return null;
      }

      const parsed = validate(RecognitionResponseSchema, await response.json());
      if (!parsed.success) {
        logWarning(NAMESPACE, `Recognition response is malformed: ${parsed.error.message}`);
        return null;
      }

      const body = parsed.data;
      if (!body.success || !body.data) {
        logWarning(NAMESPACE, `Recognition service reported no result: ${body.error ?? 'unknown reason'}`);
        return null;
      }

      logVerbose(NAMESPACE, 'Recognition succeeded', body.data);
      return { fields: body.data, confidence: body.confidence ?? null };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logWarning(NAMESPACE, `Recognition unavailable: ${message}`);
      return null;
    }
  }

  /**
   * Fetch with timeout using AbortController
   * @throws AppError TIMEOUT when the service does not answer in time
   */
  private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw timeoutError('recognize', this.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// ============================================================================
// SUGGESTION PARSING
// ============================================================================

/**
 * Parse label mass text such as "1kg", "1000 g" or "0.75 kg" into grams.
 * A bare number is taken as grams.
 */
export function parseMassText(text: string): number | null {
  const match = /^\s*(\d+(?:\.\d+)?)\s*(kg|g)?\s*$/i.exec(text);
  if (!match) {
    return null;
  }
  const value = Number(match[1]);
  const grams = match[2]?.toLowerCase() === 'kg' ? value * 1000 : value;
  return grams > 0 ? grams : null;
}

/**
 * Parse a nozzle temperature range such as "190-220°C" or "200 ~ 230 ℃"
 */
export function parseTemperatureRange(text: string): { minTemp: number; maxTemp: number } | null {
  const match = /(\d{2,3})\s*(?:°C|℃)?\s*[-~–]\s*(\d{2,3})/.exec(text);
  if (!match) {
    return null;
  }
  const first = Number(match[1]);
  const second = Number(match[2]);
  if (first > 500 || second > 500) {
    return null;
  }
  return { minTemp: Math.min(first, second), maxTemp: Math.max(first, second) };
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Keep only the recognized values that would pass spool creation
 */
export function toSpoolSuggestion(fields: RecognizedFields): SpoolSuggestion {
  const colorHex = nonEmpty(fields.colorHex);
  const diameter: FilamentDiameter | undefined =
    fields.diameter !== null && fields.diameter !== undefined && isStandardDiameter(fields.diameter)
      ? fields.diameter
      : undefined;
  const initialMass = fields.weight ? parseMassText(fields.weight) : null;
  const temperatures = fields.temperatureInfo ? parseTemperatureRange(fields.temperatureInfo) : null;

  return {
    brand: nonEmpty(fields.brand),
    material: nonEmpty(fields.material),
    colorName: nonEmpty(fields.colorName),
    colorHex: colorHex && /^#[0-9a-fA-F]{6}$/.test(colorHex) ? colorHex.toUpperCase() : undefined,
    diameter,
    initialMass: initialMass ?? undefined,
    minTemp: temperatures?.minTemp,
    maxTemp: temperatures?.maxTemp
  };
}
