/**
 * @fileoverview Emotion message decoding.
 *
 * Each text frame on the emotion stream is a single JSON object whose
 * top-level values are either JSON numbers or numeric-literal strings:
 *
 * ```json
 * { "Happy": 0.8, "Sad": "0.1", "label": "happy" }
 * ```
 *
 * Only top-level values are inspected. Anything that is not a number or a
 * numeric string (including nested objects and arrays) is skipped.
 */

import { z } from 'zod';
import { isJsonObject, type JsonValue } from './json.js';

/**
 * Decoded emotion values keyed by field name.
 */
export type EmotionMapping = Readonly<Record<string, number>>;

/**
 * Why a message was dropped.
 */
export type EmotionDecodeFailure = 'malformed_json' | 'not_an_object' | 'no_numeric_fields';

export type EmotionDecodeResult =
  | { readonly ok: true; readonly values: EmotionMapping }
  | { readonly ok: false; readonly reason: EmotionDecodeFailure };

const NUMERIC_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Check whether the whole string is a decimal numeric literal,
 * e.g. `"1"`, `"-0.25"`, `".5"`. Exponents are not accepted.
 */
export function isNumericLiteral(text: string): boolean {
  return NUMERIC_LITERAL.test(text);
}

export const NumericStringSchema = z
  .string()
  .regex(NUMERIC_LITERAL)
  .transform((text) => Number(text));

/**
 * A single emotion value: a JSON number or a numeric-literal string.
 */
export const EmotionValueSchema = z
  .union([z.number(), NumericStringSchema])
  .refine((value) => Number.isFinite(value));

/**
 * Decode one emotion text frame.
 */
export function decodeEmotionMessage(text: string): EmotionDecodeResult {
  let raw: JsonValue;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, reason: 'malformed_json' };
  }

  if (!isJsonObject(raw)) {
    return { ok: false, reason: 'not_an_object' };
  }

  const entries: [string, number][] = [];
  for (const [key, value] of Object.entries(raw)) {
    const result = EmotionValueSchema.safeParse(value);
    if (result.success) {
      entries.push([key, result.data]);
    }
  }

  if (entries.length === 0) {
    return { ok: false, reason: 'no_numeric_fields' };
  }

  return { ok: true, values: Object.fromEntries(entries) };
}
