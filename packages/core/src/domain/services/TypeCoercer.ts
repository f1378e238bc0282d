import type { FieldValue } from '../model/Record.js';
import type { CoercionRules } from '../model/Schema.js';
import { isRelationField } from '../model/Schema.js';
import { parseBooleanLike } from './canonical.js';

/** Outcome of coercing one raw cell. */
export type CoercionResult =
  | { readonly kind: 'absent' }
  | { readonly kind: 'value'; readonly value: FieldValue }
  | { readonly kind: 'fallback'; readonly value: string; readonly expected: 'integer' | 'relation' | 'boolean' };

const SIGNED_INTEGER = /^\s*[+-]?\d+\s*$/;
const DIGITS = /^\d+$/;

/** Parse a base-10 integer string. Returns `undefined` when the string is not one or exceeds the safe integer range. */
export function parseInteger(raw: string, pattern: RegExp = SIGNED_INTEGER): number | undefined {
  if (!pattern.test(raw)) return undefined;
  const value = Number.parseInt(raw.trim(), 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Converts raw dump cells into canonical field values, driven only by the
 * target field name. Never throws.
 */
export class TypeCoercer {
  constructor(private readonly rules: CoercionRules) {}

  coerce(field: string, raw: string): CoercionResult {
    if (raw === '') return { kind: 'absent' };

    if (this.rules.measurementFields.has(field)) {
      const value = parseInteger(raw);
      return value !== undefined ? { kind: 'value', value } : { kind: 'fallback', value: raw, expected: 'integer' };
    }

    if (isRelationField(this.rules, field)) {
      const value = parseInteger(raw, DIGITS);
      return value !== undefined ? { kind: 'value', value } : { kind: 'fallback', value: raw, expected: 'relation' };
    }

    if (this.rules.booleanFields.has(field)) {
      const value = parseBooleanLike(raw);
      return value !== undefined ? { kind: 'value', value } : { kind: 'fallback', value: raw, expected: 'boolean' };
    }

    return { kind: 'value', value: raw };
  }
}
