/**
 * Strata Kernel: Configuration Types
 *
 * Configuration values come from the stack, not from the template: plain
 * scalars or lists of them. A template declares the type it expects with
 * one of a small set of names (matched case-insensitively):
 *
 *   String | Number | Int | Boolean | List<T>
 *
 * This module maps those names to Type values, infers the type of a raw
 * stack value, decides whether two declarations of one key agree, and
 * converts a raw value to the declared type at run time.
 */

import {
  BoolType,
  IntType,
  NumberType,
  StringType,
  arrayOf,
  displayType,
  unwrapType,
} from '../schema/types.js';
import type { Type } from '../schema/types.js';

export type ConfigValue = string | number | boolean | ReadonlyArray<ConfigValue>;

export type ConfigTypeResult =
  | { readonly ok: true; readonly type: Type }
  | { readonly ok: false; readonly error: string };

export type ConfigConversion =
  | { readonly ok: true; readonly value: ConfigValue }
  | { readonly ok: false };

/** Display names of the accepted scalar config types, for error details. */
export const CONFIG_TYPE_NAMES = ['String', 'Number', 'Int', 'Boolean', 'List<T>'] as const;

/** Parse a declared config type name. Undefined when it is not one. */
export function parseConfigType(name: string): Type | undefined {
  const s = name.trim().toLowerCase();
  if (s.startsWith('list<') && s.endsWith('>')) {
    const inner = parseConfigType(s.slice('list<'.length, -1));
    return inner === undefined ? undefined : arrayOf(inner);
  }
  switch (s) {
    case 'string':
      return StringType;
    case 'number':
      return NumberType;
    case 'int':
      return IntType;
    case 'boolean':
      return BoolType;
    default:
      return undefined;
  }
}

/** Infer the type of a raw stack value. Lists must be non-empty and homogeneous. */
export function configValueType(value: ConfigValue): ConfigTypeResult {
  if (typeof value === 'string') return { ok: true, type: StringType };
  if (typeof value === 'boolean') return { ok: true, type: BoolType };
  if (typeof value === 'number') {
    return { ok: true, type: Number.isInteger(value) ? IntType : NumberType };
  }
  let element: Type | undefined;
  for (const item of value) {
    const itemType = configValueType(item);
    if (!itemType.ok) return itemType;
    if (element === undefined) {
      element = itemType.type;
    } else if (displayType(element) !== displayType(itemType.type)) {
      return {
        ok: false,
        error: `heterogeneous typed lists are not allowed: found types ${displayType(element)} and ${displayType(itemType.type)}`,
      };
    }
  }
  if (element === undefined) return { ok: false, error: 'empty list' };
  return { ok: true, type: arrayOf(element) };
}

/**
 * Whether `current` may share a key already declared as `existing`:
 * identical types, an integer where a number is declared, anything where a
 * string is declared, or a string whose text converts to the declared type.
 */
export function isConfigTypeCompatible(existing: Type, current: Type, value?: ConfigValue): boolean {
  const a = unwrapType(existing);
  const b = unwrapType(current);
  if (displayType(a) === displayType(b)) return true;
  if (a === NumberType && b === IntType) return true;
  if (a === StringType) return true;
  if (b === StringType && typeof value === 'string') return convertConfigValue(value, a).ok;
  return false;
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

const INTEGER = /^[+-]?\d+$/;

const TRUE_STRINGS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_STRINGS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

function parseBool(s: string): boolean | undefined {
  if (TRUE_STRINGS.has(s)) return true;
  if (FALSE_STRINGS.has(s)) return false;
  return undefined;
}

function parseNumber(s: string): number | undefined {
  if (s.trim() === '') return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Convert a raw stack value to the declared type. Strings are parsed for
 * scalar types; a list may be given as a JSON array string.
 */
export function convertConfigValue(raw: ConfigValue, type: Type): ConfigConversion {
  const target = unwrapType(type);
  switch (target.kind) {
    case 'primitive':
      return convertScalar(raw, target.name);
    case 'array': {
      let items: unknown = raw;
      if (typeof raw === 'string') {
        try {
          items = JSON.parse(raw);
        } catch (err: unknown) {
          if (err instanceof SyntaxError) return { ok: false };
          throw err;
        }
      }
      if (!Array.isArray(items)) return { ok: false };
      const out: ConfigValue[] = [];
      for (const item of items) {
        if (!isConfigValue(item)) return { ok: false };
        const converted = convertConfigValue(item, target.element);
        if (!converted.ok) return converted;
        out.push(converted.value);
      }
      return { ok: true, value: out };
    }
    default:
      return { ok: true, value: raw };
  }
}

function convertScalar(raw: ConfigValue, name: string): ConfigConversion {
  switch (name) {
    case 'string':
      if (typeof raw === 'string') return { ok: true, value: raw };
      if (typeof raw === 'number' || typeof raw === 'boolean') return { ok: true, value: String(raw) };
      return { ok: true, value: JSON.stringify(raw) };
    case 'number': {
      if (typeof raw === 'number') return { ok: true, value: raw };
      const n = typeof raw === 'string' ? parseNumber(raw) : undefined;
      return n === undefined ? { ok: false } : { ok: true, value: n };
    }
    case 'integer':
      if (typeof raw === 'number') return Number.isInteger(raw) ? { ok: true, value: raw } : { ok: false };
      if (typeof raw === 'string' && INTEGER.test(raw)) {
        return { ok: true, value: Number.parseInt(raw, 10) };
      }
      return { ok: false };
    case 'boolean': {
      if (typeof raw === 'boolean') return { ok: true, value: raw };
      const b = typeof raw === 'string' ? parseBool(raw) : undefined;
      return b === undefined ? { ok: false } : { ok: true, value: b };
    }
    default:
      return { ok: true, value: raw };
  }
}

export function isConfigValue(value: unknown): value is ConfigValue {
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  return Array.isArray(value) && value.every(isConfigValue);
}
