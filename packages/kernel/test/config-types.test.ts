/**
 * Strata Kernel: Config Type Tests
 *
 * config/parse: declared type names, case-insensitive, with List<T>
 * config/infer: raw stack values infer a type; lists must be homogeneous
 * config/compatible: which stack values may fill a declared key
 * config/convert: raw values convert to the declared type or fail
 */

import { describe, it, expect } from 'vitest';
import {
  BoolType,
  IntType,
  NumberType,
  StringType,
  arrayOf,
  configValueType,
  convertConfigValue,
  isConfigTypeCompatible,
  isConfigValue,
  parseConfigType,
} from '../src/index.js';

describe('parseConfigType', () => {
  it('accepts the scalar names in any case', () => {
    expect(parseConfigType('String')).toBe(StringType);
    expect(parseConfigType('number')).toBe(NumberType);
    expect(parseConfigType('INT')).toBe(IntType);
    expect(parseConfigType('Boolean')).toBe(BoolType);
  });

  it('accepts nested lists', () => {
    expect(parseConfigType('List<List<Int>>')).toEqual(arrayOf(arrayOf(IntType)));
  });

  it('rejects anything else', () => {
    expect(parseConfigType('Map<String>')).toBeUndefined();
    expect(parseConfigType('List<Float>')).toBeUndefined();
  });
});

describe('configValueType', () => {
  it('distinguishes integers from other numbers', () => {
    expect(configValueType(3)).toEqual({ ok: true, type: IntType });
    expect(configValueType(3.5)).toEqual({ ok: true, type: NumberType });
  });

  it('infers list element types', () => {
    expect(configValueType(['a', 'b'])).toEqual({ ok: true, type: arrayOf(StringType) });
  });

  it('rejects heterogeneous and empty lists', () => {
    expect(configValueType(['a', 1])).toEqual({
      ok: false,
      error: 'heterogeneous typed lists are not allowed: found types string and integer',
    });
    expect(configValueType([])).toEqual({ ok: false, error: 'empty list' });
  });
});

describe('isConfigTypeCompatible', () => {
  it('allows an integer where a number is declared', () => {
    expect(isConfigTypeCompatible(NumberType, IntType)).toBe(true);
  });

  it('allows anything where a string is declared', () => {
    expect(isConfigTypeCompatible(StringType, BoolType)).toBe(true);
  });

  it('allows a string that converts to the declared type', () => {
    expect(isConfigTypeCompatible(IntType, StringType, '42')).toBe(true);
    expect(isConfigTypeCompatible(IntType, StringType, 'forty-two')).toBe(false);
  });

  it('rejects a boolean where a number is declared', () => {
    expect(isConfigTypeCompatible(NumberType, BoolType, true)).toBe(false);
  });
});

describe('convertConfigValue', () => {
  it('parses numbers and integers from strings', () => {
    expect(convertConfigValue('2.5', NumberType)).toEqual({ ok: true, value: 2.5 });
    expect(convertConfigValue('-7', IntType)).toEqual({ ok: true, value: -7 });
    expect(convertConfigValue('7.5', IntType)).toEqual({ ok: false });
    expect(convertConfigValue(7.5, IntType)).toEqual({ ok: false });
  });

  it('parses the accepted boolean spellings', () => {
    expect(convertConfigValue('True', BoolType)).toEqual({ ok: true, value: true });
    expect(convertConfigValue('0', BoolType)).toEqual({ ok: true, value: false });
    expect(convertConfigValue('yes', BoolType)).toEqual({ ok: false });
  });

  it('renders scalars as strings', () => {
    expect(convertConfigValue(12, StringType)).toEqual({ ok: true, value: '12' });
  });

  it('reads a list from a JSON array string', () => {
    expect(convertConfigValue('["1", 2]', arrayOf(IntType))).toEqual({ ok: true, value: [1, 2] });
    expect(convertConfigValue('[1,', arrayOf(IntType))).toEqual({ ok: false });
    expect(convertConfigValue('{"a": 1}', arrayOf(IntType))).toEqual({ ok: false });
  });
});

describe('isConfigValue', () => {
  it('accepts scalars and nested lists of them', () => {
    expect(isConfigValue(['a', [1, true]])).toBe(true);
  });

  it('rejects objects, null and non-finite numbers', () => {
    expect(isConfigValue({ a: 1 })).toBe(false);
    expect(isConfigValue(null)).toBe(false);
    expect(isConfigValue(Number.NaN)).toBe(false);
  });
});
