/**
 * Strata Kernel: Deferred Value Tests
 *
 * deferred/settle: known, unknown and failed settle once and never reject
 * deferred/apply: continuations run only on known values; secrecy is sticky
 * deferred/all: joins every input; failure outranks unknown
 * values/resolve: nested deferred values are awaited; handles become URNs
 * values/describe: runtime kinds read naturally in messages
 */

import { describe, it, expect } from 'vitest';
import {
  ArchiveValue,
  AssetValue,
  Deferred,
  ResourceHandle,
  isValueMap,
  resolveDeep,
  toDeferred,
  typeString,
} from '../src/index.js';
import type { Value } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function handle(name: string): ResourceHandle {
  return new ResourceHandle(
    name,
    'test:index:Bucket',
    'custom',
    Deferred.known(`urn:test::${name}`),
    Deferred.known(`${name}-id`),
    Deferred.known({ arn: `arn:${name}` }),
  );
}

async function settle(value: Value): Promise<unknown> {
  return value instanceof Deferred ? value.resolution() : value;
}

// ---------------------------------------------------------------------------
// Settling
// ---------------------------------------------------------------------------

describe('Deferred settling', () => {
  it('settles known values with their secrecy', async () => {
    expect(await Deferred.known(3).resolution()).toEqual({ state: 'known', value: 3, secret: false });
    expect(await Deferred.known('s', true).resolution()).toEqual({ state: 'known', value: 's', secret: true });
  });

  it('settles unknown values', async () => {
    expect(await Deferred.unknown<number>().resolution()).toEqual({ state: 'unknown', secret: false });
  });

  it('turns a rejected promise into a failure instead of rejecting', async () => {
    const error = new Error('engine unavailable');
    const d = Deferred.fromPromise(Promise.reject(error));
    expect(await d.resolution()).toEqual({ state: 'failed', error });
  });

  it('carries no error for an already reported failure', async () => {
    expect(await Deferred.failed<number>().resolution()).toEqual({ state: 'failed' });
  });
});

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

describe('Deferred.apply', () => {
  it('maps a known value', async () => {
    const d = Deferred.known(2).apply((n) => n * 10);
    expect(await d.resolution()).toEqual({ state: 'known', value: 20, secret: false });
  });

  it('flattens a continuation that answers with a Deferred', async () => {
    const d = Deferred.known(2).apply((n) => Deferred.known(`n=${n}`));
    expect(await d.resolution()).toEqual({ state: 'known', value: 'n=2', secret: false });
  });

  it('skips the continuation for unknown and failed inputs', async () => {
    const calls: number[] = [];
    const unknown = Deferred.unknown<number>(true).apply((n) => calls.push(n));
    const failed = Deferred.failed<number>().apply((n) => calls.push(n));
    expect(await unknown.resolution()).toEqual({ state: 'unknown', secret: true });
    expect(await failed.resolution()).toEqual({ state: 'failed' });
    expect(calls).toEqual([]);
  });

  it('keeps secrecy through a continuation', async () => {
    const d = Deferred.known('pw', true).apply((s) => Deferred.known(s.length));
    expect(await d.resolution()).toEqual({ state: 'known', value: 2, secret: true });
  });

  it('settles as failed when the continuation throws', async () => {
    const error = new Error('boom');
    const d = Deferred.known(1).apply((): number => {
      throw error;
    });
    expect(await d.resolution()).toEqual({ state: 'failed', error });
  });

  it('marks a value secret without changing it', async () => {
    expect(await Deferred.known(1).asSecret().resolution()).toEqual({ state: 'known', value: 1, secret: true });
    expect(await Deferred.failed<number>().asSecret().resolution()).toEqual({ state: 'failed' });
  });
});

describe('Deferred.all', () => {
  it('collects every known value in order', async () => {
    const d = Deferred.all([Deferred.known(1), Deferred.known(2, true)]);
    expect(await d.resolution()).toEqual({ state: 'known', value: [1, 2], secret: true });
  });

  it('is unknown when any input is unknown', async () => {
    const d = Deferred.all([Deferred.known(1), Deferred.unknown<number>()]);
    expect(await d.resolution()).toEqual({ state: 'unknown', secret: false });
  });

  it('prefers failure over unknown', async () => {
    const d = Deferred.all([Deferred.unknown<number>(), Deferred.failed<number>()]);
    expect(await d.resolution()).toEqual({ state: 'failed' });
  });

  it('resolves an empty list immediately', async () => {
    expect(await Deferred.all<number>([]).resolution()).toEqual({ state: 'known', value: [], secret: false });
  });
});

// ---------------------------------------------------------------------------
// Runtime Values
// ---------------------------------------------------------------------------

describe('resolveDeep', () => {
  it('returns plain data unchanged', () => {
    expect(resolveDeep({ a: [1, 'x'], b: null })).toEqual({ a: [1, 'x'], b: null });
  });

  it('waits for nested deferred values', async () => {
    const value: Value = { a: [Deferred.known(1), 2], b: Deferred.known('x') };
    expect(await settle(resolveDeep(value))).toEqual({
      state: 'known',
      value: { a: [1, 2], b: 'x' },
      secret: false,
    });
  });

  it('replaces resource handles with their URNs on request', async () => {
    const bucket = handle('logs');
    expect(resolveDeep([bucket])).toEqual([bucket]);
    expect(await settle(resolveDeep([bucket], 'urn'))).toEqual({
      state: 'known',
      value: ['urn:test::logs'],
      secret: false,
    });
  });

  it('reads a single output of a handle', async () => {
    expect(await handle('logs').output('arn').resolution()).toEqual({
      state: 'known',
      value: 'arn:logs',
      secret: false,
    });
    expect(await handle('logs').output('missing').resolution()).toEqual({
      state: 'known',
      value: null,
      secret: false,
    });
  });
});

describe('typeString', () => {
  it.each<[Value, string]>([
    [null, 'nil'],
    [true, 'a boolean'],
    [3, 'an integer'],
    [1.5, 'a number'],
    ['s', 'a string'],
    [[1], 'a list'],
    [{ a: 1 }, 'an object'],
    [new AssetValue('string', 'hi'), 'an asset'],
    [new ArchiveValue('file', './dir'), 'an archive'],
    [Deferred.known<Value>(1), 'a deferred value'],
  ])('describes %o as %s', (value, expected) => {
    expect(typeString(value)).toBe(expected);
  });

  it('describes a resource handle', () => {
    expect(typeString(handle('logs'))).toBe('a resource');
  });
});

describe('isValueMap', () => {
  it('accepts only plain records', () => {
    expect(isValueMap({ a: 1 })).toBe(true);
    expect(isValueMap([1])).toBe(false);
    expect(isValueMap(handle('logs'))).toBe(false);
    expect(isValueMap(new AssetValue('file', 'a.txt'))).toBe(false);
  });
});

describe('toDeferred', () => {
  it('wraps plain values and passes Deferred values through', async () => {
    const d = Deferred.known<Value>('x');
    expect(toDeferred(d)).toBe(d);
    expect(await toDeferred(5).resolution()).toEqual({ state: 'known', value: 5, secret: false });
  });
});
