/**
 * Strata Kernel: Deferred Values
 *
 * A Deferred stands in for a value the orchestration engine has not
 * produced yet. It settles exactly once, to one of:
 *
 *   known    the value, possibly marked secret
 *   unknown  not computable during a preview; may still be secret
 *   failed   an error was already reported; nothing to compute
 *
 * The underlying promise never rejects, so a Deferred can be dropped on
 * the floor without producing an unhandled rejection. Composition is by
 * `apply` (map/flatten) and `all` (join, not race). Continuations run only
 * when every input is known; unknown and failed inputs skip the
 * continuation and propagate, and secrecy is sticky.
 */

export type Resolution<T> =
  | { readonly state: 'known'; readonly value: T; readonly secret: boolean }
  | { readonly state: 'unknown'; readonly secret: boolean }
  | { readonly state: 'failed'; readonly error?: unknown };

/** A continuation may answer with a plain value or another Deferred. */
export type Lifted<T> = T | Deferred<T>;

export class Deferred<T> {
  private constructor(private readonly settled: Promise<Resolution<T>>) {}

  static known<T>(value: T, secret = false): Deferred<T> {
    return new Deferred(Promise.resolve({ state: 'known', value, secret }));
  }

  static unknown<T>(secret = false): Deferred<T> {
    return new Deferred<T>(Promise.resolve({ state: 'unknown', secret }));
  }

  /** A computation whose failure has already been reported. */
  static failed<T>(error?: unknown): Deferred<T> {
    const resolution: Resolution<T> =
      error === undefined ? { state: 'failed' } : { state: 'failed', error };
    return new Deferred(Promise.resolve(resolution));
  }

  static fromResolution<T>(settled: Promise<Resolution<T>>): Deferred<T> {
    return new Deferred(settled.catch((error: unknown): Resolution<T> => ({ state: 'failed', error })));
  }

  /** Adapt a promise; a rejection becomes `failed` carrying the error. */
  static fromPromise<T>(promise: Promise<T>, secret = false): Deferred<T> {
    return Deferred.fromResolution(
      promise.then((value): Resolution<T> => ({ state: 'known', value, secret })),
    );
  }

  /** Wait on every input; the result is secret if any input is. */
  static all<T>(items: ReadonlyArray<Deferred<T>>): Deferred<T[]> {
    return Deferred.fromResolution(
      Promise.all(items.map((d) => d.settled)).then((resolutions): Resolution<T[]> => {
        const secret = resolutions.some((r) => r.state !== 'failed' && r.secret);
        const failed = resolutions.find(
          (r): r is Extract<Resolution<T>, { state: 'failed' }> => r.state === 'failed',
        );
        if (failed !== undefined) return failed;
        const values: T[] = [];
        for (const r of resolutions) {
          if (r.state !== 'known') return { state: 'unknown', secret };
          values.push(r.value);
        }
        return { state: 'known', value: values, secret };
      }),
    );
  }

  resolution(): Promise<Resolution<T>> {
    return this.settled;
  }

  /** Run `fn` once the value is known. A thrown error settles as `failed`. */
  apply<U>(fn: (value: T) => Lifted<U>): Deferred<U> {
    return Deferred.fromResolution(
      this.settled.then(async (r): Promise<Resolution<U>> => {
        if (r.state === 'failed') return r;
        if (r.state === 'unknown') return r;
        const next = fn(r.value);
        if (!(next instanceof Deferred)) return { state: 'known', value: next, secret: r.secret };
        const inner = await next.settled;
        if (!r.secret || inner.state === 'failed') return inner;
        return { ...inner, secret: true };
      }),
    );
  }

  /** The same value, marked secret. */
  asSecret(): Deferred<T> {
    return Deferred.fromResolution(
      this.settled.then((r): Resolution<T> => (r.state === 'failed' ? r : { ...r, secret: true })),
    );
  }
}

export function isDeferred(value: unknown): value is Deferred<unknown> {
  return value instanceof Deferred;
}
