/**
 * Strata Template: Diagnostics Model
 *
 * Every phase of the runtime (decoding, scheduling, type checking,
 * evaluation) reports problems as Diagnostic records instead of throwing.
 * A phase accumulates into a Diagnostics collector and keeps going; the
 * caller decides whether the collected errors are fatal.
 *
 * This module also owns the helpers shared by every "did you mean"
 * message: Levenshtein distance, candidate ordering, and the
 * NonExistentFieldFormatter used for unknown fields and properties.
 */

// ---------------------------------------------------------------------------
// Source Ranges
// ---------------------------------------------------------------------------

/** A position in a template source. Lines and columns are 1-based. */
export interface SourcePosition {
  readonly line: number;
  readonly column: number;
  /** 0-based offset into the source text. */
  readonly byte: number;
}

export interface SourceRange {
  readonly filename: string;
  readonly start: SourcePosition;
  readonly end: SourcePosition;
}

/**
 * Collapse a (line, column) pair into one ordinal so positions compare as
 * plain numbers. Holds while no line exceeds 100,000 columns.
 */
export function positionOrdinal(pos: SourcePosition): number {
  return pos.line * 100_000 + pos.column;
}

/**
 * Smallest range covering every given range. Undefined entries are
 * skipped; the result is undefined when nothing remains.
 */
export function mergeRanges(
  ranges: ReadonlyArray<SourceRange | undefined>,
): SourceRange | undefined {
  let merged: SourceRange | undefined;
  for (const range of ranges) {
    if (range === undefined) continue;
    if (merged === undefined) {
      merged = range;
      continue;
    }
    const start =
      positionOrdinal(range.start) < positionOrdinal(merged.start) ? range.start : merged.start;
    const end = positionOrdinal(range.end) > positionOrdinal(merged.end) ? range.end : merged.end;
    merged = { filename: merged.filename, start, end };
  }
  return merged;
}

// ---------------------------------------------------------------------------
// Diagnostic Records
// ---------------------------------------------------------------------------

export enum Severity {
  Error = 'error',
  Warning = 'warning',
}

export interface Diagnostic {
  readonly severity: Severity;
  readonly summary: string;
  readonly detail?: string;
  readonly range?: SourceRange;
}

export function errorDiagnostic(
  range: SourceRange | undefined,
  summary: string,
  detail?: string,
): Diagnostic {
  return withOptional({ severity: Severity.Error, summary }, range, detail);
}

export function warningDiagnostic(
  range: SourceRange | undefined,
  summary: string,
  detail?: string,
): Diagnostic {
  return withOptional({ severity: Severity.Warning, summary }, range, detail);
}

/**
 * Warn when a builtin or field name was written with unexpected casing.
 * Returns undefined when `found` is already spelled as `expected`.
 */
export function unexpectedCasing(
  range: SourceRange | undefined,
  expected: string,
  found: string,
): Diagnostic | undefined {
  if (expected === found) return undefined;
  return warningDiagnostic(
    range,
    `'${found}' looks like a miscapitalization of '${expected}'`,
    'Field and builtin names are camelCase; other spellings may be rejected in a future release.',
  );
}

function withOptional(
  base: { severity: Severity; summary: string },
  range: SourceRange | undefined,
  detail: string | undefined,
): Diagnostic {
  return {
    ...base,
    ...(detail !== undefined && detail !== '' ? { detail } : {}),
    ...(range !== undefined ? { range } : {}),
  };
}

// ---------------------------------------------------------------------------
// Diagnostics Collector
// ---------------------------------------------------------------------------

/**
 * Append-only collection of diagnostics.
 *
 * Deferred continuations append to the same collector the synchronous
 * evaluation path uses. Node runs every continuation on the one event-loop
 * thread, so appends never interleave mid-write.
 */
export class Diagnostics implements Iterable<Diagnostic> {
  private readonly entries: Diagnostic[] = [];

  constructor(initial: Iterable<Diagnostic> = []) {
    for (const d of initial) this.entries.push(d);
  }

  add(diagnostic: Diagnostic | undefined): void {
    if (diagnostic !== undefined) this.entries.push(diagnostic);
  }

  error(range: SourceRange | undefined, summary: string, detail?: string): void {
    this.entries.push(errorDiagnostic(range, summary, detail));
  }

  warning(range: SourceRange | undefined, summary: string, detail?: string): void {
    this.entries.push(warningDiagnostic(range, summary, detail));
  }

  extend(other: Iterable<Diagnostic>): void {
    for (const d of other) this.entries.push(d);
  }

  hasErrors(): boolean {
    return this.entries.some((d) => d.severity === Severity.Error);
  }

  errors(): ReadonlyArray<Diagnostic> {
    return this.entries.filter((d) => d.severity === Severity.Error);
  }

  get length(): number {
    return this.entries.length;
  }

  toArray(): ReadonlyArray<Diagnostic> {
    return [...this.entries];
  }

  [Symbol.iterator](): Iterator<Diagnostic> {
    return this.entries[Symbol.iterator]();
  }
}

// ---------------------------------------------------------------------------
// Suggestions
// ---------------------------------------------------------------------------

/** Levenshtein distance between two strings. */
export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const subCost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min(
          (previous[j] ?? 0) + 1,
          (current[j - 1] ?? 0) + 1,
          (previous[j - 1] ?? 0) + subCost,
        ),
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Order candidates by closeness to `target`. Ties keep alphabetical order,
 * so the output is stable for a given candidate set.
 */
export function sortByEditDistance(candidates: ReadonlyArray<string>, target: string): string[] {
  const alphabetical = [...candidates].sort();
  const distances = new Map(alphabetical.map((c) => [c, editDistance(c, target)]));
  return alphabetical.sort((a, b) => (distances.get(a) ?? 0) - (distances.get(b) ?? 0));
}

/** `a`, `a and b`, `a, b and c`. */
export function andList(items: ReadonlyArray<string>): string {
  return humanList(items, 'and');
}

/** `a`, `a or b`, `a, b or c`. */
export function orList(items: ReadonlyArray<string>): string {
  return humanList(items, 'or');
}

function humanList(items: ReadonlyArray<string>, conjunction: string): string {
  if (items.length <= 1) return items.join('');
  const head = items.slice(0, -1).join(', ');
  return `${head} ${conjunction} ${items[items.length - 1] ?? ''}`;
}

export interface NonExistentFieldOptions {
  /** How the object that lacks the field is named in the message. */
  readonly parentLabel: string;
  /** Names that do exist on the parent. */
  readonly fields: ReadonlyArray<string>;
  /** List at most this many suggestions; 0 lists them all. */
  readonly maxElements?: number;
  /** Say "properties" instead of "fields". */
  readonly fieldsAreProperties?: boolean;
}

/**
 * Builds the summary/detail pair for a reference to a field that does not
 * exist, listing the existing names closest to what was written first.
 */
export class NonExistentFieldFormatter {
  constructor(private readonly options: NonExistentFieldOptions) {}

  /** One-line message: header followed by the suggestion body. */
  message(field: string, fieldLabel: string): string {
    return `${this.header(fieldLabel)} ${this.body(field)}`;
  }

  messageWithDetail(field: string, fieldLabel: string): { summary: string; detail: string } {
    return { summary: this.header(fieldLabel), detail: this.body(field) };
  }

  private header(fieldLabel: string): string {
    return `${fieldLabel} does not exist on ${this.options.parentLabel}.`;
  }

  private body(field: string): string {
    const kind = this.options.fieldsAreProperties === true ? 'properties' : 'fields';
    const existing = sortByEditDistance(this.options.fields, field);
    if (existing.length === 0) {
      return `${this.options.parentLabel} has no ${kind}`;
    }
    const max = this.options.maxElements ?? 0;
    let list = existing.join(', ');
    if (max !== 0 && existing.length > max) {
      list = `${existing.slice(0, max).join(', ')} and ${existing.length - max} others`;
    }
    return `Existing ${kind} are: ${list}`;
  }
}
