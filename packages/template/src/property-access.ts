/**
 * Strata Template: Property Access and Interpolation Parsing
 *
 * A property access is a JavaScript-like path made only of literals:
 *
 *   name        := [^.\[}]+
 *   quoted      := '"' ( '\"' | [^"] )* '"'
 *   subscript   := '[' ( quoted | integer ) ']'
 *   root        := name | '[' quoted ']'
 *   path        := root { '.' name | subscript }
 *
 * Strings embed paths as `${path}`. `$$` is an escaped `$`.
 *
 * A string that is exactly one `${path}` becomes a SymbolExpr so the value
 * keeps its type (a list stays a list); any other mix of text and paths is
 * an InterpolateExpr that always produces a string.
 */

import type {
  Expr,
  Interpolation,
  PropertyAccess,
  PropertyAccessor,
} from './ast.js';
import type { Diagnostic, SourceRange } from './diagnostics.js';
import { errorDiagnostic } from './diagnostics.js';

export type InterpolateResult =
  | { readonly ok: true; readonly parts: ReadonlyArray<Interpolation> }
  | { readonly ok: false; readonly diagnostics: ReadonlyArray<Diagnostic> };

type AccessResult =
  | { readonly ok: true; readonly access: PropertyAccess; readonly next: number }
  | { readonly ok: false; readonly diagnostic: Diagnostic };

const INTEGER = /^[+-]?\d+$/;

/**
 * Parse a path starting at `start` (just past a `${`) up to and including
 * the closing `}`.
 */
function parseAccess(input: string, start: number, range: SourceRange | undefined): AccessResult {
  const fail = (summary: string): AccessResult => ({
    ok: false,
    diagnostic: errorDiagnostic(range, summary),
  });

  const accessors: PropertyAccessor[] = [];
  let pos = start;
  while (pos < input.length) {
    const c = input[pos];
    if (c === '}') {
      return { ok: true, access: { accessors }, next: pos + 1 };
    }
    if (c === '.') {
      pos++;
      continue;
    }
    if (c === '[') {
      if (input[pos + 1] === '"') {
        let key = '';
        let i = pos + 2;
        for (;;) {
          if (i >= input.length) return fail('missing closing quote in property name');
          const ch = input[i];
          if (ch === '"') {
            i++;
            break;
          }
          if (ch === '\\' && input[i + 1] === '"') {
            key += '"';
            i += 2;
            continue;
          }
          key += ch;
          i++;
        }
        if (input[i] !== ']') return fail('missing closing bracket in property access');
        accessors.push({ kind: 'subscript', index: key });
        pos = i + 1;
        continue;
      }

      const close = input.indexOf(']', pos);
      if (close === -1) return fail('missing closing bracket in list index');
      const digits = input.slice(pos + 1, close);
      if (!INTEGER.test(digits)) return fail('invalid list index');
      if (accessors.length === 0) {
        return fail('the root property must be a string subscript or a name');
      }
      accessors.push({ kind: 'subscript', index: Number.parseInt(digits, 10) });
      pos = close + 1;
      continue;
    }

    let end = pos;
    while (end < input.length && !'.[}'.includes(input[end] ?? '')) end++;
    accessors.push({ kind: 'name', name: input.slice(pos, end) });
    pos = end;
  }
  return fail('unterminated interpolation');
}

/** Split a string into literal text and `${...}` references. */
export function parseInterpolate(input: string, range?: SourceRange): InterpolateResult {
  const parts: Interpolation[] = [];
  const diagnostics: Diagnostic[] = [];
  let text = '';
  let pos = 0;
  while (pos < input.length) {
    const c = input[pos];
    const n = input[pos + 1];
    if (c === '$' && n === '{') {
      const result = parseAccess(input, pos + 2, range);
      if (!result.ok) return { ok: false, diagnostics: [result.diagnostic] };
      if (result.access.accessors.length === 0) {
        diagnostics.push(errorDiagnostic(range, 'Property access expressions cannot be empty'));
      }
      parts.push({ text, value: result.access });
      text = '';
      pos = result.next;
    } else if (c === '$' && n === '$') {
      text += '$';
      pos += 2;
    } else {
      text += c;
      pos++;
    }
  }
  if (text !== '') parts.push({ text });
  if (diagnostics.length > 0) return { ok: false, diagnostics };
  return { ok: true, parts };
}

/**
 * Parse a scalar string into the narrowest expression: a plain string, a
 * lone symbol reference, or an interpolation.
 */
export function parseStringValue(
  input: string,
  range?: SourceRange,
): { readonly expr?: Expr; readonly diagnostics: ReadonlyArray<Diagnostic> } {
  const result = parseInterpolate(input, range);
  if (!result.ok) return { diagnostics: result.diagnostics };

  const { parts } = result;
  const withRange = range === undefined ? {} : { range };
  const only = parts[0];
  if (parts.length === 0) {
    return { expr: { kind: 'string', value: '', ...withRange }, diagnostics: [] };
  }
  if (parts.length === 1 && only !== undefined) {
    if (only.value === undefined) {
      return { expr: { kind: 'string', value: only.text, ...withRange }, diagnostics: [] };
    }
    if (only.text === '') {
      return { expr: { kind: 'symbol', property: only.value, ...withRange }, diagnostics: [] };
    }
  }
  return { expr: { kind: 'interpolate', parts, ...withRange }, diagnostics: [] };
}
