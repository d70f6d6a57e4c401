/**
 * Strata Template: Expression Parser
 *
 * Turns YAML (or JSON, which is a subset) source into expression trees.
 * The `yaml` library does the lexing and gives us nodes with byte ranges;
 * this module maps each node to an Expr, recognising builtin calls
 * (`fn::join`, `fn::invoke`, ...) as single-key objects.
 *
 * Parsing never throws. Syntax problems are returned as diagnostics
 * alongside whatever tree could still be built, so later phases can report
 * their own errors in the same run.
 */

import { isAlias, isMap, isScalar, isSeq, LineCounter, parseDocument } from 'yaml';
import type { Document, Node as YamlNode } from 'yaml';
import type {
  AssetArchiveEntry,
  AssetKind,
  ArchiveKind,
  AssetOrArchiveExpr,
  Expr,
  InvokeOptions,
  ObjectExpr,
  ObjectProperty,
  StringExpr,
} from './ast.js';
import { Diagnostics, unexpectedCasing } from './diagnostics.js';
import type { SourceRange } from './diagnostics.js';
import { parseStringValue } from './property-access.js';

// ---------------------------------------------------------------------------
// Builtin Tables
// ---------------------------------------------------------------------------

type BuiltinParser = (call: BuiltinCall, diags: Diagnostics) => Expr | undefined;

interface BuiltinCall {
  /** The `fn::` key as written. */
  readonly name: StringExpr;
  readonly args: Expr;
  readonly range: SourceRange | undefined;
}

const ASSET_BUILTINS: ReadonlyMap<string, AssetKind | ArchiveKind> = new Map<string, AssetKind | ArchiveKind>([
  ['fn::stringasset', 'stringAsset'],
  ['fn::fileasset', 'fileAsset'],
  ['fn::remoteasset', 'remoteAsset'],
  ['fn::filearchive', 'fileArchive'],
  ['fn::remotearchive', 'remoteArchive'],
]);

/** `fn::<pkg>:<module>(:<name>)?` is shorthand for `fn::invoke`. */
const INVOKE_SHORTHAND = /^fn::[^:]+:[^:]+(:[^:]+)?$/;

interface Builtin {
  readonly spelling: string;
  readonly parse: BuiltinParser;
}

const BUILTINS: ReadonlyMap<string, Builtin> = new Map<string, Builtin>([
  ['fn::invoke', { spelling: 'fn::invoke', parse: parseInvoke }],
  ['fn::join', { spelling: 'fn::join', parse: pairParser('join', (a, b) => ({ kind: 'join', delimiter: a, values: b })) }],
  ['fn::split', { spelling: 'fn::split', parse: pairParser('split', (a, b) => ({ kind: 'split', delimiter: a, source: b })) }],
  ['fn::select', { spelling: 'fn::select', parse: pairParser('select', (a, b) => ({ kind: 'select', index: a, values: b })) }],
  ['fn::tojson', { spelling: 'fn::toJSON', parse: unaryParser('toJSON') }],
  ['fn::tobase64', { spelling: 'fn::toBase64', parse: unaryParser('toBase64') }],
  ['fn::frombase64', { spelling: 'fn::fromBase64', parse: unaryParser('fromBase64') }],
  ['fn::secret', { spelling: 'fn::secret', parse: unaryParser('secret') }],
  ['fn::readfile', { spelling: 'fn::readFile', parse: unaryParser('readFile') }],
  ['fn::rfc3339tounix', { spelling: 'fn::rfc3339ToUnix', parse: unaryParser('rfc3339ToUnix') }],
  ['fn::stackreference', { spelling: 'fn::stackReference', parse: parseStackReference }],
  ['fn::assetarchive', { spelling: 'fn::assetArchive', parse: parseAssetArchive }],
]);

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface ParsedSource {
  /** The document body, or undefined for an empty document. */
  readonly expr?: Expr;
  readonly diagnostics: Diagnostics;
}

/**
 * Parse YAML or JSON text into an expression tree.
 *
 * @param filename - Used only in source ranges
 */
export function parseSource(filename: string, text: string): ParsedSource {
  const lineCounter = new LineCounter();
  const doc = parseDocument(text, { lineCounter, prettyErrors: false });
  const diags = new Diagnostics();
  const toRange = (start: number, end: number): SourceRange => {
    const s = lineCounter.linePos(start);
    const e = lineCounter.linePos(end);
    return {
      filename,
      start: { line: s.line, column: s.col, byte: start },
      end: { line: e.line, column: e.col, byte: end },
    };
  };

  for (const err of doc.errors) {
    diags.error(toRange(err.pos[0], err.pos[1]), firstLine(err.message));
  }
  if (diags.hasErrors()) return { diagnostics: diags };

  const parser = new ExprParser(doc, diags, toRange);
  const expr = doc.contents === null ? undefined : parser.parse(doc.contents);
  return expr === undefined ? { diagnostics: diags } : { expr, diagnostics: diags };
}

/** Parse a single expression from source text, e.g. in tests and tooling. */
export function parseExpr(text: string, filename = '<expr>'): ParsedSource {
  return parseSource(filename, text);
}

// ---------------------------------------------------------------------------
// Node Mapping
// ---------------------------------------------------------------------------

class ExprParser {
  constructor(
    private readonly doc: Document,
    private readonly diags: Diagnostics,
    private readonly toRange: (start: number, end: number) => SourceRange,
  ) {}

  parse(node: unknown): Expr | undefined {
    if (isAlias(node)) {
      const target = node.resolve(this.doc);
      return target === undefined ? undefined : this.parse(target);
    }
    const range = this.rangeOf(node);
    const withRange = range === undefined ? {} : { range };

    if (isScalar(node)) {
      const value: unknown = node.value;
      if (value === null || value === undefined) return { kind: 'null', ...withRange };
      if (typeof value === 'boolean') return { kind: 'boolean', value, ...withRange };
      if (typeof value === 'number') return { kind: 'number', value, ...withRange };
      const parsed = parseStringValue(String(value), range);
      this.diags.extend(parsed.diagnostics);
      return parsed.expr;
    }

    if (isSeq(node)) {
      const elements: Expr[] = [];
      for (const item of node.items) {
        const x = this.parse(item);
        if (x !== undefined) elements.push(x);
      }
      return { kind: 'list', elements, ...withRange };
    }

    if (isMap(node)) {
      const entries: ObjectProperty[] = [];
      for (const pair of node.items) {
        const key = this.parse(pair.key);
        const value = this.parse(pair.value) ?? { kind: 'null', ...this.rangeOrEmpty(pair.value) };
        if (key === undefined) continue;
        entries.push({ key, value });
      }
      return this.objectOrBuiltin(entries, range);
    }

    if (node !== null && node !== undefined) {
      this.diags.error(range, 'unexpected syntax node');
    }
    return undefined;
  }

  private objectOrBuiltin(entries: ObjectProperty[], range: SourceRange | undefined): Expr | undefined {
    const withRange = range === undefined ? {} : { range };
    const object: ObjectExpr = { kind: 'object', entries, ...withRange };

    for (const { key, value } of entries) {
      if (key.kind !== 'string') continue;
      const assetKind = ASSET_BUILTINS.get(key.value.toLowerCase());
      if (assetKind === undefined) continue;
      if (entries.length !== 1) {
        this.diags.error(range, `${key.value} must have its own object`);
        return undefined;
      }
      this.diags.add(unexpectedCasing(key.range, spellingOf(assetKind), key.value));
      return { kind: assetKind, source: value, ...withRange };
    }

    const only = entries[0];
    if (entries.length !== 1 || only === undefined || only.key.kind !== 'string') return object;

    const name = only.key;
    const lower = name.value.toLowerCase();
    const builtin = BUILTINS.get(lower);
    if (builtin !== undefined) {
      this.diags.add(unexpectedCasing(name.range, builtin.spelling, name.value));
      if (lower === 'fn::stackreference') {
        this.diags.warning(
          name.range,
          "'fn::stackReference' is deprecated; please use 'strata:strata:StackReference' instead",
        );
      }
      return builtin.parse({ name, args: only.value, range }, this.diags) ?? object;
    }

    if (INVOKE_SHORTHAND.test(lower)) {
      const token: StringExpr = { kind: 'string', value: name.value.slice(4), ...(name.range ? { range: name.range } : {}) };
      const args = only.value.kind === 'object' ? only.value : undefined;
      return {
        kind: 'invoke',
        token,
        ...(args !== undefined ? { args } : {}),
        options: {},
        ...withRange,
      };
    }

    if (lower.startsWith('fn::')) {
      this.diags.warning(
        name.range,
        "'fn::' is a reserved prefix",
        `The key '${name.value}' is treated as a plain object key.`,
      );
    }
    return object;
  }

  private rangeOf(node: unknown): SourceRange | undefined {
    if (!isYamlNode(node)) return undefined;
    const r = node.range;
    if (r === null || r === undefined) return undefined;
    return this.toRange(r[0], r[1]);
  }

  private rangeOrEmpty(node: unknown): { range?: SourceRange } {
    const range = this.rangeOf(node);
    return range === undefined ? {} : { range };
  }
}

function isYamlNode(node: unknown): node is YamlNode {
  return isScalar(node) || isMap(node) || isSeq(node) || isAlias(node);
}

// ---------------------------------------------------------------------------
// Builtin Argument Parsers
// ---------------------------------------------------------------------------

function unaryParser(kind: 'toJSON' | 'toBase64' | 'fromBase64' | 'secret' | 'readFile' | 'rfc3339ToUnix'): BuiltinParser {
  return (call) => ({ kind, value: call.args, ...rangeField(call.range) });
}

function pairParser(
  name: 'join' | 'split' | 'select',
  build: (first: Expr, second: Expr) => Expr,
): BuiltinParser {
  return (call, diags) => {
    const { args } = call;
    const first = args.kind === 'list' ? args.elements[0] : undefined;
    const second = args.kind === 'list' ? args.elements[1] : undefined;
    if (args.kind !== 'list' || args.elements.length !== 2 || first === undefined || second === undefined) {
      diags.error(args.range, `the argument to fn::${name} must be a two-valued list`);
      return undefined;
    }
    return { ...build(first, second), ...rangeField(call.range) };
  };
}

function parseStackReference(call: BuiltinCall, diags: Diagnostics): Expr | undefined {
  const { args } = call;
  const stackName = args.kind === 'list' ? args.elements[0] : undefined;
  const propertyName = args.kind === 'list' ? args.elements[1] : undefined;
  if (args.kind !== 'list' || args.elements.length !== 2 || stackName === undefined || propertyName === undefined) {
    diags.error(args.range, 'the argument to fn::stackReference must be a two-valued list');
    return undefined;
  }
  if (stackName.kind !== 'string') {
    diags.error(args.range, 'the first argument to fn::stackReference must be a string literal');
    return undefined;
  }
  return { kind: 'stackReference', stackName, propertyName, ...rangeField(call.range) };
}

function parseAssetArchive(call: BuiltinCall, diags: Diagnostics): Expr | undefined {
  const { args } = call;
  if (args.kind !== 'object') {
    diags.error(args.range, 'the argument to fn::assetArchive must be an object');
    return undefined;
  }
  const entries: AssetArchiveEntry[] = [];
  for (const { key, value } of args.entries) {
    let ok = true;
    if (key.kind !== 'string') {
      diags.error(key.range, 'keys in fn::assetArchive arguments must be string literals');
      ok = false;
    }
    if (!isAssetOrArchive(value)) {
      diags.error(value.range, `value must be an asset or an archive, not ${describeKind(value)}`);
      ok = false;
    }
    if (ok && key.kind === 'string' && isAssetOrArchive(value)) {
      entries.push({ path: key.value, value });
    }
  }
  return { kind: 'assetArchive', entries, ...rangeField(call.range) };
}

const INVOKE_FIELDS = ['function', 'arguments', 'options', 'return'] as const;
const INVOKE_OPTION_FIELDS = ['parent', 'provider', 'dependsOn', 'version', 'pluginDownloadURL'] as const;

function parseInvoke(call: BuiltinCall, diags: Diagnostics): Expr | undefined {
  const { args } = call;
  if (args.kind !== 'object') {
    diags.error(
      args.range,
      "the argument to fn::invoke must be an object containing 'function', 'arguments', 'options', and 'return'",
    );
    return undefined;
  }

  const before = diags.errors().length;
  const fields = new Map<string, Expr>();
  for (const { key, value } of args.entries) {
    if (key.kind !== 'string') continue;
    const field = INVOKE_FIELDS.find((f) => f === key.value.toLowerCase());
    if (field === undefined) continue;
    diags.add(unexpectedCasing(key.range, field, key.value));
    fields.set(field, value);
  }

  const fn = fields.get('function');
  const argsExpr = fields.get('arguments');
  const optionsExpr = fields.get('options');
  const ret = fields.get('return');

  if (fn === undefined) {
    diags.error(args.range, "missing function name ('function')");
  } else if (fn.kind !== 'string') {
    diags.error(fn.range, 'function name must be a string literal');
  }
  if (argsExpr !== undefined && argsExpr.kind !== 'object') {
    diags.error(argsExpr.range, "function arguments ('arguments') must be an object");
  }
  if (ret !== undefined && ret.kind !== 'string') {
    diags.error(ret.range, 'return directive must be a string literal');
  }
  const options = optionsExpr === undefined ? {} : parseInvokeOptions(optionsExpr, diags);

  if (diags.errors().length !== before || fn === undefined || fn.kind !== 'string') return undefined;
  return {
    kind: 'invoke',
    token: fn,
    ...(argsExpr !== undefined && argsExpr.kind === 'object' ? { args: argsExpr } : {}),
    options,
    ...(ret !== undefined && ret.kind === 'string' ? { return: ret } : {}),
    ...rangeField(call.range),
  };
}

function parseInvokeOptions(expr: Expr, diags: Diagnostics): InvokeOptions {
  if (expr.kind !== 'object') {
    diags.error(expr.range, 'invoke options must be an object');
    return {};
  }
  const options: { -readonly [K in keyof InvokeOptions]: InvokeOptions[K] } = {};
  for (const { key, value } of expr.entries) {
    if (key.kind !== 'string') continue;
    const field = INVOKE_OPTION_FIELDS.find((f) => f.toLowerCase() === key.value.toLowerCase());
    if (field === undefined) {
      diags.warning(
        key.range,
        `Object 'invokeOptions' has no field named '${key.value}'`,
        `note: available fields are: ${INVOKE_OPTION_FIELDS.join(', ')}`,
      );
      continue;
    }
    diags.add(unexpectedCasing(key.range, field, key.value));
    if (field === 'version' || field === 'pluginDownloadURL') {
      if (value.kind !== 'string') {
        diags.error(value.range, `${field} must be a string literal`);
        continue;
      }
      options[field] = value;
    } else {
      options[field] = value;
    }
  }
  return options;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isAssetOrArchive(expr: Expr): expr is AssetOrArchiveExpr {
  switch (expr.kind) {
    case 'stringAsset':
    case 'fileAsset':
    case 'remoteAsset':
    case 'fileArchive':
    case 'remoteArchive':
    case 'assetArchive':
      return true;
    default:
      return false;
  }
}

/** Human description of an expression kind, e.g. "a list", "an object". */
export function describeKind(expr: Expr): string {
  switch (expr.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return 'a boolean';
    case 'number':
      return 'a number';
    case 'string':
    case 'interpolate':
      return 'a string';
    case 'symbol':
      return 'a reference';
    case 'list':
      return 'a list';
    case 'object':
      return 'an object';
    default:
      return `fn::${expr.kind}`;
  }
}

function spellingOf(kind: AssetOrArchiveExpr['kind']): string {
  return `fn::${kind}`;
}

function rangeField(range: SourceRange | undefined): { range?: SourceRange } {
  return range === undefined ? {} : { range };
}

function firstLine(message: string): string {
  const newline = message.indexOf('\n');
  return newline === -1 ? message : message.slice(0, newline);
}
