/**
 * Strata Template: Abstract Syntax Tree
 *
 * The immutable tree every later phase consumes. Expressions form a closed
 * tagged union keyed by `kind`; consumers switch over it exhaustively and
 * end with `assertNever` so a new kind cannot be added without the
 * compiler pointing at every switch that needs it.
 *
 * Nodes are created once by the decoder (or by the factory functions at the
 * bottom of this file) and never mutated. Later phases key their caches on
 * node identity, so two structurally equal nodes are still distinct.
 */

import type { SourceRange } from './diagnostics.js';

// ---------------------------------------------------------------------------
// Property Access
// ---------------------------------------------------------------------------

export interface PropertyName {
  readonly kind: 'name';
  readonly name: string;
}

export interface PropertySubscript {
  readonly kind: 'subscript';
  readonly index: string | number;
}

export type PropertyAccessor = PropertyName | PropertySubscript;

/** A parsed `a.b["c"][0]` path. Always has at least one accessor. */
export interface PropertyAccess {
  readonly accessors: ReadonlyArray<PropertyAccessor>;
}

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

interface ExprBase {
  readonly range?: SourceRange;
}

export interface NullExpr extends ExprBase {
  readonly kind: 'null';
}

export interface BooleanExpr extends ExprBase {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface NumberExpr extends ExprBase {
  readonly kind: 'number';
  readonly value: number;
}

export interface StringExpr extends ExprBase {
  readonly kind: 'string';
  readonly value: string;
}

export interface Interpolation {
  /** Literal text preceding `value`. */
  readonly text: string;
  readonly value?: PropertyAccess;
}

export interface InterpolateExpr extends ExprBase {
  readonly kind: 'interpolate';
  readonly parts: ReadonlyArray<Interpolation>;
}

/** A string consisting of exactly one `${...}` reference. */
export interface SymbolExpr extends ExprBase {
  readonly kind: 'symbol';
  readonly property: PropertyAccess;
}

export interface ListExpr extends ExprBase {
  readonly kind: 'list';
  readonly elements: ReadonlyArray<Expr>;
}

export interface ObjectProperty {
  readonly key: Expr;
  readonly value: Expr;
}

export interface ObjectExpr extends ExprBase {
  readonly kind: 'object';
  readonly entries: ReadonlyArray<ObjectProperty>;
}

export interface InvokeOptions {
  readonly parent?: Expr;
  readonly provider?: Expr;
  readonly dependsOn?: Expr;
  readonly version?: StringExpr;
  readonly pluginDownloadURL?: StringExpr;
}

export interface InvokeExpr extends ExprBase {
  readonly kind: 'invoke';
  readonly token: StringExpr;
  readonly args?: ObjectExpr;
  readonly options: InvokeOptions;
  readonly return?: StringExpr;
}

export interface JoinExpr extends ExprBase {
  readonly kind: 'join';
  readonly delimiter: Expr;
  readonly values: Expr;
}

export interface SplitExpr extends ExprBase {
  readonly kind: 'split';
  readonly delimiter: Expr;
  readonly source: Expr;
}

export interface SelectExpr extends ExprBase {
  readonly kind: 'select';
  readonly index: Expr;
  readonly values: Expr;
}

/** Builtins that take a single argument expression. */
export interface UnaryBuiltinExpr extends ExprBase {
  readonly kind: 'toJSON' | 'toBase64' | 'fromBase64' | 'secret' | 'readFile' | 'rfc3339ToUnix';
  readonly value: Expr;
}

export type AssetKind = 'stringAsset' | 'fileAsset' | 'remoteAsset';
export type ArchiveKind = 'fileArchive' | 'remoteArchive';

export interface AssetExpr extends ExprBase {
  readonly kind: AssetKind;
  readonly source: Expr;
}

export interface ArchiveExpr extends ExprBase {
  readonly kind: ArchiveKind;
  readonly source: Expr;
}

export interface AssetArchiveEntry {
  readonly path: string;
  readonly value: AssetOrArchiveExpr;
}

export interface AssetArchiveExpr extends ExprBase {
  readonly kind: 'assetArchive';
  /** Entries in source order; the evaluator re-sorts them by path. */
  readonly entries: ReadonlyArray<AssetArchiveEntry>;
}

export type AssetOrArchiveExpr = AssetExpr | ArchiveExpr | AssetArchiveExpr;

export interface StackReferenceExpr extends ExprBase {
  readonly kind: 'stackReference';
  readonly stackName: StringExpr;
  readonly propertyName: Expr;
}

export type BuiltinExpr =
  | InvokeExpr
  | JoinExpr
  | SplitExpr
  | SelectExpr
  | UnaryBuiltinExpr
  | AssetExpr
  | ArchiveExpr
  | AssetArchiveExpr
  | StackReferenceExpr;

export type Expr =
  | NullExpr
  | BooleanExpr
  | NumberExpr
  | StringExpr
  | InterpolateExpr
  | SymbolExpr
  | ListExpr
  | ObjectExpr
  | BuiltinExpr;

export type ExprKind = Expr['kind'];

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

/** A named declaration; `key` keeps the range of the name itself. */
export interface Entry<T> {
  readonly key: StringExpr;
  readonly value: T;
}

export interface ConfigParamDecl {
  readonly type?: StringExpr;
  readonly default?: Expr;
  readonly secret?: BooleanExpr;
  readonly range?: SourceRange;
}

export interface CustomTimeoutsDecl {
  readonly create?: Expr;
  readonly update?: Expr;
  readonly delete?: Expr;
}

export interface ResourceOptionsDecl {
  readonly additionalSecretOutputs?: Expr;
  readonly aliases?: Expr;
  readonly customTimeouts?: CustomTimeoutsDecl;
  readonly deleteBeforeReplace?: Expr;
  readonly dependsOn?: Expr;
  readonly ignoreChanges?: Expr;
  readonly import?: Expr;
  readonly parent?: Expr;
  readonly protect?: Expr;
  readonly provider?: Expr;
  readonly providers?: Expr;
  readonly version?: Expr;
  readonly pluginDownloadURL?: Expr;
  readonly replaceOnChanges?: Expr;
  readonly retainOnDelete?: Expr;
  readonly deletedWith?: Expr;
  readonly replaceWith?: Expr;
  readonly hideDiffs?: Expr;
}

/** Names of every resource option, in declaration order. */
export const RESOURCE_OPTION_NAMES = [
  'additionalSecretOutputs',
  'aliases',
  'customTimeouts',
  'deleteBeforeReplace',
  'dependsOn',
  'ignoreChanges',
  'import',
  'parent',
  'protect',
  'provider',
  'providers',
  'version',
  'pluginDownloadURL',
  'replaceOnChanges',
  'retainOnDelete',
  'deletedWith',
  'replaceWith',
  'hideDiffs',
] as const satisfies ReadonlyArray<keyof ResourceOptionsDecl>;

export interface GetResourceDecl {
  readonly id: Expr;
  readonly state: ReadonlyArray<Entry<Expr>>;
  readonly range?: SourceRange;
}

export interface ResourceDecl {
  readonly type: StringExpr;
  readonly defaultProvider?: BooleanExpr;
  readonly properties: ReadonlyArray<Entry<Expr>>;
  /** True when a `properties` block was written, even an empty one. */
  readonly hasProperties: boolean;
  readonly options: ResourceOptionsDecl;
  readonly get?: GetResourceDecl;
  readonly range?: SourceRange;
}

export interface Template {
  readonly name?: StringExpr;
  readonly description?: StringExpr;
  readonly config: ReadonlyArray<Entry<ConfigParamDecl>>;
  readonly variables: ReadonlyArray<Entry<Expr>>;
  readonly resources: ReadonlyArray<Entry<ResourceDecl>>;
  readonly outputs: ReadonlyArray<Entry<Expr>>;
  readonly range?: SourceRange;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Thrown when an exhaustive switch receives a value its type rules out. */
export class UnreachableError extends Error {
  constructor(value: unknown) {
    super(`unreachable: unexpected value ${JSON.stringify(value)}`);
    this.name = 'UnreachableError';
  }
}

export function assertNever(value: never): never {
  throw new UnreachableError(value);
}

/** The name a property access is rooted at. */
export function rootName(access: PropertyAccess): string {
  const root = access.accessors[0];
  if (root === undefined) return '';
  return root.kind === 'name' ? root.name : String(root.index);
}

/** Render a property access back to its source form, e.g. `a.b["c"][0]`. */
export function formatPropertyAccess(access: PropertyAccess): string {
  let out = '';
  for (const accessor of access.accessors) {
    if (accessor.kind === 'name') {
      if (out.length !== 0) out += '.';
      out += accessor.name;
    } else if (typeof accessor.index === 'string') {
      out += `["${accessor.index.replaceAll('"', '\\"')}"]`;
    } else {
      out += `[${accessor.index}]`;
    }
  }
  return out;
}

/**
 * The direct sub-expressions of an expression, in source order.
 * Shared by the dependency extractor and the post-order type walk.
 */
export function childExprs(expr: Expr): Expr[] {
  switch (expr.kind) {
    case 'null':
    case 'boolean':
    case 'number':
    case 'string':
    case 'interpolate':
    case 'symbol':
      return [];
    case 'list':
      return [...expr.elements];
    case 'object':
      return expr.entries.flatMap((e) => [e.key, e.value]);
    case 'invoke': {
      const out: Expr[] = [];
      if (expr.args !== undefined) out.push(expr.args);
      const { parent, provider, dependsOn } = expr.options;
      for (const opt of [parent, provider, dependsOn]) {
        if (opt !== undefined) out.push(opt);
      }
      return out;
    }
    case 'join':
      return [expr.delimiter, expr.values];
    case 'split':
      return [expr.delimiter, expr.source];
    case 'select':
      return [expr.index, expr.values];
    case 'toJSON':
    case 'toBase64':
    case 'fromBase64':
    case 'secret':
    case 'readFile':
    case 'rfc3339ToUnix':
      return [expr.value];
    case 'stringAsset':
    case 'fileAsset':
    case 'remoteAsset':
    case 'fileArchive':
    case 'remoteArchive':
      return [expr.source];
    case 'assetArchive':
      return expr.entries.map((e) => e.value);
    case 'stackReference':
      return [expr.stackName, expr.propertyName];
    default:
      return assertNever(expr);
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function nullExpr(range?: SourceRange): NullExpr {
  return withRange({ kind: 'null' }, range);
}

export function booleanExpr(value: boolean, range?: SourceRange): BooleanExpr {
  return withRange({ kind: 'boolean', value }, range);
}

export function numberExpr(value: number, range?: SourceRange): NumberExpr {
  return withRange({ kind: 'number', value }, range);
}

export function stringExpr(value: string, range?: SourceRange): StringExpr {
  return withRange({ kind: 'string', value }, range);
}

export function listExpr(elements: ReadonlyArray<Expr>, range?: SourceRange): ListExpr {
  return withRange({ kind: 'list', elements }, range);
}

export function objectExpr(
  entries: ReadonlyArray<ObjectProperty>,
  range?: SourceRange,
): ObjectExpr {
  return withRange({ kind: 'object', entries }, range);
}

/** Object literal from a plain record of string keys to expressions. */
export function objectOf(fields: Readonly<Record<string, Expr>>, range?: SourceRange): ObjectExpr {
  return objectExpr(
    Object.entries(fields).map(([k, v]) => ({ key: stringExpr(k), value: v })),
    range,
  );
}

export function entry<T>(name: string, value: T, range?: SourceRange): Entry<T> {
  return { key: stringExpr(name, range), value };
}

function withRange<T extends object>(node: T, range: SourceRange | undefined): T {
  return range === undefined ? node : { ...node, range };
}
