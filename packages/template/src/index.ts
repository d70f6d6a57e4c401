/**
 * @strata/template
 *
 * Strata template front end: the AST, property-access and interpolation
 * parsing, the YAML/JSON expression parser, the declaration decoder, and
 * the diagnostics model shared by every later phase.
 *
 * This package is the base layer. The kernel depends on it; it has no
 * internal Strata dependencies.
 */

// AST
export type {
  ArchiveExpr,
  ArchiveKind,
  AssetArchiveEntry,
  AssetArchiveExpr,
  AssetExpr,
  AssetKind,
  AssetOrArchiveExpr,
  BooleanExpr,
  BuiltinExpr,
  ConfigParamDecl,
  CustomTimeoutsDecl,
  Entry,
  Expr,
  ExprKind,
  GetResourceDecl,
  InterpolateExpr,
  Interpolation,
  InvokeExpr,
  InvokeOptions,
  JoinExpr,
  ListExpr,
  NullExpr,
  NumberExpr,
  ObjectExpr,
  ObjectProperty,
  PropertyAccess,
  PropertyAccessor,
  PropertyName,
  PropertySubscript,
  ResourceDecl,
  ResourceOptionsDecl,
  SelectExpr,
  SplitExpr,
  StackReferenceExpr,
  StringExpr,
  SymbolExpr,
  Template,
  UnaryBuiltinExpr,
} from './ast.js';
export {
  RESOURCE_OPTION_NAMES,
  UnreachableError,
  assertNever,
  booleanExpr,
  childExprs,
  entry,
  formatPropertyAccess,
  listExpr,
  nullExpr,
  numberExpr,
  objectExpr,
  objectOf,
  rootName,
  stringExpr,
} from './ast.js';

// Diagnostics
export type {
  Diagnostic,
  NonExistentFieldOptions,
  SourcePosition,
  SourceRange,
} from './diagnostics.js';
export {
  Diagnostics,
  NonExistentFieldFormatter,
  Severity,
  andList,
  editDistance,
  errorDiagnostic,
  mergeRanges,
  orList,
  positionOrdinal,
  sortByEditDistance,
  unexpectedCasing,
  warningDiagnostic,
} from './diagnostics.js';

// Parsing
export type { InterpolateResult } from './property-access.js';
export { parseInterpolate, parseStringValue } from './property-access.js';
export type { ParsedSource } from './parser.js';
export { describeKind, isAssetOrArchive, parseExpr, parseSource } from './parser.js';
export type { LoadedTemplate } from './template.js';
export { decodeTemplate, loadTemplate } from './template.js';
