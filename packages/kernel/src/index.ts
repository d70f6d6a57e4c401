/**
 * @strata/kernel
 *
 * Strata kernel: package schema binding, the dependency graph and
 * scheduler, the structural type checker, deferred values, the evaluator
 * and run orchestration.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API. The orchestration
 * engine, file reader and log sink are interfaces; their implementations
 * live in @strata/runtime-host.
 */

// Types
export type {
  ArrayType,
  EnumMember,
  EnumType,
  FunctionSchema,
  InputType,
  InvalidType,
  MapType,
  ObjectType,
  OptionalType,
  PrimitiveName,
  PrimitiveType,
  PropertyType,
  ResourceSchema,
  ResourceType,
  TokenType,
  Type,
  TypeKind,
  UnionType,
} from './schema/types.js';
export {
  ADHOC_OBJECT_TOKEN,
  AnyType,
  ArchiveType,
  AssetType,
  BoolType,
  ENVIRONMENT_OBJECT_TYPE,
  IntType,
  Invalid,
  NumberType,
  OrderedTypeSet,
  StringType,
  arrayOf,
  displayType,
  findProperty,
  input,
  isAdhocObject,
  isPrimitive,
  isRequired,
  mapOf,
  objectType,
  optional,
  optionalProperties,
  primitive,
  resourceType,
  typesEqual,
  unionOf,
  unwrapType,
} from './schema/types.js';

// Package schemas
export type {
  BindResult,
  ComplexTypeSpec,
  EnumValueSpec,
  FunctionSpec,
  ObjectSpec,
  PackageSchema,
  PackageSpec,
  PrimitiveSpecName,
  PropertySpec,
  ResourceSpec,
} from './schema/package.js';
export { bindPackage, providerToken } from './schema/package.js';
export type {
  LoadPackageResult,
  PackageLoader,
  PackageReference,
  ReferencedPackages,
  ResolveResult,
} from './schema/loader.js';
export {
  InMemoryPackageLoader,
  candidateTokens,
  isProviderToken,
  packageNameOf,
  referencedPackages,
  resolveFunction,
  resolveResource,
} from './schema/loader.js';

// Config
export type { ConfigConversion, ConfigTypeResult, ConfigValue } from './config/config-types.js';
export {
  CONFIG_TYPE_NAMES,
  configValueType,
  convertConfigValue,
  isConfigTypeCompatible,
  isConfigValue,
  parseConfigType,
} from './config/config-types.js';

// Graph
export type {
  BuildGraphResult,
  ConfigNode,
  Graph,
  GraphNode,
  GraphOptions,
  MissingNode,
  ResourceNode,
  ScheduleResult,
  StackConfigEntry,
  StackConfigNode,
  VariableNode,
} from './graph/scheduler.js';
export {
  ENVIRONMENT_NAME,
  buildGraph,
  nodeKindLabel,
  scheduleTemplate,
  topologicalSort,
} from './graph/scheduler.js';
export { expressionDependencies, resourceDependencies } from './graph/dependencies.js';
export type { TemplateVisitor } from './graph/walker.js';
export { walkExpr, walkTemplate } from './graph/walker.js';

// Type checking
export type { NotAssignableInit } from './typing/not-assignable.js';
export { NotAssignable } from './typing/not-assignable.js';
export type { TypeLookup } from './typing/assignable.js';
export { Assignability, dispType } from './typing/assignable.js';
export type { TypeCheckOptions, TypeCheckResult, Typing } from './typing/checker.js';
export { TypeChecker, findOutput, typeCheck } from './typing/checker.js';

// Evaluation
export type { Lifted, Resolution } from './evaluation/deferred.js';
export { Deferred, isDeferred } from './evaluation/deferred.js';
export type {
  ArchiveSource,
  AssetSource,
  ResourceKind,
  Value,
  ValueMap,
} from './evaluation/values.js';
export {
  ArchiveValue,
  AssetValue,
  ResourceHandle,
  isList,
  isValueMap,
  ownValue,
  resolveDeep,
  setValue,
  toDeferred,
  typeString,
} from './evaluation/values.js';
export type {
  Alias,
  AliasSpec,
  CustomTimeouts,
  Engine,
  EngineLog,
  EvaluationContext,
  FileReader,
  InvokeOptions,
  ReadResourceRequest,
  RegisterResourceRequest,
  RegisteredResource,
  ResourceOptions,
} from './evaluation/engine.js';
export { STACK_REFERENCE_TOKEN } from './evaluation/engine.js';
export type { Evaluated, EvaluatorOptions } from './evaluation/evaluator.js';
export { Evaluator } from './evaluation/evaluator.js';

// Run
export type { RunHost, RunResult } from './run.js';
export { runTemplate } from './run.js';

// Log sink interface (implementation lives in runtime-host)
export type { DiagnosticLogEntry, LogSink, RunPhase } from './logging/log-sink.js';
export { DiagnosticLogger, toEntry } from './logging/diagnostic-log.js';
