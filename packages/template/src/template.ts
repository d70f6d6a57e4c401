/**
 * Strata Template: Declaration Decoder
 *
 * Maps the parsed document onto Template declarations. Each record type
 * has an explicit table of field names; a field is matched
 * case-insensitively (with a casing warning) and unknown fields produce a
 * warning listing the fields that are available.
 *
 * Decoding keeps going after errors so one run reports as much as
 * possible. The returned Template is only meaningful when the diagnostics
 * carry no errors.
 */

import type {
  BooleanExpr,
  ConfigParamDecl,
  CustomTimeoutsDecl,
  Entry,
  Expr,
  GetResourceDecl,
  ObjectExpr,
  ResourceDecl,
  ResourceOptionsDecl,
  StringExpr,
  Template,
} from './ast.js';
import { RESOURCE_OPTION_NAMES } from './ast.js';
import { Diagnostics, unexpectedCasing } from './diagnostics.js';
import type { SourceRange } from './diagnostics.js';
import { parseSource } from './parser.js';

// ---------------------------------------------------------------------------
// Field Tables
// ---------------------------------------------------------------------------

const TEMPLATE_FIELDS = [
  'name',
  'runtime',
  'description',
  'configuration',
  'config',
  'variables',
  'resources',
  'outputs',
] as const;

const CONFIG_FIELDS = ['type', 'default', 'secret', 'description'] as const;
const RESOURCE_FIELDS = ['type', 'defaultProvider', 'properties', 'options', 'get'] as const;
const GET_FIELDS = ['id', 'state'] as const;
const CUSTOM_TIMEOUT_FIELDS = ['create', 'update', 'delete'] as const;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface LoadedTemplate {
  readonly template: Template;
  readonly diagnostics: Diagnostics;
}

/**
 * Parse and decode a template from YAML or JSON source text.
 *
 * @param filename - Recorded in every source range
 */
export function loadTemplate(filename: string, text: string): LoadedTemplate {
  const parsed = parseSource(filename, text);
  const diags = parsed.diagnostics;
  if (parsed.expr === undefined) {
    if (!diags.hasErrors()) diags.error(undefined, `${filename} is empty`);
    return { template: emptyTemplate(), diagnostics: diags };
  }
  return { template: decodeTemplate(parsed.expr, diags), diagnostics: diags };
}

/** Decode a parsed document body into a Template, appending to `diags`. */
export function decodeTemplate(expr: Expr, diags: Diagnostics): Template {
  if (expr.kind !== 'object') {
    diags.error(expr.range, 'a template must be an object');
    return emptyTemplate();
  }

  let name: StringExpr | undefined;
  let description: StringExpr | undefined;
  const config: Entry<ConfigParamDecl>[] = [];
  const variables: Entry<Expr>[] = [];
  const resources: Entry<ResourceDecl>[] = [];
  const outputs: Entry<Expr>[] = [];

  for (const [field, value] of recordFields('Template', expr, TEMPLATE_FIELDS, diags)) {
    switch (field) {
      case 'name':
        name = stringLiteral(value, 'name', diags);
        break;
      case 'description':
        description = stringLiteral(value, 'description', diags);
        break;
      case 'runtime':
        break;
      case 'configuration':
      case 'config':
        for (const e of decodeMap(value, field, diags)) {
          config.push({ key: e.key, value: decodeConfigParam(e.value, diags) });
        }
        break;
      case 'variables':
        variables.push(...decodeMap(value, field, diags));
        break;
      case 'resources':
        for (const e of decodeMap(value, field, diags)) {
          resources.push({ key: e.key, value: decodeResource(e.key, e.value, diags) });
        }
        break;
      case 'outputs':
        outputs.push(...decodeMap(value, field, diags));
        break;
    }
  }

  return {
    ...(name !== undefined ? { name } : {}),
    ...(description !== undefined ? { description } : {}),
    config,
    variables,
    resources,
    outputs,
    ...(expr.range !== undefined ? { range: expr.range } : {}),
  };
}

// ---------------------------------------------------------------------------
// Record Decoders
// ---------------------------------------------------------------------------

function decodeConfigParam(value: Expr, diags: Diagnostics): ConfigParamDecl {
  // A bare value is shorthand for `{ default: <value> }`.
  if (value.kind !== 'object') {
    return { default: value, ...rangeField(value.range) };
  }
  let type: StringExpr | undefined;
  let defaultValue: Expr | undefined;
  let secret: BooleanExpr | undefined;
  for (const [field, v] of recordFields('configParam', value, CONFIG_FIELDS, diags)) {
    switch (field) {
      case 'type':
        type = stringLiteral(v, 'type', diags);
        break;
      case 'default':
        defaultValue = v;
        break;
      case 'secret':
        secret = booleanLiteral(v, 'secret', diags);
        break;
      case 'description':
        break;
    }
  }
  return {
    ...(type !== undefined ? { type } : {}),
    ...(defaultValue !== undefined ? { default: defaultValue } : {}),
    ...(secret !== undefined ? { secret } : {}),
    ...rangeField(value.range),
  };
}

function decodeResource(name: StringExpr, value: Expr, diags: Diagnostics): ResourceDecl {
  if (value.kind !== 'object') {
    diags.error(value.range, `resource ${name.value} must be an object`);
    return { type: { kind: 'string', value: '' }, properties: [], hasProperties: false, options: {} };
  }

  let type: StringExpr | undefined;
  let defaultProvider: BooleanExpr | undefined;
  let properties: Entry<Expr>[] = [];
  let hasProperties = false;
  let options: ResourceOptionsDecl = {};
  let get: GetResourceDecl | undefined;

  for (const [field, v] of recordFields('resource', value, RESOURCE_FIELDS, diags)) {
    switch (field) {
      case 'type':
        type = stringLiteral(v, 'type', diags);
        break;
      case 'defaultProvider':
        defaultProvider = booleanLiteral(v, 'defaultProvider', diags);
        break;
      case 'properties':
        properties = decodeMap(v, 'properties', diags);
        hasProperties = true;
        break;
      case 'options':
        options = decodeOptions(v, diags);
        break;
      case 'get':
        get = decodeGet(v, diags);
        break;
    }
  }

  if (type === undefined) {
    diags.error(value.range, `resource ${name.value} is missing required field 'type'`);
  }
  return {
    type: type ?? { kind: 'string', value: '' },
    ...(defaultProvider !== undefined ? { defaultProvider } : {}),
    properties,
    hasProperties,
    options,
    ...(get !== undefined ? { get } : {}),
    ...rangeField(value.range),
  };
}

function decodeOptions(value: Expr, diags: Diagnostics): ResourceOptionsDecl {
  if (value.kind !== 'object') {
    diags.error(value.range, 'resource options must be an object');
    return {};
  }
  const options: { -readonly [K in keyof ResourceOptionsDecl]: ResourceOptionsDecl[K] } = {};
  for (const [field, v] of recordFields('resourceOptions', value, RESOURCE_OPTION_NAMES, diags)) {
    if (field === 'customTimeouts') {
      options.customTimeouts = decodeCustomTimeouts(v, diags);
    } else {
      options[field] = v;
    }
  }
  return options;
}

function decodeCustomTimeouts(value: Expr, diags: Diagnostics): CustomTimeoutsDecl {
  if (value.kind !== 'object') {
    diags.error(value.range, 'customTimeouts must be an object');
    return {};
  }
  const timeouts: { -readonly [K in keyof CustomTimeoutsDecl]: CustomTimeoutsDecl[K] } = {};
  for (const [field, v] of recordFields('customTimeouts', value, CUSTOM_TIMEOUT_FIELDS, diags)) {
    timeouts[field] = v;
  }
  return timeouts;
}

function decodeGet(value: Expr, diags: Diagnostics): GetResourceDecl | undefined {
  if (value.kind !== 'object') {
    diags.error(value.range, 'get must be an object');
    return undefined;
  }
  let id: Expr | undefined;
  let state: Entry<Expr>[] = [];
  for (const [field, v] of recordFields('get', value, GET_FIELDS, diags)) {
    if (field === 'id') id = v;
    else state = decodeMap(v, 'state', diags);
  }
  if (id === undefined) {
    diags.error(value.range, "get is missing required field 'id'");
    return undefined;
  }
  return { id, state, ...rangeField(value.range) };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * The known fields of an object, matched case-insensitively, in source
 * order. Unknown and non-literal keys are reported and skipped.
 */
function recordFields<F extends string>(
  label: string,
  object: ObjectExpr,
  fields: ReadonlyArray<F>,
  diags: Diagnostics,
): Array<[F, Expr]> {
  const out: Array<[F, Expr]> = [];
  for (const { key, value } of object.entries) {
    if (key.kind !== 'string') {
      diags.error(key.range, `keys of ${label} must be string literals`);
      continue;
    }
    const field = fields.find((f) => f.toLowerCase() === key.value.toLowerCase());
    if (field === undefined) {
      diags.warning(
        key.range,
        `Object '${label}' has no field named '${key.value}'`,
        `note: available fields are: ${fields.join(', ')}`,
      );
      continue;
    }
    diags.add(unexpectedCasing(key.range, field, key.value));
    out.push([field, value]);
  }
  return out;
}

/** Decode a name → expression map whose keys must be string literals. */
function decodeMap(value: Expr, section: string, diags: Diagnostics): Entry<Expr>[] {
  if (value.kind !== 'object') {
    diags.error(value.range, `${section} must be an object`);
    return [];
  }
  const out: Entry<Expr>[] = [];
  for (const { key, value: v } of value.entries) {
    if (key.kind !== 'string') {
      diags.error(key.range, `keys of ${section} must be string literals`);
      continue;
    }
    out.push({ key, value: v });
  }
  return out;
}

function stringLiteral(value: Expr, field: string, diags: Diagnostics): StringExpr | undefined {
  if (value.kind === 'string') return value;
  diags.error(value.range, `${field} must be a string literal`);
  return undefined;
}

function booleanLiteral(value: Expr, field: string, diags: Diagnostics): BooleanExpr | undefined {
  if (value.kind === 'boolean') return value;
  diags.error(value.range, `${field} must be a boolean literal`);
  return undefined;
}

function rangeField(range: SourceRange | undefined): { range?: SourceRange } {
  return range === undefined ? {} : { range };
}

function emptyTemplate(): Template {
  return { config: [], variables: [], resources: [], outputs: [] };
}
