/**
 * Strata Kernel: Graph Builder and Scheduler
 *
 * Turns a template's declarations into one deterministic evaluation order.
 *
 * Nodes are registered in a fixed order (configuration, then resources,
 * then variables) and each name may be used once across all three
 * namespaces. Configuration has no dependencies and is emitted first.
 * Everything else is ordered by a depth-first visit in registration order,
 * so the same template always yields the same sequence of engine calls.
 *
 * Failures are local. A cycle is reported once, against the name that
 * closes it, and every node on it (and every node depending on one) is
 * left out of the order. Unrelated branches are still scheduled and can
 * report their own problems.
 */

import type {
  ConfigParamDecl,
  Expr,
  ResourceDecl,
  StringExpr,
  Template,
} from '@strata/template';
import { Diagnostics } from '@strata/template';
import type { ConfigValue } from '../config/config-types.js';
import { isProviderToken, packageNameOf } from '../schema/loader.js';
import { expressionDependencies, resourceDependencies } from './dependencies.js';

/** Name of the builtin environment object; always resolvable, never declarable. */
export const ENVIRONMENT_NAME = 'strata';

// ---------------------------------------------------------------------------
// Graph Nodes
// ---------------------------------------------------------------------------

export interface ConfigNode {
  readonly kind: 'config';
  readonly key: StringExpr;
  readonly decl: ConfigParamDecl;
}

/** A stack configuration value the template reads without declaring it. */
export interface StackConfigNode {
  readonly kind: 'stackConfig';
  readonly key: StringExpr;
  readonly value: ConfigValue;
}

export interface VariableNode {
  readonly kind: 'variable';
  readonly key: StringExpr;
  readonly value: Expr;
}

export interface ResourceNode {
  readonly kind: 'resource';
  readonly key: StringExpr;
  readonly decl: ResourceDecl;
  /** Package this resource is the default provider for. */
  readonly defaultProviderFor?: string;
}

/** Placeholder for a referenced name that nothing declares. */
export interface MissingNode {
  readonly kind: 'missing';
  readonly key: StringExpr;
}

export type GraphNode = ConfigNode | StackConfigNode | VariableNode | ResourceNode | MissingNode;

/** The noun a node kind is called by in diagnostics. */
export function nodeKindLabel(node: GraphNode): string {
  switch (node.kind) {
    case 'config':
    case 'stackConfig':
      return 'config';
    case 'variable':
      return 'variable';
    case 'resource':
      return 'resource';
    case 'missing':
      return 'missing node';
  }
}

export interface StackConfigEntry {
  readonly key: string;
  readonly value: ConfigValue;
}

export interface GraphOptions {
  /** Prefix that may be stripped from references, e.g. `myproject:bucketName`. */
  readonly project?: string;
  /** Report unresolved names while sorting instead of scheduling a placeholder. */
  readonly strictSymbols?: boolean;
  /** Stack configuration available to the template without a declaration. */
  readonly stackConfig?: ReadonlyArray<StackConfigEntry>;
}

export interface Graph {
  readonly nodes: ReadonlyMap<string, GraphNode>;
  /** Node keys in registration order. */
  readonly order: ReadonlyArray<string>;
  readonly dependencies: ReadonlyMap<string, ReadonlyArray<StringExpr>>;
  /** Package name → key of its default provider resource. */
  readonly defaultProviders: ReadonlyMap<string, StringExpr>;
  readonly project?: string;
  readonly strictSymbols: boolean;
}

export type BuildGraphResult =
  | { readonly ok: true; readonly graph: Graph; readonly diagnostics: Diagnostics }
  | { readonly ok: false; readonly diagnostics: Diagnostics };

export type ScheduleResult =
  | { readonly ok: true; readonly nodes: ReadonlyArray<GraphNode>; readonly diagnostics: Diagnostics }
  | { readonly ok: false; readonly nodes: ReadonlyArray<GraphNode>; readonly diagnostics: Diagnostics };

// ---------------------------------------------------------------------------
// Graph Construction
// ---------------------------------------------------------------------------

/**
 * Register every declaration of `template` as a graph node.
 * Naming conflicts are errors and leave the offending node out.
 */
export function buildGraph(template: Template, options: GraphOptions = {}): BuildGraphResult {
  const diagnostics = new Diagnostics();
  const nodes = new Map<string, GraphNode>();
  const order: string[] = [];
  const dependencies = new Map<string, ReadonlyArray<StringExpr>>();
  const defaultProviders = new Map<string, StringExpr>();

  const add = (node: GraphNode, deps: ReadonlyArray<StringExpr>): void => {
    if (!checkUnique(nodes, node, diagnostics)) return;
    nodes.set(node.key.value, node);
    order.push(node.key.value);
    dependencies.set(node.key.value, deps);
  };

  for (const { key, value } of template.config) {
    add({ kind: 'config', key, decl: value }, []);
  }
  for (const { key, value } of options.stackConfig ?? []) {
    add({ kind: 'stackConfig', key: { kind: 'string', value: key }, value }, []);
  }

  for (const { key, value: decl } of template.resources) {
    let defaultProviderFor: string | undefined;
    if (decl.defaultProvider?.value === true) {
      if (!isProviderToken(decl.type.value)) {
        diagnostics.error(
          decl.defaultProvider.range,
          `resource ${key.value} sets defaultProvider but ${decl.type.value} is not a provider type`,
          'Only resources of type strata:providers:<package> can be default providers.',
        );
      } else {
        defaultProviderFor = packageNameOf(decl.type.value);
        const existing = defaultProviders.get(defaultProviderFor);
        if (existing !== undefined) {
          diagnostics.error(
            decl.defaultProvider.range,
            `resource ${key.value} cannot be the default provider for ${defaultProviderFor}: ` +
              `resource ${existing.value} already is`,
          );
        } else {
          defaultProviders.set(defaultProviderFor, key);
        }
      }
    }
    add(
      defaultProviderFor !== undefined
        ? { kind: 'resource', key, decl, defaultProviderFor }
        : { kind: 'resource', key, decl },
      resourceDependencies(decl),
    );
  }

  for (const { key, value } of template.variables) {
    add({ kind: 'variable', key, value }, expressionDependencies(value));
  }

  if (diagnostics.hasErrors()) return { ok: false, diagnostics };

  const project = options.project ?? template.name?.value;
  return {
    ok: true,
    graph: {
      nodes,
      order,
      dependencies,
      defaultProviders,
      ...(project !== undefined ? { project } : {}),
      strictSymbols: options.strictSymbols === true,
    },
    diagnostics,
  };
}

function checkUnique(
  nodes: ReadonlyMap<string, GraphNode>,
  node: GraphNode,
  diagnostics: Diagnostics,
): boolean {
  const name = node.key.value;
  const kind = nodeKindLabel(node);
  if (name === ENVIRONMENT_NAME) {
    diagnostics.error(node.key.range, `${kind} ${name} uses the reserved name ${ENVIRONMENT_NAME}`);
    return false;
  }
  const other = nodes.get(name);
  if (other === undefined) return true;
  // Stack config shadowed by a declaration is the normal case, not a conflict.
  if (node.kind === 'stackConfig' || other.kind === 'stackConfig') return false;
  const otherKind = nodeKindLabel(other);
  if (otherKind === kind) {
    diagnostics.error(node.key.range, `found duplicate ${kind} ${name}`);
  } else {
    diagnostics.error(
      node.key.range,
      `${kind} ${name} cannot have the same name as ${otherKind} ${name}`,
    );
  }
  return false;
}

// ---------------------------------------------------------------------------
// Topological Sort
// ---------------------------------------------------------------------------

/**
 * Order a graph so every node follows the nodes it depends on.
 *
 * The result always carries the nodes that could be ordered; `ok` is false
 * when any error was reported.
 */
export function topologicalSort(graph: Graph): ScheduleResult {
  return new Scheduler(graph).run();
}

/** Build and sort in one step. */
export function scheduleTemplate(template: Template, options: GraphOptions = {}): ScheduleResult {
  const built = buildGraph(template, options);
  if (!built.ok) return { ok: false, nodes: [], diagnostics: built.diagnostics };
  const sorted = topologicalSort(built.graph);
  const diagnostics = new Diagnostics(built.diagnostics);
  diagnostics.extend(sorted.diagnostics);
  return diagnostics.hasErrors()
    ? { ok: false, nodes: sorted.nodes, diagnostics }
    : { ok: true, nodes: sorted.nodes, diagnostics };
}

class Scheduler {
  private readonly nodes: Map<string, GraphNode>;
  private readonly order: string[];
  private readonly sorted: GraphNode[] = [];
  private readonly visiting = new Set<string>();
  private readonly visited = new Set<string>();
  private readonly failed = new Set<string>();
  private readonly diagnostics = new Diagnostics();

  constructor(private readonly graph: Graph) {
    this.nodes = new Map(graph.nodes);
    this.order = [...graph.order];
  }

  run(): ScheduleResult {
    // Configuration goes first, in declaration order.
    for (const key of this.order) {
      const node = this.nodes.get(key);
      if (node?.kind === 'config' || node?.kind === 'stackConfig') {
        this.visited.add(key);
        this.sorted.push(node);
      }
    }

    // Visit the first unsettled node until none remain. `order` grows as
    // placeholders for missing names are added, so re-scan each time.
    for (;;) {
      const next = this.order.find((k) => !this.visited.has(k) && !this.failed.has(k));
      if (next === undefined) break;
      const node = this.nodes.get(next);
      if (node !== undefined) this.visit(node.key);
    }

    const nodes = [...this.sorted];
    return this.diagnostics.hasErrors()
      ? { ok: false, nodes, diagnostics: this.diagnostics }
      : { ok: true, nodes, diagnostics: this.diagnostics };
  }

  private visit(name: StringExpr): boolean {
    const node = this.resolve(name);
    if (node === undefined) return false;
    const key = node.key.value;

    if (this.failed.has(key)) return false;
    if (this.visited.has(key)) return true;
    if (this.visiting.has(key)) {
      this.diagnostics.error(
        name.range,
        `circular dependency of ${nodeKindLabel(node)} '${key}' transitively on itself`,
      );
      return false;
    }

    this.visiting.add(key);
    const ok = this.visitDependencies(node);
    this.visiting.delete(key);
    if (!ok) {
      this.failed.add(key);
      return false;
    }
    this.visited.add(key);
    this.sorted.push(node);
    return true;
  }

  private visitDependencies(node: GraphNode): boolean {
    for (const dep of this.graph.dependencies.get(node.key.value) ?? []) {
      if (dep.value === ENVIRONMENT_NAME) continue;
      if (!this.visit(dep)) return false;
    }
    if (node.kind !== 'resource') return true;

    // A resource without an explicit provider waits for its package's
    // default provider, unless it is that provider.
    const pkg = node.decl.type.value.split(':')[0] ?? '';
    const defaultProvider = this.graph.defaultProviders.get(pkg);
    if (
      defaultProvider !== undefined &&
      node.decl.options.provider === undefined &&
      node.defaultProviderFor === undefined
    ) {
      return this.visit(defaultProvider);
    }
    return true;
  }

  /** The node a reference names, creating a placeholder when tolerant. */
  private resolve(name: StringExpr): GraphNode | undefined {
    const direct = this.nodes.get(name.value);
    if (direct !== undefined) return direct;

    const project = this.graph.project;
    if (project !== undefined && name.value.startsWith(`${project}:`)) {
      const stripped = this.nodes.get(name.value.slice(project.length + 1));
      if (stripped !== undefined) return stripped;
    }

    if (this.graph.strictSymbols) {
      this.diagnostics.error(
        name.range,
        `resource, variable, or config value "${name.value}" not found`,
      );
      return undefined;
    }
    const missing: MissingNode = { kind: 'missing', key: name };
    this.nodes.set(name.value, missing);
    this.order.push(name.value);
    return missing;
  }
}
