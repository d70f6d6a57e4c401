/**
 * Strata Kernel: Run Orchestration
 *
 * One run of a template: schedule, type check, evaluate, publish outputs.
 * Each phase's diagnostics are collected into the run result and forwarded
 * to the DiagnosticLogger. Scheduling or type errors stop the run before
 * anything is registered with the engine.
 */

import type { Template } from '@strata/template';
import { Diagnostics } from '@strata/template';
import type { ConfigValue } from './config/config-types.js';
import type { Engine, EvaluationContext, FileReader } from './evaluation/engine.js';
import { Evaluator } from './evaluation/evaluator.js';
import type { ValueMap } from './evaluation/values.js';
import type { StackConfigEntry } from './graph/scheduler.js';
import { scheduleTemplate } from './graph/scheduler.js';
import type { DiagnosticLogger } from './logging/diagnostic-log.js';
import type { PackageLoader } from './schema/loader.js';
import { typeCheck } from './typing/checker.js';

export interface RunHost {
  readonly engine: Engine;
  readonly loader: PackageLoader;
  readonly context: EvaluationContext;
  readonly fileReader?: FileReader;
  /** Stack configuration. Keys may carry the `<project>:` namespace. */
  readonly config?: ReadonlyArray<StackConfigEntry>;
  readonly strictSymbols?: boolean;
  readonly logger?: DiagnosticLogger;
  /** Tags every log entry of this run. */
  readonly runId?: string;
}

export interface RunResult {
  readonly ok: boolean;
  readonly outputs: ValueMap;
  readonly diagnostics: Diagnostics;
}

export async function runTemplate(template: Template, host: RunHost): Promise<RunResult> {
  const diagnostics = new Diagnostics();
  const runId = host.runId ?? 'local';
  const project = host.context.project;

  const config = (host.config ?? []).map(({ key, value }) => ({ key: stripProject(key, project), value }));
  const declared = new Set(template.config.map((c) => c.key.value));

  const scheduled = scheduleTemplate(template, {
    project,
    ...(host.strictSymbols !== undefined ? { strictSymbols: host.strictSymbols } : {}),
    stackConfig: config.filter((c) => !declared.has(c.key)),
  });
  host.logger?.record(runId, 'schedule', scheduled.diagnostics);
  diagnostics.extend(scheduled.diagnostics);
  if (!scheduled.ok) return { ok: false, outputs: {}, diagnostics };

  const checked = typeCheck(template, scheduled.nodes, host.loader, { stackConfig: config, project });
  host.logger?.record(runId, 'typecheck', checked.diagnostics);
  diagnostics.extend(checked.diagnostics);
  if (checked.diagnostics.hasErrors()) return { ok: false, outputs: {}, diagnostics };

  const evaluator = new Evaluator({
    engine: host.engine,
    loader: host.loader,
    context: host.context,
    typing: checked.typing,
    ...(host.fileReader !== undefined ? { fileReader: host.fileReader } : {}),
    config: new Map<string, ConfigValue>(config.map((c) => [c.key, c.value])),
  });
  const nodesOk = evaluator.evaluateNodes(scheduled.nodes);
  const outputs = nodesOk ? evaluator.evaluateOutputs(template.outputs) : { ok: false, values: {} };
  await evaluator.settled();
  const evaluated = nodesOk && outputs.ok && !evaluator.diagnostics.hasErrors();
  if (evaluated) host.engine.registerOutputs(outputs.values);

  host.logger?.record(runId, 'evaluate', evaluator.diagnostics);
  diagnostics.extend(evaluator.diagnostics);
  return {
    ok: evaluated,
    outputs: outputs.values,
    diagnostics,
  };
}

/** `myproject:bucket` → `bucket` when `myproject` is the running project. */
function stripProject(key: string, project: string): string {
  const prefix = `${project}:`;
  return project !== '' && key.startsWith(prefix) ? key.slice(prefix.length) : key;
}
