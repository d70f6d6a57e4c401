/**
 * Strata Runtime Host: Diagnostics Printer
 *
 * Renders diagnostics for a terminal:
 *
 *   main.yaml:5:8: error: cannot access an object property using an integer index
 *     indented detail, one line per detail line
 *
 * Errors are red, warnings yellow and detail dim.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { Severity } from '@strata/template';
import type { Diagnostic, Diagnostics } from '@strata/template';

export interface FormatOptions {
  /** Force colour on or off. Default: whatever chalk detects for stdout. */
  readonly color?: boolean;
}

const _severityColors: Record<Severity, (c: ChalkInstance) => ChalkInstance> = {
  [Severity.Error]: (c) => c.red,
  [Severity.Warning]: (c) => c.yellow,
};

function palette(options: FormatOptions): ChalkInstance {
  if (options.color === undefined) return chalk;
  return new Chalk({ level: options.color ? 1 : 0 });
}

export function formatDiagnostic(d: Diagnostic, options: FormatOptions = {}): string {
  const c = palette(options);
  const location =
    d.range === undefined ? '' : `${d.range.filename}:${d.range.start.line}:${d.range.start.column}: `;
  const head = `${location}${_severityColors[d.severity](c)(d.severity)}: ${d.summary}`;
  if (d.detail === undefined || d.detail === '') return head;
  const detail = d.detail.split('\n').map((line) => c.dim(`  ${line}`));
  return [head, ...detail].join('\n');
}

/** Every diagnostic, in order, followed by a count line. */
export function formatDiagnostics(diagnostics: Diagnostics, options: FormatOptions = {}): string {
  const all = diagnostics.toArray();
  if (all.length === 0) return '';
  const errors = all.filter((d) => d.severity === Severity.Error).length;
  const warnings = all.length - errors;
  const count = `${plural(errors, 'error')}, ${plural(warnings, 'warning')}`;
  return [...all.map((d) => formatDiagnostic(d, options)), count].join('\n');
}

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? '' : 's'}`;
}
