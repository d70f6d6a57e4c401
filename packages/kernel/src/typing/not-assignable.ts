/**
 * Strata Kernel: Assignability Failure Chains
 *
 * When a value cannot be assigned to its destination the checker explains
 * why as a tree: each node carries a reason, the property it concerns,
 * where in the source it happened and the failures that caused it.
 *
 *   Cannot assign '{bucket: number}' to 'aws:s3/bucket:Bucket':
 *     bucket: Cannot assign type 'number' to type 'boolean'
 *
 * Nodes are immutable; the `with*` and `because` methods return copies.
 */

import type { SourceRange } from '@strata/template';
import { mergeRanges } from '@strata/template';

export interface NotAssignableInit {
  readonly reason: string;
  readonly because?: ReadonlyArray<NotAssignable>;
  /** The checker met a type combination it does not understand. */
  readonly internal?: boolean;
  /** Do not report this node itself; report its children instead. */
  readonly transitory?: boolean;
  readonly property?: string;
  readonly range?: SourceRange;
  readonly summary?: string;
}

export class NotAssignable {
  readonly reason: string;
  readonly because: ReadonlyArray<NotAssignable>;
  readonly internal: boolean;
  readonly transitory: boolean;
  readonly property: string;
  private readonly ownRange: SourceRange | undefined;
  private readonly ownSummary: string;

  constructor(init: NotAssignableInit) {
    this.reason = init.reason;
    this.because = init.because ?? [];
    this.internal = init.internal === true;
    this.transitory = init.transitory === true;
    this.property = init.property ?? '';
    this.ownRange = init.range;
    this.ownSummary = init.summary ?? '';
  }

  /**
   * The headline for this failure. Only one summary can be shown, so a
   * child's is used when this node has none and exactly one child.
   */
  summary(): string {
    if (this.ownSummary !== '') return this.ownSummary;
    const [only] = this.because;
    return this.because.length === 1 && only !== undefined ? only.summary() : '';
  }

  /** Own range, else the smallest range covering every descendant's. */
  range(): SourceRange | undefined {
    if (this.ownRange !== undefined) return this.ownRange;
    return mergeRanges(this.because.map((b) => b.range()));
  }

  isInternal(): boolean {
    return this.internal || this.because.some((b) => b.isInternal());
  }

  /** The nodes to report: this one, or for a transitory node its reportable descendants. */
  leaders(): NotAssignable[] {
    if (!this.transitory) return [this];
    return this.because.flatMap((b) => b.leaders());
  }

  withRange(range: SourceRange | undefined): NotAssignable {
    return range === undefined ? this : this.copy({ range });
  }

  withBecause(...because: NotAssignable[]): NotAssignable {
    return this.copy({ because });
  }

  withProperty(property: string): NotAssignable {
    return this.copy({ property });
  }

  withSummary(summary: string): NotAssignable {
    return this.copy({ summary });
  }

  /** Append text to the reason. */
  withReason(suffix: string): NotAssignable {
    return this.copy({ reason: this.reason + suffix });
  }

  asTransitory(): NotAssignable {
    return this.copy({ transitory: true });
  }

  toString(): string {
    return this.render(0);
  }

  /** Single-line form, e.g. for a log channel. */
  toErrorString(): string {
    return this.toString().replaceAll('\n', ';');
  }

  private render(indent: number): string {
    const prop = this.property !== '' ? `${this.property}: ` : '';
    let s = '  '.repeat(indent) + prop + this.reason;
    if (this.because.length > 0) s += ':';
    for (const child of this.because) s += '\n' + child.render(indent + 1);
    return s;
  }

  private copy(changes: Partial<NotAssignableInit>): NotAssignable {
    const ownSummary = this.ownSummary === '' ? undefined : this.ownSummary;
    return new NotAssignable({
      reason: this.reason,
      because: this.because,
      internal: this.internal,
      transitory: this.transitory,
      property: this.property,
      ...(this.ownRange !== undefined ? { range: this.ownRange } : {}),
      ...(ownSummary !== undefined ? { summary: ownSummary } : {}),
      ...changes,
    });
  }
}
