/**
 * Chain of analysis.
 *
 * Steps are assembled through a ChainStepDraft, then frozen when appended.
 * The chain enforces ordinals 1..N with no gaps.
 */

import { ChainStep } from '../domain/analysis';
import { ExecutionFault } from '../domain/errors';

export interface ChainStepInit {
  ordinal: number;
  focus: string;
  code: string;
  stdout: string;
  stderr: string;
  fault: ExecutionFault | null;
}

export class ChainStepDraft {
  private readonly insights: string[] = [];
  private readonly evidence: string[] = [];

  constructor(private readonly init: ChainStepInit) {}

  get ordinal(): number {
    return this.init.ordinal;
  }

  addInsight(insight: string): this {
    this.insights.push(insight);
    return this;
  }

  /** Duplicates are ignored. */
  addEvidence(uid: string): this {
    if (!this.evidence.includes(uid)) {
      this.evidence.push(uid);
    }
    return this;
  }

  freeze(): ChainStep {
    return Object.freeze({
      ordinal: this.init.ordinal,
      focus: this.init.focus,
      code: this.init.code,
      stdout: this.init.stdout,
      stderr: this.init.stderr,
      success: this.init.fault === null,
      fault: this.init.fault ? Object.freeze({ ...this.init.fault }) : null,
      insights: Object.freeze([...this.insights]),
      evidenceUids: Object.freeze([...this.evidence]),
    });
  }
}

export class Chain {
  private readonly items: ChainStep[] = [];

  get steps(): readonly ChainStep[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  /** Next ordinal the chain accepts. */
  get nextOrdinal(): number {
    return this.items.length + 1;
  }

  /** @throws RangeError when the step's ordinal is not the next one. */
  append(step: ChainStepDraft): ChainStep {
    const frozen = step.freeze();
    if (frozen.ordinal !== this.nextOrdinal) {
      throw new RangeError(`Chain expected step ${this.nextOrdinal}, got ${frozen.ordinal}`);
    }
    this.items.push(frozen);
    return frozen;
  }

  /** Every evidence uid across the chain, first occurrence order. */
  evidenceUids(): string[] {
    return [...new Set(this.items.flatMap((s) => s.evidenceUids))];
  }

  toJSON(): ChainStep[] {
    return [...this.items];
  }
}
