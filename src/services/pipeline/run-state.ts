/**
 * Run state machine
 *
 *   idle → ingest → preprocess → merge → sequence → batch → emit → completed
 *                                                          ↘ planned (dry run)
 *   any non-terminal phase → failed
 *
 * @module pipeline/run-state
 */

import type { RunStage } from '../../models/run.js';
import { InvalidStateError } from '../sequencing/errors.js';

export type RunPhase = 'idle' | RunStage | 'completed' | 'planned' | 'failed';

const TRANSITIONS: Record<RunPhase, readonly RunPhase[]> = {
  idle: ['ingest', 'failed'],
  ingest: ['preprocess', 'failed'],
  preprocess: ['merge', 'failed'],
  merge: ['sequence', 'failed'],
  sequence: ['batch', 'failed'],
  batch: ['emit', 'planned', 'failed'],
  emit: ['completed', 'failed'],
  completed: [],
  planned: [],
  failed: [],
};

const TERMINAL: ReadonlySet<RunPhase> = new Set(['completed', 'planned', 'failed']);

function isStage(phase: RunPhase): phase is RunStage {
  return phase !== 'idle' && !TERMINAL.has(phase);
}

export class RunStateMachine {
  private current: RunPhase = 'idle';
  private lastStage: RunStage | null = null;
  private failureReason: string | null = null;

  get phase(): RunPhase {
    return this.current;
  }

  /** Stage the run is in, or was in when it terminated */
  get stage(): RunStage | null {
    return this.lastStage;
  }

  get reason(): string | null {
    return this.failureReason;
  }

  get isTerminal(): boolean {
    return TERMINAL.has(this.current);
  }

  /**
   * @throws InvalidStateError on a transition the machine does not allow
   */
  advance(next: Exclude<RunPhase, 'idle' | 'failed'>): void {
    this.transition(next);
  }

  fail(reason: string): void {
    this.transition('failed');
    this.failureReason = reason;
  }

  private transition(next: RunPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InvalidStateError(`Illegal run transition ${this.current} → ${next}`, {
        from: this.current,
        to: next,
      });
    }
    this.current = next;
    if (isStage(next)) {
      this.lastStage = next;
    }
  }
}
