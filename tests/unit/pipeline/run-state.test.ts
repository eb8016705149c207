/**
 * Unit tests for the run state machine
 *
 * @module tests/unit/pipeline/run-state
 */

import { describe, it, expect } from 'vitest';
import { RunStateMachine } from '../../../src/services/pipeline/run-state.js';
import { InvalidStateError } from '../../../src/services/sequencing/errors.js';

function advanceTo(machine: RunStateMachine, ...phases: Parameters<RunStateMachine['advance']>[0][]): void {
  for (const phase of phases) {
    machine.advance(phase);
  }
}

describe('RunStateMachine', () => {
  it('should walk every stage to completed', () => {
    const machine = new RunStateMachine();
    advanceTo(machine, 'ingest', 'preprocess', 'merge', 'sequence', 'batch', 'emit', 'completed');

    expect(machine.phase).toBe('completed');
    expect(machine.stage).toBe('emit');
    expect(machine.isTerminal).toBe(true);
  });

  it('should end a dry run in planned after batch', () => {
    const machine = new RunStateMachine();
    advanceTo(machine, 'ingest', 'preprocess', 'merge', 'sequence', 'batch', 'planned');

    expect(machine.phase).toBe('planned');
    expect(machine.stage).toBe('batch');
  });

  it('should record the failing stage and reason', () => {
    const machine = new RunStateMachine();
    advanceTo(machine, 'ingest', 'preprocess');
    machine.fail('no pages');

    expect(machine.phase).toBe('failed');
    expect(machine.stage).toBe('preprocess');
    expect(machine.reason).toBe('no pages');
  });

  it('should reject skipping a stage', () => {
    const machine = new RunStateMachine();
    machine.advance('ingest');
    expect(() => machine.advance('merge')).toThrow(InvalidStateError);
  });

  it('should reject leaving a terminal phase', () => {
    const machine = new RunStateMachine();
    machine.fail('boom');
    expect(() => machine.advance('ingest')).toThrow(/failed → ingest/);
  });
});
