import { describe, it, expect, beforeEach } from '@jest/globals';
import type { ScenarioAssertion } from '@anomaly-lab/domain';
import { ResultReporter, formatOutcome } from '../reporter/result-reporter.js';

const readsCommittedPrice: ScenarioAssertion = {
  description: 'first read is 150',
  evaluate: (view) => view.valueOf('first-read') === 150,
};

let reporter: ResultReporter;

beforeEach(() => {
  reporter = new ResultReporter('demo');
  reporter.record(0, 'A', 'BEGIN', { status: 'ok', value: null });
  reporter.record(1, 'A', 'READ', { status: 'ok', value: 150 }, 'first-read');
  reporter.record(2, 'B', 'UPDATE', { status: 'error', kind: 'LockTimeout', message: 'lock timeout' }, 'b-update');
});

describe('formatOutcome', () => {
  it('prints values, bare acknowledgements and typed errors', () => {
    expect(formatOutcome({ status: 'ok', value: 151 })).toBe('151');
    expect(formatOutcome({ status: 'ok', value: null })).toBe('ok');
    expect(formatOutcome({ status: 'error', kind: 'SerializationFailure', message: 'conflict' })).toBe(
      'SerializationFailure: conflict',
    );
  });
});

describe('ResultReporter', () => {
  it('keeps entries in order and frozen', () => {
    const log = reporter.log;
    expect(log.map((r) => r.stepIndex)).toEqual([0, 1, 2]);
    expect(Object.isFrozen(log[1])).toBe(true);
    expect(log[1]?.label).toBe('first-read');
    expect(log[0] && 'label' in log[0]).toBe(false);
  });

  it('exposes values only for steps that succeeded with one', () => {
    const view = reporter.view();
    expect(view.valueOf('first-read')).toBe(150);
    expect(view.valueOf('b-update')).toBeUndefined();
    expect(view.valueOf('never-ran')).toBeUndefined();
    expect(view.outcomeOf('b-update')).toEqual({
      status: 'error',
      kind: 'LockTimeout',
      message: 'lock timeout',
    });
  });

  it('renders the log, the final observation and a passing verdict', () => {
    reporter.observeFinal({ itemId: 1, price: 151 });
    const verdict = reporter.finalize(readsCommittedPrice);
    expect(verdict.pass).toBe(true);
    expect(verdict.reason).toBeUndefined();
    expect(reporter.render(verdict)).toEqual([
      'A: BEGIN -> ok',
      'A: READ -> 150',
      'B: UPDATE -> LockTimeout: lock timeout',
      'final: item 1 price=151',
      'PASS demo: first read is 150',
    ]);
  });

  it('fails with a reason when the observations do not satisfy the assertion', () => {
    const verdict = reporter.finalize({ description: 'never', evaluate: () => false });
    expect(verdict).toMatchObject({
      pass: false,
      reason: 'observations do not satisfy the assertion',
    });
    expect(reporter.render(verdict).at(-1)).toBe(
      'FAIL demo: never (observations do not satisfy the assertion)',
    );
  });

  it('fails an aborted run without evaluating the assertion', () => {
    let evaluated = false;
    const verdict = reporter.finalize(
      {
        description: 'unreachable',
        evaluate: () => {
          evaluated = true;
          return true;
        },
      },
      { stepIndex: 2, message: 'StepExecutionError: boom' },
    );
    expect(evaluated).toBe(false);
    expect(verdict.reason).toBe('aborted at step 2: StepExecutionError: boom');
  });

  it('turns a throwing assertion into a failed verdict', () => {
    const verdict = reporter.finalize({
      description: 'throws',
      evaluate: () => {
        throw new Error('second-read missing');
      },
    });
    expect(verdict.pass).toBe(false);
    expect(verdict.reason).toBe('second-read missing');
  });

  it('renders a missing final row', () => {
    reporter.observeFinal({ itemId: 7, price: null });
    const lines = reporter.render(reporter.finalize(readsCommittedPrice));
    expect(lines.at(-2)).toBe('final: item 7 price=missing');
  });
});
