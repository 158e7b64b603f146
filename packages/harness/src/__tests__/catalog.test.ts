/**
 * Scenario Catalog Tests
 *
 * Every catalog scenario run end to end against the in-process store, with the
 * exact values each interleaving produces.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { UnknownScenarioError } from '@anomaly-lab/domain';
import type { ScenarioDefinition, StepOutcome } from '@anomaly-lab/domain';
import { DeterministicClock, InMemoryIsolationStore } from '@anomaly-lab/adapters';
import { ScenarioOrchestrator } from '../orchestrator/scenario-orchestrator.js';
import { ResultReporter } from '../reporter/result-reporter.js';
import {
  SCENARIO_CATALOG,
  dirtyReadScenario,
  findScenario,
  listScenarios,
  nonRepeatableReadScenario,
  phantomReadScenario,
  repeatableReadScenario,
  serializableNoPhantomScenario,
} from '../catalog/index.js';

let store: InMemoryIsolationStore;
let orchestrator: ScenarioOrchestrator;

beforeEach(() => {
  store = new InMemoryIsolationStore();
  orchestrator = new ScenarioOrchestrator({
    store,
    sleeper: new DeterministicClock(Date.UTC(2024, 0, 1)),
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Lookup
// ═══════════════════════════════════════════════════════════════════════════════

describe('catalog lookup', () => {
  it('lists the scenarios in catalog order', () => {
    expect(listScenarios().map((s) => s.id)).toEqual([
      'dirty-read',
      'non-repeatable-read',
      'repeatable-read-no-anomaly',
      'phantom-read',
      'serializable-no-phantom',
      'dirty-read-read-uncommitted',
    ]);
  });

  it('summarises actors and step counts', () => {
    const summary = listScenarios().find((s) => s.id === 'phantom-read');
    expect(summary?.stepCount).toBe(8);
    expect(summary?.actors).toEqual([
      { role: 'A', isolationLevel: 'READ_COMMITTED' },
      { role: 'B', isolationLevel: 'READ_COMMITTED' },
    ]);
  });

  it('throws UnknownScenarioError for an unknown id', () => {
    expect(() => findScenario('lost-update')).toThrow(UnknownScenarioError);
  });

  it('spells out the phantom predicate in the description', () => {
    expect(phantomReadScenario.description).toContain('price >= 50 AND deleted = false');
  });

  it('gives every scenario a unique id', () => {
    const ids = SCENARIO_CATALOG.map((s) => s.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Runs
// ═══════════════════════════════════════════════════════════════════════════════

describe('catalog runs on the in-process store', () => {
  it.each(SCENARIO_CATALOG.map((s) => [s.id, s] as const))('%s passes', async (_id, scenario) => {
    const result = await orchestrator.run(scenario);
    expect(result.verdict.reason).toBeUndefined();
    expect(result.verdict.pass).toBe(true);
    expect(store.openSessions).toBe(0);
    expect(store.engine.openTransactions).toBe(0);
  });

  it('dirty-read: B only ever sees the committed price', async () => {
    const result = await orchestrator.run(dirtyReadScenario);
    expect(result.rendered).toEqual([
      'A: BEGIN -> ok',
      'A: UPDATE -> 1',
      'A: SLEEP -> ok',
      'B: BEGIN -> ok',
      'B: READ -> 150',
      'B: COMMIT -> ok',
      'A: ROLLBACK -> ok',
      'final: item 1 price=150',
      'PASS dirty-read: B reads the committed price 150, never the uncommitted 200',
    ]);
  });

  it('non-repeatable-read: the second read sees the committed change', async () => {
    const result = await orchestrator.run(nonRepeatableReadScenario);
    expect(result.rendered).toEqual([
      'A: BEGIN -> ok',
      'A: READ -> 150',
      'A: SLEEP -> ok',
      'B: BEGIN -> ok',
      'B: UPDATE -> 1',
      'B: COMMIT -> ok',
      'A: READ -> 151',
      'A: COMMIT -> ok',
      'final: item 1 price=151',
      "PASS non-repeatable-read: A's second read exceeds the first by B's delta (1)",
    ]);
  });

  it('repeatable-read-no-anomaly: both reads agree while the change still commits', async () => {
    const result = await orchestrator.run(repeatableReadScenario);
    const reads = result.log.filter((r) => r.action === 'READ').map((r) => r.outcome);
    expect(reads).toEqual([
      { status: 'ok', value: 50 },
      { status: 'ok', value: 50 },
    ]);
    expect(result.final).toEqual({ itemId: 100, price: 51 });
  });

  it('phantom-read: the second count includes the inserted row', async () => {
    const result = await orchestrator.run(phantomReadScenario);
    const counts = result.log.filter((r) => r.action === 'COUNT').map((r) => r.outcome);
    expect(counts).toEqual([
      { status: 'ok', value: 3 },
      { status: 'ok', value: 4 },
    ]);
    expect(result.log.find((r) => r.action === 'INSERT')?.outcome).toEqual({ status: 'ok', value: 6 });
  });

  it('serializable-no-phantom: both counts agree and the reader commits', async () => {
    const result = await orchestrator.run(serializableNoPhantomScenario);
    const counts = result.log.filter((r) => r.action === 'COUNT').map((r) => r.outcome);
    expect(counts).toEqual([
      { status: 'ok', value: 3 },
      { status: 'ok', value: 3 },
    ]);
    expect(result.log.at(-1)?.outcome).toEqual({ status: 'ok', value: null });
  });

  it('gives the same log when a scenario runs twice', async () => {
    const first = await orchestrator.run(phantomReadScenario);
    const second = await orchestrator.run(phantomReadScenario);
    expect(second.rendered).toEqual(first.rendered);
    expect(second.runId).not.toBe(first.runId);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Verdicts on hand-built logs
// ═══════════════════════════════════════════════════════════════════════════════

const ok = (value: number | null = null): StepOutcome => ({ status: 'ok', value });

function judge(
  scenario: ScenarioDefinition,
  labelled: Record<string, StepOutcome>,
  finalPrice?: number,
): boolean {
  const reporter = new ResultReporter(scenario.id);
  Object.entries(labelled).forEach(([label, outcome], index) => {
    reporter.record(index, 'A', 'READ', outcome, label);
  });
  if (finalPrice !== undefined) reporter.observeFinal({ itemId: 1, price: finalPrice });
  return reporter.finalize(scenario.assertion).pass;
}

describe('catalog assertions', () => {
  describe('serializable-no-phantom', () => {
    it('passes when the reader commit fails with a serialization failure', () => {
      const pass = judge(serializableNoPhantomScenario, {
        'first-count': ok(3),
        'second-count': ok(3),
        'reader-commit': {
          status: 'error',
          kind: 'SerializationFailure',
          message: 'could not serialize access due to read/write dependencies among transactions',
        },
      });
      expect(pass).toBe(true);
    });

    it('fails when the counts differ and the commit succeeds', () => {
      const pass = judge(serializableNoPhantomScenario, {
        'first-count': ok(3),
        'second-count': ok(4),
        'reader-commit': ok(),
      });
      expect(pass).toBe(false);
    });

    it('fails when the commit fails for any other reason', () => {
      const pass = judge(serializableNoPhantomScenario, {
        'first-count': ok(3),
        'second-count': ok(3),
        'reader-commit': { status: 'error', kind: 'LockTimeout', message: 'lock timeout' },
      });
      expect(pass).toBe(false);
    });

    it('fails when the reader never committed', () => {
      expect(judge(serializableNoPhantomScenario, { 'first-count': ok(3), 'second-count': ok(3) })).toBe(
        false,
      );
    });
  });

  it('phantom-read fails when both counts agree', () => {
    expect(judge(phantomReadScenario, { 'first-count': ok(3), 'second-count': ok(3) })).toBe(false);
  });

  it('non-repeatable-read fails when both reads agree', () => {
    expect(judge(nonRepeatableReadScenario, { 'first-read': ok(150), 'second-read': ok(150) })).toBe(
      false,
    );
  });

  it('non-repeatable-read fails when the second read is off by more than the delta', () => {
    expect(judge(nonRepeatableReadScenario, { 'first-read': ok(150), 'second-read': ok(152) })).toBe(
      false,
    );
  });

  it('repeatable-read-no-anomaly fails when the second read sees the change', () => {
    expect(judge(repeatableReadScenario, { 'first-read': ok(50), 'second-read': ok(51) })).toBe(false);
  });

  it('dirty-read fails when B sees the uncommitted price', () => {
    expect(judge(dirtyReadScenario, { 'concurrent-read': ok(200) }, 150)).toBe(false);
  });

  it('dirty-read fails when the rollback did not restore the price', () => {
    expect(judge(dirtyReadScenario, { 'concurrent-read': ok(150) }, 200)).toBe(false);
  });

  it('dirty-read passes on the committed price', () => {
    expect(judge(dirtyReadScenario, { 'concurrent-read': ok(150) }, 150)).toBe(true);
  });
});
