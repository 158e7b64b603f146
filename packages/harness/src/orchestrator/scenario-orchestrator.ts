import { v4 as uuidv4 } from 'uuid';
import {
  ActorMisuseError,
  AssertionMismatch,
  StepExecutionError,
  isHarnessError,
} from '@anomaly-lab/domain';
import type {
  ErrorKind,
  HarnessError,
  ScenarioDefinition,
  ScenarioResult,
  ScenarioStep,
  SleeperPort,
  TransactionalStorePort,
} from '@anomaly-lab/domain';
import { TransactionActor } from '../actor/transaction-actor.js';
import { ResultReporter } from '../reporter/result-reporter.js';

export interface OrchestratorOptions {
  store: TransactionalStorePort;
  sleeper: SleeperPort;
  newRunId?: () => string;
}

interface Abort {
  readonly stepIndex: number;
  readonly kind: ErrorKind;
  readonly message: string;
}

function toHarnessError(err: unknown): HarnessError {
  if (isHarnessError(err)) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new StepExecutionError(detail, { cause: err });
}

/**
 * Sole scheduler of a scenario run. Steps are awaited one at a time in declared
 * order, so two actors can hold open transactions simultaneously while every
 * statement still reaches the store in a fixed sequence.
 */
export class ScenarioOrchestrator {
  private readonly newRunId: () => string;

  constructor(private readonly opts: OrchestratorOptions) {
    this.newRunId = opts.newRunId ?? uuidv4;
  }

  async run(scenario: ScenarioDefinition): Promise<ScenarioResult> {
    const { store, sleeper } = this.opts;
    const runId = this.newRunId();
    const startedAt = sleeper.now();
    const reporter = new ResultReporter(scenario.id);

    await store.resetFixture(scenario.fixture);

    const actors = new Map<string, TransactionActor>();
    let abort: Abort | undefined;
    try {
      for (const spec of scenario.actors) {
        actors.set(spec.role, await TransactionActor.open(store, spec, sleeper));
      }
      abort = await this.execute(scenario, actors, reporter);
    } finally {
      await this.teardown(scenario.id, actors);
    }

    if (scenario.observe) {
      reporter.observeFinal({
        itemId: scenario.observe.itemId,
        price: await store.readCommittedPrice(scenario.observe.itemId),
      });
    }

    const verdict = reporter.finalize(scenario.assertion, abort);
    return {
      runId,
      scenarioId: scenario.id,
      startedAt,
      finishedAt: sleeper.now(),
      log: reporter.log,
      final: reporter.finalObservation,
      abortedBy: abort,
      verdict,
      rendered: reporter.render(verdict),
    };
  }

  private async execute(
    scenario: ScenarioDefinition,
    actors: Map<string, TransactionActor>,
    reporter: ResultReporter,
  ): Promise<Abort | undefined> {
    for (const [index, step] of scenario.steps.entries()) {
      let value: number | null;
      try {
        const actor = actors.get(step.actor);
        if (!actor) {
          throw new ActorMisuseError(`step ${index} names undeclared actor ${step.actor}`);
        }
        value = await dispatch(actor, step);
      } catch (err) {
        const error = toHarnessError(err);
        reporter.record(
          index,
          step.actor,
          step.action,
          { status: 'error', kind: error.kind, message: error.message },
          step.label,
        );
        if (error.recoverable && !step.fatal) continue;
        return { stepIndex: index, kind: error.kind, message: `${error.kind}: ${error.message}` };
      }

      reporter.record(index, step.actor, step.action, { status: 'ok', value }, step.label);

      const mismatch = checkExpectation(step, value);
      if (mismatch) {
        return { stepIndex: index, kind: mismatch.kind, message: `${mismatch.kind}: ${mismatch.message}` };
      }
    }
    return undefined;
  }

  /** Runs on every exit path: nothing stays open past `run`. */
  private async teardown(scenarioId: string, actors: Map<string, TransactionActor>): Promise<void> {
    for (const actor of actors.values()) {
      if (actor.state === 'ACTIVE') await actor.rollback();
      try {
        await actor.release();
      } catch (err) {
        console.warn(`[orchestrator] ${scenarioId}: releasing ${actor.role} failed`, err);
      }
    }
  }
}

async function dispatch(actor: TransactionActor, step: ScenarioStep): Promise<number | null> {
  switch (step.action) {
    case 'BEGIN':
      await actor.begin();
      return null;
    case 'READ':
      return actor.read(step.itemId);
    case 'COUNT':
      return actor.count(step.predicate);
    case 'UPDATE':
      return actor.update(step.itemId, step.delta);
    case 'INSERT':
      return actor.insert(step.row);
    case 'SLEEP':
      await actor.sleep(step.durationMs);
      return null;
    case 'COMMIT':
      await actor.commit();
      return null;
    case 'ROLLBACK':
      await actor.rollback();
      return null;
    default: {
      const unknown: never = step;
      throw new ActorMisuseError(`unsupported step ${JSON.stringify(unknown)}`);
    }
  }
}

function checkExpectation(step: ScenarioStep, value: number | null): AssertionMismatch | null {
  if (step.action !== 'READ' && step.action !== 'COUNT') return null;
  if (step.expect === undefined || value === step.expect) return null;
  return new AssertionMismatch(
    `${step.actor} ${step.action} expected ${step.expect}, observed ${value ?? 'no row'}`,
  );
}
