import type { ActorSpec } from './transaction-actor.js';
import type { CountPredicate, ItemSeed } from './item.js';
import type { ObservationView } from './scenario-result.js';

export type StepAction =
  | 'BEGIN'
  | 'READ'
  | 'COUNT'
  | 'UPDATE'
  | 'INSERT'
  | 'SLEEP'
  | 'COMMIT'
  | 'ROLLBACK';

interface StepBase {
  /** Role of the actor the step is dispatched to. */
  readonly actor: string;
  /** Name an assertion uses to look up this step's observation. */
  readonly label?: string;
  /** A recoverable failure of a fatal step aborts the run. */
  readonly fatal?: boolean;
}

export interface BeginStep extends StepBase {
  readonly action: 'BEGIN';
}

export interface ReadStep extends StepBase {
  readonly action: 'READ';
  readonly itemId: number;
  /** Price the read must observe; anything else aborts with AssertionMismatch. */
  readonly expect?: number;
}

export interface CountStep extends StepBase {
  readonly action: 'COUNT';
  readonly predicate: CountPredicate;
  readonly expect?: number;
}

export interface UpdateStep extends StepBase {
  readonly action: 'UPDATE';
  readonly itemId: number;
  readonly delta: number;
}

export interface InsertStep extends StepBase {
  readonly action: 'INSERT';
  readonly row: ItemSeed;
}

export interface SleepStep extends StepBase {
  readonly action: 'SLEEP';
  readonly durationMs: number;
}

export interface CommitStep extends StepBase {
  readonly action: 'COMMIT';
}

export interface RollbackStep extends StepBase {
  readonly action: 'ROLLBACK';
}

export type ScenarioStep =
  | BeginStep
  | ReadStep
  | CountStep
  | UpdateStep
  | InsertStep
  | SleepStep
  | CommitStep
  | RollbackStep;

export interface FixtureSpec {
  readonly rows: readonly ItemSeed[];
}

export interface ScenarioAssertion {
  readonly description: string;
  readonly evaluate: (view: ObservationView) => boolean;
}

export interface ScenarioDefinition {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly fixture: FixtureSpec;
  readonly actors: readonly ActorSpec[];
  readonly steps: readonly ScenarioStep[];
  /** Item whose committed price is read after teardown. */
  readonly observe?: { readonly itemId: number };
  readonly assertion: ScenarioAssertion;
}

export interface ScenarioSummary {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly actors: readonly ActorSpec[];
  readonly stepCount: number;
  readonly assertion: string;
}
