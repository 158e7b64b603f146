import type { ErrorKind } from '../errors/harness-errors.js';
import type { StepAction } from './scenario.js';

export type StepOutcome =
  | { readonly status: 'ok'; readonly value: number | null }
  | { readonly status: 'error'; readonly kind: ErrorKind; readonly message: string };

export interface StepRecord {
  readonly stepIndex: number;
  readonly actor: string;
  readonly action: StepAction;
  readonly label?: string;
  readonly outcome: StepOutcome;
}

export interface FinalObservation {
  readonly itemId: number;
  readonly price: number | null;
}

/** Read-only view of a run's log handed to scenario assertions. */
export interface ObservationView {
  readonly records: readonly StepRecord[];
  /** Outcome of the step carrying `label`; undefined if it never ran. */
  outcomeOf(label: string): StepOutcome | undefined;
  /** Value observed by the step carrying `label`; undefined unless it succeeded with a value. */
  valueOf(label: string): number | undefined;
  readonly final?: FinalObservation;
}

export interface Verdict {
  readonly pass: boolean;
  readonly assertion: string;
  readonly reason?: string;
  readonly log: readonly StepRecord[];
}

export interface ScenarioResult {
  readonly runId: string;
  readonly scenarioId: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly log: readonly StepRecord[];
  readonly final?: FinalObservation;
  readonly abortedBy?: { readonly stepIndex: number; readonly kind: ErrorKind; readonly message: string };
  readonly verdict: Verdict;
  readonly rendered: readonly string[];
}
