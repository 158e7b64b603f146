import type {
  FinalObservation,
  ObservationView,
  ScenarioAssertion,
  StepAction,
  StepOutcome,
  StepRecord,
  Verdict,
} from '@anomaly-lab/domain';

export interface AbortInfo {
  readonly stepIndex: number;
  readonly message: string;
}

export function formatOutcome(outcome: StepOutcome): string {
  if (outcome.status === 'error') return `${outcome.kind}: ${outcome.message}`;
  return outcome.value === null ? 'ok' : String(outcome.value);
}

/** Append-only log of one scenario run. */
export class ResultReporter {
  private readonly records: StepRecord[] = [];
  private final: FinalObservation | undefined;

  constructor(readonly scenarioId: string) {}

  get log(): readonly StepRecord[] {
    return [...this.records];
  }

  get finalObservation(): FinalObservation | undefined {
    return this.final;
  }

  record(
    stepIndex: number,
    actor: string,
    action: StepAction,
    outcome: StepOutcome,
    label?: string,
  ): StepRecord {
    const entry: StepRecord = Object.freeze({
      stepIndex,
      actor,
      action,
      outcome: Object.freeze({ ...outcome }),
      ...(label === undefined ? {} : { label }),
    });
    this.records.push(entry);
    return entry;
  }

  observeFinal(observation: FinalObservation): void {
    this.final = Object.freeze({ ...observation });
  }

  view(): ObservationView {
    const records = this.log;
    const byLabel = (label: string) => records.find((r) => r.label === label);
    return {
      records,
      final: this.final,
      outcomeOf: (label) => byLabel(label)?.outcome,
      valueOf: (label) => {
        const outcome = byLabel(label)?.outcome;
        return outcome?.status === 'ok' && outcome.value !== null ? outcome.value : undefined;
      },
    };
  }

  finalize(assertion: ScenarioAssertion, abort?: AbortInfo): Verdict {
    const log = this.log;
    if (abort) {
      return {
        pass: false,
        assertion: assertion.description,
        reason: `aborted at step ${abort.stepIndex}: ${abort.message}`,
        log,
      };
    }
    try {
      const pass = assertion.evaluate(this.view());
      return pass
        ? { pass, assertion: assertion.description, log }
        : { pass, assertion: assertion.description, reason: 'observations do not satisfy the assertion', log };
    } catch (err) {
      return {
        pass: false,
        assertion: assertion.description,
        reason: err instanceof Error ? err.message : String(err),
        log,
      };
    }
  }

  /** `<actor>: <action> -> <outcome>` per step, the final observation, then the verdict. */
  render(verdict: Verdict): string[] {
    const lines = this.records.map(
      (r) => `${r.actor}: ${r.action} -> ${formatOutcome(r.outcome)}`,
    );
    if (this.final) {
      lines.push(`final: item ${this.final.itemId} price=${this.final.price ?? 'missing'}`);
    }
    lines.push(
      verdict.pass
        ? `PASS ${this.scenarioId}: ${verdict.assertion}`
        : `FAIL ${this.scenarioId}: ${verdict.assertion} (${verdict.reason ?? 'failed'})`,
    );
    return lines;
  }
}
