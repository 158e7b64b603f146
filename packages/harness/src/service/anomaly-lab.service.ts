import type {
  RunScenarioCommand,
  ScenarioCommandPort,
  ScenarioDefinition,
  ScenarioResult,
  ScenarioSummary,
  SleeperPort,
  TransactionalStorePort,
} from '@anomaly-lab/domain';
import { SCENARIO_CATALOG, findScenario, listScenarios } from '../catalog/index.js';
import { ScenarioOrchestrator } from '../orchestrator/scenario-orchestrator.js';

export interface AnomalyLabServiceOptions {
  store: TransactionalStorePort;
  sleeper: SleeperPort;
  catalog?: readonly ScenarioDefinition[];
}

/** Runs catalog scenarios one at a time, since every run resets the shared fixture table. */
export class AnomalyLabService implements ScenarioCommandPort {
  private readonly orchestrator: ScenarioOrchestrator;
  private readonly catalog: readonly ScenarioDefinition[];
  private tail: Promise<unknown> = Promise.resolve();

  constructor(opts: AnomalyLabServiceOptions) {
    this.orchestrator = new ScenarioOrchestrator({ store: opts.store, sleeper: opts.sleeper });
    this.catalog = opts.catalog ?? SCENARIO_CATALOG;
  }

  listScenarios(): ScenarioSummary[] {
    return listScenarios(this.catalog);
  }

  describeScenario(scenarioId: string): ScenarioDefinition {
    return findScenario(scenarioId, this.catalog);
  }

  async runScenario(cmd: RunScenarioCommand): Promise<ScenarioResult> {
    const scenario = findScenario(cmd.scenarioId, this.catalog);
    const run = this.tail.then(() => this.orchestrator.run(scenario));
    // the caller gets the rejection; the queue only needs to know the run finished
    this.tail = run.catch(() => undefined);
    return run;
  }
}
