import type { ScenarioResult } from '../../entities/scenario-result.js';
import type { ScenarioDefinition, ScenarioSummary } from '../../entities/scenario.js';

export interface RunScenarioCommand {
  scenarioId: string;
}

export interface ScenarioCommandPort {
  listScenarios(): ScenarioSummary[];
  describeScenario(scenarioId: string): ScenarioDefinition;
  runScenario(cmd: RunScenarioCommand): Promise<ScenarioResult>;
}
