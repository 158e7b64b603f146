import { UnknownScenarioError } from '@anomaly-lab/domain';
import type { ScenarioDefinition, ScenarioSummary } from '@anomaly-lab/domain';
import { dirtyReadReadUncommittedScenario, dirtyReadScenario } from './dirty-read.scenario.js';
import { nonRepeatableReadScenario, repeatableReadScenario } from './repeated-read.scenario.js';
import { phantomReadScenario, serializableNoPhantomScenario } from './phantom.scenario.js';

export const SCENARIO_CATALOG: readonly ScenarioDefinition[] = [
  dirtyReadScenario,
  nonRepeatableReadScenario,
  repeatableReadScenario,
  phantomReadScenario,
  serializableNoPhantomScenario,
  dirtyReadReadUncommittedScenario,
];

export function findScenario(
  scenarioId: string,
  catalog: readonly ScenarioDefinition[] = SCENARIO_CATALOG,
): ScenarioDefinition {
  const scenario = catalog.find((s) => s.id === scenarioId);
  if (!scenario) throw new UnknownScenarioError(scenarioId);
  return scenario;
}

export function toSummary(scenario: ScenarioDefinition): ScenarioSummary {
  return {
    id: scenario.id,
    title: scenario.title,
    description: scenario.description,
    actors: scenario.actors,
    stepCount: scenario.steps.length,
    assertion: scenario.assertion.description,
  };
}

export function listScenarios(
  catalog: readonly ScenarioDefinition[] = SCENARIO_CATALOG,
): ScenarioSummary[] {
  return catalog.map(toSummary);
}

export {
  dirtyReadScenario,
  dirtyReadReadUncommittedScenario,
  nonRepeatableReadScenario,
  repeatableReadScenario,
  phantomReadScenario,
  serializableNoPhantomScenario,
};
export { PHANTOM_PREDICATE } from './phantom.scenario.js';
