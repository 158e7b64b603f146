export { TransactionActor } from './actor/transaction-actor.js';
export { ScenarioOrchestrator } from './orchestrator/scenario-orchestrator.js';
export type { OrchestratorOptions } from './orchestrator/scenario-orchestrator.js';
export { ResultReporter, formatOutcome } from './reporter/result-reporter.js';
export type { AbortInfo } from './reporter/result-reporter.js';
export * from './catalog/index.js';
export { AnomalyLabService } from './service/anomaly-lab.service.js';
export type { AnomalyLabServiceOptions } from './service/anomaly-lab.service.js';
