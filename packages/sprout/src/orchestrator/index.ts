export { createOrchestrator, OrchestratorImpl, type Orchestrator } from './orchestrator.js';
export type { SproutRequest, SproutSummary, OrchestratorDependencies } from './types.js';
