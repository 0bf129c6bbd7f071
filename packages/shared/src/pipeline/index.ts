/**
 * Pipeline Orchestration
 */

export {
  PipelineOrchestrator,
  selectBestConversion,
  type DocumentAnalyzer,
  type OrchestratorConfig,
  type PipelineOrchestratorOptions,
  type ProviderOutcome,
} from './orchestrator';
export { TERMINAL_STATES, assertTransition, canTransition, isTerminal } from './state-machine';
