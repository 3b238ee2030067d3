export { IngestionOrchestrator } from './orchestrator';
export type {
  DocumentAttributes,
  IngestRequest,
  IngestResult,
  IngestionOrchestratorOptions,
} from './orchestrator';
export { IngestionError } from './errors';
export { canTransition, isTerminal } from './stages';
export type { DocumentStatus, IngestionStage, IngestionState } from './stages';
