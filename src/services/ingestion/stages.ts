/**
 * Ingestion state machine.
 *
 * received -> parsing -> chunking -> indexing -> committed
 * Any in-progress state may end in failed(stage, cause).
 */

export type IngestionStage = 'parsing' | 'chunking' | 'indexing';

export type IngestionState =
  | { state: 'received' }
  | { state: 'parsing' }
  | { state: 'chunking' }
  | { state: 'indexing' }
  | { state: 'committed'; chunkCount: number; contentHash: string }
  | { state: 'failed'; stage: IngestionStage; cause: string };

export type IngestionStateName = IngestionState['state'];

export type DocumentStatus = IngestionState & {
  documentId: string;
  updatedAt: string;
};

const TRANSITIONS: Record<IngestionStateName, readonly IngestionStateName[]> = {
  received: ['parsing', 'failed'],
  parsing: ['chunking', 'failed'],
  chunking: ['indexing', 'failed'],
  indexing: ['committed', 'failed'],
  committed: [],
  failed: [],
};

export function canTransition(from: IngestionStateName | undefined, to: IngestionStateName): boolean {
  // A new run always starts from received, whatever the last run ended in
  if (to === 'received') return from === undefined || isTerminal(from);
  return from !== undefined && TRANSITIONS[from].includes(to);
}

export function isTerminal(state: IngestionStateName): boolean {
  return state === 'committed' || state === 'failed';
}
