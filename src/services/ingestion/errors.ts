import { AppError } from '../../utils/errors';
import { errorMessage } from '../../utils/logger';
import type { IngestionStage } from './stages';

/**
 * Ingestion failure with the stage it happened in. The HTTP status follows
 * the underlying cause.
 */
export class IngestionError extends AppError {
  constructor(
    public readonly documentId: string,
    public readonly stage: IngestionStage,
    cause: unknown
  ) {
    super(
      cause instanceof AppError ? cause.statusCode : 500,
      `Ingestion of ${documentId} failed at ${stage}: ${errorMessage(cause)}`,
      'INGESTION_FAILED',
      { cause }
    );
    this.name = 'IngestionError';
  }
}
