export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code?: string) {
    super(400, message, code);
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', code?: string) {
    super(404, message, code);
    this.name = 'NotFoundError';
  }
}

// ========== Pipeline errors ==========

export type ParseFailureReason = 'corrupt' | 'encrypted' | 'unsupported_format' | 'empty';

/** Unreadable input. Local to one document. */
export class ParseError extends AppError {
  constructor(
    message: string,
    public readonly reason: ParseFailureReason,
    options?: { cause?: unknown }
  ) {
    super(422, message, 'PARSE_ERROR', options);
    this.name = 'ParseError';
  }
}

export class ChunkingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(422, message, 'CHUNKING_ERROR', options);
    this.name = 'ChunkingError';
  }
}

export class IndexUnavailableError extends AppError {
  constructor(message: string = 'Vector index unavailable', options?: { cause?: unknown }) {
    super(503, message, 'INDEX_UNAVAILABLE', options);
    this.name = 'IndexUnavailableError';
  }
}

/**
 * Two writes for one document overlapped inside a store. The index lock
 * prevents this, so seeing it means a caller bypassed the lock.
 */
export class DuplicateInsertError extends AppError {
  constructor(public readonly documentId: string) {
    super(409, `Concurrent write already in progress for document ${documentId}`, 'DUPLICATE_INSERT');
    this.name = 'DuplicateInsertError';
  }
}

export class JudgmentParseError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(502, message, 'JUDGMENT_PARSE_ERROR', options);
    this.name = 'JudgmentParseError';
  }
}

export class ExternalServiceTimeout extends AppError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(504, `${operation} timed out after ${timeoutMs}ms`, 'EXTERNAL_TIMEOUT');
    this.name = 'ExternalServiceTimeout';
  }
}

export class ExternalServiceError extends AppError {
  constructor(
    public readonly service: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(502, `${service}: ${message}`, 'EXTERNAL_SERVICE_ERROR', options);
    this.name = 'ExternalServiceError';
  }
}

export class OperationCancelledError extends AppError {
  constructor(message = 'Operation cancelled') {
    super(499, message, 'CANCELLED');
    this.name = 'OperationCancelledError';
  }
}
