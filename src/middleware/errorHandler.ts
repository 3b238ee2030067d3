import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

function sendError(res: Response, status: number, message: string, code?: string) {
  res.status(status).json({
    error: {
      message,
      status,
      ...(code && { code }),
    },
  });
}

function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    const message = err.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    sendError(res, 400, message, 'INVALID_INPUT');
    return;
  }

  if (isBodyParseError(err)) {
    sendError(res, 400, 'Malformed JSON body', 'INVALID_JSON');
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error({ error: err, cause: err.cause, path: req.path }, 'Request failed');
    }
    sendError(res, err.statusCode, err.message, err.code);
    return;
  }

  logger.error({ error: err, path: req.path }, 'Unexpected error');
  sendError(res, 500, 'Internal server error');
}
