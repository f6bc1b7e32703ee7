import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger.js';

/** Shape of the errors raised by express.json() (body-parser). */
interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return (
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    logger.warn('[Relay] Rejected request body:', err.message);
    const malformed = err.type === 'entity.parse.failed';
    res.status(err.status).json({
      error: malformed ? `Invalid JSON: ${err.message}` : err.message,
      code: malformed ? 'INVALID_DIRECTIVE' : 'BAD_REQUEST',
    });
    return;
  }

  logger.error('[Relay Error]', err.message, err.stack);
  res.status(500).json({
    error: err.message || 'Internal Server Error',
    code: 'INTERNAL_ERROR',
  });
}

/** Terminal handler for routes nothing else matched. */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
}
