import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ErrorCode } from '../domain/errors.js';
import { isDomainError } from '../domain/errors.js';
import { logger } from '../logger.js';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  invalid_input: 400,
  invalid_range: 422,
  not_found: 404,
  slot_unavailable: 409,
  invalid_state: 409,
  store_unavailable: 503,
};

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) {
  if (!err) return next();

  if (err instanceof z.ZodError) {
    const detail = err.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    return res.status(400).json({ error: 'invalid_input', detail });
  }

  if (isDomainError(err)) {
    const status = STATUS_BY_CODE[err.code];
    if (status >= 500) {
      logger.error({ op: 'http', path: req.path, err }, 'Request failed');
    }
    return res.status(status).json({ error: err.code, detail: err.message });
  }

  logger.error({ op: 'http', path: req.path, err }, 'Unexpected error');
  return res.status(500).json({ error: 'internal_error', detail: 'An unexpected error occurred' });
}
