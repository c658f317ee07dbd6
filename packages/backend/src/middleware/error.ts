import { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger.js';
import {
  EmbeddingUnavailableError,
  StorageUnavailableError,
  UnknownFactError,
  ValidationError,
} from '../lib/errors.js';

export interface ApiError extends Error {
  status_code?: number;
  status?: number; // body-parser uses 'status'
}

export function status_for_error(err: ApiError): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof UnknownFactError) return 404;
  if (err instanceof EmbeddingUnavailableError) return 503;
  if (err instanceof StorageUnavailableError) return 503;
  return err.status_code || err.status || 500;
}

export function error_middleware(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status_code = status_for_error(err);
  const message = status_code >= 500 && status_code !== 503 ? 'Internal server error' : err.message;

  const log_context: Record<string, unknown> = {
    request_id: req.request_id,
    method: req.method,
    path: req.originalUrl || req.path,
    error: err.message,
    error_type: err.name,
    status_code,
  };

  if (status_code >= 500) {
    log_context.stack = err.stack;
    logger.error('request error', log_context);
  } else {
    logger.warn('request rejected', log_context);
  }

  res.status(status_code).json({
    error: message,
    request_id: req.request_id,
  });
}
