import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { logger } from '../lib/logger.js';

declare global {
  namespace Express {
    interface Request {
      request_id: string;
    }
  }
}

const REQUEST_ID_HEADER = 'x-request-id';

export function logging_middleware(req: Request, res: Response, next: NextFunction): void {
  // callers may pass their own id so chat-platform logs line up with ours
  const incoming = req.header(REQUEST_ID_HEADER);
  const request_id = incoming && incoming.length <= 128 ? incoming : randomUUID();
  req.request_id = request_id;
  res.setHeader(REQUEST_ID_HEADER, request_id);

  const start = Date.now();

  res.on('finish', () => {
    const duration_ms = Date.now() - start;
    const meta = {
      request_id,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms,
    };
    if (res.statusCode >= 500) {
      logger.warn('request failed', meta);
    } else {
      logger.info('request completed', meta);
    }
  });

  next();
}
