import { randomUUID } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { logInfo } from './logger';
import { recordHttpRequest } from './metrics';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function resolveRequestId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : randomUUID();
}

export function applyRequestTracing(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    const requestId = resolveRequestId(req.headers['x-request-id']);
    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      // baseUrl + motif de route pour éviter l'explosion de labels
      const route = req.route?.path ? `${req.baseUrl}${String(req.route.path)}` : 'unmatched';
      recordHttpRequest(req.method, route, res.statusCode);
      logInfo('http_request', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
        requestId
      });
    });

    next();
  };
}
