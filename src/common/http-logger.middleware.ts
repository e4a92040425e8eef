import { Injectable, Logger, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

export const REQUEST_ID_HEADER = 'x-request-id';

/** Incoming `x-request-id` (or `x-correlation-id`), else a fresh UUID. */
export function resolveRequestId(req: Request): string {
  const fromHeader =
    req.headers[REQUEST_ID_HEADER] ?? req.headers['x-correlation-id'];
  const value = Array.isArray(fromHeader) ? fromHeader[0] : fromHeader;
  return value !== undefined && value.length > 0 ? value : randomUUID();
}

/** One log line per request once the response is finished. */
@Injectable()
export class HttpLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  use(req: Request, res: Response, next: NextFunction): void {
    const started = Date.now();
    const requestId = resolveRequestId(req);
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on('finish', () => {
      const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms requestId=${requestId}`;
      if (res.statusCode >= 500) {
        this.logger.error(line);
      } else if (res.statusCode >= 400) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    });

    next();
  }
}
