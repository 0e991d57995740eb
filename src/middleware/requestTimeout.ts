/**
 * Request timeout middleware.
 * Answers 408 when a request is still unanswered after the configured time.
 */

import { HttpStatus, RequestConfig } from '../config';

import type { NextFunction, Request, RequestHandler, Response } from 'express';

export function createRequestTimeout(timeoutMs: number = RequestConfig.timeoutMs): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    req.socket.setTimeout(timeoutMs);

    const timer = setTimeout(() => {
      if (!res.headersSent) {
        req.log.warn('Request timeout exceeded', {
          method: req.method,
          path: req.path,
          timeoutMs,
        });
        res.status(HttpStatus.REQUEST_TIMEOUT).json({
          message: `Request processing exceeded ${String(timeoutMs / 1000)} seconds`,
          status: 'error',
        });
      }
    }, timeoutMs);

    const clear = () => {
      clearTimeout(timer);
    };
    res.on('finish', clear);
    res.on('close', clear);

    next();
  };
}
