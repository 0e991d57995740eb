import { randomUUID } from 'node:crypto';

import { AuthConfig } from '../config';
import { Logger } from '../utils/logger';

import type { LogContext } from '../utils/logger';
import type { NextFunction, Request, Response } from 'express';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
      startTime: number;
    }
  }
}

type WriteTokenState = 'absent' | 'malformed' | 'present';

const CORRELATION_HEADER = 'x-request-id';
const CORRELATION_ID = /^[\w-]{1,64}$/;

// A caller-supplied id is reused so a shortcut run can be traced end to end
function correlationIdFor(req: Request): string {
  const supplied = req.get(CORRELATION_HEADER);
  return supplied && CORRELATION_ID.test(supplied) ? supplied : `req-${randomUUID().slice(0, 8)}`;
}

// Never the token itself
function writeTokenState(req: Request): WriteTokenState {
  const token = req.get(AuthConfig.headerName);
  if (!token) return 'absent';
  return token.startsWith(AuthConfig.tokenPrefix) ? 'present' : 'malformed';
}

function levelFor(statusCode: number): 'error' | 'info' | 'warn' {
  if (statusCode >= 500) return 'error';
  return statusCode >= 400 ? 'warn' : 'info';
}

/**
 * Give each request a correlated logger, echo its id back in
 * `X-Request-Id`, and log the request once it has been answered.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.correlationId = correlationIdFor(req);
  req.startTime = Date.now();
  req.log = new Logger(req.correlationId);
  res.setHeader('X-Request-Id', req.correlationId);

  const received: LogContext = { method: req.method, path: req.path };
  if (req.method === 'POST') {
    received.bodyBytes = Number(req.get('content-length') ?? 0);
    received.writeToken = writeTokenState(req);
  }
  req.log.debug('Request received', received);

  res.on('finish', () => {
    const level = levelFor(res.statusCode);
    const context: LogContext = {
      ...received,
      durationMs: Date.now() - req.startTime,
      statusCode: res.statusCode,
    };

    if (level === 'error') {
      req.log.error('Request answered', undefined, context);
    } else {
      req.log[level]('Request answered', context);
    }
  });

  next();
}
