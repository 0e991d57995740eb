import { timingSafeEqual } from 'node:crypto';

import { AuthConfig, HttpStatus } from '../config';

import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Determine the reason for auth failure (for logging purposes only).
 */
function getAuthFailureReason(token: string | undefined): string {
  if (!token) return 'missing_token';
  if (!token.startsWith(AuthConfig.tokenPrefix)) return 'invalid_format';
  return 'token_mismatch';
}

/**
 * Timing-safe token comparison to prevent timing attacks.
 */
function isValidToken(provided: string, expected: string): boolean {
  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);
  if (providedBuf.length !== expectedBuf.length) {
    return false;
  }
  return timingSafeEqual(providedBuf, expectedBuf);
}

function readToken(req: Request): string | undefined {
  const header = req.headers[AuthConfig.headerName];
  return Array.isArray(header) ? header[0] : header;
}

/**
 * Require the write token on submissions. Without a configured token the
 * middleware lets every request through, as the mobile shortcut may not
 * send one.
 */
export function createWriteAuth(expectedToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedToken) {
      next();
      return;
    }

    const token = readToken(req);
    if (!token?.startsWith(AuthConfig.tokenPrefix) || !isValidToken(token, expectedToken)) {
      req.log.warn('Write authentication failed', {
        path: req.path,
        reason: getAuthFailureReason(token),
      });
      res.status(HttpStatus.UNAUTHORIZED).json({
        message: 'Unauthorized: invalid write token',
        status: 'error',
      });
      return;
    }

    req.log.debug('Write authentication successful');
    next();
  };
}
