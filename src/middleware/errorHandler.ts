import { HttpStatus } from '../config';
import { StorageError, ValidationError, errorMessage } from '../utils/errors';

import type { ErrorResponse } from '../types';
import type { NextFunction, Request, Response } from 'express';

/**
 * body-parser rejects bodies with an error carrying a `type` such as
 * 'entity.parse.failed' or 'entity.too.large'.
 */
function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

/**
 * Map an error to its HTTP status and JSON body.
 */
export function toErrorResponse(error: unknown): { status: number; body: ErrorResponse } {
  if (error instanceof ValidationError) {
    return {
      body: { details: error.issues, message: error.message, status: 'error' },
      status: HttpStatus.BAD_REQUEST,
    };
  }

  switch (bodyParserErrorType(error)) {
    case 'entity.parse.failed': {
      return {
        body: { message: 'Request body is not valid JSON', status: 'error' },
        status: HttpStatus.BAD_REQUEST,
      };
    }
    case 'entity.too.large': {
      return {
        body: { message: 'Request body too large', status: 'error' },
        status: HttpStatus.PAYLOAD_TOO_LARGE,
      };
    }
    default: {
      break;
    }
  }

  return {
    body: {
      message: error instanceof StorageError ? error.message : 'Failed to process request',
      status: 'error',
    },
    status: HttpStatus.INTERNAL_SERVER_ERROR,
  };
}

/**
 * Unmatched routes.
 */
export function notFound(req: Request, res: Response): void {
  res.status(HttpStatus.NOT_FOUND).json({
    message: `No route for ${req.method} ${req.path}`,
    status: 'error',
  } satisfies ErrorResponse);
}

/**
 * Last-resort error middleware for errors raised before or outside the
 * controllers, such as malformed JSON bodies.
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const { body, status } = toErrorResponse(error);
  if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
    req.log.error('Unhandled request error', error, { path: req.path });
  } else {
    req.log.warn('Rejected request', { error: errorMessage(error), path: req.path, status });
  }

  res.status(status).json(body);
}
