/**
 * In-memory rate limiting middleware.
 * Fixed window per client IP; suitable for the single instance this
 * server runs as.
 */

import { HttpStatus, RateLimitConfig } from '../config';

import type { NextFunction, Request, RequestHandler, Response } from 'express';

export interface RateLimitOptions {
  /** How often expired client entries are swept */
  cleanupIntervalMs: number;
  /** Maximum number of requests allowed in the time window */
  maxRequests: number;
  /** Skip rate limiting for specific paths (e.g., the status check) */
  skipPaths: string[];
  /** Time window in milliseconds */
  windowMs: number;
}

interface RequestRecord {
  count: number;
  resetTime: number;
}

const DEFAULT_OPTIONS: RateLimitOptions = {
  cleanupIntervalMs: RateLimitConfig.cleanupIntervalMs,
  maxRequests: RateLimitConfig.maxRequests,
  skipPaths: RateLimitConfig.skipPaths,
  windowMs: RateLimitConfig.windowMs,
};

/**
 * Get client IP address from request.
 * Handles common proxy headers (X-Forwarded-For, X-Real-IP).
 */
function getClientIp(req: Request): string {
  const forwardedFor = req.headers['x-forwarded-for'];
  if (forwardedFor) {
    // X-Forwarded-For can be comma-separated list; take first IP
    const ips = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
    return ips.split(',')[0].trim();
  }

  const realIp = req.headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? realIp[0] : realIp;
  }

  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Create a rate limiting middleware. Each middleware keeps its own counters.
 */
export function createRateLimit(options: Partial<RateLimitOptions> = {}): RequestHandler {
  const settings = { ...DEFAULT_OPTIONS, ...options };
  const requestStore = new Map<string, RequestRecord>();

  // unref so the sweep never holds the process open
  setInterval(() => {
    const now = Date.now();
    for (const [key, record] of requestStore) {
      if (record.resetTime <= now) {
        requestStore.delete(key);
      }
    }
  }, settings.cleanupIntervalMs).unref();

  return (req: Request, res: Response, next: NextFunction) => {
    if (settings.skipPaths.includes(req.path)) {
      next();
      return;
    }

    const clientIp = getClientIp(req);
    const now = Date.now();

    let record = requestStore.get(clientIp);
    if (!record || record.resetTime <= now) {
      record = { count: 0, resetTime: now + settings.windowMs };
      requestStore.set(clientIp, record);
    }

    record.count++;

    const remaining = Math.max(0, settings.maxRequests - record.count);
    const resetSeconds = Math.ceil((record.resetTime - now) / 1000);

    res.setHeader('X-RateLimit-Limit', String(settings.maxRequests));
    res.setHeader('X-RateLimit-Remaining', String(remaining));
    res.setHeader('X-RateLimit-Reset', String(resetSeconds));

    if (record.count > settings.maxRequests) {
      req.log.warn('Rate limit exceeded', {
        clientIp,
        limit: settings.maxRequests,
        path: req.path,
        requests: record.count,
        resetIn: resetSeconds,
      });

      res.setHeader('Retry-After', String(resetSeconds));
      res.status(HttpStatus.TOO_MANY_REQUESTS).json({
        message: `Rate limit exceeded. Try again in ${String(resetSeconds)} seconds.`,
        retryAfter: resetSeconds,
        status: 'error',
      });
      return;
    }

    next();
  };
}
