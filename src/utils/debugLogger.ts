/**
 * Debug logging for troubleshooting data flow.
 * Enabled via DEBUG_LOGGING=true.
 *
 * Categories:
 * - REQUEST: raw submission bodies and query strings
 * - RESPONSE: outgoing bodies
 * - VALIDATION: rejected submissions with their zod issues
 * - STORAGE: day record reads and writes
 * - AGGREGATION: records the dashboard could not use as-is
 */

import type { LogContext, Logger } from './logger';

export type DebugCategory = 'AGGREGATION' | 'REQUEST' | 'RESPONSE' | 'STORAGE' | 'VALIDATION';

export interface CoercionStats {
  /** Records handed to the aggregation engine */
  inputRecords: number;
  /** Records whose date could not be read; left out of windows and buckets */
  unreadableDates: number;
}

export function isDebugEnabled(): boolean {
  return process.env.DEBUG_LOGGING === 'true';
}

/**
 * Core debug logging function. No-op unless DEBUG_LOGGING is enabled.
 */
export function debugLog(logger: Logger, category: DebugCategory, message: string, data?: unknown): void {
  if (!isDebugEnabled()) return;

  const context: LogContext = { debugCategory: category };
  if (data !== undefined) {
    context.data = data;
  }

  logger.debug(`[DEBUG:${category}] ${message}`, context);
}

/**
 * Summarise coercions made while building a dashboard. Silent when every
 * record was usable.
 */
export function debugCoercion(logger: Logger, stats: CoercionStats): void {
  if (stats.unreadableDates === 0) return;

  debugLog(logger, 'AGGREGATION', 'Records with unreadable dates were skipped', stats);
}

export function debugRequest(logger: Logger, body: unknown, metadata?: LogContext): void {
  if (!isDebugEnabled()) return;

  const bodySize = JSON.stringify(body ?? {}).length;
  debugLog(logger, 'REQUEST', `Raw request body (${String(bodySize)} bytes)`, { body, ...metadata });
}

export function debugResponse(logger: Logger, statusCode: number, body: unknown): void {
  debugLog(logger, 'RESPONSE', `Response (${String(statusCode)})`, { body, statusCode });
}

export function debugStorage(logger: Logger, operation: string, details: LogContext): void {
  debugLog(logger, 'STORAGE', operation, details);
}

export function debugValidation(logger: Logger, input: unknown, issues: unknown): void {
  debugLog(logger, 'VALIDATION', 'Validation failed', { input, issues });
}
