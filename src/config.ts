/**
 * Centralized configuration for the daily health server.
 *
 * Values can be overridden via environment variables where noted.
 *
 * Configuration categories:
 * - Server: HTTP server settings (port, host, body limits)
 * - Request: per-request processing limits
 * - Auth: optional write token for submissions
 * - RateLimit: Request rate limiting
 * - CORS: Cross-origin resource sharing
 * - Storage: SQLite database location
 * - Time: reference timezone for "today" and `recorded_at`
 * - Dashboard: goal thresholds and period windows
 * - Backup: scheduled copy of the database file
 */

import type { Period } from './types';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Safely parse an integer from an environment variable.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws TypeError if value is set but not a valid integer
 */
export function parseIntSafe(
  value: string | undefined,
  defaultValue: number,
  variableName: string,
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return parsed;
}

/**
 * Read an optional string variable. Unset, empty and whitespace-only values
 * all mean "not configured".
 */
export function readOptionalEnv(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

export const ServerConfig = {
  /**
   * Server port.
   * @env PORT
   * @default 5009
   */
  port: parseIntSafe(process.env.PORT, 5009, 'PORT'),

  /**
   * Server bind address.
   * @default '0.0.0.0'
   */
  host: '0.0.0.0',

  /**
   * Maximum request body size for JSON payloads.
   * A submission is a handful of numbers.
   * @default '100kb'
   */
  bodyLimit: '100kb',

  /**
   * Graceful shutdown timeout in milliseconds.
   * @default 10000 (10 seconds)
   */
  shutdownTimeoutMs: 10_000,
} as const;

// =============================================================================
// REQUEST CONFIGURATION
// =============================================================================

export const RequestConfig = {
  /**
   * Maximum request processing time in milliseconds.
   * Requests exceeding this will receive a 408 timeout response.
   * @default 30000 (30 seconds)
   */
  timeoutMs: 30_000,
} as const;

// =============================================================================
// AUTHENTICATION CONFIGURATION
// =============================================================================

export const AuthConfig = {
  /**
   * Required prefix for the write token.
   * @default 'sk-'
   */
  tokenPrefix: 'sk-',

  /**
   * HTTP header carrying the write token.
   * @default 'api-key'
   */
  headerName: 'api-key',

  /**
   * Token required on POST /dump. Submissions are open when unset or empty.
   * @env WRITE_TOKEN
   */
  writeToken: readOptionalEnv(process.env.WRITE_TOKEN),
} as const;

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

const RATE_LIMIT_WINDOW_MS = 60_000;

export const RateLimitConfig = {
  /**
   * Maximum requests allowed per IP address within the time window.
   * @default 100
   */
  maxRequests: 100,

  /**
   * Rate limit time window in milliseconds.
   * @default 60000 (1 minute)
   */
  windowMs: RATE_LIMIT_WINDOW_MS,

  /**
   * Paths excluded from rate limiting.
   * @default ['/status']
   */
  skipPaths: ['/status'] as string[],

  /**
   * Expired client entries are swept every two windows.
   */
  cleanupIntervalMs: RATE_LIMIT_WINDOW_MS * 2,
} as const;

// =============================================================================
// CORS CONFIGURATION
// =============================================================================

export const CorsConfig = {
  allowedHeaders: ['Content-Type', 'Authorization', 'api-key'] as string[],
  allowedMethods: ['GET', 'POST', 'OPTIONS'] as string[],
} as const;

// =============================================================================
// STORAGE CONFIGURATION
// =============================================================================

export const StorageConfig = {
  /**
   * SQLite database file. Use ':memory:' for a throwaway database.
   * @env DB_PATH
   * @default 'data/health_records.db'
   */
  dbPath: process.env.DB_PATH ?? 'data/health_records.db',

  /**
   * Table holding one row per calendar day.
   */
  tableName: 'health_records',
} as const;

// =============================================================================
// TIME CONFIGURATION
// =============================================================================

export const TimeConfig = {
  /**
   * IANA timezone that decides which calendar day a submission belongs to.
   * Independent of the host's zone.
   * @env HEALTH_TIMEZONE
   * @default 'Europe/Madrid'
   */
  referenceTimeZone: process.env.HEALTH_TIMEZONE ?? 'Europe/Madrid',
} as const;

// =============================================================================
// DASHBOARD CONFIGURATION
// =============================================================================

export const DashboardConfig = {
  /**
   * Daily goals shown as progress rings. Presentation only.
   */
  goals: {
    steps: 10_000,
    kcals: 500,
    km: 8,
    flights_climbed: 50,
  },

  /**
   * Trailing window, in days, for each period selector.
   */
  periodDays: {
    week: 7,
    month: 30,
    year: 365,
    all: Number.POSITIVE_INFINITY,
  } satisfies Record<Period, number>,
} as const;

// =============================================================================
// BACKUP CONFIGURATION
// =============================================================================

export const BackupConfig = {
  /**
   * Cron expression for the backup job.
   * @env BACKUP_CRON
   * @default '0 * * * *' (top of every hour)
   */
  cronExpression: process.env.BACKUP_CRON ?? '0 * * * *',

  /**
   * Suffix appended to the database path for the backup copy.
   * @default '.bk'
   */
  suffix: '.bk',
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
  NOT_FOUND: 404,
  OK: 200,
  PAYLOAD_TOO_LARGE: 413,
  REQUEST_TIMEOUT: 408,
  TOO_MANY_REQUESTS: 429,
  UNAUTHORIZED: 401,
} as const;
