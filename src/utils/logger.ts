/**
 * Console logger for the health server.
 * - Development: coloured single-line entries with an indented context line
 * - Production (NODE_ENV=production): one JSON object per line
 */

const ansi = {
  cyan: '\u001B[36m',
  dim: '\u001B[2m',
  gray: '\u001B[90m',
  red: '\u001B[31m',
  reset: '\u001B[0m',
  yellow: '\u001B[33m',
} as const;

export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'error' | 'info' | 'warn';

export interface TimerResult {
  end: (level: LogLevel, message: string, context?: LogContext) => void;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  correlationId?: string;
  durationMs?: number;
  error?: {
    message: string;
    name: string;
    cause?: string;
    stack?: string;
  };
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLOURS: Record<LogLevel, string> = {
  debug: ansi.gray,
  error: ansi.red,
  info: ansi.cyan,
  warn: ansi.yellow,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function describeError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    return {
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
  }
  if (typeof error === 'object' && 'message' in error) {
    return { message: String(error.message), name: 'UnknownError' };
  }
  return { message: JSON.stringify(error), name: 'UnknownError' };
}

export class Logger {
  private readonly correlationId?: string;
  private readonly isProduction: boolean;
  private readonly minLevel: LogLevel;

  constructor(correlationId?: string) {
    const configuredLevel = process.env.LOG_LEVEL;
    this.correlationId = correlationId;
    this.isProduction = process.env.NODE_ENV === 'production';
    this.minLevel = isLogLevel(configuredLevel) ? configuredLevel : 'debug';
  }

  /**
   * Create a logger bound to a request correlation ID.
   */
  child(correlationId: string): Logger {
    return new Logger(correlationId);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write('error', message, context, error);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  /**
   * Start timing an operation; `end` logs the outcome with its duration.
   */
  startTimer(operation: string): TimerResult {
    const startedAt = Date.now();
    this.debug(`Starting: ${operation}`);

    return {
      end: (level, message, context) => {
        this.write(level, message, context, undefined, Date.now() - startedAt);
      },
    };
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  private pretty(entry: LogEntry): string {
    const colour = LEVEL_COLOURS[entry.level];
    const level = `${colour}${entry.level.toUpperCase().padEnd(5)}${ansi.reset}`;
    const correlation = entry.correlationId
      ? `${ansi.dim}[${entry.correlationId}]${ansi.reset} `
      : '';
    const duration =
      entry.durationMs === undefined ? '' : ` ${ansi.dim}(${String(entry.durationMs)}ms)${ansi.reset}`;

    const lines = [
      `${ansi.dim}${entry.timestamp}${ansi.reset} ${level} ${correlation}${entry.message}${duration}`,
    ];

    if (entry.context && Object.keys(entry.context).length > 0) {
      lines.push(`  ${ansi.dim}${JSON.stringify(entry.context)}${ansi.reset}`);
    }

    if (entry.error) {
      lines.push(`  ${ansi.red}${entry.error.name}: ${entry.error.message}${ansi.reset}`);
      if (entry.error.cause) {
        lines.push(`  ${ansi.red}caused by: ${entry.error.cause}${ansi.reset}`);
      }
      if (entry.error.stack) {
        lines.push(`${ansi.dim}${entry.error.stack}${ansi.reset}`);
      }
    }

    return lines.join('\n');
  }

  private write(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown,
    durationMs?: number,
  ): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) return;

    const entry: LogEntry = {
      context,
      correlationId: this.correlationId,
      durationMs,
      error: describeError(error),
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    const output = this.isProduction ? JSON.stringify(entry) : this.pretty(entry);

    switch (level) {
      case 'error': {
        console.error(output);
        break;
      }
      case 'warn': {
        console.warn(output);
        break;
      }
      default: {
        console.log(output);
      }
    }
  }
}

// Process-wide logger for startup, shutdown and the backup job
export const logger = new Logger();
