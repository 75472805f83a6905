/**
 * Structured JSON Logger
 *
 * Base class for the per-agent loggers. Each entry is a single JSON line
 * with event, level and timestamp; agents subclass this and add typed
 * event methods on top of the protected log().
 *
 * @module logger
 */

// ===========================================
// Logger Configuration
// ===========================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Include timestamps in output */
  includeTimestamp: boolean;

  /** Pretty print JSON (development only) */
  prettyPrint: boolean;

  /** Custom output function (defaults to console.log) */
  output?: (message: string) => void;
}

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

const envLevel = process.env.LOG_LEVEL;

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  includeTimestamp: true,
  prettyPrint: false,
};

// ===========================================
// Logger Class
// ===========================================

export class StructuredLogger<TEvent extends string = string> {
  protected config: LoggerConfig;
  private sessionId?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  /**
   * Set session ID for all subsequent log entries
   */
  setSessionId(sessionId: string | undefined): void {
    this.sessionId = sessionId;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  /**
   * Format and output log entry
   */
  protected log(level: LogLevel, event: TEvent | 'message', data: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      event,
      level,
      timestamp: this.config.includeTimestamp ? new Date().toISOString() : undefined,
      session_id: this.sessionId,
      ...data,
    };

    // Remove undefined values
    for (const key in entry) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    const output = this.config.output ?? console.log;
    const message = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    output(message);
  }

  // ===========================================
  // Generic Log Methods
  // ===========================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', 'message', { message, ...data });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', 'message', { message, ...data });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', 'message', { message, ...data });
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', 'message', { message, ...data });
  }
}

/**
 * Turn an unknown thrown value into a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
