/**
 * Log levels understood by the harness logger, ordered from most to least verbose.
 * `silent` disables output entirely.
 */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured logger used throughout the harness
 */
export interface KubetestLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log debug level messages
   */
  debug(msg: string, meta?: Record<string, unknown>): void;

  info(msg: string, meta?: Record<string, unknown>): void;

  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages, serializing the error's name, message and stack
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): KubetestLogger;
}

/**
 * Configuration options for the harness logger
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Enable pretty printing through pino-pretty (default: false)
   */
  pretty?: boolean;

  /**
   * Output file (default: stdout)
   */
  destination?: string;

  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}
