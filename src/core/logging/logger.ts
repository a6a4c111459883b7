import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { KubetestLogger, LoggerConfig, LogLevel } from './types.js';

function serializeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

/**
 * Pino-based implementation of KubetestLogger
 */
class PinoLogger implements KubetestLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta ?? {}, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.error(logData, msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.fatal(logData, msg);
  }

  child(bindings: Record<string, unknown>): KubetestLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/** Transport workers by their options; a worker lives as long as the process */
const transports = new Map<string, pino.DestinationStream>();

/**
 * One transport worker per target and options, reused when the logger is reconfigured
 */
function sharedTransport(options: pino.TransportSingleOptions): pino.DestinationStream {
  const key = JSON.stringify(options);
  let stream = transports.get(key);
  if (!stream) {
    const created: pino.DestinationStream = pino.transport(options);
    stream = created;
    transports.set(key, stream);
  }
  return stream;
}

/**
 * Create a logger with the specified configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): KubetestLogger {
  const finalConfig: LoggerConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    name: 'kubetest',
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stdout') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
        mkdir: true,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, sharedTransport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

let rootLogger: KubetestLogger = createLogger();
let generation = 0;

/**
 * Replace the root logger, e.g. once `--kube-log-level` has been parsed.
 * Loggers handed out by the getters below pick up the new root on their next call.
 */
export function configureLogging(config: Partial<LoggerConfig>): void {
  rootLogger = createLogger(config);
  generation++;
}

export function setLogLevel(level: LogLevel): void {
  configureLogging({ level });
}

/**
 * Child logger that re-binds itself whenever the root logger is replaced
 */
class BoundLogger implements KubetestLogger {
  private cached: KubetestLogger | undefined;
  private cachedGeneration = -1;

  constructor(private readonly bindings: Record<string, unknown>) {}

  private get delegate(): KubetestLogger {
    if (!this.cached || this.cachedGeneration !== generation) {
      this.cached = rootLogger.child(this.bindings);
      this.cachedGeneration = generation;
    }
    return this.cached;
  }

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.delegate.trace(msg, meta);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.delegate.debug(msg, meta);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.delegate.info(msg, meta);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.delegate.warn(msg, meta);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.delegate.error(msg, error, meta);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.delegate.fatal(msg, error, meta);
  }

  child(bindings: Record<string, unknown>): KubetestLogger {
    return new BoundLogger({ ...this.bindings, ...bindings });
  }
}

/**
 * Default logger instance; follows `configureLogging`
 */
export const logger: KubetestLogger = new BoundLogger({});

/**
 * Create a component-specific logger
 */
export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): KubetestLogger {
  return new BoundLogger({ component, ...additionalContext });
}

/**
 * Create a logger for one test session
 */
export function getTestLogger(
  testName: string,
  namespace?: string,
  additionalContext?: Record<string, unknown>
): KubetestLogger {
  return new BoundLogger({ testName, namespace, ...additionalContext });
}
