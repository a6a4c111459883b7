import { LOG_LEVELS, type LogLevel, type LoggerConfig } from './types.js';

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  options: {
    timestamp: true,
  },
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get logger configuration from environment variables
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  const envLevel = env.KUBETEST_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    config.level = envLevel;
  } else if (env.VITEST === 'true' || env.NODE_ENV === 'test') {
    // keep test output readable; teardown warnings still show
    config.level = 'warn';
  }

  if (env.KUBETEST_LOG_PRETTY === 'true') {
    config.pretty = true;
  }

  if (env.KUBETEST_LOG_DESTINATION) {
    config.destination = env.KUBETEST_LOG_DESTINATION;
  }

  if (env.KUBETEST_LOG_TIMESTAMP === 'false') {
    config.options = { ...config.options, timestamp: false };
  }

  return config;
}

/**
 * Validate logger configuration
 */
export function validateLoggerConfig(config: LoggerConfig): void {
  if (!isLogLevel(config.level)) {
    throw new Error(`Invalid log level: ${config.level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  if (config.destination !== undefined && config.destination.trim() === '') {
    throw new Error('Log destination must be a non-empty path');
  }
}
