import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  configureLogging,
  createLogger,
  getComponentLogger,
  getLoggerConfigFromEnv,
  getTestLogger,
  isLogLevel,
  type LoggerConfig,
  setLogLevel,
  validateLoggerConfig,
} from '../../src/core/logging/index.js';

describe('Kubetest Logging', () => {
  afterEach(() => {
    configureLogging({ level: 'silent' });
  });

  describe('Logger Creation', () => {
    it('should create a logger with every level method', () => {
      const logger = createLogger({ level: 'silent' });
      expect(typeof logger.trace).toBe('function');
      expect(typeof logger.debug).toBe('function');
      expect(typeof logger.info).toBe('function');
      expect(typeof logger.warn).toBe('function');
      expect(typeof logger.error).toBe('function');
      expect(typeof logger.fatal).toBe('function');
      expect(typeof logger.child).toBe('function');
    });

    it('should create child loggers with context', () => {
      const child = createLogger({ level: 'silent' }).child({ component: 'test' });
      expect(() => child.info('message')).not.toThrow();
    });
  });

  describe('Environment Configuration', () => {
    it('should read KUBETEST_LOG_LEVEL case-insensitively', () => {
      expect(getLoggerConfigFromEnv({ KUBETEST_LOG_LEVEL: 'DEBUG' }).level).toBe('debug');
    });

    it('should default to warn under the test runner', () => {
      expect(getLoggerConfigFromEnv({ VITEST: 'true' }).level).toBe('warn');
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'test' }).level).toBe('warn');
    });

    it('should default to info outside a test runner', () => {
      expect(getLoggerConfigFromEnv({}).level).toBe('info');
    });

    it('should ignore an unknown level', () => {
      expect(getLoggerConfigFromEnv({ KUBETEST_LOG_LEVEL: 'verbose' }).level).toBe('info');
    });

    it('should read pretty printing, destination and timestamp settings', () => {
      const config = getLoggerConfigFromEnv({
        KUBETEST_LOG_PRETTY: 'true',
        KUBETEST_LOG_DESTINATION: '/tmp/kubetest.log',
        KUBETEST_LOG_TIMESTAMP: 'false',
      });
      expect(config.pretty).toBe(true);
      expect(config.destination).toBe('/tmp/kubetest.log');
      expect(config.options?.timestamp).toBe(false);
    });
  });

  describe('Specialized Logger Functions', () => {
    it('should create component-specific loggers', () => {
      const logger = getComponentLogger('namespace-manager');
      expect(() => logger.debug('message', { namespace: 'kubetest-1' })).not.toThrow();
    });

    it('should create test-specific loggers', () => {
      const logger = getTestLogger('creates a deployment', 'kubetest-1', { testId: 'abc' });
      expect(() => logger.warn('message')).not.toThrow();
    });

    it('should reuse the transport worker when reconfigured with the same destination', () => {
      const transport = vi.spyOn(pino, 'transport');
      const destination = join(tmpdir(), `kubetest-logging-${process.pid}-${Date.now()}.log`);

      configureLogging({ level: 'silent', destination });
      configureLogging({ level: 'error', destination });

      expect(transport).toHaveBeenCalledTimes(1);
      transport.mockRestore();
    });

    it('should keep handing out working loggers after the level changes', () => {
      const logger = getComponentLogger('registry');
      setLogLevel('error');
      expect(() => logger.error('after level change', new Error('boom'))).not.toThrow();
      expect(() => logger.child({ extra: true }).info('child after change')).not.toThrow();
    });
  });

  describe('Logger Methods', () => {
    it('should handle all log levels without throwing', () => {
      const logger = createLogger({ level: 'silent' });

      expect(() => logger.trace('trace message')).not.toThrow();
      expect(() => logger.debug('debug message')).not.toThrow();
      expect(() => logger.info('info message')).not.toThrow();
      expect(() => logger.warn('warn message')).not.toThrow();
      expect(() => logger.error('error message')).not.toThrow();
      expect(() => logger.fatal('fatal message')).not.toThrow();
    });

    it('should handle error objects and metadata', () => {
      const logger = createLogger({ level: 'silent' });
      expect(() => logger.error('Error occurred', new Error('Test error'), { identity: 'Pod/ns/web' })).not.toThrow();
      expect(() => logger.fatal('Fatal error occurred', new Error('Test error'))).not.toThrow();
    });
  });

  describe('Validation', () => {
    it('should recognise log levels', () => {
      expect(isLogLevel('trace')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
    });

    it('should reject an empty destination', () => {
      const config: LoggerConfig = { level: 'info', destination: '  ' };
      expect(() => validateLoggerConfig(config)).toThrow('Log destination must be a non-empty path');
    });
  });
});
