import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../src/core/errors.js';
import {
  DEFAULT_HARNESS_CONFIG,
  loadHarnessConfig,
  parseHarnessArgs,
  readHarnessEnv,
} from '../../src/harness/config.js';

describe('parseHarnessArgs', () => {
  it('reads flags in both spellings', () => {
    expect(parseHarnessArgs(['--kube-config', '/tmp/test-kubeconfig', '--kube-log-level=DEBUG'])).toEqual({
      kubeConfigPath: '/tmp/test-kubeconfig',
      logLevel: 'debug',
    });
  });

  it('ignores flags it does not own', () => {
    expect(parseHarnessArgs(['run', '--reporter=verbose', '--kube-disable', '--kube-context', 'kind-test'])).toEqual({
      disabled: true,
      context: 'kind-test',
    });
  });

  it('accepts explicit boolean values', () => {
    expect(parseHarnessArgs(['--in-cluster=false'])).toEqual({ inCluster: false });
  });

  it('requires values for value flags', () => {
    expect(() => parseHarnessArgs(['--kube-config'])).toThrow('Flag --kube-config requires a value');
    expect(() => parseHarnessArgs(['--kube-log-level', '--kube-disable'])).toThrow(ConfigurationError);
  });
});

describe('readHarnessEnv', () => {
  it('reads KUBETEST_ variables', () => {
    expect(
      readHarnessEnv({
        KUBETEST_POLL_INTERVAL: '250',
        KUBETEST_IN_CLUSTER: 'yes',
        KUBETEST_LOG_LEVEL: 'WARN',
        KUBETEST_CONTEXT: '',
        UNRELATED: 'value',
      })
    ).toEqual({ pollInterval: 250, inCluster: true, logLevel: 'warn' });
  });
});

describe('loadHarnessConfig', () => {
  it('starts from the defaults', () => {
    expect(loadHarnessConfig({ argv: [], env: {} })).toEqual(DEFAULT_HARNESS_CONFIG);
  });

  it('lets flags override the environment and overrides win over both', () => {
    const config = loadHarnessConfig({
      argv: ['--kube-log-level', 'error', '--kube-config=/tmp/from-flag'],
      env: { KUBETEST_LOG_LEVEL: 'debug', KUBETEST_KUBECONFIG: '/tmp/from-env', KUBETEST_WAIT_TIMEOUT: '5000' },
      overrides: { waitTimeout: 100, context: undefined },
    });

    expect(config).toMatchObject({ logLevel: 'error', kubeConfigPath: '/tmp/from-flag', waitTimeout: 100 });
    expect(config.context).toBeUndefined();
  });

  it('rejects unknown log levels with the valid choices', () => {
    expect(() => loadHarnessConfig({ argv: ['--kube-log-level=verbose'], env: {} })).toThrow(
      'Invalid harness configuration:'
    );

    let caught: unknown;
    try {
      loadHarnessConfig({ argv: ['--kube-log-level=verbose'], env: {} });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      field: 'logLevel',
      suggestions: ['Use one of: trace, debug, info, warn, error, fatal, silent'],
    });
  });

  it('reads the request timeout from the environment', () => {
    expect(loadHarnessConfig({ argv: [], env: { KUBETEST_REQUEST_TIMEOUT: '2500' } }).requestTimeout).toBe(2500);
    expect(() => loadHarnessConfig({ argv: [], env: { KUBETEST_REQUEST_TIMEOUT: '0' } })).toThrow(ConfigurationError);
  });

  it('rejects invalid numbers and prefixes', () => {
    expect(() => loadHarnessConfig({ argv: [], env: { KUBETEST_POLL_INTERVAL: '-5' } })).toThrow(ConfigurationError);
    expect(() => loadHarnessConfig({ argv: [], env: {}, overrides: { namespacePrefix: 'Bad_Prefix' } })).toThrow(
      ConfigurationError
    );
  });
});
