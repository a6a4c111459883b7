/**
 * Harness configuration
 *
 * Resolved from defaults, then `KUBETEST_*` environment variables, then
 * `--kube-*` flags, then explicit overrides, and validated with arktype.
 * Vitest rejects flags it does not know, so the flags are normally passed
 * after `--` or through the environment.
 */

import { type } from 'arktype';
import { ConfigurationError } from '../core/errors.js';
import { LOG_LEVELS } from '../core/logging/index.js';

export const HarnessConfigSchema = type({
  'kubeConfigPath?': 'string',
  'context?': 'string',
  'logLevel?': "'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'",
  disabled: 'boolean',
  inCluster: 'boolean',
  namespacePrefix: '/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/',
  pollInterval: 'number > 0',
  requestTimeout: 'number > 0',
  waitTimeout: 'number >= 0',
  namespaceReadyTimeout: 'number > 0',
  namespaceDeletionGracePeriod: 'number >= 0',
  awaitNamespaceDeletion: 'boolean',
  testTimeout: 'number > 0',
});

export type HarnessConfig = typeof HarnessConfigSchema.infer;

/**
 * Without a configured log level the logger keeps its environment default
 */
export const DEFAULT_HARNESS_CONFIG: HarnessConfig = {
  disabled: false,
  inCluster: false,
  namespacePrefix: 'kubetest',
  pollInterval: 1000,
  requestTimeout: 30000,
  waitTimeout: 60000,
  namespaceReadyTimeout: 30000,
  namespaceDeletionGracePeriod: 60000,
  awaitNamespaceDeletion: false,
  testTimeout: 300000,
};

type RawConfig = Record<string, unknown>;

interface FlagDefinition {
  flag: string;
  key: keyof HarnessConfig;
  boolean?: boolean;
}

const FLAGS: FlagDefinition[] = [
  { flag: '--kube-config', key: 'kubeConfigPath' },
  { flag: '--kube-context', key: 'context' },
  { flag: '--kube-log-level', key: 'logLevel' },
  { flag: '--kube-disable', key: 'disabled', boolean: true },
  { flag: '--in-cluster', key: 'inCluster', boolean: true },
];

const ENV_VARS: Array<{ name: string; key: keyof HarnessConfig; parse: (value: string) => unknown }> = [
  { name: 'KUBETEST_KUBECONFIG', key: 'kubeConfigPath', parse: String },
  { name: 'KUBETEST_CONTEXT', key: 'context', parse: String },
  { name: 'KUBETEST_LOG_LEVEL', key: 'logLevel', parse: (value) => value.toLowerCase() },
  { name: 'KUBETEST_DISABLE', key: 'disabled', parse: parseBoolean },
  { name: 'KUBETEST_IN_CLUSTER', key: 'inCluster', parse: parseBoolean },
  { name: 'KUBETEST_NAMESPACE_PREFIX', key: 'namespacePrefix', parse: String },
  { name: 'KUBETEST_POLL_INTERVAL', key: 'pollInterval', parse: Number },
  { name: 'KUBETEST_REQUEST_TIMEOUT', key: 'requestTimeout', parse: Number },
  { name: 'KUBETEST_WAIT_TIMEOUT', key: 'waitTimeout', parse: Number },
  { name: 'KUBETEST_NAMESPACE_READY_TIMEOUT', key: 'namespaceReadyTimeout', parse: Number },
  { name: 'KUBETEST_NAMESPACE_DELETION_GRACE_PERIOD', key: 'namespaceDeletionGracePeriod', parse: Number },
  { name: 'KUBETEST_AWAIT_NAMESPACE_DELETION', key: 'awaitNamespaceDeletion', parse: parseBoolean },
  { name: 'KUBETEST_TEST_TIMEOUT', key: 'testTimeout', parse: Number },
];

function parseBoolean(value: string): unknown {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', ''].includes(normalized)) {
    return false;
  }
  return value;
}

/**
 * Read `--kube-*` flags; both `--flag=value` and `--flag value` are accepted
 */
export function parseHarnessArgs(argv: readonly string[]): RawConfig {
  const result: RawConfig = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }
    const [flag, inlineValue] = splitFlag(arg);
    const definition = FLAGS.find((candidate) => candidate.flag === flag);
    if (!definition) {
      continue;
    }

    if (definition.boolean) {
      result[definition.key] = inlineValue === undefined ? true : parseBoolean(inlineValue);
      continue;
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
      throw new ConfigurationError(`Flag ${flag} requires a value`, definition.key);
    }
    if (inlineValue === undefined) {
      i++;
    }
    result[definition.key] = definition.key === 'logLevel' ? value.toLowerCase() : value;
  }
  return result;
}

function splitFlag(arg: string): [string, string | undefined] {
  const index = arg.indexOf('=');
  return index === -1 ? [arg, undefined] : [arg.slice(0, index), arg.slice(index + 1)];
}

export function readHarnessEnv(env: NodeJS.ProcessEnv): RawConfig {
  const result: RawConfig = {};
  for (const { name, key, parse } of ENV_VARS) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      result[key] = parse(value);
    }
  }
  return result;
}

export interface LoadHarnessConfigOptions {
  argv?: readonly string[] | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  overrides?: Partial<HarnessConfig> | undefined;
}

/**
 * Resolve and validate the harness configuration
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadHarnessConfig(options: LoadHarnessConfigOptions = {}): HarnessConfig {
  const raw: RawConfig = {
    ...DEFAULT_HARNESS_CONFIG,
    ...readHarnessEnv(options.env ?? process.env),
    ...parseHarnessArgs(options.argv ?? process.argv.slice(2)),
    ...withoutUndefined(options.overrides ?? {}),
  };

  const result = HarnessConfigSchema(raw);
  if (result instanceof type.errors) {
    const field = result[0]?.path.join('.');
    throw new ConfigurationError(
      `Invalid harness configuration: ${result.summary}`,
      field,
      field === 'logLevel' ? [`Use one of: ${LOG_LEVELS.join(', ')}`] : undefined
    );
  }
  return result;
}

function withoutUndefined(values: Partial<HarnessConfig>): RawConfig {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
