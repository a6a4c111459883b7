/**
 * Kubernetes Client Provider
 *
 * Single source of truth for cluster connectivity. Loads the KubeConfig
 * (explicit path, in-cluster service account or the default lookup) and
 * hands out the API clients built from it. One provider, and therefore one
 * connection, may be shared read-only by concurrently running tests.
 */

import * as k8s from '@kubernetes/client-node';
import { RequestTimeoutError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { abortable, anySignal, backoffDelay, deadline, sleep } from '../utils/index.js';
import { isRetryableError } from './errors.js';

/**
 * Retry configuration options for operations with exponential backoff
 */
export interface RetryOptions {
  /**
   * Maximum number of attempts, including the first one
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Delay before the first retry in milliseconds
   * @default 200
   */
  baseDelay?: number;

  /**
   * @default 5000
   */
  maxDelay?: number;

  /**
   * @default 2
   */
  backoffFactor?: number;

  /**
   * Decides whether a failure is transient
   */
  retryableErrors?: (error: unknown) => boolean;

  /**
   * Milliseconds each attempt may take before it fails with `RequestTimeoutError`
   */
  timeout?: number;

  /**
   * Aborts the pending attempt or backoff sleep
   */
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  baseDelay: 200,
  maxDelay: 5000,
  backoffFactor: 2,
} as const;

/**
 * Configuration options for the Kubernetes client provider
 */
export interface KubernetesClientConfig {
  /**
   * Kubeconfig file to load. When absent, the default lookup applies
   * (`KUBECONFIG`, then `~/.kube/config`).
   */
  kubeconfigPath?: string | undefined;

  /**
   * Context to switch to after loading
   */
  context?: string | undefined;

  /**
   * Use the pod's service account instead of a kubeconfig file
   */
  inCluster?: boolean | undefined;

  /**
   * SECURITY WARNING: Only set to true in non-production environments.
   * @default false
   */
  skipTLSVerify?: boolean | undefined;
}

const logger = getComponentLogger('kubernetes-client-provider');

/**
 * Execute an operation with retry logic and exponential backoff.
 * Only failures classified as transient are retried; everything else is rethrown at once.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_OPTIONS.maxAttempts,
    baseDelay = DEFAULT_RETRY_OPTIONS.baseDelay,
    maxDelay = DEFAULT_RETRY_OPTIONS.maxDelay,
    backoffFactor = DEFAULT_RETRY_OPTIONS.backoffFactor,
    retryableErrors = isRetryableError,
    timeout,
    signal,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await runAttempt(operation, timeout, signal);

      if (attempt > 1) {
        logger.debug('Operation succeeded after retry', { attempt, maxAttempts });
      }

      return result;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const retryable = retryableErrors(error);
      if (attempt >= maxAttempts || !retryable) {
        if (retryable) {
          logger.warn('Operation failed after all retry attempts', {
            attempt,
            maxAttempts,
            error: error instanceof Error ? error.message : String(error),
          });
        }
        throw error;
      }

      const delay = backoffDelay(attempt, baseDelay, backoffFactor, maxDelay);

      logger.debug('Operation failed, retrying', {
        error: error instanceof Error ? error.message : String(error),
        attempt,
        maxAttempts,
        retryDelay: delay,
      });

      await sleep(delay, signal);
    }
  }
}

function runAttempt<T>(
  operation: () => Promise<T>,
  timeout: number | undefined,
  signal: AbortSignal | undefined
): Promise<T> {
  if (timeout === undefined) {
    return abortable(operation(), signal);
  }
  const bound = deadline(timeout, () => new RequestTimeoutError(timeout));
  return abortable(operation(), anySignal(signal, bound.signal)).finally(bound.clear);
}

export class KubernetesClientProvider {
  private readonly kubeConfig: k8s.KubeConfig;
  private objectApi: k8s.KubernetesObjectApi | undefined;
  private coreApi: k8s.CoreV1Api | undefined;
  private versionApi: k8s.VersionApi | undefined;

  private constructor(kubeConfig: k8s.KubeConfig) {
    this.kubeConfig = kubeConfig;
  }

  /**
   * Load a KubeConfig according to `config` and wrap it
   *
   * @throws Error when the kubeconfig cannot be loaded or the context does not exist
   */
  static fromConfig(config: KubernetesClientConfig = {}): KubernetesClientProvider {
    logger.debug('Initializing Kubernetes client provider', {
      kubeconfigPath: config.kubeconfigPath,
      context: config.context,
      inCluster: config.inCluster,
    });

    try {
      const kc = createKubeConfig(config);
      const provider = new KubernetesClientProvider(kc);
      logger.info('Kubernetes client provider initialized', provider.getConnectionInfo());
      return provider;
    } catch (error) {
      logger.error('Failed to initialize Kubernetes client provider', error instanceof Error ? error : undefined);
      throw new Error(
        `Failed to initialize Kubernetes client provider: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Wrap a pre-configured KubeConfig
   */
  static fromKubeConfig(kubeConfig: k8s.KubeConfig): KubernetesClientProvider {
    return new KubernetesClientProvider(kubeConfig);
  }

  getKubeConfig(): k8s.KubeConfig {
    return this.kubeConfig;
  }

  /**
   * Generic object API used for create/read/list/delete of any kind
   */
  getKubernetesObjectApi(): k8s.KubernetesObjectApi {
    this.objectApi ??= k8s.KubernetesObjectApi.makeApiClient(this.kubeConfig);
    return this.objectApi;
  }

  getCoreV1Api(): k8s.CoreV1Api {
    this.coreApi ??= this.kubeConfig.makeApiClient(k8s.CoreV1Api);
    return this.coreApi;
  }

  getVersionApi(): k8s.VersionApi {
    this.versionApi ??= this.kubeConfig.makeApiClient(k8s.VersionApi);
    return this.versionApi;
  }

  /**
   * A new Watch bound to this provider's KubeConfig
   */
  createWatch(): k8s.Watch {
    return new k8s.Watch(this.kubeConfig);
  }

  getConnectionInfo(): {
    currentContext: string;
    server?: string;
    clusterName?: string;
    userName?: string;
  } {
    const cluster = this.kubeConfig.getCurrentCluster();
    const user = this.kubeConfig.getCurrentUser();

    return {
      currentContext: this.kubeConfig.getCurrentContext(),
      ...(cluster?.server ? { server: cluster.server } : {}),
      ...(cluster?.name ? { clusterName: cluster.name } : {}),
      ...(user?.name ? { userName: user.name } : {}),
    };
  }
}

export function createKubeConfig(config: KubernetesClientConfig): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();

  if (config.inCluster) {
    kc.loadFromCluster();
  } else if (config.kubeconfigPath) {
    kc.loadFromFile(config.kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }

  if (config.context) {
    const available = kc.getContexts().map((c) => c.name);
    if (!available.includes(config.context)) {
      throw new Error(
        `Context '${config.context}' not found in kubeconfig (available: ${available.join(', ') || 'none'})`
      );
    }
    kc.setCurrentContext(config.context);
  }

  const cluster = kc.getCurrentCluster();
  if (!cluster) {
    throw new Error('Kubeconfig has no current cluster');
  }

  if (config.skipTLSVerify) {
    logger.warn('TLS verification disabled - this is insecure and should only be used in development', {
      server: cluster.server,
    });
    const modified = { ...cluster, skipTLSVerify: true };
    kc.clusters = kc.clusters.map((c) => (c === cluster ? modified : c));
  }

  return kc;
}

/**
 * Factory function to create a provider from configuration
 */
export function createKubernetesClientProvider(config?: KubernetesClientConfig): KubernetesClientProvider {
  return KubernetesClientProvider.fromConfig(config);
}

export function createKubernetesClientProviderWithKubeConfig(
  kubeConfig: k8s.KubeConfig
): KubernetesClientProvider {
  return KubernetesClientProvider.fromKubeConfig(kubeConfig);
}
