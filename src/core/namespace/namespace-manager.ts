/**
 * Namespace Isolation Manager
 *
 * Gives every test its own freshly created namespace and reclaims it afterwards.
 * Names are unique within the process (an issued-name set, checked and updated
 * without yielding to the event loop) and across processes (regenerated when
 * the API server reports a conflict).
 */

import type { KubernetesObject, V1Namespace } from '@kubernetes/client-node';
import { ConditionTimeoutError, KubetestError, NamespaceCreationError, WaitCancelledError } from '../errors.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import { isConflictError, isNotFoundError } from '../kubernetes/errors.js';
import { resolveResourceType } from '../kubernetes/resource-types.js';
import { getComponentLogger } from '../logging/index.js';
import { ResourceHandle } from '../resources/handle.js';
import { ConditionWaiter } from '../waiting/index.js';
import { generateNamespaceName } from './naming.js';
import { TestNamespace } from './test-namespace.js';

export const MANAGED_LABEL = 'kubetest.io/managed';
export const TEST_NAME_ANNOTATION = 'kubetest.io/test-name';

const NAMESPACE_TYPE = resolveResourceType('Namespace');
const MAX_NAME_ATTEMPTS = 10;

export interface NamespaceManagerOptions {
  prefix?: string | undefined;
  /** How long a new namespace may take to become Active */
  readyTimeout?: number | undefined;
  pollInterval?: number | undefined;
  /** How long a released namespace may take to disappear before a warning is recorded */
  deletionGracePeriod?: number | undefined;
  /** Make `release` wait for the namespace to be gone instead of monitoring in the background */
  awaitDeletion?: boolean | undefined;
  /** Random part of generated names */
  idGenerator?: (() => string) | undefined;
}

export interface AcquireOptions {
  testName?: string | undefined;
  /** Use this name instead of generating one */
  name?: string | undefined;
  /** When false, `name` must be an existing namespace, which is used as-is and never deleted */
  create?: boolean | undefined;
  labels?: Record<string, string> | undefined;
  signal?: AbortSignal | undefined;
}

export interface NamespaceWarning {
  namespace: string;
  message: string;
}

export type NamespaceReleaseStatus = 'skipped' | 'terminating' | 'deleted';

export interface NamespaceReleaseOutcome {
  namespace: string;
  status: NamespaceReleaseStatus;
}

export class NamespaceManager {
  private readonly logger = getComponentLogger('namespace-manager');
  private readonly waiter: ConditionWaiter;
  private readonly issued = new Set<string>();
  private readonly monitors = new Map<AbortController, Promise<void>>();
  private readonly recordedWarnings: NamespaceWarning[] = [];
  private readonly options: Required<Omit<NamespaceManagerOptions, 'idGenerator'>> &
    Pick<NamespaceManagerOptions, 'idGenerator'>;

  constructor(
    private readonly client: ClusterClient,
    options: NamespaceManagerOptions = {}
  ) {
    this.options = {
      prefix: options.prefix ?? 'kubetest',
      readyTimeout: options.readyTimeout ?? 30000,
      pollInterval: options.pollInterval ?? 1000,
      deletionGracePeriod: options.deletionGracePeriod ?? 60000,
      awaitDeletion: options.awaitDeletion ?? false,
      idGenerator: options.idGenerator,
    };
    this.waiter = new ConditionWaiter(client, { interval: this.options.pollInterval }, this.logger);
  }

  /**
   * Warnings recorded by background deletion monitors
   */
  get warnings(): readonly NamespaceWarning[] {
    return this.recordedWarnings;
  }

  get pendingMonitors(): number {
    return this.monitors.size;
  }

  /**
   * Create (or adopt) the namespace a test runs in and wait until it is Active
   *
   * @throws NamespaceCreationError if it cannot be created or does not become Active in time
   */
  async acquire(options: AcquireOptions = {}): Promise<TestNamespace> {
    if (options.create === false) {
      return this.adopt(options);
    }

    const { namespace, created } = await this.createUnique(options);

    try {
      const handle = new ResourceHandle<V1Namespace>({
        type: NAMESPACE_TYPE,
        namespace: undefined,
        name: namespace.name,
        desired: this.namespaceSpec(namespace.name, options),
        observed: created,
        client: this.client,
      });
      await this.waiter.waitUntilReady(handle, {
        timeout: this.options.readyTimeout,
        interval: this.options.pollInterval,
        onTimeout: 'fail',
        strategy: 'poll',
        signal: options.signal,
      });
    } catch (error) {
      await this.discard(namespace);
      if (error instanceof WaitCancelledError) {
        throw error;
      }
      const reason =
        error instanceof ConditionTimeoutError
          ? `not Active after ${this.options.readyTimeout}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new NamespaceCreationError(namespace.name, reason, error);
    }

    namespace.transition('Active');
    this.logger.info('Namespace ready', { namespace: namespace.name, testName: options.testName });
    return namespace;
  }

  /**
   * Delete a managed namespace. By default this returns once deletion is accepted and a
   * background monitor records a warning if termination outlasts the grace period.
   */
  async release(namespace: TestNamespace): Promise<NamespaceReleaseOutcome> {
    if (!namespace.managed) {
      this.logger.debug('Leaving unmanaged namespace in place', { namespace: namespace.name });
      return { namespace: namespace.name, status: 'skipped' };
    }
    if (namespace.phase === 'Gone') {
      return { namespace: namespace.name, status: 'deleted' };
    }
    if (namespace.phase === 'Terminating') {
      return { namespace: namespace.name, status: 'terminating' };
    }

    await this.client.delete(NAMESPACE_TYPE, undefined, namespace.name);
    namespace.transition('Terminating');
    this.logger.debug('Namespace deletion requested', { namespace: namespace.name });

    if (this.options.awaitDeletion) {
      const gone = await this.awaitGone(namespace);
      return { namespace: namespace.name, status: gone ? 'deleted' : 'terminating' };
    }

    this.startMonitor(namespace);
    return { namespace: namespace.name, status: 'terminating' };
  }

  /**
   * Stop background monitors and wait for them to settle
   */
  async shutdown(): Promise<void> {
    const pending = [...this.monitors.entries()];
    for (const [controller] of pending) {
      controller.abort();
    }
    await Promise.allSettled(pending.map(([, monitor]) => monitor));
  }

  private async adopt(options: AcquireOptions): Promise<TestNamespace> {
    const name = options.name;
    if (!name) {
      throw new KubetestError('An existing namespace name is required when create is false', 'NAMESPACE_NAME_REQUIRED');
    }
    try {
      await this.client.get(NAMESPACE_TYPE, undefined, name);
    } catch (error) {
      throw new NamespaceCreationError(
        name,
        isNotFoundError(error) ? 'namespace does not exist' : error instanceof Error ? error.message : String(error),
        error
      );
    }
    const namespace = new TestNamespace(name, false, options.testName);
    namespace.transition('Active');
    return namespace;
  }

  private async createUnique(
    options: AcquireOptions
  ): Promise<{ namespace: TestNamespace; created: KubernetesObject }> {
    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
      const name = options.name ?? this.nextName(options.testName);
      if (!name) {
        continue;
      }

      try {
        const created = await this.client.create(NAMESPACE_TYPE, undefined, this.namespaceSpec(name, options));
        return { namespace: new TestNamespace(name, true, options.testName), created };
      } catch (error) {
        if (isConflictError(error) && !options.name) {
          this.logger.debug('Namespace name taken, generating another', { namespace: name, attempt });
          continue;
        }
        throw new NamespaceCreationError(name, error instanceof Error ? error.message : String(error), error);
      }
    }

    throw new NamespaceCreationError(
      options.name ?? `${this.options.prefix}-*`,
      `no unique name found after ${MAX_NAME_ATTEMPTS} attempts`
    );
  }

  /**
   * A fresh name, or undefined if it was already issued in this process
   */
  private nextName(testName: string | undefined): string | undefined {
    const name = generateNamespaceName({
      prefix: this.options.prefix,
      testName,
      id: this.options.idGenerator?.(),
    });
    if (this.issued.has(name)) {
      return undefined;
    }
    this.issued.add(name);
    return name;
  }

  private namespaceSpec(name: string, options: AcquireOptions): V1Namespace {
    return {
      apiVersion: 'v1',
      kind: 'Namespace',
      metadata: {
        name,
        labels: { ...options.labels, [MANAGED_LABEL]: 'true' },
        ...(options.testName ? { annotations: { [TEST_NAME_ANNOTATION]: options.testName } } : {}),
      },
    };
  }

  private async discard(namespace: TestNamespace): Promise<void> {
    try {
      await this.client.delete(NAMESPACE_TYPE, undefined, namespace.name);
      namespace.transition('Terminating');
    } catch (error) {
      this.logger.warn('Failed to delete namespace that never became ready', {
        namespace: namespace.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async awaitGone(namespace: TestNamespace, signal?: AbortSignal): Promise<boolean> {
    const handle = new ResourceHandle({
      type: NAMESPACE_TYPE,
      namespace: undefined,
      name: namespace.name,
      desired: { apiVersion: 'v1', kind: 'Namespace', metadata: { name: namespace.name } },
      client: this.client,
    });
    const result = await this.waiter.waitForDeletion(handle, {
      timeout: this.options.deletionGracePeriod,
      interval: this.options.pollInterval,
      onTimeout: 'return-last-state',
      strategy: 'poll',
      signal,
    });

    if (result.satisfied) {
      namespace.transition('Gone');
      return true;
    }

    const message = `Namespace still terminating after ${this.options.deletionGracePeriod}ms`;
    this.recordedWarnings.push({ namespace: namespace.name, message });
    this.logger.warn(message, { namespace: namespace.name });
    return false;
  }

  private startMonitor(namespace: TestNamespace): void {
    const controller = new AbortController();
    const monitor = this.awaitGone(namespace, controller.signal)
      .then(
        () => undefined,
        (error: unknown) => {
          if (error instanceof WaitCancelledError) {
            return;
          }
          const message = `Namespace deletion monitor failed: ${error instanceof Error ? error.message : String(error)}`;
          this.recordedWarnings.push({ namespace: namespace.name, message });
          this.logger.warn(message, { namespace: namespace.name });
        }
      )
      .finally(() => {
        this.monitors.delete(controller);
      });
    this.monitors.set(controller, monitor);
  }
}
