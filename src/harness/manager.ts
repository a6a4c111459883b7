/**
 * Test manager
 *
 * Owns the process-wide cluster connection and hands every test a session:
 * a fresh namespace, a registry for the objects it creates and the `kube`
 * client. Sessions are independent; only the connection is shared.
 */

import type { KubernetesObject } from '@kubernetes/client-node';
import { KubetestError } from '../core/errors.js';
import { createKubernetesClientProvider } from '../core/kubernetes/client-provider.js';
import { type ClusterClient, createClusterClient } from '../core/kubernetes/cluster-client.js';
import { getTestLogger, type KubetestLogger, setLogLevel } from '../core/logging/index.js';
import { type LoadDirectoryOptions, loadManifests, type RenderContext } from '../core/manifests/index.js';
import { NamespaceManager, type TestNamespace } from '../core/namespace/index.js';
import {
  type ClusterRoleBindingOptions,
  clusterRoleBinding,
  type RoleBindingOptions,
  roleBinding,
} from '../core/rbac/bindings.js';
import { ResourceRegistry, type TeardownReport } from '../core/registry/index.js';
import { anySignal } from '../core/utils/index.js';
import { ConditionWaiter } from '../core/waiting/index.js';
import { type HarnessConfig, type LoadHarnessConfigOptions, loadHarnessConfig } from './config.js';
import { KubeClient } from './kube-client.js';

export interface NamespaceOptions {
  /** Use this name instead of a generated one */
  name?: string | undefined;
  /** When false, `name` must be an existing namespace; it is used as-is and not deleted */
  create?: boolean | undefined;
  labels?: Record<string, string> | undefined;
}

export interface ManifestSource extends Omit<LoadDirectoryOptions, 'context'> {
  /** File or directory */
  path: string;
}

export interface SessionOptions {
  namespace?: NamespaceOptions | undefined;
  /** Applied in order before the test body runs */
  manifests?: ReadonlyArray<string | ManifestSource> | undefined;
  roleBindings?: readonly RoleBindingOptions[] | undefined;
  clusterRoleBindings?: readonly ClusterRoleBindingOptions[] | undefined;
  /** Wait for every manifest object to be ready before the test body runs */
  waitForManifests?: boolean | undefined;
}

export interface KubeTestManagerOptions {
  config?: LoadHarnessConfigOptions | undefined;
  /** Use this client instead of connecting with the configured kubeconfig */
  client?: ClusterClient | undefined;
}

export class TestSession {
  private namespaceState: TestNamespace | undefined;
  private registryState: ResourceRegistry | undefined;
  private kubeClient: KubeClient | undefined;
  private teardownResult: Promise<TeardownReport | undefined> | undefined;
  /** Aborted at teardown so no wait of this session outlives it */
  private readonly lifetime = new AbortController();

  constructor(
    readonly id: string,
    readonly testName: string,
    private readonly options: SessionOptions,
    private readonly manager: KubeTestManager,
    private logger: KubetestLogger
  ) {}

  get namespace(): TestNamespace | undefined {
    return this.namespaceState;
  }

  get registry(): ResourceRegistry | undefined {
    return this.registryState;
  }

  get kube(): KubeClient | undefined {
    return this.kubeClient;
  }

  /**
   * Acquire the namespace, apply RBAC bindings and manifests and build the `kube` client.
   * A failure after the namespace exists tears the session down before rethrowing.
   */
  async setup(signal?: AbortSignal): Promise<KubeClient> {
    if (this.kubeClient) {
      return this.kubeClient;
    }

    const { client, config, namespaceManager } = this.manager;
    const sessionSignal = anySignal(signal, this.lifetime.signal);
    const namespace = await namespaceManager.acquire({
      testName: this.testName,
      name: this.options.namespace?.name,
      create: this.options.namespace?.create,
      labels: this.options.namespace?.labels,
      signal: sessionSignal,
    });
    this.namespaceState = namespace;
    this.logger = this.logger.child({ namespace: namespace.name });

    const registry = new ResourceRegistry({ client, namespace, namespaceManager, logger: this.logger });
    this.registryState = registry;

    const renderContext: RenderContext = { namespace: namespace.name, testName: this.testName, testNodeId: this.id };
    const kube = new KubeClient({
      client,
      registry,
      waiter: this.manager.waiter,
      renderContext,
      signal: sessionSignal,
      logger: this.logger,
    });

    try {
      for (const binding of this.options.roleBindings ?? []) {
        await registry.createResource('RoleBinding', roleBinding(this.testName, namespace.name, binding));
      }
      for (const binding of this.options.clusterRoleBindings ?? []) {
        await registry.createResource('ClusterRoleBinding', clusterRoleBinding(this.testName, namespace.name, binding));
      }

      const manifests: KubernetesObject[] = [];
      for (const entry of this.options.manifests ?? []) {
        const source: ManifestSource = typeof entry === 'string' ? { path: entry } : entry;
        const { path, ...loadOptions } = source;
        manifests.push(...(await loadManifests(path, { ...loadOptions, context: renderContext })));
      }
      const handles = await registry.createResources(manifests);

      if (this.options.waitForManifests && handles.length > 0) {
        await Promise.all(
          handles.map((handle) =>
            this.manager.waiter.waitUntilReady(handle, { timeout: config.waitTimeout, signal: sessionSignal })
          )
        );
      }
    } catch (error) {
      this.logger.error('Session setup failed', error instanceof Error ? error : undefined);
      await this.teardown();
      throw error;
    }

    this.logger.debug('Session ready', { namespace: namespace.name });
    this.kubeClient = kube;
    return kube;
  }

  /**
   * Delete everything the test created and release its namespace; idempotent
   */
  teardown(): Promise<TeardownReport | undefined> {
    this.teardownResult ??= this.runTeardown();
    return this.teardownResult;
  }

  private async runTeardown(): Promise<TeardownReport | undefined> {
    this.lifetime.abort(new KubetestError(`Session for test "${this.id}" was torn down`, 'SESSION_CLOSED', { id: this.id }));
    try {
      if (this.registryState) {
        const report = await this.registryState.teardown();
        if (report.failures.length > 0) {
          this.logger.warn('Teardown left resources behind', {
            failures: report.failures.map((failure) => `${failure.identity}: ${failure.error.message}`),
          });
        }
        return report;
      }
      if (this.namespaceState) {
        await this.manager.namespaceManager.release(this.namespaceState);
      }
      return undefined;
    } finally {
      this.manager.forget(this);
    }
  }
}

export class KubeTestManager {
  readonly config: HarnessConfig;
  readonly client: ClusterClient;
  readonly namespaceManager: NamespaceManager;
  readonly waiter: ConditionWaiter;

  private readonly sessions = new Map<string, TestSession>();

  constructor(options: KubeTestManagerOptions = {}) {
    this.config = loadHarnessConfig(options.config);
    if (this.config.logLevel) {
      setLogLevel(this.config.logLevel);
    }

    this.client =
      options.client ??
      createClusterClient(
        createKubernetesClientProvider({
          kubeconfigPath: this.config.kubeConfigPath,
          context: this.config.context,
          inCluster: this.config.inCluster,
        }),
        { requestTimeout: this.config.requestTimeout }
      );

    this.namespaceManager = new NamespaceManager(this.client, {
      prefix: this.config.namespacePrefix,
      readyTimeout: this.config.namespaceReadyTimeout,
      pollInterval: this.config.pollInterval,
      deletionGracePeriod: this.config.namespaceDeletionGracePeriod,
      awaitDeletion: this.config.awaitNamespaceDeletion,
    });

    this.waiter = new ConditionWaiter(this.client, {
      interval: this.config.pollInterval,
      timeout: this.config.waitTimeout,
    });
  }

  /**
   * Register a session for a test
   *
   * @throws KubetestError if a session with the same id is still active
   */
  newTest(id: string, testName: string, options: SessionOptions = {}): TestSession {
    if (this.sessions.has(id)) {
      throw new KubetestError(`A session for test "${id}" is already active`, 'DUPLICATE_SESSION', { id });
    }
    const session = new TestSession(id, testName, options, this, getTestLogger(testName, undefined, { testId: id }));
    this.sessions.set(id, session);
    return session;
  }

  getTest(id: string): TestSession | undefined {
    return this.sessions.get(id);
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  /** @internal */
  forget(session: TestSession): void {
    if (this.sessions.get(session.id) === session) {
      this.sessions.delete(session.id);
    }
  }

  /**
   * Tear down remaining sessions and stop namespace monitors
   */
  async shutdown(): Promise<void> {
    await Promise.allSettled([...this.sessions.values()].map((session) => session.teardown()));
    await this.namespaceManager.shutdown();
  }
}
