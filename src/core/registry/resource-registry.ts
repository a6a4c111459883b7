/**
 * Test Context / Registry
 *
 * Tracks every object a test creates, in creation order, and deletes them in
 * reverse order when the test ends. Teardown is best effort: a failed delete
 * is recorded and the remaining objects are still deleted.
 */

import type { KubernetesObject } from '@kubernetes/client-node';
import { RegistryClosedError, ResourceIdentityError, toError } from '../errors.js';
import type { ClusterClient, DeleteOptions } from '../kubernetes/cluster-client.js';
import { type ResourceKind, resolveResourceType } from '../kubernetes/resource-types.js';
import { getComponentLogger, type KubetestLogger } from '../logging/index.js';
import type { NamespaceManager, NamespaceReleaseOutcome, TestNamespace } from '../namespace/index.js';
import { ResourceHandle, resourceIdentity } from '../resources/handle.js';

export type RegistryState = 'open' | 'closing' | 'closed';

export interface TeardownFailure {
  identity: string;
  error: Error;
  timestamp: Date;
}

export interface TeardownReport {
  namespace: string;
  /** Identities in the order they were deleted */
  deleted: string[];
  failures: TeardownFailure[];
  /** Undefined when no namespace manager owns the namespace */
  namespaceRelease?: NamespaceReleaseOutcome | undefined;
  namespaceError?: Error | undefined;
  /** Milliseconds */
  duration: number;
}

export interface ResourceRegistryOptions {
  client: ClusterClient;
  namespace: TestNamespace;
  /** Releases the namespace after the resources are deleted */
  namespaceManager?: NamespaceManager | undefined;
  deleteOptions?: DeleteOptions | undefined;
  logger?: KubetestLogger | undefined;
}

export class ResourceRegistry {
  readonly namespace: TestNamespace;

  private readonly client: ClusterClient;
  private readonly namespaceManager: NamespaceManager | undefined;
  private readonly deleteOptions: DeleteOptions | undefined;
  private readonly logger: KubetestLogger;
  private readonly tracked: ResourceHandle[] = [];
  private readonly deletedHandles = new Set<ResourceHandle>();
  private readonly retiredIdentities = new Set<string>();
  private readonly inFlight = new Set<Promise<unknown>>();
  private currentState: RegistryState = 'open';
  private teardownResult: Promise<TeardownReport> | undefined;

  constructor(options: ResourceRegistryOptions) {
    this.client = options.client;
    this.namespace = options.namespace;
    this.namespaceManager = options.namespaceManager;
    this.deleteOptions = options.deleteOptions;
    this.logger = (options.logger ?? getComponentLogger('resource-registry')).child({
      namespace: options.namespace.name,
    });
  }

  get state(): RegistryState {
    return this.currentState;
  }

  /**
   * Tracked handles in creation order
   */
  get handles(): readonly ResourceHandle[] {
    return this.tracked;
  }

  /**
   * Create an object in the test's namespace and start tracking it.
   * Returns as soon as the API server accepts it; readiness is not awaited.
   *
   * @throws RegistryClosedError once teardown has begun
   * @throws ResourceIdentityError if the identity was deleted earlier in this test
   */
  async createResource<T extends KubernetesObject>(kind: ResourceKind, spec: T): Promise<ResourceHandle<T>> {
    this.assertOpen();

    const type = resolveResourceType(kind, spec.apiVersion);
    const namespace = type.namespaced ? this.namespace.name : undefined;
    const requestedName = spec.metadata?.name;

    if (!requestedName && !spec.metadata?.generateName) {
      throw new ResourceIdentityError(type.kind, 'metadata.name or metadata.generateName is required');
    }
    if (requestedName) {
      this.assertNotRetired(resourceIdentity(type.kind, namespace, requestedName));
    }

    const desired: T = {
      ...spec,
      apiVersion: type.apiVersion,
      kind: type.kind,
      metadata: { ...spec.metadata, ...(namespace ? { namespace } : {}) },
    };

    const creation = this.client.create(type, namespace, desired);
    this.inFlight.add(creation);
    let created: KubernetesObject;
    try {
      created = await creation;
    } finally {
      this.inFlight.delete(creation);
    }

    const handle = new ResourceHandle<T>({
      type,
      namespace,
      name: created.metadata?.name ?? requestedName ?? '',
      desired,
      observed: created,
      client: this.client,
    });
    this.tracked.push(handle);

    this.logger.debug('Created resource', { identity: handle.identity });
    return handle;
  }

  /**
   * Create several objects in order; stops at the first failure
   */
  async createResources(specs: readonly KubernetesObject[]): Promise<ResourceHandle[]> {
    const handles: ResourceHandle[] = [];
    for (const spec of specs) {
      if (!spec.kind) {
        throw new ResourceIdentityError(spec.metadata?.name ?? '<unnamed>', 'kind is required');
      }
      handles.push(await this.createResource(spec.kind, spec));
    }
    return handles;
  }

  /**
   * Delete one tracked object during the test. Its identity cannot be re-created afterwards.
   */
  async deleteResource(handle: ResourceHandle): Promise<void> {
    if (!this.tracked.includes(handle)) {
      throw new ResourceIdentityError(handle.identity, 'is not tracked by this registry');
    }
    if (this.deletedHandles.has(handle)) {
      return;
    }

    handle.markDeletionRequested();
    this.retiredIdentities.add(handle.identity);
    await this.client.delete(handle.type, handle.namespace, handle.name, this.deleteOptions);
    this.deletedHandles.add(handle);
    this.logger.debug('Deleted resource', { identity: handle.identity });
  }

  /**
   * Delete every tracked object in reverse creation order, then release the namespace.
   * Never throws for an individual failure; calling it again returns the first report.
   */
  teardown(): Promise<TeardownReport> {
    this.teardownResult ??= this.runTeardown();
    return this.teardownResult;
  }

  private async runTeardown(): Promise<TeardownReport> {
    this.currentState = 'closing';
    const startTime = Date.now();
    const deleted: string[] = [];
    const failures: TeardownFailure[] = [];

    // creations started before teardown still land in `tracked`
    await Promise.allSettled([...this.inFlight]);

    const reversed = [...this.tracked].reverse();
    this.logger.debug('Tearing down resources', { count: reversed.length });

    for (const handle of reversed) {
      if (this.deletedHandles.has(handle)) {
        continue;
      }
      try {
        handle.markDeletionRequested();
        this.retiredIdentities.add(handle.identity);
        await this.client.delete(handle.type, handle.namespace, handle.name, this.deleteOptions);
        this.deletedHandles.add(handle);
        deleted.push(handle.identity);
      } catch (error) {
        const failure = { identity: handle.identity, error: toError(error), timestamp: new Date() };
        failures.push(failure);
        this.logger.warn('Failed to delete resource during teardown', {
          identity: failure.identity,
          error: failure.error.message,
        });
      }
    }

    let namespaceRelease: NamespaceReleaseOutcome | undefined;
    let namespaceError: Error | undefined;
    if (this.namespaceManager) {
      try {
        namespaceRelease = await this.namespaceManager.release(this.namespace);
      } catch (error) {
        namespaceError = toError(error);
        this.logger.warn('Failed to release namespace', { error: namespaceError.message });
      }
    }

    this.currentState = 'closed';
    const duration = Date.now() - startTime;

    if (failures.length > 0 || namespaceError) {
      this.logger.warn('Teardown completed with failures', {
        deleted: deleted.length,
        failed: failures.length,
        duration,
      });
    } else {
      this.logger.debug('Teardown completed', { deleted: deleted.length, duration });
    }

    return {
      namespace: this.namespace.name,
      deleted,
      failures,
      namespaceRelease,
      namespaceError,
      duration,
    };
  }

  private assertOpen(): void {
    if (this.currentState !== 'open') {
      throw new RegistryClosedError(this.namespace.name, this.currentState);
    }
  }

  private assertNotRetired(identity: string): void {
    if (this.retiredIdentities.has(identity)) {
      throw new ResourceIdentityError(identity, 'was deleted earlier in this test and cannot be re-created');
    }
  }
}
