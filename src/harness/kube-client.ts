/**
 * The `kube` object a test receives: its namespace, resource creation and
 * waiting, all scoped to the test and cancelled by its timeout.
 */

import type { CoreV1Event, KubernetesObject, V1LabelSelector, V1Pod, VersionInfo } from '@kubernetes/client-node';
import { ResourceIdentityError } from '../core/errors.js';
import type { ClusterClient } from '../core/kubernetes/cluster-client.js';
import type { ResourceKind } from '../core/kubernetes/resource-types.js';
import type { KubetestLogger } from '../core/logging/index.js';
import { type LoadDirectoryOptions, loadManifests, type RenderContext } from '../core/manifests/index.js';
import type { ResourceRegistry } from '../core/registry/index.js';
import type { ResourceHandle } from '../core/resources/handle.js';
import type { ReadinessPredicate } from '../core/resources/readiness.js';
import {
  isOwnedBy,
  labelSelectorString,
  matchesLabelSelector,
  selectorString,
  workloadSelector,
} from '../core/resources/selectors.js';
import { anySignal } from '../core/utils/index.js';
import type {
  ConditionsWaitOptions,
  ConditionWaiter,
  NamedCondition,
  ReadyWaitOptions,
  WaitOptions,
  WaitResult,
} from '../core/waiting/index.js';

export interface KubeClientOptions {
  client: ClusterClient;
  registry: ResourceRegistry;
  waiter: ConditionWaiter;
  renderContext: RenderContext;
  /** Aborted when the test times out */
  signal?: AbortSignal | undefined;
  logger: KubetestLogger;
}

export interface PodQuery {
  /** Equality-based label filter */
  labels?: Record<string, string> | undefined;
  selector?: V1LabelSelector | undefined;
  /** Only pods owned by this workload, following Deployment → ReplicaSet → Pod */
  owner?: ResourceHandle | undefined;
}

export class KubeClient {
  private readonly client: ClusterClient;
  private readonly registry: ResourceRegistry;
  private readonly waiter: ConditionWaiter;
  private readonly renderContext: RenderContext;
  private readonly signal: AbortSignal | undefined;
  private readonly logger: KubetestLogger;

  constructor(options: KubeClientOptions) {
    this.client = options.client;
    this.registry = options.registry;
    this.waiter = options.waiter;
    this.renderContext = options.renderContext;
    this.signal = options.signal;
    this.logger = options.logger;
  }

  /**
   * Name of the test's namespace
   */
  get namespace(): string {
    return this.registry.namespace.name;
  }

  /**
   * Handles created so far, in creation order
   */
  get handles(): readonly ResourceHandle[] {
    return this.registry.handles;
  }

  createResource<T extends KubernetesObject>(kind: ResourceKind, spec: T): Promise<ResourceHandle<T>> {
    return this.registry.createResource(kind, spec);
  }

  /**
   * Create a resource whose kind is taken from the document
   */
  async apply<T extends KubernetesObject>(spec: T): Promise<ResourceHandle<T>> {
    if (!spec.kind) {
      throw new ResourceIdentityError(spec.metadata?.name ?? '<unnamed>', 'kind is required');
    }
    return this.registry.createResource(spec.kind, spec);
  }

  /**
   * Create every object in a manifest file; templates see the test's render context
   */
  async loadManifest(path: string, options: Omit<LoadDirectoryOptions, 'files' | 'context'> = {}): Promise<ResourceHandle[]> {
    const manifests = await loadManifests(path, { ...options, context: this.renderContext });
    return this.registry.createResources(manifests);
  }

  /**
   * Create every object in a directory of manifests, or only the listed files
   */
  async loadManifests(directory: string, options: Omit<LoadDirectoryOptions, 'context'> = {}): Promise<ResourceHandle[]> {
    const manifests = await loadManifests(directory, { ...options, context: this.renderContext });
    return this.registry.createResources(manifests);
  }

  waitUntil<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    predicate: ReadinessPredicate<T>,
    options: WaitOptions = {}
  ): Promise<WaitResult<T>> {
    return this.waiter.waitUntil(handle, predicate, this.scoped(options));
  }

  waitUntilReady<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    options: ReadyWaitOptions<T> = {}
  ): Promise<WaitResult<T>> {
    return this.waiter.waitUntilReady(handle, this.scoped(options));
  }

  /**
   * Wait until every tracked resource is ready
   */
  async waitForRegistered(options: WaitOptions = {}): Promise<WaitResult[]> {
    const handles = this.registry.handles.filter((handle) => !handle.deletionRequested);
    this.logger.debug('Waiting for registered resources', { count: handles.length });
    return Promise.all(handles.map((handle) => this.waiter.waitUntilReady(handle, this.scoped(options))));
  }

  waitForConditions<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    conditions: ReadonlyArray<NamedCondition<T>>,
    options: ConditionsWaitOptions = {}
  ): Promise<WaitResult<T>> {
    return this.waiter.waitForConditions(handle, conditions, this.scoped(options));
  }

  waitForDeletion<T extends KubernetesObject>(handle: ResourceHandle<T>, options: WaitOptions = {}): Promise<WaitResult<T>> {
    return this.waiter.waitForDeletion(handle, this.scoped(options));
  }

  deleteResource(handle: ResourceHandle): Promise<void> {
    return this.registry.deleteResource(handle);
  }

  /**
   * Pods in the test namespace, optionally filtered by labels, a selector or an owning workload
   */
  async getPods(query: PodQuery = {}): Promise<V1Pod[]> {
    const ownerSelector = query.owner?.observed ? workloadSelector(query.owner.observed) : undefined;
    const selector = query.selector ?? ownerSelector;
    const labelSelector = [query.labels && selectorString(query.labels), selector && labelSelectorString(selector)]
      .filter((part): part is string => Boolean(part))
      .join(',');

    const pods: V1Pod[] = await this.client.list('Pod', this.namespace, {
      ...(labelSelector ? { labelSelector } : {}),
    });

    const matching = selector ? pods.filter((pod) => matchesLabelSelector(pod.metadata?.labels, selector)) : pods;
    if (!query.owner) {
      return matching;
    }

    const ownerUids = await this.podOwnerUids(query.owner);
    return matching.filter((pod) => ownerUids.some((uid) => isOwnedBy(pod, uid)));
  }

  /**
   * Events in the test namespace, or only those about one resource
   */
  getEvents(handle?: ResourceHandle): Promise<CoreV1Event[]> {
    return this.client.listEvents(
      this.namespace,
      handle && { kind: handle.kind, name: handle.name, uid: handle.observed?.metadata?.uid }
    );
  }

  getServerVersion(): Promise<VersionInfo> {
    return this.client.getServerVersion();
  }

  /**
   * UIDs of the objects that directly own the workload's pods
   */
  private async podOwnerUids(owner: ResourceHandle): Promise<string[]> {
    const uid = owner.observed?.metadata?.uid;
    if (!uid) {
      return [];
    }
    if (owner.kind !== 'Deployment') {
      return [uid];
    }
    const replicaSets = await this.client.list('ReplicaSet', this.namespace);
    return replicaSets
      .filter((replicaSet) => isOwnedBy(replicaSet, uid))
      .map((replicaSet) => replicaSet.metadata?.uid)
      .filter((replicaSetUid): replicaSetUid is string => replicaSetUid !== undefined);
  }

  private scoped<O extends WaitOptions>(options: O): O {
    return { ...options, signal: anySignal(this.signal, options.signal) };
  }
}
