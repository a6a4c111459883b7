/**
 * Resource Handle
 *
 * Client-side record of one cluster object created by a test. The observed
 * state is a cache: it changes only on an explicit `refresh()` or when the
 * watch-based waiter applies a delivered event.
 */

import type { KubernetesObject } from '@kubernetes/client-node';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import type { ResourceType } from '../kubernetes/resource-types.js';
import {
  getReadinessEvaluator,
  type ReadinessEvaluator,
  type ReadinessPredicate,
  type ReadinessStatus,
  safeEvaluate,
} from './readiness.js';

/**
 * `Kind/namespace/name`, or `Kind/name` for cluster-scoped objects
 */
export function resourceIdentity(kind: string, namespace: string | undefined, name: string): string {
  return namespace ? `${kind}/${namespace}/${name}` : `${kind}/${name}`;
}

export interface ResourceHandleOptions<T extends KubernetesObject> {
  type: ResourceType;
  namespace: string | undefined;
  name: string;
  desired: T;
  observed?: KubernetesObject | undefined;
  client: ClusterClient;
  createdAt?: Date | undefined;
}

export class ResourceHandle<T extends KubernetesObject = KubernetesObject> {
  readonly type: ResourceType;
  readonly namespace: string | undefined;
  readonly name: string;
  readonly desired: T;
  readonly createdAt: Date;

  private readonly client: ClusterClient;
  private observedState: T | undefined;
  private deletionRequestedAt: Date | undefined;

  constructor(options: ResourceHandleOptions<T>) {
    this.type = options.type;
    this.namespace = options.type.namespaced ? options.namespace : undefined;
    this.name = options.name;
    this.desired = options.desired;
    this.client = options.client;
    this.createdAt = options.createdAt ?? new Date();
    if (options.observed) {
      this.observe(options.observed);
    }
  }

  get kind(): string {
    return this.type.kind;
  }

  get apiVersion(): string {
    return this.type.apiVersion;
  }

  get identity(): string {
    return resourceIdentity(this.kind, this.namespace, this.name);
  }

  /**
   * Last fetched document, undefined until the first observation
   */
  get observed(): T | undefined {
    return this.observedState;
  }

  get deletionRequested(): boolean {
    return this.deletionRequestedAt !== undefined;
  }

  /**
   * Fetch the live object and cache it
   *
   * @throws NotFoundError if the object no longer exists
   */
  async refresh(): Promise<T> {
    const document = await this.client.get(this.type, this.namespace, this.name);
    return this.observe(document);
  }

  /**
   * Replace the cached state with a document delivered by the cluster
   */
  observe(document: KubernetesObject): T {
    if (!this.isOwnDocument(document)) {
      throw new Error(
        `Document ${document.kind ?? '<no kind>'}/${document.metadata?.name ?? '<no name>'} does not belong to ${this.identity}`
      );
    }
    this.observedState = document;
    return document;
  }

  /**
   * Evaluate a predicate against the cached state; false when nothing has been observed.
   * Never calls the cluster.
   */
  isReady(predicate: ReadinessPredicate<T>): boolean {
    return this.observedState !== undefined && predicate(this.observedState);
  }

  /**
   * Evaluate readiness with diagnostics, using the built-in evaluator for the kind by default
   */
  evaluate(evaluator: ReadinessEvaluator<T> = getReadinessEvaluator(this.kind)): ReadinessStatus {
    if (!this.observedState) {
      return { ready: false, reason: 'NotObserved', message: `${this.identity} has not been observed yet` };
    }
    return safeEvaluate(evaluator, this.observedState);
  }

  markDeletionRequested(): void {
    this.deletionRequestedAt ??= new Date();
  }

  toString(): string {
    return this.identity;
  }

  private isOwnDocument(document: KubernetesObject): document is T {
    return (
      (document.kind === undefined || document.kind === this.kind) &&
      document.metadata?.name === this.name &&
      (!this.namespace || document.metadata?.namespace === undefined || document.metadata?.namespace === this.namespace)
    );
  }
}
