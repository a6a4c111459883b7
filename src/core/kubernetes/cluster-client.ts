/**
 * Cluster Client Adapter
 *
 * Thin authenticated transport to the cluster API. Issues create/get/list/
 * delete/watch calls for arbitrary kinds, retries transient failures with
 * exponential backoff and translates client errors into the harness taxonomy.
 * It keeps no per-resource state: handles are owned by the registry.
 */

import * as k8s from '@kubernetes/client-node';
import type { KubernetesObject } from '@kubernetes/client-node';
import { ApiError, RequestTimeoutError, WatchExpiredError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { abortable, anySignal, deadline } from '../utils/index.js';
import { type KubernetesClientProvider, type RetryOptions, withRetry } from './client-provider.js';
import { isConflictError, isGoneError, isNotFoundError, toApiError } from './errors.js';
import { collectionPath, type ResourceKind, type ResourceType, resolveResourceType } from './resource-types.js';
import { EventQueue } from './watch-stream.js';

export type WatchEventType = 'ADDED' | 'MODIFIED' | 'DELETED' | 'BOOKMARK';

export interface WatchEvent<T extends KubernetesObject = KubernetesObject> {
  type: WatchEventType;
  object: T;
}

export interface ListOptions {
  labelSelector?: string | undefined;
  fieldSelector?: string | undefined;
}

export interface WatchOptions extends ListOptions {
  /** Resume point; events after this version are delivered */
  resourceVersion?: string | undefined;
  /** Ends the stream and closes the underlying connection */
  signal?: AbortSignal | undefined;
  /** Server-side timeout of each underlying watch request */
  timeoutSeconds?: number | undefined;
}

export interface DeleteOptions {
  gracePeriodSeconds?: number | undefined;
  propagationPolicy?: 'Foreground' | 'Background' | 'Orphan' | undefined;
}

/**
 * Reference to the object events are filtered on
 */
export interface InvolvedObject {
  kind?: string | undefined;
  name?: string | undefined;
  uid?: string | undefined;
}

/**
 * Transport contract the rest of the harness is written against
 */
export interface ClusterClient {
  /**
   * Create an object; a namespaced kind is created in `namespace`
   */
  create(kind: ResourceKind, namespace: string | undefined, spec: KubernetesObject): Promise<KubernetesObject>;

  /**
   * @throws NotFoundError when the object does not exist
   */
  get(kind: ResourceKind, namespace: string | undefined, name: string): Promise<KubernetesObject>;

  /**
   * Idempotent: deleting an absent object succeeds
   */
  delete(kind: ResourceKind, namespace: string | undefined, name: string, options?: DeleteOptions): Promise<void>;

  list(kind: ResourceKind, namespace: string | undefined, options?: ListOptions): Promise<KubernetesObject[]>;

  /**
   * Lazy stream of change events. It restarts itself from the last delivered
   * resourceVersion when the server closes the connection, ends when the signal
   * aborts and throws `WatchExpiredError` when the resume point is too old.
   */
  watch(kind: ResourceKind, namespace: string | undefined, options?: WatchOptions): AsyncIterable<WatchEvent>;

  listEvents(namespace: string, involvedObject?: InvolvedObject): Promise<k8s.CoreV1Event[]>;

  getServerVersion(): Promise<k8s.VersionInfo>;
}

/**
 * The part of `k8s.Watch` the adapter depends on
 */
export type Watcher = Pick<k8s.Watch, 'watch'>;

export interface KubernetesClusterClientDeps {
  objectApi: k8s.KubernetesObjectApi;
  coreApi?: k8s.CoreV1Api | undefined;
  versionApi?: k8s.VersionApi | undefined;
  watchFactory?: (() => Watcher) | undefined;
}

export interface KubernetesClusterClientOptions {
  retry?: RetryOptions | undefined;
  /**
   * Milliseconds one request may take, per attempt; also bounds opening a watch
   * @default 30000
   */
  requestTimeout?: number | undefined;
}

export const DEFAULT_REQUEST_TIMEOUT = 30000;

function objectHeader(type: ResourceType, name: string, namespace: string | undefined): KubernetesObject & { metadata: { name: string; namespace?: string } } {
  return {
    apiVersion: type.apiVersion,
    kind: type.kind,
    metadata: {
      name,
      ...(type.namespaced && namespace ? { namespace } : {}),
    },
  };
}

function isWatchEventType(phase: string): phase is WatchEventType {
  return phase === 'ADDED' || phase === 'MODIFIED' || phase === 'DELETED' || phase === 'BOOKMARK';
}

/**
 * `ClusterClient` backed by @kubernetes/client-node
 */
export class KubernetesClusterClient implements ClusterClient {
  private readonly logger = getComponentLogger('cluster-client');
  private readonly objectApi: k8s.KubernetesObjectApi;
  private readonly coreApi: k8s.CoreV1Api | undefined;
  private readonly versionApi: k8s.VersionApi | undefined;
  private readonly watchFactory: (() => Watcher) | undefined;
  private readonly retry: RetryOptions;
  private readonly requestTimeout: number;

  constructor(deps: KubernetesClusterClientDeps, options: KubernetesClusterClientOptions = {}) {
    this.objectApi = deps.objectApi;
    this.coreApi = deps.coreApi;
    this.versionApi = deps.versionApi;
    this.watchFactory = deps.watchFactory;
    this.requestTimeout = options.requestTimeout ?? options.retry?.timeout ?? DEFAULT_REQUEST_TIMEOUT;
    this.retry = { ...options.retry, timeout: this.requestTimeout };
  }

  async create(kind: ResourceKind, namespace: string | undefined, spec: KubernetesObject): Promise<KubernetesObject> {
    const type = resolveResourceType(kind, spec.apiVersion);
    const body: KubernetesObject = {
      ...spec,
      apiVersion: type.apiVersion,
      kind: type.kind,
      metadata: {
        ...spec.metadata,
        ...(type.namespaced && namespace ? { namespace } : {}),
      },
    };
    const name = body.metadata?.name;

    this.logger.debug('Creating resource', { kind: type.kind, namespace, name });

    let attempt = 0;
    try {
      return await withRetry(async () => {
        attempt++;
        try {
          return await this.objectApi.create(body);
        } catch (error) {
          // an earlier attempt may have reached the server before the connection failed
          if (attempt > 1 && name && isConflictError(error)) {
            return await this.objectApi.read(objectHeader(type, name, namespace));
          }
          throw error;
        }
      }, this.retry);
    } catch (error) {
      throw toApiError(error, { kind: type.kind, name, namespace });
    }
  }

  async get(kind: ResourceKind, namespace: string | undefined, name: string): Promise<KubernetesObject> {
    const type = resolveResourceType(kind);
    try {
      return await withRetry(() => this.objectApi.read(objectHeader(type, name, namespace)), this.retry);
    } catch (error) {
      throw toApiError(error, { kind: type.kind, name, namespace });
    }
  }

  async delete(
    kind: ResourceKind,
    namespace: string | undefined,
    name: string,
    options: DeleteOptions = {}
  ): Promise<void> {
    const type = resolveResourceType(kind);

    this.logger.debug('Deleting resource', { kind: type.kind, namespace, name });

    try {
      await withRetry(
        () =>
          this.objectApi.delete(
            objectHeader(type, name, namespace),
            undefined,
            undefined,
            options.gracePeriodSeconds,
            undefined,
            options.propagationPolicy ?? 'Background'
          ),
        this.retry
      );
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.debug('Resource already gone', { kind: type.kind, namespace, name });
        return;
      }
      throw toApiError(error, { kind: type.kind, name, namespace });
    }
  }

  async list(kind: ResourceKind, namespace: string | undefined, options: ListOptions = {}): Promise<KubernetesObject[]> {
    const type = resolveResourceType(kind);
    try {
      const result = await withRetry(
        () =>
          this.objectApi.list(
            type.apiVersion,
            type.kind,
            type.namespaced ? namespace : undefined,
            undefined,
            undefined,
            undefined,
            options.fieldSelector,
            options.labelSelector
          ),
        this.retry
      );
      return result.items;
    } catch (error) {
      throw toApiError(error, { kind: type.kind, namespace });
    }
  }

  watch(kind: ResourceKind, namespace: string | undefined, options: WatchOptions = {}): AsyncIterable<WatchEvent> {
    const type = resolveResourceType(kind);
    return {
      [Symbol.asyncIterator]: () => this.streamEvents(type, namespace, options),
    };
  }

  private async *streamEvents(
    type: ResourceType,
    namespace: string | undefined,
    options: WatchOptions
  ): AsyncGenerator<WatchEvent, void, undefined> {
    const { signal } = options;
    const watcher = this.requireWatcher();
    const path = collectionPath(type, namespace);
    let resourceVersion = options.resourceVersion;

    while (!signal?.aborted) {
      const queue = new EventQueue<WatchEvent>();
      const params: Record<string, string | number | boolean | undefined> = {
        allowWatchBookmarks: true,
        resourceVersion,
        labelSelector: options.labelSelector,
        fieldSelector: options.fieldSelector,
        timeoutSeconds: options.timeoutSeconds,
      };

      this.logger.trace('Opening watch', { path, resourceVersion });

      const connecting = watcher.watch(
        path,
        params,
        (phase: string, apiObj: KubernetesObject) => {
          if (phase === 'ERROR') {
            queue.fail(isGoneError(apiObj) ? new WatchExpiredError(resourceVersion, { cause: apiObj }) : toApiError(apiObj));
          } else if (isWatchEventType(phase)) {
            queue.push({ type: phase, object: apiObj });
          }
        },
        (error: unknown) => {
          if (error && !signal?.aborted) {
            queue.fail(error);
          } else {
            queue.end();
          }
        }
      );

      const bound = deadline(this.requestTimeout, () => new RequestTimeoutError(this.requestTimeout));
      let controller: AbortController;
      try {
        controller = await abortable(connecting, anySignal(signal, bound.signal));
      } catch (error) {
        if (bound.signal.aborted || signal?.aborted) {
          // a connection that completes after we gave up is closed straight away
          void connecting.then(
            (late) => late.abort(),
            (lateError: unknown) => this.logger.debug('Abandoned watch failed to connect', { path, error: String(lateError) })
          );
        }
        if (signal?.aborted) {
          return;
        }
        throw isGoneError(error) ? new WatchExpiredError(resourceVersion, { cause: error }) : toApiError(error);
      } finally {
        bound.clear();
      }

      const onAbort = (): void => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        for (;;) {
          const next = await queue.next(signal);
          if (next.done) {
            break;
          }
          const version = next.value.object.metadata?.resourceVersion;
          if (version) {
            resourceVersion = version;
          }
          if (next.value.type !== 'BOOKMARK') {
            yield next.value;
          }
        }
      } catch (error) {
        if (error instanceof ApiError) {
          throw error;
        }
        throw isGoneError(error) ? new WatchExpiredError(resourceVersion, { cause: error }) : toApiError(error);
      } finally {
        signal?.removeEventListener('abort', onAbort);
        controller.abort();
      }

      this.logger.trace('Watch closed by server, resuming', { path, resourceVersion });
    }
  }

  async listEvents(namespace: string, involvedObject?: InvolvedObject): Promise<k8s.CoreV1Event[]> {
    const coreApi = this.requireCoreApi();
    const fieldSelector = involvedObjectSelector(involvedObject);
    try {
      const result = await withRetry(
        () => coreApi.listNamespacedEvent({ namespace, ...(fieldSelector ? { fieldSelector } : {}) }),
        this.retry
      );
      return result.items;
    } catch (error) {
      throw toApiError(error, { kind: 'Event', namespace });
    }
  }

  async getServerVersion(): Promise<k8s.VersionInfo> {
    const versionApi = this.versionApi;
    if (!versionApi) {
      throw new ApiError('Version API is not configured for this client', undefined);
    }
    try {
      return await withRetry(() => versionApi.getCode(), this.retry);
    } catch (error) {
      throw toApiError(error);
    }
  }

  private requireWatcher(): Watcher {
    if (!this.watchFactory) {
      throw new ApiError('Watch is not configured for this client', undefined);
    }
    return this.watchFactory();
  }

  private requireCoreApi(): k8s.CoreV1Api {
    if (!this.coreApi) {
      throw new ApiError('Core API is not configured for this client', undefined);
    }
    return this.coreApi;
  }
}

/**
 * Field selector matching events about one object
 */
export function involvedObjectSelector(involvedObject?: InvolvedObject): string | undefined {
  if (!involvedObject) {
    return undefined;
  }
  const parts: string[] = [];
  if (involvedObject.kind) {
    parts.push(`involvedObject.kind=${involvedObject.kind}`);
  }
  if (involvedObject.name) {
    parts.push(`involvedObject.name=${involvedObject.name}`);
  }
  if (involvedObject.uid) {
    parts.push(`involvedObject.uid=${involvedObject.uid}`);
  }
  return parts.length > 0 ? parts.join(',') : undefined;
}

/**
 * Build a cluster client from a provider; the provider's connection is shared
 */
export function createClusterClient(
  provider: KubernetesClientProvider,
  options?: KubernetesClusterClientOptions
): KubernetesClusterClient {
  return new KubernetesClusterClient(
    {
      objectApi: provider.getKubernetesObjectApi(),
      coreApi: provider.getCoreV1Api(),
      versionApi: provider.getVersionApi(),
      watchFactory: () => provider.createWatch(),
    },
    options
  );
}
