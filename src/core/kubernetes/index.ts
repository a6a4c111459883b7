export {
  type ClusterClient,
  createClusterClient,
  DEFAULT_REQUEST_TIMEOUT,
  type DeleteOptions,
  type InvolvedObject,
  involvedObjectSelector,
  KubernetesClusterClient,
  type KubernetesClusterClientDeps,
  type KubernetesClusterClientOptions,
  type ListOptions,
  type Watcher,
  type WatchEvent,
  type WatchEventType,
  type WatchOptions,
} from './cluster-client.js';
export {
  createKubeConfig,
  createKubernetesClientProvider,
  createKubernetesClientProviderWithKubeConfig,
  DEFAULT_RETRY_OPTIONS,
  type KubernetesClientConfig,
  KubernetesClientProvider,
  type RetryOptions,
  withRetry,
} from './client-provider.js';
export {
  formatKubernetesError,
  getErrorDetails,
  getErrorReason,
  getErrorStatusCode,
  isConflictError,
  isGoneError,
  isNotFoundError,
  isRetryableError,
  type KubernetesApiError,
  toApiError,
} from './errors.js';
export {
  collectionPath,
  listBuiltinResourceTypes,
  pluralize,
  type ResourceKind,
  type ResourceType,
  resolveResourceType,
} from './resource-types.js';
