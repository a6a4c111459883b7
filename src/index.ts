/**
 * kubetest-harness: run tests against a live Kubernetes cluster, each in its
 * own namespace, with everything they create deleted afterwards.
 */

// =============================================================================
// ERRORS
// =============================================================================
export {
  ApiError,
  ConditionTimeoutError,
  ConfigurationError,
  KubetestError,
  ManifestError,
  NamespaceCreationError,
  NotFoundError,
  RegistryClosedError,
  RequestTimeoutError,
  ResourceIdentityError,
  WaitCancelledError,
  WatchExpiredError,
} from './core/errors.js';

// =============================================================================
// LOGGING
// =============================================================================
export {
  configureLogging,
  getComponentLogger,
  getTestLogger,
  type KubetestLogger,
  type LoggerConfig,
  type LogLevel,
  logger,
  setLogLevel,
} from './core/logging/index.js';

// =============================================================================
// CLUSTER ACCESS
// =============================================================================
export * from './core/kubernetes/index.js';

// =============================================================================
// RESOURCES AND WAITING
// =============================================================================
export { ResourceHandle, type ResourceHandleOptions, resourceIdentity } from './core/resources/handle.js';
export {
  daemonSetReadiness,
  deploymentReadiness,
  existenceReadiness,
  type GenericResource,
  genericReadiness,
  getReadinessEvaluator,
  ingressReadiness,
  jobReadiness,
  namespaceReadiness,
  persistentVolumeClaimReadiness,
  podReadiness,
  predicateFromEvaluator,
  type ReadinessEvaluator,
  type ReadinessPredicate,
  type ReadinessStatus,
  replicaSetReadiness,
  serviceReadiness,
  statefulSetReadiness,
} from './core/resources/readiness.js';
export {
  isOwnedBy,
  labelSelectorString,
  matchesLabelSelector,
  selectorString,
  workloadSelector,
} from './core/resources/selectors.js';
export * from './core/waiting/index.js';

// =============================================================================
// TEST ISOLATION
// =============================================================================
export * from './core/namespace/index.js';
export * from './core/registry/index.js';
export * from './core/manifests/index.js';
export * from './core/rbac/bindings.js';

// =============================================================================
// HARNESS
// =============================================================================
export {
  DEFAULT_HARNESS_CONFIG,
  type HarnessConfig,
  HarnessConfigSchema,
  type LoadHarnessConfigOptions,
  loadHarnessConfig,
  parseHarnessArgs,
  readHarnessEnv,
} from './harness/config.js';
export { KubeClient, type KubeClientOptions, type PodQuery } from './harness/kube-client.js';
export {
  KubeTestManager,
  type KubeTestManagerOptions,
  type ManifestSource,
  type NamespaceOptions,
  type SessionOptions,
  TestSession,
} from './harness/manager.js';
