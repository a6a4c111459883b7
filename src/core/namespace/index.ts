export {
  type AcquireOptions,
  MANAGED_LABEL,
  NamespaceManager,
  type NamespaceManagerOptions,
  type NamespaceReleaseOutcome,
  type NamespaceReleaseStatus,
  type NamespaceWarning,
  TEST_NAME_ANNOTATION,
} from './namespace-manager.js';
export { generateNamespaceName, MAX_NAMESPACE_NAME_LENGTH, type NamespaceNameOptions, sanitizeName } from './naming.js';
export { type NamespacePhase, TestNamespace } from './test-namespace.js';
