export {
  type RegistryState,
  ResourceRegistry,
  type ResourceRegistryOptions,
  type TeardownFailure,
  type TeardownReport,
} from './resource-registry.js';
