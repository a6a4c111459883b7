/**
 * Resource type resolution
 *
 * Maps a kind to the coordinates the API server needs (group/version, plural, scope)
 * so that any kind can be handled generically without per-kind wrappers.
 */

/**
 * API coordinates of one resource kind
 */
export interface ResourceType {
  apiVersion: string;
  kind: string;
  /** Lower-case plural used in REST paths, e.g. `deployments` */
  plural: string;
  namespaced: boolean;
}

/**
 * Either a kind name known to the harness ("Deployment") or full coordinates
 */
export type ResourceKind = string | ResourceType;

function builtin(apiVersion: string, kind: string, plural: string, namespaced = true): ResourceType {
  return { apiVersion, kind, plural, namespaced };
}

const BUILTIN_RESOURCE_TYPES: readonly ResourceType[] = [
  builtin('v1', 'ConfigMap', 'configmaps'),
  builtin('v1', 'Endpoints', 'endpoints'),
  builtin('v1', 'Event', 'events'),
  builtin('v1', 'Namespace', 'namespaces', false),
  builtin('v1', 'Node', 'nodes', false),
  builtin('v1', 'PersistentVolume', 'persistentvolumes', false),
  builtin('v1', 'PersistentVolumeClaim', 'persistentvolumeclaims'),
  builtin('v1', 'Pod', 'pods'),
  builtin('v1', 'Secret', 'secrets'),
  builtin('v1', 'Service', 'services'),
  builtin('v1', 'ServiceAccount', 'serviceaccounts'),
  builtin('apps/v1', 'DaemonSet', 'daemonsets'),
  builtin('apps/v1', 'Deployment', 'deployments'),
  builtin('apps/v1', 'ReplicaSet', 'replicasets'),
  builtin('apps/v1', 'StatefulSet', 'statefulsets'),
  builtin('batch/v1', 'CronJob', 'cronjobs'),
  builtin('batch/v1', 'Job', 'jobs'),
  builtin('networking.k8s.io/v1', 'Ingress', 'ingresses'),
  builtin('networking.k8s.io/v1', 'NetworkPolicy', 'networkpolicies'),
  builtin('rbac.authorization.k8s.io/v1', 'ClusterRole', 'clusterroles', false),
  builtin('rbac.authorization.k8s.io/v1', 'ClusterRoleBinding', 'clusterrolebindings', false),
  builtin('rbac.authorization.k8s.io/v1', 'Role', 'roles'),
  builtin('rbac.authorization.k8s.io/v1', 'RoleBinding', 'rolebindings'),
  builtin('storage.k8s.io/v1', 'CSIDriver', 'csidrivers', false),
  builtin('storage.k8s.io/v1', 'StorageClass', 'storageclasses', false),
  builtin('apiextensions.k8s.io/v1', 'CustomResourceDefinition', 'customresourcedefinitions', false),
];

const byKind = new Map(BUILTIN_RESOURCE_TYPES.map((type) => [type.kind, type]));

/**
 * Derive the REST plural for a kind the harness has no entry for
 */
export function pluralize(kind: string): string {
  const lower = kind.toLowerCase();
  if (/(s|x|z|ch|sh)$/.test(lower)) {
    return `${lower}es`;
  }
  if (/[^aeiou]y$/.test(lower)) {
    return `${lower.slice(0, -1)}ies`;
  }
  return `${lower}s`;
}

/**
 * Resolve a kind to its API coordinates.
 *
 * @param apiVersion - Overrides the built-in group/version, required for kinds the harness does not know
 * @throws Error if the kind is unknown and no apiVersion is given
 */
export function resolveResourceType(kind: ResourceKind, apiVersion?: string): ResourceType {
  if (typeof kind !== 'string') {
    return kind;
  }

  const known = byKind.get(kind);
  if (known) {
    return apiVersion && apiVersion !== known.apiVersion ? { ...known, apiVersion } : known;
  }

  if (!apiVersion) {
    throw new Error(
      `Unknown resource kind "${kind}": pass an apiVersion (or a full ResourceType) for custom kinds`
    );
  }

  // Custom resources are overwhelmingly namespaced; cluster-scoped ones need a full ResourceType
  return { apiVersion, kind, plural: pluralize(kind), namespaced: true };
}

/**
 * REST collection path for a resource type, used for watches
 */
export function collectionPath(type: ResourceType, namespace?: string): string {
  const prefix = type.apiVersion.includes('/') ? `/apis/${type.apiVersion}` : `/api/${type.apiVersion}`;
  if (type.namespaced && namespace) {
    return `${prefix}/namespaces/${namespace}/${type.plural}`;
  }
  return `${prefix}/${type.plural}`;
}

export function listBuiltinResourceTypes(): readonly ResourceType[] {
  return BUILTIN_RESOURCE_TYPES;
}
