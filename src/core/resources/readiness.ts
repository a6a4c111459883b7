/**
 * Readiness evaluation for live cluster objects
 *
 * Evaluators are pure functions of an observed document. They never call the
 * cluster; the waiter refreshes the document and re-evaluates.
 */

import type {
  KubernetesObject,
  V1DaemonSet,
  V1Deployment,
  V1Ingress,
  V1Job,
  V1Namespace,
  V1PersistentVolumeClaim,
  V1Pod,
  V1ReplicaSet,
  V1Service,
  V1StatefulSet,
} from '@kubernetes/client-node';

/**
 * Result of evaluating an observed document
 */
export interface ReadinessStatus {
  ready: boolean;
  reason?: string | undefined;
  message?: string | undefined;
  details?: Record<string, unknown> | undefined;
}

export type ReadinessEvaluator<T extends KubernetesObject = KubernetesObject> = (liveResource: T) => ReadinessStatus;

export type ReadinessPredicate<T extends KubernetesObject = KubernetesObject> = (liveResource: T) => boolean;

interface StatusCondition {
  type?: string;
  status?: string;
  reason?: string;
  message?: string;
}

/**
 * Shape of a resource the harness has no dedicated evaluator for
 */
export interface GenericResource extends KubernetesObject {
  status?: {
    conditions?: StatusCondition[];
    [key: string]: unknown;
  };
}

function findCondition(conditions: readonly StatusCondition[] | undefined, type: string): StatusCondition | undefined {
  return Array.isArray(conditions) ? conditions.find((condition) => condition.type === type) : undefined;
}

function isTrue(condition: StatusCondition | undefined): boolean {
  return condition?.status === 'True';
}

export const podReadiness: ReadinessEvaluator<V1Pod> = (pod) => {
  const status = pod.status;
  if (!status) {
    return { ready: false, reason: 'StatusMissing', message: 'Pod status not available yet' };
  }

  const phase = status.phase ?? 'Unknown';
  if (phase === 'Succeeded') {
    return { ready: true, message: 'Pod completed successfully' };
  }
  if (phase !== 'Running') {
    return { ready: false, reason: 'PodNotRunning', message: `Pod is in phase ${phase}`, details: { phase } };
  }

  const containers = status.containerStatuses ?? [];
  const readyContainers = containers.filter((container) => container.ready).length;
  if (isTrue(findCondition(status.conditions, 'Ready')) || (containers.length > 0 && readyContainers === containers.length)) {
    return { ready: true, message: `Pod is running with ${readyContainers}/${containers.length} ready containers` };
  }

  return {
    ready: false,
    reason: 'ContainersNotReady',
    message: `Waiting for containers: ${readyContainers}/${containers.length} ready`,
    details: { phase, readyContainers, totalContainers: containers.length },
  };
};

export const deploymentReadiness: ReadinessEvaluator<V1Deployment> = (deployment) => {
  const expectedReplicas = deployment.spec?.replicas ?? 1;
  const status = deployment.status;
  if (!status) {
    return {
      ready: false,
      reason: 'StatusMissing',
      message: 'Deployment status not available yet',
      details: { expectedReplicas },
    };
  }

  const readyReplicas = status.readyReplicas ?? 0;
  const availableReplicas = status.availableReplicas ?? 0;

  if (readyReplicas >= expectedReplicas && availableReplicas >= expectedReplicas) {
    return {
      ready: true,
      message: `Deployment has ${readyReplicas}/${expectedReplicas} ready replicas and ${availableReplicas}/${expectedReplicas} available replicas`,
    };
  }

  return {
    ready: false,
    reason: 'ReplicasNotReady',
    message: `Waiting for replicas: ${readyReplicas}/${expectedReplicas} ready, ${availableReplicas}/${expectedReplicas} available`,
    details: {
      expectedReplicas,
      readyReplicas,
      availableReplicas,
      updatedReplicas: status.updatedReplicas ?? 0,
    },
  };
};

export const statefulSetReadiness: ReadinessEvaluator<V1StatefulSet> = (statefulSet) => {
  const expectedReplicas = statefulSet.spec?.replicas ?? 1;
  const readyReplicas = statefulSet.status?.readyReplicas ?? 0;
  const availableReplicas = statefulSet.status?.availableReplicas ?? readyReplicas;

  if (!statefulSet.status) {
    return { ready: false, reason: 'StatusMissing', message: 'StatefulSet status not available yet' };
  }
  if (readyReplicas >= expectedReplicas && availableReplicas >= expectedReplicas) {
    return { ready: true, message: `StatefulSet has ${readyReplicas}/${expectedReplicas} ready replicas` };
  }
  return {
    ready: false,
    reason: 'ReplicasNotReady',
    message: `Waiting for replicas: ${readyReplicas}/${expectedReplicas} ready`,
    details: { expectedReplicas, readyReplicas, availableReplicas },
  };
};

export const replicaSetReadiness: ReadinessEvaluator<V1ReplicaSet> = (replicaSet) => {
  const expectedReplicas = replicaSet.spec?.replicas ?? 1;
  const readyReplicas = replicaSet.status?.readyReplicas ?? 0;
  const availableReplicas = replicaSet.status?.availableReplicas ?? 0;

  if (!replicaSet.status) {
    return { ready: false, reason: 'StatusMissing', message: 'ReplicaSet status not available yet' };
  }
  if (readyReplicas >= expectedReplicas && availableReplicas >= expectedReplicas) {
    return { ready: true, message: `ReplicaSet has ${readyReplicas}/${expectedReplicas} ready replicas` };
  }
  return {
    ready: false,
    reason: 'ReplicasNotReady',
    message: `Waiting for replicas: ${readyReplicas}/${expectedReplicas} ready, ${availableReplicas}/${expectedReplicas} available`,
    details: { expectedReplicas, readyReplicas, availableReplicas },
  };
};

export const daemonSetReadiness: ReadinessEvaluator<V1DaemonSet> = (daemonSet) => {
  const status = daemonSet.status;
  if (!status) {
    return { ready: false, reason: 'StatusMissing', message: 'DaemonSet status not available yet' };
  }
  const desired = status.desiredNumberScheduled;
  const numberReady = status.numberReady;
  if (numberReady === desired) {
    return { ready: true, message: `DaemonSet has ${numberReady}/${desired} ready pods` };
  }
  return {
    ready: false,
    reason: 'PodsNotReady',
    message: `Waiting for daemon pods: ${numberReady}/${desired} ready`,
    details: { desiredNumberScheduled: desired, numberReady },
  };
};

export const jobReadiness: ReadinessEvaluator<V1Job> = (job) => {
  const completions = job.spec?.completions ?? 1;
  const status = job.status;
  if (!status) {
    return { ready: false, reason: 'StatusMissing', message: 'Job status not available yet', details: { completions } };
  }

  const failed = findCondition(status.conditions, 'Failed');
  if (isTrue(failed)) {
    return {
      ready: false,
      reason: 'JobFailed',
      message: failed?.message ?? 'Job failed',
      details: { failed: status.failed ?? 0 },
    };
  }

  const succeeded = status.succeeded ?? 0;
  if (succeeded >= completions) {
    return { ready: true, message: `Job completed with ${succeeded}/${completions} successful pods` };
  }
  return {
    ready: false,
    reason: 'JobNotComplete',
    message: `Waiting for completions: ${succeeded}/${completions}`,
    details: { completions, succeeded, active: status.active ?? 0, failed: status.failed ?? 0 },
  };
};

export const serviceReadiness: ReadinessEvaluator<V1Service> = (service) => {
  if (service.spec?.type !== 'LoadBalancer') {
    return { ready: true, message: `Service of type ${service.spec?.type ?? 'ClusterIP'} exists` };
  }
  const ingress = service.status?.loadBalancer?.ingress ?? [];
  if (ingress.length > 0) {
    return { ready: true, message: 'LoadBalancer ingress assigned' };
  }
  return { ready: false, reason: 'LoadBalancerPending', message: 'Waiting for a LoadBalancer ingress address' };
};

export const persistentVolumeClaimReadiness: ReadinessEvaluator<V1PersistentVolumeClaim> = (claim) => {
  const phase = claim.status?.phase ?? 'Pending';
  if (phase === 'Bound') {
    return { ready: true, message: 'PersistentVolumeClaim is bound' };
  }
  return { ready: false, reason: 'NotBound', message: `PersistentVolumeClaim is in phase ${phase}`, details: { phase } };
};

export const namespaceReadiness: ReadinessEvaluator<V1Namespace> = (namespace) => {
  const phase = namespace.status?.phase;
  if (phase === 'Active') {
    return { ready: true, message: 'Namespace is active' };
  }
  return { ready: false, reason: 'NamespaceNotActive', message: `Namespace is in phase ${phase ?? 'Unknown'}` };
};

export const ingressReadiness: ReadinessEvaluator<V1Ingress> = (ingress) => {
  const addresses = ingress.status?.loadBalancer?.ingress ?? [];
  if (addresses.length > 0) {
    return { ready: true, message: 'Ingress has a load balancer address' };
  }
  return { ready: false, reason: 'IngressPending', message: 'Waiting for a load balancer address' };
};

/**
 * Ready once it exists
 */
export const existenceReadiness: ReadinessEvaluator = (resource) => ({
  ready: true,
  message: `${resource.kind ?? 'Resource'} exists`,
});

/**
 * Fallback: a Ready or Available condition set to True, otherwise any status
 */
export const genericReadiness: ReadinessEvaluator<GenericResource> = (resource) => {
  const status = resource.status;
  if (!status) {
    return { ready: false, reason: 'StatusMissing', message: 'Resource status not available yet' };
  }

  const conditions = status.conditions;
  if (Array.isArray(conditions) && conditions.length > 0) {
    const condition = findCondition(conditions, 'Ready') ?? findCondition(conditions, 'Available');
    if (isTrue(condition)) {
      return { ready: true, message: `${condition?.type} condition is True` };
    }
    return {
      ready: false,
      reason: condition?.reason ?? 'ConditionNotReady',
      message: condition?.message ?? 'Waiting for a Ready or Available condition',
      details: { conditions },
    };
  }

  return { ready: true, message: 'Resource has a status' };
};

const EXISTENCE_KINDS = [
  'ConfigMap',
  'Secret',
  'ServiceAccount',
  'Endpoints',
  'NetworkPolicy',
  'Role',
  'RoleBinding',
  'ClusterRole',
  'ClusterRoleBinding',
  'StorageClass',
  'CSIDriver',
  'CronJob',
];

const READINESS_EVALUATORS = new Map<string, ReadinessEvaluator>([
  ['Pod', podReadiness],
  ['Deployment', deploymentReadiness],
  ['StatefulSet', statefulSetReadiness],
  ['ReplicaSet', replicaSetReadiness],
  ['DaemonSet', daemonSetReadiness],
  ['Job', jobReadiness],
  ['Service', serviceReadiness],
  ['PersistentVolumeClaim', persistentVolumeClaimReadiness],
  ['Namespace', namespaceReadiness],
  ['Ingress', ingressReadiness],
  ...EXISTENCE_KINDS.map((kind): [string, ReadinessEvaluator] => [kind, existenceReadiness]),
]);

/**
 * Built-in evaluator for a kind, falling back to the generic condition check
 */
export function getReadinessEvaluator(kind: string): ReadinessEvaluator {
  return READINESS_EVALUATORS.get(kind) ?? genericReadiness;
}

/**
 * Run an evaluator, reporting a throwing evaluator as not ready
 */
export function safeEvaluate<T extends KubernetesObject>(
  evaluator: ReadinessEvaluator<T>,
  liveResource: T
): ReadinessStatus {
  try {
    return evaluator(liveResource);
  } catch (error) {
    return {
      ready: false,
      reason: 'EvaluationError',
      message: `Error evaluating readiness: ${error instanceof Error ? error.message : String(error)}`,
      details: { error: String(error) },
    };
  }
}

export function predicateFromEvaluator<T extends KubernetesObject>(
  evaluator: ReadinessEvaluator<T>
): ReadinessPredicate<T> {
  return (liveResource) => safeEvaluate(evaluator, liveResource).ready;
}
