import type { V1Deployment, V1Job, V1Pod } from '@kubernetes/client-node';
import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  daemonSetReadiness,
  deploymentReadiness,
  existenceReadiness,
  genericReadiness,
  getReadinessEvaluator,
  jobReadiness,
  namespaceReadiness,
  persistentVolumeClaimReadiness,
  podReadiness,
  predicateFromEvaluator,
  safeEvaluate,
  serviceReadiness,
  statefulSetReadiness,
} from '../../../src/core/resources/readiness.js';

function deployment(replicas: number, readyReplicas?: number, availableReplicas?: number): V1Deployment {
  return {
    kind: 'Deployment',
    metadata: { name: 'web' },
    spec: { replicas, selector: {}, template: {} },
    status: { readyReplicas, availableReplicas },
  };
}

describe('podReadiness', () => {
  it('is ready when the Ready condition is True', () => {
    const pod: V1Pod = {
      status: { phase: 'Running', conditions: [{ type: 'Ready', status: 'True' }] },
    };
    expect(podReadiness(pod).ready).toBe(true);
  });

  it('is ready when every container is ready', () => {
    const pod: V1Pod = {
      status: {
        phase: 'Running',
        containerStatuses: [
          { name: 'app', image: 'app:1', imageID: '', ready: true, restartCount: 0 },
          { name: 'sidecar', image: 'sidecar:1', imageID: '', ready: true, restartCount: 0 },
        ],
      },
    };
    expect(podReadiness(pod)).toEqual({ ready: true, message: 'Pod is running with 2/2 ready containers' });
  });

  it('waits for containers that are not ready', () => {
    const pod: V1Pod = {
      status: {
        phase: 'Running',
        containerStatuses: [
          { name: 'app', image: 'app:1', imageID: '', ready: true, restartCount: 0 },
          { name: 'sidecar', image: 'sidecar:1', imageID: '', ready: false, restartCount: 2 },
        ],
      },
    };
    expect(podReadiness(pod)).toMatchObject({
      ready: false,
      reason: 'ContainersNotReady',
      message: 'Waiting for containers: 1/2 ready',
    });
  });

  it('reports the phase of pods that are not running', () => {
    expect(podReadiness({ status: { phase: 'Pending' } })).toMatchObject({
      ready: false,
      reason: 'PodNotRunning',
      message: 'Pod is in phase Pending',
    });
  });

  it('treats completed pods as ready', () => {
    expect(podReadiness({ status: { phase: 'Succeeded' } }).ready).toBe(true);
  });

  it('is not ready without a status', () => {
    expect(podReadiness({ metadata: { name: 'web-0' } }).reason).toBe('StatusMissing');
  });
});

describe('deploymentReadiness', () => {
  it('requires ready and available replicas to reach the desired count', () => {
    expect(deploymentReadiness(deployment(3, 3, 3)).ready).toBe(true);
    expect(deploymentReadiness(deployment(3, 3, 2))).toMatchObject({
      ready: false,
      reason: 'ReplicasNotReady',
      message: 'Waiting for replicas: 3/3 ready, 2/3 available',
    });
  });

  it('is ready exactly when both counts reach the desired replicas', () => {
    fc.assert(
      fc.property(fc.nat(10), fc.nat(10), fc.nat(10), (replicas, ready, available) => {
        const status = deploymentReadiness(deployment(replicas, ready, available));
        expect(status.ready).toBe(ready >= replicas && available >= replicas);
      }),
      { numRuns: 100 }
    );
  });

  it('defaults to one replica', () => {
    const withoutReplicas: V1Deployment = { status: { readyReplicas: 1, availableReplicas: 1 } };
    expect(deploymentReadiness(withoutReplicas).ready).toBe(true);
  });
});

describe('statefulSetReadiness', () => {
  it('counts ready replicas', () => {
    expect(statefulSetReadiness({ spec: { replicas: 2, selector: {}, serviceName: 'db', template: {} }, status: { replicas: 2, readyReplicas: 1 } })).toMatchObject({
      ready: false,
      message: 'Waiting for replicas: 1/2 ready',
    });
  });
});

describe('daemonSetReadiness', () => {
  it('compares ready pods with scheduled pods', () => {
    const status = { currentNumberScheduled: 3, desiredNumberScheduled: 3, numberMisscheduled: 0, numberReady: 3 };
    expect(daemonSetReadiness({ status }).ready).toBe(true);
    expect(daemonSetReadiness({ status: { ...status, numberReady: 1 } }).message).toBe('Waiting for daemon pods: 1/3 ready');
  });
});

describe('jobReadiness', () => {
  it('is ready when the completions succeeded', () => {
    const job: V1Job = { spec: { completions: 2, template: {} }, status: { succeeded: 2 } };
    expect(jobReadiness(job).ready).toBe(true);
  });

  it('reports failed jobs', () => {
    const job: V1Job = {
      spec: { template: {} },
      status: { failed: 4, conditions: [{ type: 'Failed', status: 'True', message: 'BackoffLimitExceeded' }] },
    };
    expect(jobReadiness(job)).toMatchObject({ ready: false, reason: 'JobFailed', message: 'BackoffLimitExceeded' });
  });
});

describe('serviceReadiness', () => {
  it('is ready for ClusterIP services', () => {
    expect(serviceReadiness({ spec: { type: 'ClusterIP' } }).ready).toBe(true);
  });

  it('waits for a LoadBalancer address', () => {
    expect(serviceReadiness({ spec: { type: 'LoadBalancer' } }).reason).toBe('LoadBalancerPending');
    expect(
      serviceReadiness({ spec: { type: 'LoadBalancer' }, status: { loadBalancer: { ingress: [{ ip: '10.0.0.1' }] } } })
        .ready
    ).toBe(true);
  });
});

describe('phase based kinds', () => {
  it('waits for claims to bind', () => {
    expect(persistentVolumeClaimReadiness({ status: { phase: 'Pending' } }).message).toBe(
      'PersistentVolumeClaim is in phase Pending'
    );
    expect(persistentVolumeClaimReadiness({ status: { phase: 'Bound' } }).ready).toBe(true);
  });

  it('waits for namespaces to become Active', () => {
    expect(namespaceReadiness({ status: { phase: 'Terminating' } })).toEqual({
      ready: false,
      reason: 'NamespaceNotActive',
      message: 'Namespace is in phase Terminating',
    });
    expect(namespaceReadiness({ status: { phase: 'Active' } }).ready).toBe(true);
  });
});

describe('genericReadiness', () => {
  it('uses the Ready condition', () => {
    expect(genericReadiness({ status: { conditions: [{ type: 'Ready', status: 'False', reason: 'Reconciling' }] } })).toMatchObject({
      ready: false,
      reason: 'Reconciling',
    });
    expect(genericReadiness({ status: { conditions: [{ type: 'Ready', status: 'True' }] } })).toEqual({
      ready: true,
      message: 'Ready condition is True',
    });
  });

  it('falls back to the Available condition', () => {
    expect(genericReadiness({ status: { conditions: [{ type: 'Available', status: 'True' }] } }).ready).toBe(true);
  });

  it('accepts a status without conditions', () => {
    expect(genericReadiness({ status: { observedGeneration: 1 } }).ready).toBe(true);
    expect(genericReadiness({ kind: 'Widget' }).reason).toBe('StatusMissing');
  });
});

describe('getReadinessEvaluator', () => {
  it('maps kinds to their evaluators', () => {
    expect(getReadinessEvaluator('Deployment')).toBe(deploymentReadiness);
    expect(getReadinessEvaluator('ConfigMap')).toBe(existenceReadiness);
    expect(getReadinessEvaluator('Widget')).toBe(genericReadiness);
  });

  it('reports existence kinds as ready', () => {
    expect(existenceReadiness({ kind: 'Secret' })).toEqual({ ready: true, message: 'Secret exists' });
  });
});

describe('safeEvaluate', () => {
  it('turns a throwing evaluator into a not-ready status', () => {
    const status = safeEvaluate(() => {
      throw new Error('boom');
    }, { kind: 'Widget' });

    expect(status).toMatchObject({ ready: false, reason: 'EvaluationError', message: 'Error evaluating readiness: boom' });
  });

  it('derives a predicate from an evaluator', () => {
    const ready = predicateFromEvaluator(namespaceReadiness);
    expect(ready({ status: { phase: 'Active' } })).toBe(true);
    expect(ready({})).toBe(false);
  });
});
