import type { V1ConfigMap, V1Namespace } from '@kubernetes/client-node';
import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError } from '../../../src/core/errors.js';
import { resolveResourceType } from '../../../src/core/kubernetes/resource-types.js';
import { ResourceHandle, resourceIdentity } from '../../../src/core/resources/handle.js';
import { namespaceReadiness } from '../../../src/core/resources/readiness.js';
import { FakeCluster } from '../../utils/fake-cluster.js';

describe('resourceIdentity', () => {
  it('includes the namespace of namespaced objects', () => {
    expect(resourceIdentity('Pod', 'ns-1', 'web-0')).toBe('Pod/ns-1/web-0');
    expect(resourceIdentity('Namespace', undefined, 'ns-1')).toBe('Namespace/ns-1');
  });
});

describe('ResourceHandle', () => {
  let cluster: FakeCluster;
  const desired: V1ConfigMap = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'settings' }, data: { a: '1' } };

  function configMapHandle(): ResourceHandle<V1ConfigMap> {
    return new ResourceHandle({
      type: resolveResourceType('ConfigMap'),
      namespace: 'ns-1',
      name: 'settings',
      desired,
      client: cluster,
    });
  }

  beforeEach(() => {
    cluster = new FakeCluster();
  });

  it('drops the namespace of cluster-scoped kinds', () => {
    const handle = new ResourceHandle<V1Namespace>({
      type: resolveResourceType('Namespace'),
      namespace: 'ns-1',
      name: 'scratch',
      desired: { metadata: { name: 'scratch' } },
      client: cluster,
    });

    expect(handle.namespace).toBeUndefined();
    expect(handle.identity).toBe('Namespace/scratch');
    expect(String(handle)).toBe('Namespace/scratch');
  });

  it('has no observed state until refreshed', async () => {
    await cluster.create('ConfigMap', 'ns-1', desired);
    const handle = configMapHandle();

    expect(handle.observed).toBeUndefined();
    expect(handle.isReady(() => true)).toBe(false);
    expect(handle.evaluate()).toEqual({
      ready: false,
      reason: 'NotObserved',
      message: 'ConfigMap/ns-1/settings has not been observed yet',
    });

    const live = await handle.refresh();

    expect(live.metadata?.uid).toBe('uid-1');
    expect(handle.observed).toEqual(live);
    expect(handle.evaluate()).toEqual({ ready: true, message: 'ConfigMap exists' });
  });

  it('keeps the cached state between refreshes', async () => {
    await cluster.create('ConfigMap', 'ns-1', desired);
    const handle = configMapHandle();
    await handle.refresh();

    cluster.update('ConfigMap', 'ns-1', 'settings', (document) => ({ ...document, data: { a: '2' } }));

    expect(handle.observed?.data).toEqual({ a: '1' });
    await handle.refresh();
    expect(handle.observed?.data).toEqual({ a: '2' });
  });

  it('surfaces NotFoundError when the object is gone', async () => {
    await expect(configMapHandle().refresh()).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects documents of other objects', () => {
    const handle = configMapHandle();

    expect(() => handle.observe({ kind: 'ConfigMap', metadata: { name: 'other', namespace: 'ns-1' } })).toThrow(
      'Document ConfigMap/other does not belong to ConfigMap/ns-1/settings'
    );
    expect(() => handle.observe({ kind: 'Secret', metadata: { name: 'settings', namespace: 'ns-1' } })).toThrow(
      'does not belong to'
    );
    expect(() => handle.observe({ kind: 'ConfigMap', metadata: { name: 'settings', namespace: 'ns-2' } })).toThrow(
      'does not belong to'
    );
  });

  it('evaluates predicates and custom evaluators against the cached state', () => {
    const observed: V1Namespace = { kind: 'Namespace', metadata: { name: 'scratch' }, status: { phase: 'Terminating' } };
    const handle = new ResourceHandle<V1Namespace>({
      type: resolveResourceType('Namespace'),
      namespace: undefined,
      name: 'scratch',
      desired: {},
      observed,
      client: cluster,
    });

    expect(handle.isReady((ns) => ns.status?.phase === 'Terminating')).toBe(true);
    expect(handle.evaluate(namespaceReadiness).reason).toBe('NamespaceNotActive');
    expect(cluster.calls.get).toBe(0);
  });

  it('records a deletion request once', () => {
    const handle = configMapHandle();
    expect(handle.deletionRequested).toBe(false);
    handle.markDeletionRequested();
    handle.markDeletionRequested();
    expect(handle.deletionRequested).toBe(true);
  });
});
