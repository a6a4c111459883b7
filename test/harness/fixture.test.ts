import { afterAll, describe, expect, it, vi } from 'vitest';
import { WaitCancelledError } from '../../src/core/errors.js';
import { createKubeTest } from '../../src/harness/fixture.js';
import { KubeTestManager } from '../../src/harness/manager.js';
import { FakeCluster } from '../utils/fake-cluster.js';

const cluster = new FakeCluster();
const manager = new KubeTestManager({
  client: cluster,
  config: { argv: [], env: {}, overrides: { pollInterval: 10 } },
});
const kubeTest = createKubeTest({ manager });
const get = vi.spyOn(cluster, 'get');

const disabledManager = new KubeTestManager({
  client: new FakeCluster(),
  config: { argv: [], env: {}, overrides: { disabled: true } },
});
const disabledKubeTest = createKubeTest({ manager: disabledManager });

afterAll(async () => {
  await manager.shutdown();
});

describe('kubeTest', () => {
  let namespace: string | undefined;
  let disabledRan = false;

  kubeTest('hands the test a client bound to a fresh namespace', async ({ kube }) => {
    namespace = kube.namespace;
    await kube.createResource('ConfigMap', { metadata: { name: 'settings' } });

    expect(manager.activeSessions).toBe(1);
    expect(cluster.has('ConfigMap', kube.namespace, 'settings')).toBe(true);
  });

  it('cleans up after the test ends', () => {
    expect(namespace).toBeDefined();
    expect(cluster.has('ConfigMap', namespace, 'settings')).toBe(false);
    expect(cluster.deleteCalls).toEqual(['ConfigMap/settings', `Namespace/${namespace}`]);
    expect(manager.activeSessions).toBe(0);
  });

  disabledKubeTest('is skipped when Kubernetes tests are disabled', ({ kube }) => {
    disabledRan = kube.namespace !== '';
  });

  it('did not run the disabled test body', () => {
    expect(disabledRan).toBe(false);
  });

  let orphan: Promise<unknown> | undefined;

  kubeTest('returns while one of its waits is still running', async ({ kube }) => {
    const handle = await kube.createResource('ConfigMap', { metadata: { name: 'watched' } });
    orphan = kube.waitUntil(handle, () => false, { timeout: 3000, interval: 10 }).then(
      () => 'finished',
      (error: unknown) => error
    );
  });

  it('stops the waits of a finished test', async () => {
    const checksOfWatched = (): number => get.mock.calls.filter(([, , name]) => name === 'watched').length;
    const before = checksOfWatched();

    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(checksOfWatched()).toBe(before);
    await expect(orphan).resolves.toBeInstanceOf(WaitCancelledError);
  });
});
