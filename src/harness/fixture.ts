/**
 * Vitest integration
 *
 * ```typescript
 * import { kubeTest } from 'kubetest-harness/vitest';
 *
 * kubeTest('deploys nginx', async ({ kube }) => {
 *   const deployment = await kube.loadManifest('./manifests/nginx.yaml');
 *   await kube.waitForRegistered({ timeout: 120_000 });
 * });
 * ```
 */

import { afterAll, test } from 'vitest';
import { KubetestError } from '../core/errors.js';
import type { KubeClient } from './kube-client.js';
import { KubeTestManager, type SessionOptions } from './manager.js';

export interface KubeTestFixtures {
  kube: KubeClient;
}

export interface KubeTestOptions extends SessionOptions {
  /** Per-test budget in milliseconds; defaults to the configured testTimeout */
  timeout?: number | undefined;
  /** Defaults to a manager shared by every test in the file */
  manager?: KubeTestManager | undefined;
}

let defaultManager: KubeTestManager | undefined;

/**
 * Manager configured from flags and environment, created on first use
 */
export function getDefaultManager(): KubeTestManager {
  defaultManager ??= new KubeTestManager();
  return defaultManager;
}

/**
 * A `test` whose context carries a `kube` client bound to a fresh namespace.
 * When the test ends, however it ends, everything it created is deleted.
 */
export function createKubeTest(options: KubeTestOptions = {}) {
  const { timeout, manager, ...sessionOptions } = options;

  return test.extend<KubeTestFixtures>({
    kube: async ({ task, skip }, use) => {
      const owner = manager ?? getDefaultManager();
      if (owner.config.disabled) {
        skip('Kubernetes tests are disabled');
      }

      const budget = timeout ?? owner.config.testTimeout;
      const controller = new AbortController();
      const timer = setTimeout(() => {
        controller.abort(new KubetestError(`Test exceeded its ${budget}ms budget`, 'TEST_TIMEOUT', { test: task.name }));
      }, budget);

      const session = owner.newTest(task.id, task.name, sessionOptions);
      try {
        const kube = await session.setup(controller.signal);
        await use(kube);
      } finally {
        clearTimeout(timer);
        if (!controller.signal.aborted) {
          controller.abort(new KubetestError('Test finished', 'TEST_FINISHED', { test: task.name }));
        }
        await session.teardown();
      }
    },
  });
}

export const kubeTest = createKubeTest();

afterAll(async () => {
  await defaultManager?.shutdown();
});
