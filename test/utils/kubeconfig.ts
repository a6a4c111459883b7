import { fileURLToPath } from 'node:url';
import { KubeConfig } from '@kubernetes/client-node';

export const KUBECONFIG_FIXTURE = fileURLToPath(new URL('../fixtures/kubeconfig.yaml', import.meta.url));

/**
 * KubeConfig pointing at a server that is never contacted
 */
export function createTestKubeConfig(): KubeConfig {
  const kc = new KubeConfig();
  kc.loadFromOptions({
    clusters: [{ name: 'test-cluster', server: 'https://test-server:6443', skipTLSVerify: false }],
    users: [{ name: 'test-user', token: 'test-token' }],
    contexts: [{ name: 'test-context', cluster: 'test-cluster', user: 'test-user' }],
    currentContext: 'test-context',
  });
  return kc;
}
