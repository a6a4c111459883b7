import * as k8s from '@kubernetes/client-node';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { RequestTimeoutError } from '../../../src/core/errors.js';
import {
  createKubeConfig,
  createKubernetesClientProvider,
  KubernetesClientProvider,
  withRetry,
} from '../../../src/core/kubernetes/client-provider.js';
import { createTestKubeConfig, KUBECONFIG_FIXTURE as KUBECONFIG } from '../../utils/kubeconfig.js';

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('retries transient failures until the operation succeeds', async () => {
    const operation = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce({ code: 503 })
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, { baseDelay: 1 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('rethrows non-retryable failures without retrying', async () => {
    const failure = { code: 400, body: { reason: 'BadRequest' } };
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(operation, { baseDelay: 1 })).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts', async () => {
    const failure = { code: 503 };
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(operation, { maxAttempts: 3, baseDelay: 1 })).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('backs off exponentially between attempts', async () => {
    vi.useFakeTimers();
    const operation = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce({ code: 429 })
      .mockRejectedValueOnce({ code: 429 })
      .mockResolvedValueOnce('done');

    const result = withRetry(operation, { baseDelay: 200, backoffFactor: 2 });

    await vi.advanceTimersByTimeAsync(199);
    expect(operation).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(operation).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(399);
    expect(operation).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(operation).toHaveBeenCalledTimes(3);
    await expect(result).resolves.toBe('done');
  });

  it('fails an attempt that outlives the timeout and retries it', async () => {
    vi.useFakeTimers();
    const operation = vi.fn<() => Promise<string>>()
      .mockReturnValueOnce(new Promise<string>(() => undefined))
      .mockResolvedValueOnce('ok');

    const result = withRetry(operation, { timeout: 1000, baseDelay: 200 });

    await vi.advanceTimersByTimeAsync(999);
    expect(operation).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(201);
    expect(operation).toHaveBeenCalledTimes(2);
    await expect(result).resolves.toBe('ok');
  });

  it('surfaces a RequestTimeoutError when every attempt times out', async () => {
    vi.useFakeTimers();
    const operation = vi.fn<() => Promise<string>>(() => new Promise<string>(() => undefined));

    const result = withRetry(operation, { maxAttempts: 2, timeout: 500, baseDelay: 100 });
    const assertion = expect(result).rejects.toThrow('Request timed out after 500ms');
    await vi.advanceTimersByTimeAsync(1100);
    await assertion;

    await expect(result).rejects.toBeInstanceOf(RequestTimeoutError);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('stops backing off when the signal aborts', async () => {
    const controller = new AbortController();
    const operation = vi.fn<() => Promise<string>>().mockImplementation(async () => {
      controller.abort(new Error('test over'));
      throw { code: 503 };
    });

    await expect(withRetry(operation, { baseDelay: 10_000, signal: controller.signal })).rejects.toThrow('test over');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('KubernetesClientProvider', () => {
  it('creates each API client once', () => {
    const provider = KubernetesClientProvider.fromKubeConfig(createTestKubeConfig());

    expect(provider.getKubernetesObjectApi()).toBe(provider.getKubernetesObjectApi());
    expect(provider.getCoreV1Api()).toBeInstanceOf(k8s.CoreV1Api);
    expect(provider.getVersionApi()).toBeInstanceOf(k8s.VersionApi);
    expect(provider.createWatch()).toBeInstanceOf(k8s.Watch);
  });

  it('reports connection info for the current context', () => {
    const provider = KubernetesClientProvider.fromKubeConfig(createTestKubeConfig());

    expect(provider.getConnectionInfo()).toEqual({
      currentContext: 'test-context',
      server: 'https://test-server:6443',
      clusterName: 'test-cluster',
      userName: 'test-user',
    });
  });

  it('loads a kubeconfig file', () => {
    const provider = createKubernetesClientProvider({ kubeconfigPath: KUBECONFIG });
    expect(provider.getKubeConfig().getCurrentContext()).toBe('test-context');
  });

  it('wraps loading failures', () => {
    expect(() => createKubernetesClientProvider({ kubeconfigPath: KUBECONFIG, context: 'missing' })).toThrow(
      "Failed to initialize Kubernetes client provider: Context 'missing' not found in kubeconfig (available: test-context)"
    );
  });
});

describe('createKubeConfig', () => {
  it('switches to the requested context', () => {
    const kc = createKubeConfig({ kubeconfigPath: KUBECONFIG, context: 'test-context' });
    expect(kc.getCurrentContext()).toBe('test-context');
  });

  it('disables TLS verification only when asked', () => {
    expect(createKubeConfig({ kubeconfigPath: KUBECONFIG }).getCurrentCluster()?.skipTLSVerify).toBeFalsy();
    expect(createKubeConfig({ kubeconfigPath: KUBECONFIG, skipTLSVerify: true }).getCurrentCluster()?.skipTLSVerify).toBe(
      true
    );
  });
});
