/**
 * Error taxonomy for the harness
 * Every error carries a stable code and structured context for diagnostics
 */

import type { KubernetesObject } from '@kubernetes/client-node';

export class KubetestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'KubetestError';
  }
}

/**
 * Transport or protocol failure talking to the cluster API
 */
export class ApiError extends KubetestError {
  constructor(
    message: string,
    public readonly statusCode: number | undefined,
    public readonly reason?: string,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(
      message,
      'API_ERROR',
      { statusCode, reason, ...options?.context },
      options?.cause !== undefined ? { cause: options.cause } : undefined
    );
    this.name = 'ApiError';
  }
}

/**
 * The addressed object does not exist (HTTP 404)
 */
export class NotFoundError extends ApiError {
  constructor(
    public readonly kind: string,
    public override readonly name: string,
    public readonly namespace?: string,
    options?: { cause?: unknown }
  ) {
    super(
      `${kind} "${name}" not found${namespace ? ` in namespace "${namespace}"` : ''}`,
      404,
      'NotFound',
      { ...options, context: { kind, name, namespace } }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * A watch could not resume because its resourceVersion is no longer retained (HTTP 410)
 */
export class WatchExpiredError extends ApiError {
  constructor(public readonly resourceVersion: string | undefined, options?: { cause?: unknown }) {
    super(
      `Watch expired: resourceVersion ${resourceVersion ?? '(none)'} is too old`,
      410,
      'Expired',
      { ...options, context: { resourceVersion } }
    );
    this.name = 'WatchExpiredError';
  }
}

/**
 * An API request did not complete within the request timeout; retryable like an HTTP 408
 */
export class RequestTimeoutError extends ApiError {
  constructor(public readonly timeout: number) {
    super(`Request timed out after ${timeout}ms`, 408, 'Timeout', { context: { timeout } });
    this.name = 'RequestTimeoutError';
  }
}

/**
 * A readiness predicate did not hold within the wait budget
 */
export class ConditionTimeoutError<T extends KubernetesObject = KubernetesObject> extends KubetestError {
  constructor(
    public readonly target: string,
    public readonly timeout: number,
    public readonly attempts: number,
    public readonly lastState: T | undefined,
    public readonly lastReason?: string
  ) {
    super(
      `Timed out after ${timeout}ms waiting for ${target} (${attempts} checks)` +
        (lastReason ? `: ${lastReason}` : '') +
        `\nLast observed state: ${describeState(lastState)}`,
      'CONDITION_TIMEOUT',
      { target, timeout, attempts, lastReason }
    );
    this.name = 'ConditionTimeoutError';
  }
}

function describeState(state: KubernetesObject | undefined): string {
  if (!state) {
    return '<never observed>';
  }
  return JSON.stringify('status' in state && state.status !== undefined ? state.status : state);
}

/**
 * A wait was cancelled before it completed, typically by the owning test's timeout
 */
export class WaitCancelledError extends KubetestError {
  constructor(public readonly target: string, cause?: unknown) {
    super(`Wait for ${target} was cancelled`, 'WAIT_CANCELLED', { target }, { cause });
    this.name = 'WaitCancelledError';
  }
}

/**
 * The test namespace could not be created or never became Active
 */
export class NamespaceCreationError extends KubetestError {
  constructor(public readonly namespace: string, message: string, cause?: unknown) {
    super(`Failed to create namespace "${namespace}": ${message}`, 'NAMESPACE_CREATION_FAILED', { namespace }, { cause });
    this.name = 'NamespaceCreationError';
  }
}

/**
 * Resources were created after the registry began tearing down
 */
export class RegistryClosedError extends KubetestError {
  constructor(public readonly namespace: string, public readonly state: string) {
    super(
      `Cannot create resources in namespace "${namespace}": registry is ${state}`,
      'REGISTRY_CLOSED',
      { namespace, state }
    );
    this.name = 'RegistryClosedError';
  }
}

/**
 * A resource identity was reused after its deletion was requested in the same test
 */
export class ResourceIdentityError extends KubetestError {
  constructor(public readonly identity: string, message: string) {
    super(`${identity}: ${message}`, 'RESOURCE_IDENTITY', { identity });
    this.name = 'ResourceIdentityError';
  }
}

/**
 * A manifest file could not be read, parsed or rendered
 */
export class ManifestError extends KubetestError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(`${message} (${path})`, 'MANIFEST_ERROR', { path }, { cause });
    this.name = 'ManifestError';
  }
}

/**
 * Invalid harness configuration
 */
export class ConfigurationError extends KubetestError {
  constructor(message: string, public readonly field?: string, public readonly suggestions?: string[]) {
    super(message, 'CONFIGURATION_ERROR', { field, suggestions });
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
