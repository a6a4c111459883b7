/**
 * Kubernetes Error Handling Utilities
 *
 * Centralized classification of errors thrown by @kubernetes/client-node.
 * The error shape varies between client versions and transports:
 * - 1.x `ApiException`: error.code, error.body (JSON string or parsed Status)
 * - 0.x request-based: error.statusCode, error.body
 * - fetch-based wrappers: error.response.statusCode
 */

import { ApiError, NotFoundError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * Body of a Kubernetes `Status` response
 */
interface StatusBody {
  code?: number;
  message?: string;
  reason?: string;
  details?: unknown;
}

/**
 * Structural view of the errors thrown by the client
 */
export interface KubernetesApiError {
  code?: unknown;
  statusCode?: number;
  response?: {
    statusCode?: number;
    body?: unknown;
  };
  body?: unknown;
  message?: string;
  name?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

/**
 * Read the fields the classifiers look at from an arbitrary thrown value
 */
function asApiError(value: unknown): KubernetesApiError | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const response = isRecord(value.response) ? value.response : undefined;
  return {
    code: value.code,
    ...(typeof value.statusCode === 'number' && { statusCode: value.statusCode }),
    ...(response && {
      response: {
        ...(typeof response.statusCode === 'number' && { statusCode: response.statusCode }),
        body: response.body,
      },
    }),
    body: value.body,
    ...(typeof value.message === 'string' && { message: value.message }),
  };
}

/**
 * Extract the `Status` body from an error, parsing it when the client left it as a string
 */
function getStatusBody(error: KubernetesApiError): StatusBody | undefined {
  let body: unknown = error.body;
  if (typeof body === 'string') {
    const text = body;
    try {
      body = JSON.parse(text);
    } catch {
      return { message: text };
    }
  }
  const record = asRecord(body);
  if (!record) {
    return undefined;
  }
  return {
    ...(typeof record.code === 'number' && { code: record.code }),
    ...(typeof record.message === 'string' && { message: record.message }),
    ...(typeof record.reason === 'string' && { reason: record.reason }),
    ...('details' in record && { details: record.details }),
  };
}

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * @returns The HTTP status code, or undefined if not found
 *
 * @example
 * ```typescript
 * try {
 *   await api.read(resource);
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // Handle not found
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  const err = asApiError(error);
  if (!err) {
    return undefined;
  }

  // 1.x ApiException; network errors carry string codes such as 'ECONNRESET'
  if (typeof err.code === 'number') {
    return err.code;
  }

  if (typeof err.statusCode === 'number') {
    return err.statusCode;
  }

  if (typeof err.response?.statusCode === 'number') {
    return err.response.statusCode;
  }

  const body = getStatusBody(err);
  if (typeof body?.code === 'number') {
    return body.code;
  }

  logger.trace('Could not extract status code from error', {
    errorType: typeof error,
    errorKeys: Object.keys(asRecord(error) ?? {}),
  });

  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof NotFoundError || getErrorStatusCode(error) === 404;
}

/**
 * Check if an error is a "Conflict" (409) error, e.g. the object already exists
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

/**
 * Check if an error is a "Gone" (410) error, returned when a watch resourceVersion has expired
 */
export function isGoneError(error: unknown): boolean {
  return getErrorStatusCode(error) === 410;
}

/**
 * HTTP status codes that are typically retryable.
 */
const RETRYABLE_STATUS_CODES = [
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN'];

/**
 * Check if an error is retryable.
 *
 * An error is considered retryable if:
 * - It has a retryable HTTP status code (408, 429, 500, 502, 503, 504)
 * - It's a network connectivity error (ECONNREFUSED, ECONNRESET, ETIMEDOUT, ...)
 * - It's a fetch-related TypeError (network failure)
 */
export function isRetryableError(error: unknown): boolean {
  const statusCode = getErrorStatusCode(error);
  if (statusCode !== undefined) {
    return RETRYABLE_STATUS_CODES.includes(statusCode);
  }

  const record = asRecord(error);
  if (record && typeof record.code === 'string' && RETRYABLE_NETWORK_CODES.includes(record.code)) {
    return true;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('enotfound') ||
      message.includes('etimedout') ||
      message.includes('network error') ||
      message.includes('socket hang up') ||
      message.includes('connection reset')
    ) {
      return true;
    }

    if (error instanceof TypeError && message.includes('fetch')) {
      return true;
    }
  }

  return false;
}

export function getErrorReason(error: unknown): string | undefined {
  const err = asApiError(error);
  return err ? getStatusBody(err)?.reason : undefined;
}

/**
 * Extract detailed error information from a Kubernetes API error.
 */
export function getErrorDetails(error: unknown): {
  statusCode: number | undefined;
  reason: string | undefined;
  message: string | undefined;
  details: unknown;
} {
  const err = asApiError(error);
  if (!err) {
    return {
      statusCode: undefined,
      reason: undefined,
      message: String(error),
      details: undefined,
    };
  }

  const body = getStatusBody(err);
  return {
    statusCode: getErrorStatusCode(error),
    reason: body?.reason,
    message: body?.message ?? err.message,
    details: body?.details,
  };
}

/**
 * Format a Kubernetes API error into a human-readable message.
 *
 * @example
 * ```typescript
 * formatKubernetesError(error);
 * // "Kubernetes API error (403): Forbidden: pods is forbidden"
 * ```
 */
export function formatKubernetesError(error: unknown): string {
  if (typeof error !== 'object' || error === null) {
    return String(error);
  }

  const { statusCode, reason, message } = getErrorDetails(error);
  const parts: string[] = [
    statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error',
  ];

  if (reason) {
    parts.push(reason);
  }

  if (message) {
    parts.push(message);
  }

  return parts.join(': ');
}

/**
 * Convert an error thrown by the client into the harness taxonomy.
 * 404s become `NotFoundError` when the addressed object is known.
 */
export function toApiError(
  error: unknown,
  target?: { kind: string; name?: string | undefined; namespace?: string | undefined }
): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  const { statusCode, reason } = getErrorDetails(error);
  if (statusCode === 404 && target?.name) {
    return new NotFoundError(target.kind, target.name, target.namespace, { cause: error });
  }

  return new ApiError(formatKubernetesError(error), statusCode, reason, {
    cause: error,
    ...(target && { context: { ...target } }),
  });
}
