import { randomUUID } from 'node:crypto';

/** Longest name the API server accepts for a namespace (RFC 1123 label) */
export const MAX_NAMESPACE_NAME_LENGTH = 63;

export interface NamespaceNameOptions {
  prefix?: string | undefined;
  testName?: string | undefined;
  /** Milliseconds since the epoch; truncated to seconds */
  timestamp?: number | undefined;
  /** Short random identifier; the first 8 characters are used */
  id?: string | undefined;
}

/**
 * Lower-case a test name and replace everything outside `[a-z0-9-]` with `-`
 */
export function sanitizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9-]/g, '-');
}

/**
 * Build `<prefix>-<id>-<unix seconds>[-<sanitized test name>]`, cut to 63
 * characters with trailing dashes removed
 *
 * @example
 * ```typescript
 * generateNamespaceName({ testName: 'Test1_FOO', id: 'a80ebe94', timestamp: 1536849367000 });
 * // 'kubetest-a80ebe94-1536849367-test1-foo'
 * ```
 */
export function generateNamespaceName(options: NamespaceNameOptions = {}): string {
  const prefix = options.prefix ?? 'kubetest';
  const id = (options.id ?? randomUUID()).slice(0, 8);
  const seconds = Math.floor((options.timestamp ?? Date.now()) / 1000);

  let name = `${prefix}-${id}-${seconds}`;
  if (options.testName) {
    name = `${name}-${sanitizeName(options.testName)}`;
  }

  return name.slice(0, MAX_NAMESPACE_NAME_LENGTH).replace(/-+$/, '');
}
