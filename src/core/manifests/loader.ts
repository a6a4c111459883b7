/**
 * Manifest loading
 *
 * Reads YAML or JSON manifests from files or directories, optionally rendering
 * them as templates first, and returns the documents they contain.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { KubernetesObject } from '@kubernetes/client-node';
import * as yaml from 'js-yaml';
import { ManifestError } from '../errors.js';

/**
 * Values available to manifest templates
 */
export interface RenderContext {
  namespace: string;
  testName: string;
  testNodeId?: string | undefined;
  [key: string]: unknown;
}

/**
 * Turns a manifest template into the YAML that is parsed
 */
export type ManifestRenderer = (template: string, context: RenderContext) => string;

export interface LoadManifestOptions {
  renderer?: ManifestRenderer | undefined;
  /** Templates are rendered only when a context is given */
  context?: RenderContext | undefined;
}

export interface LoadDirectoryOptions extends LoadManifestOptions {
  /** Load only these files, in this order, instead of every manifest in the directory */
  files?: readonly string[] | undefined;
}

const MANIFEST_EXTENSIONS = new Set(['.yaml', '.yml', '.json']);

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w]*)\s*\}\}/g;

/**
 * Replace `{{ key }}` placeholders with context values; unknown keys are left as they are
 *
 * @example
 * ```typescript
 * renderTemplate('namespace: {{ namespace }}', { namespace: 'kubetest-1', testName: 'x' });
 * // 'namespace: kubetest-1'
 * ```
 */
export const renderTemplate: ManifestRenderer = (template, context) =>
  template.replace(PLACEHOLDER, (placeholder: string, key: string) => {
    const value = context[key];
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
      ? String(value)
      : placeholder;
  });

function isManifest(document: unknown): document is KubernetesObject {
  return (
    typeof document === 'object' &&
    document !== null &&
    'kind' in document &&
    typeof document.kind === 'string' &&
    'apiVersion' in document &&
    typeof document.apiVersion === 'string'
  );
}

function isList(document: KubernetesObject): document is KubernetesObject & { items: unknown[] } {
  return document.kind === 'List' && 'items' in document && Array.isArray(document.items);
}

/**
 * Parse every document in a YAML stream. Empty documents are skipped and
 * `kind: List` documents are expanded into their items.
 *
 * @throws ManifestError on invalid YAML or a document that is not an object with kind and apiVersion
 */
export function parseManifests(content: string, source = '<inline>'): KubernetesObject[] {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(content);
  } catch (error) {
    throw new ManifestError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, source, error);
  }

  const manifests: KubernetesObject[] = [];
  const collect = (document: unknown, index: number): void => {
    if (document === null || document === undefined) {
      return;
    }
    if (!isManifest(document)) {
      throw new ManifestError(`Document ${index} is not a Kubernetes object (kind and apiVersion are required)`, source);
    }
    if (isList(document)) {
      for (const item of document.items) {
        collect(item, index);
      }
      return;
    }
    manifests.push(document);
  };

  documents.forEach((document, index) => collect(document, index));
  return manifests;
}

/**
 * Load the manifests in one file
 */
export async function loadManifestFile(path: string, options: LoadManifestOptions = {}): Promise<KubernetesObject[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new ManifestError(
      `Cannot read manifest: ${error instanceof Error ? error.message : String(error)}`,
      path,
      error
    );
  }

  if (options.context) {
    const renderer = options.renderer ?? renderTemplate;
    try {
      content = renderer(content, options.context);
    } catch (error) {
      throw new ManifestError(
        `Cannot render manifest: ${error instanceof Error ? error.message : String(error)}`,
        path,
        error
      );
    }
  }

  return parseManifests(content, path);
}

/**
 * Load every manifest file in a directory (not recursive), in file name order
 */
export async function loadManifestDirectory(
  directory: string,
  options: LoadDirectoryOptions = {}
): Promise<KubernetesObject[]> {
  let files: string[];
  if (options.files) {
    files = [...options.files];
  } else {
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      files = entries
        .filter((entry) => entry.isFile() && MANIFEST_EXTENSIONS.has(extname(entry.name)))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      throw new ManifestError(
        `Cannot read manifest directory: ${error instanceof Error ? error.message : String(error)}`,
        directory,
        error
      );
    }
  }

  const manifests: KubernetesObject[] = [];
  for (const file of files) {
    manifests.push(...(await loadManifestFile(join(directory, file), options)));
  }
  return manifests;
}

/**
 * Load a manifest file, or every manifest in a directory
 */
export async function loadManifests(path: string, options: LoadDirectoryOptions = {}): Promise<KubernetesObject[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch (error) {
    throw new ManifestError(
      `Manifest path not found: ${error instanceof Error ? error.message : String(error)}`,
      path,
      error
    );
  }
  return isDirectory ? loadManifestDirectory(path, options) : loadManifestFile(path, options);
}
