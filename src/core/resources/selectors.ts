/**
 * Label selector helpers
 */

import type { KubernetesObject, V1LabelSelector, V1LabelSelectorRequirement } from '@kubernetes/client-node';

/**
 * Render a label map as an equality-based selector, e.g. `app=web,tier=frontend`
 */
export function selectorString(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

function requirementString(requirement: V1LabelSelectorRequirement): string {
  const values = (requirement.values ?? []).join(',');
  switch (requirement.operator) {
    case 'In':
      return `${requirement.key} in (${values})`;
    case 'NotIn':
      return `${requirement.key} notin (${values})`;
    case 'Exists':
      return requirement.key;
    case 'DoesNotExist':
      return `!${requirement.key}`;
    default:
      throw new Error(`Unsupported label selector operator "${requirement.operator}"`);
  }
}

/**
 * Render a structured selector (matchLabels + matchExpressions) in the API's string syntax
 */
export function labelSelectorString(selector: V1LabelSelector): string {
  const parts: string[] = [];
  if (selector.matchLabels) {
    const labels = selectorString(selector.matchLabels);
    if (labels) {
      parts.push(labels);
    }
  }
  for (const requirement of selector.matchExpressions ?? []) {
    parts.push(requirementString(requirement));
  }
  return parts.join(',');
}

function matchesRequirement(labels: Record<string, string>, requirement: V1LabelSelectorRequirement): boolean {
  const present = Object.prototype.hasOwnProperty.call(labels, requirement.key);
  const value = labels[requirement.key];
  const values = requirement.values ?? [];

  switch (requirement.operator) {
    case 'In':
      return present && value !== undefined && values.includes(value);
    case 'NotIn':
      return !present || value === undefined || !values.includes(value);
    case 'Exists':
      return present;
    case 'DoesNotExist':
      return !present;
    default:
      return false;
  }
}

/**
 * Evaluate a structured selector against a label map; an empty selector matches everything
 */
export function matchesLabelSelector(labels: Record<string, string> | undefined, selector: V1LabelSelector): boolean {
  const actual = labels ?? {};
  for (const [key, value] of Object.entries(selector.matchLabels ?? {})) {
    if (actual[key] !== value) {
      return false;
    }
  }
  return (selector.matchExpressions ?? []).every((requirement) => matchesRequirement(actual, requirement));
}

/**
 * Whether `resource` lists `ownerUid` among its owner references
 */
export function isOwnedBy(resource: KubernetesObject, ownerUid: string): boolean {
  return (resource.metadata?.ownerReferences ?? []).some((owner) => owner.uid === ownerUid);
}

function isStringMap(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((entry) => typeof entry === 'string')
  );
}

function isRequirementList(value: unknown): value is V1LabelSelectorRequirement[] {
  return (
    Array.isArray(value) &&
    value.every(
      (entry: unknown) =>
        typeof entry === 'object' &&
        entry !== null &&
        'key' in entry &&
        typeof entry.key === 'string' &&
        'operator' in entry &&
        typeof entry.operator === 'string'
    )
  );
}

/**
 * Pod selector of a workload: `spec.selector` in structured form (Deployment, Job, ...)
 * or as a plain label map (Service, ReplicationController)
 */
export function workloadSelector(resource: KubernetesObject): V1LabelSelector | undefined {
  if (!('spec' in resource) || typeof resource.spec !== 'object' || resource.spec === null) {
    return undefined;
  }
  const spec = resource.spec;
  if (!('selector' in spec)) {
    return undefined;
  }
  const selector = spec.selector;
  if (typeof selector !== 'object' || selector === null) {
    return undefined;
  }

  if ('matchLabels' in selector || 'matchExpressions' in selector) {
    const matchLabels = 'matchLabels' in selector ? selector.matchLabels : undefined;
    const matchExpressions = 'matchExpressions' in selector ? selector.matchExpressions : undefined;
    return {
      ...(isStringMap(matchLabels) && { matchLabels }),
      ...(isRequirementList(matchExpressions) && { matchExpressions }),
    };
  }

  return isStringMap(selector) ? { matchLabels: selector } : undefined;
}
