/**
 * RoleBinding and ClusterRoleBinding builders for tests that need extra permissions
 */

import type { RbacV1Subject, V1ClusterRoleBinding, V1RoleBinding } from '@kubernetes/client-node';
import { ConfigurationError } from '../errors.js';

export const RBAC_API_GROUP = 'rbac.authorization.k8s.io';

export type SubjectKind = 'User' | 'Group' | 'ServiceAccount';

export interface SubjectOptions {
  subjectKind?: SubjectKind | undefined;
  subjectName?: string | undefined;
}

export interface RoleBindingOptions extends SubjectOptions {
  /** `Role` or `ClusterRole` */
  roleKind: 'Role' | 'ClusterRole';
  roleName: string;
}

export interface ClusterRoleBindingOptions extends SubjectOptions {
  clusterRoleName: string;
}

/**
 * Every authenticated and unauthenticated user and every service account
 */
export function defaultSubjects(): RbacV1Subject[] {
  return ['system:authenticated', 'system:unauthenticated', 'system:serviceaccounts'].map((name) => ({
    apiGroup: RBAC_API_GROUP,
    kind: 'Group',
    name,
  }));
}

/**
 * The single subject named by `subjectKind` and `subjectName`, or the default subjects when neither is set
 *
 * @throws ConfigurationError if only one of the two is set
 */
export function bindingSubjects(namespace: string, options: SubjectOptions): RbacV1Subject[] {
  const { subjectKind, subjectName } = options;
  if (Boolean(subjectKind) !== Boolean(subjectName)) {
    throw new ConfigurationError(
      'subjectKind and subjectName must be set together to bind a custom subject',
      subjectKind ? 'subjectName' : 'subjectKind'
    );
  }
  if (!subjectKind || !subjectName) {
    return defaultSubjects();
  }
  if (subjectKind === 'ServiceAccount') {
    return [{ apiGroup: '', kind: subjectKind, name: subjectName, namespace }];
  }
  return [{ apiGroup: RBAC_API_GROUP, kind: subjectKind, name: subjectName }];
}

/**
 * Binding name for a test; `/` is not allowed in object names.
 * Cluster-scoped bindings also carry the namespace, their names being cluster-wide.
 */
export function bindingName(testName: string, namespace?: string): string {
  const name = `kubetest:${testName.replace(/\//g, '-')}`;
  return namespace ? `${name}:${namespace}` : name;
}

export function roleBinding(testName: string, namespace: string, options: RoleBindingOptions): V1RoleBinding {
  return {
    apiVersion: `${RBAC_API_GROUP}/v1`,
    kind: 'RoleBinding',
    metadata: { name: bindingName(testName), namespace },
    roleRef: { apiGroup: RBAC_API_GROUP, kind: options.roleKind, name: options.roleName },
    subjects: bindingSubjects(namespace, options),
  };
}

export function clusterRoleBinding(
  testName: string,
  namespace: string,
  options: ClusterRoleBindingOptions
): V1ClusterRoleBinding {
  return {
    apiVersion: `${RBAC_API_GROUP}/v1`,
    kind: 'ClusterRoleBinding',
    metadata: { name: bindingName(testName, namespace) },
    roleRef: { apiGroup: RBAC_API_GROUP, kind: 'ClusterRole', name: options.clusterRoleName },
    subjects: bindingSubjects(namespace, options),
  };
}
