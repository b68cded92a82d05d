import type { AssignmentKind, ClassifiedAssignment, RoleAssignmentRecord } from './types.js';

/**
 * Compare form of an ARM scope: lower case, no trailing slash
 */
export function normalizeScope(scope: string): string {
  return scope.trim().replace(/\/+$/, '').toLowerCase();
}

/**
 * Direct when assigned at the resource's own scope, inherited otherwise.
 * Only the scope string is compared; group membership and deny
 * assignments are not considered.
 */
export function classifyAssignment(assignment: RoleAssignmentRecord, resourceScope: string): AssignmentKind {
  return normalizeScope(assignment.scope) === normalizeScope(resourceScope) ? 'direct' : 'inherited';
}

export function classifyAssignments(
  assignments: readonly RoleAssignmentRecord[],
  resourceScope: string,
  roleNames: ReadonlyMap<string, string>
): ClassifiedAssignment[] {
  return assignments
    .map(assignment => ({
      ...assignment,
      roleName: roleNames.get(assignment.roleDefinitionId) ?? roleDefinitionGuid(assignment.roleDefinitionId),
      kind: classifyAssignment(assignment, resourceScope),
    }))
    .sort(compareAssignments);
}

function compareAssignments(a: ClassifiedAssignment, b: ClassifiedAssignment): number {
  if (a.kind !== b.kind) {
    return a.kind === 'direct' ? -1 : 1;
  }
  return a.roleName.localeCompare(b.roleName) || a.scope.localeCompare(b.scope);
}

/**
 * Last path segment of a role definition id, used when the name is unknown
 */
export function roleDefinitionGuid(roleDefinitionId: string): string {
  const segments = roleDefinitionId.split('/').filter(segment => segment.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : roleDefinitionId;
}
