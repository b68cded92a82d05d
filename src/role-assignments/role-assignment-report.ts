import { getLogger } from '../utils/logger.js';
import { classifyAssignments } from './classify.js';
import type { AuthorizationGateway, ClassifiedAssignment } from './types.js';

/**
 * List a principal's role assignments that apply to a resource, with role names
 * and direct/inherited classification.
 */
export async function listClassifiedAssignments(
  gateway: AuthorizationGateway,
  resourceScope: string,
  principalId: string
): Promise<ClassifiedAssignment[]> {
  const logger = getLogger();

  const assignments = await gateway.listRoleAssignments(resourceScope, principalId);
  logger.debug(`Found ${assignments.length} role assignment(s) for ${principalId}`);

  // One definition lookup per distinct role
  const roleNames = new Map<string, string>();
  for (const roleDefinitionId of new Set(assignments.map(a => a.roleDefinitionId))) {
    const roleName = await gateway.getRoleDefinitionName(roleDefinitionId);
    if (roleName) {
      roleNames.set(roleDefinitionId, roleName);
    } else {
      logger.warn(`Role definition has no name: ${roleDefinitionId}`);
    }
  }

  return classifyAssignments(assignments, resourceScope, roleNames);
}
