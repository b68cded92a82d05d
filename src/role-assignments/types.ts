export interface ResourceQuery {
  name: string;
  /** e.g. Microsoft.Web/sites */
  resourceType?: string;
  resourceGroup?: string;
}

export interface ResourceSummary {
  id: string;
  name: string;
  type: string;
  location?: string;
}

export interface RoleAssignmentRecord {
  id: string;
  scope: string;
  roleDefinitionId: string;
  principalId: string;
  principalType?: string;
  condition?: string;
}

export type AssignmentKind = 'direct' | 'inherited';

export interface ClassifiedAssignment extends RoleAssignmentRecord {
  roleName: string;
  kind: AssignmentKind;
}

export interface ResourceGateway {
  findResources(query: ResourceQuery): Promise<ResourceSummary[]>;
}

export interface AuthorizationGateway {
  /** Assignments for the principal at, above and below the scope */
  listRoleAssignments(scope: string, principalId: string): Promise<RoleAssignmentRecord[]>;
  getRoleDefinitionName(roleDefinitionId: string): Promise<string | undefined>;
}

export interface DirectoryGateway {
  getUserObjectId(userPrincipalName: string): Promise<string | undefined>;
}
