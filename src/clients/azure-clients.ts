/**
 * Azure SDK clients
 *
 * Each gateway wraps one management-plane (or Graph) client behind the narrow
 * interface its command needs. Every client is built from the run's explicit
 * credential; nothing depends on an ambient CLI login.
 */

import type { TokenCredential } from '@azure/identity';
import { SubscriptionClient } from '@azure/arm-subscriptions';
import { WebSiteManagementClient } from '@azure/arm-appservice';
import { ResourceManagementClient, type GenericResourceExpanded } from '@azure/arm-resources';
import { AuthorizationManagementClient } from '@azure/arm-authorization';
import { Client } from '@microsoft/microsoft-graph-client';
import { TokenCredentialAuthenticationProvider } from '@microsoft/microsoft-graph-client/authProviders/azureTokenCredentials/index.js';
import type { SubscriptionGateway } from '../context/context-setter.js';
import type { HostKeyGateway } from '../function-app/host-keys.js';
import type {
  AuthorizationGateway,
  DirectoryGateway,
  ResourceGateway,
  ResourceSummary,
  RoleAssignmentRecord,
} from '../role-assignments/types.js';

const GRAPH_SCOPES = ['https://graph.microsoft.com/.default'];

export interface GatewayFactory {
  subscriptions(credential: TokenCredential): SubscriptionGateway;
  hostKeys(credential: TokenCredential, subscriptionId: string): HostKeyGateway;
  resources(credential: TokenCredential, subscriptionId: string): ResourceGateway;
  authorization(credential: TokenCredential, subscriptionId: string): AuthorizationGateway;
  directory(credential: TokenCredential): DirectoryGateway;
}

/**
 * Quote a value for an OData $filter
 */
export function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function createSubscriptionGateway(credential: TokenCredential): SubscriptionGateway {
  const client = new SubscriptionClient(credential);

  return {
    async getSubscription(subscriptionId) {
      const subscription = await client.subscriptions.get(subscriptionId);
      return {
        subscriptionId: subscription.subscriptionId ?? subscriptionId,
        subscriptionName: subscription.displayName,
        tenantId: subscription.tenantId,
        state: subscription.state,
      };
    },
  };
}

export function createHostKeyGateway(credential: TokenCredential, subscriptionId: string): HostKeyGateway {
  const client = new WebSiteManagementClient(credential, subscriptionId);

  return {
    async createOrUpdateHostKey(request) {
      const key = await client.webApps.createOrUpdateHostSecret(
        request.resourceGroupName,
        request.functionAppName,
        request.keyType,
        request.keyName,
        { name: request.keyName, value: request.keyValue }
      );
      return { name: key.name ?? request.keyName, value: key.value };
    },
  };
}

function toResourceSummary(resource: GenericResourceExpanded): ResourceSummary | undefined {
  if (!resource.id || !resource.name || !resource.type) {
    return undefined;
  }
  return { id: resource.id, name: resource.name, type: resource.type, location: resource.location };
}

export function createResourceGateway(credential: TokenCredential, subscriptionId: string): ResourceGateway {
  const client = new ResourceManagementClient(credential, subscriptionId);

  return {
    async findResources(query) {
      const options = { filter: `name eq ${odataString(query.name)}` };
      const pages = query.resourceGroup
        ? client.resources.listByResourceGroup(query.resourceGroup, options)
        : client.resources.list(options);

      const wantedType = query.resourceType?.toLowerCase();
      const matches: ResourceSummary[] = [];

      for await (const resource of pages) {
        const summary = toResourceSummary(resource);
        if (!summary) continue;
        if (wantedType && summary.type.toLowerCase() !== wantedType) continue;
        matches.push(summary);
      }

      return matches;
    },
  };
}

export function createAuthorizationGateway(credential: TokenCredential, subscriptionId: string): AuthorizationGateway {
  const client = new AuthorizationManagementClient(credential, subscriptionId);

  return {
    async listRoleAssignments(scope, principalId) {
      const records: RoleAssignmentRecord[] = [];
      const pages = client.roleAssignments.listForScope(scope, {
        filter: `principalId eq ${odataString(principalId)}`,
      });

      for await (const assignment of pages) {
        if (!assignment.id || !assignment.scope || !assignment.roleDefinitionId) continue;
        records.push({
          id: assignment.id,
          scope: assignment.scope,
          roleDefinitionId: assignment.roleDefinitionId,
          principalId: assignment.principalId ?? principalId,
          principalType: assignment.principalType,
          condition: assignment.condition,
        });
      }

      return records;
    },

    async getRoleDefinitionName(roleDefinitionId) {
      const definition = await client.roleDefinitions.getById(roleDefinitionId);
      return definition.roleName;
    },
  };
}

export function createDirectoryGateway(credential: TokenCredential): DirectoryGateway {
  const authProvider = new TokenCredentialAuthenticationProvider(credential, { scopes: GRAPH_SCOPES });
  const client = Client.initWithMiddleware({ authProvider });

  return {
    async getUserObjectId(userPrincipalName) {
      const user: { id?: string } = await client
        .api(`/users/${encodeURIComponent(userPrincipalName)}`)
        .select('id,userPrincipalName')
        .get();
      return user.id;
    },
  };
}

export const azureGateways: GatewayFactory = {
  subscriptions: createSubscriptionGateway,
  hostKeys: createHostKeyGateway,
  resources: createResourceGateway,
  authorization: createAuthorizationGateway,
  directory: createDirectoryGateway,
};
