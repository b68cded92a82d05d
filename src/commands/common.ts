import type { TokenCredential } from '@azure/identity';
import { createCredential, type CredentialOptions } from '../auth/credential.js';
import type { CommonOptions } from '../cli/args.js';
import { azureGateways, type GatewayFactory } from '../clients/azure-clients.js';
import type { ConfigDocument } from '../config/config-document.js';
import type { ConfigLocation } from '../config/config-locator.js';
import { mergeFlag, mergeValue } from '../config/precedence.js';
import { applySubscriptionContext, type AzureContext } from '../context/context-setter.js';
import { ToolkitError } from '../errors.js';
import { getLogger } from '../utils/logger.js';

const ARM_SCOPE = 'https://management.azure.com/.default';

export interface CommandDependencies {
  createCredential: (options: CredentialOptions) => TokenCredential;
  gateways: GatewayFactory;
}

export const defaultDependencies: CommandDependencies = {
  createCredential,
  gateways: azureGateways,
};

export interface ContextParameters {
  subscriptionId?: string;
  tenantId?: string;
  useDeviceAuthentication: boolean;
}

export interface Session {
  credential: TokenCredential;
  context?: AzureContext;
}

export function configLocation(options: CommonOptions, prefix: string): ConfigLocation {
  return {
    explicitPath: options.configPath,
    name: options.configName,
    directory: options.configDir,
    prefix,
  };
}

/**
 * context.subscriptionId falls back to the legacy context.defaultSubscriptionId
 */
export function resolveContextParameters(
  options: CommonOptions,
  document: ConfigDocument | undefined
): ContextParameters {
  return {
    subscriptionId: mergeValue(options.subscriptionId, document, 'context', 'subscriptionId', 'defaultSubscriptionId'),
    tenantId: mergeValue(options.tenantId, document, 'context', 'tenantId'),
    useDeviceAuthentication: mergeFlag(options.deviceAuth, document, 'auth', 'useDeviceAuthentication') ?? false,
  };
}

/**
 * Acquire a management token up front so sign-in problems surface before any other call
 */
export async function authenticate(credential: TokenCredential): Promise<void> {
  const token = await credential.getToken(ARM_SCOPE);
  if (!token) {
    throw new ToolkitError('Authentication returned no access token');
  }
}

export async function openSession(parameters: ContextParameters, deps: CommandDependencies): Promise<Session> {
  const credential = deps.createCredential({
    tenantId: parameters.tenantId,
    useDeviceAuthentication: parameters.useDeviceAuthentication,
  });

  await authenticate(credential);
  getLogger().debug('Authenticated');

  const context = await applySubscriptionContext(parameters.subscriptionId, deps.gateways.subscriptions(credential));
  return { credential, context };
}
