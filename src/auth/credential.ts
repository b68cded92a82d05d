import {
  DefaultAzureCredential,
  DeviceCodeCredential,
  type DeviceCodeInfo,
  type TokenCredential,
} from '@azure/identity';
import { getLogger } from '../utils/logger.js';

export interface CredentialOptions {
  tenantId?: string;
  useDeviceAuthentication?: boolean;
}

export type CredentialKind = 'device-code' | 'default';

export function selectCredentialKind(options: CredentialOptions): CredentialKind {
  return options.useDeviceAuthentication ? 'device-code' : 'default';
}

/**
 * Build the credential every SDK client in a run shares.
 *
 * Device code sign-in prints its prompt through the logger; everything else
 * goes through DefaultAzureCredential (environment, managed identity, Azure CLI).
 */
export function createCredential(options: CredentialOptions): TokenCredential {
  const logger = getLogger();
  const kind = selectCredentialKind(options);

  if (kind === 'device-code') {
    logger.info('🔐 Using device code authentication');
    return new DeviceCodeCredential({
      tenantId: options.tenantId,
      userPromptCallback: (info: DeviceCodeInfo) => {
        logger.output(`\n${info.message}\n`);
      },
    });
  }

  logger.debug('Using DefaultAzureCredential');
  return new DefaultAzureCredential(options.tenantId ? { tenantId: options.tenantId } : {});
}
