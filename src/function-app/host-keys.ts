/**
 * Function App host keys
 *
 * Creates or replaces a named key on a Function App host. Without a value
 * the platform generates one.
 */

import { ArgumentError } from '../errors.js';
import { getLogger } from '../utils/logger.js';

export const HOST_KEY_TYPES = ['functionKeys', 'systemKeys'] as const;
export type HostKeyType = (typeof HOST_KEY_TYPES)[number];

export interface HostKeyTarget {
  resourceGroupName: string;
  functionAppName: string;
}

export interface HostKeyRequest extends HostKeyTarget {
  keyType: HostKeyType;
  keyName: string;
  keyValue?: string;
}

export interface HostKeyResult {
  name: string;
  value?: string;
}

export interface HostKeyGateway {
  createOrUpdateHostKey(request: HostKeyRequest): Promise<HostKeyResult>;
}

export function parseHostKeyType(value: string | undefined): HostKeyType {
  if (value === undefined) {
    return 'functionKeys';
  }
  const match = HOST_KEY_TYPES.find(type => type.toLowerCase() === value.trim().toLowerCase());
  if (!match) {
    throw new ArgumentError(`Invalid host key type '${value}' (expected ${HOST_KEY_TYPES.join(' or ')})`);
  }
  return match;
}

/**
 * Show only the last 4 characters of a secret
 */
export function maskSecret(value: string | undefined): string {
  if (!value) {
    return '(none)';
  }
  if (value.length <= 4) {
    return '*'.repeat(value.length);
  }
  return `${'*'.repeat(Math.min(value.length - 4, 8))}${value.slice(-4)}`;
}

export async function setHostKey(gateway: HostKeyGateway, request: HostKeyRequest): Promise<HostKeyResult> {
  const logger = getLogger();
  const source = request.keyValue ? 'provided value' : 'generated value';

  logger.info(
    `Setting ${request.keyType} '${request.keyName}' on ${request.functionAppName} ` +
      `(resource group ${request.resourceGroupName}, ${source})`
  );

  const result = await gateway.createOrUpdateHostKey(request);

  logger.success(`Host key '${result.name}' set (value ${maskSecret(result.value)})`);
  return result;
}
