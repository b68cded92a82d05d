import { MissingRequiredFieldError } from '../errors.js';
import { getLogger } from '../utils/logger.js';
import type { DirectoryGateway } from './types.js';

export interface PrincipalReference {
  objectId?: string;
  userPrincipalName?: string;
}

/**
 * Object id wins over UPN. A UPN is resolved through the directory.
 */
export async function resolvePrincipalId(
  gateway: DirectoryGateway,
  principal: PrincipalReference
): Promise<string> {
  const logger = getLogger();

  if (principal.objectId) {
    return principal.objectId;
  }

  if (!principal.userPrincipalName) {
    throw new MissingRequiredFieldError('principal.objectId', 'or principal.upn');
  }

  logger.info(`Resolving object ID for ${principal.userPrincipalName}`);
  const objectId = await gateway.getUserObjectId(principal.userPrincipalName);

  if (!objectId) {
    throw new MissingRequiredFieldError(
      'principal.objectId',
      `directory returned no object ID for ${principal.userPrincipalName}`
    );
  }

  logger.debug(`${principal.userPrincipalName} -> ${objectId}`);
  return objectId;
}
