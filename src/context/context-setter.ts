import { getLogger } from '../utils/logger.js';

/**
 * The subscription/tenant selection later calls run against
 */
export interface AzureContext {
  subscriptionId: string;
  subscriptionName?: string;
  tenantId?: string;
  state?: string;
}

export interface SubscriptionGateway {
  getSubscription(subscriptionId: string): Promise<AzureContext>;
}

/**
 * Select the subscription for the rest of the run.
 * No subscription id is a no-op; platform errors are not caught.
 */
export async function applySubscriptionContext(
  subscriptionId: string | undefined,
  gateway: SubscriptionGateway
): Promise<AzureContext | undefined> {
  const logger = getLogger();

  if (!subscriptionId) {
    logger.info('No subscription ID provided, skipping context selection');
    return undefined;
  }

  logger.debug(`Selecting subscription ${subscriptionId}`);
  const context = await gateway.getSubscription(subscriptionId);
  logger.success(`Context set: ${describeContext(context)}`);
  return context;
}

export function describeContext(context: AzureContext): string {
  const name = context.subscriptionName ? `${context.subscriptionName} (${context.subscriptionId})` : context.subscriptionId;
  return context.tenantId ? `${name} in tenant ${context.tenantId}` : name;
}
