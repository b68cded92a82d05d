import { ResourceLookupError } from '../errors.js';
import { getLogger } from '../utils/logger.js';
import type { ResourceGateway, ResourceQuery, ResourceSummary } from './types.js';

export function describeQuery(query: ResourceQuery): string {
  const parts = [`name '${query.name}'`];
  if (query.resourceType) parts.push(`type '${query.resourceType}'`);
  if (query.resourceGroup) parts.push(`resource group '${query.resourceGroup}'`);
  return parts.join(', ');
}

/**
 * Find exactly one resource. Zero or several matches are fatal.
 */
export async function findResource(gateway: ResourceGateway, query: ResourceQuery): Promise<ResourceSummary> {
  const logger = getLogger();
  logger.info(`Looking up resource with ${describeQuery(query)}`);

  const matches = await gateway.findResources(query);

  if (matches.length === 0) {
    throw new ResourceLookupError(`No resource found with ${describeQuery(query)}`);
  }

  if (matches.length > 1) {
    const ids = matches.map(resource => resource.id);
    throw new ResourceLookupError(
      `${matches.length} resources match ${describeQuery(query)}; narrow the lookup with a type or resource group:\n` +
        ids.map(id => `  - ${id}`).join('\n'),
      ids
    );
  }

  const [resource] = matches;
  logger.debug(`Resource found: ${resource.id}`);
  return resource;
}
