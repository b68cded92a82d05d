import { COMMON_HELP, parseCommonOption, takeValue, unknownArgument, type CommonOptions } from '../cli/args.js';
import type { ConfigDocument } from '../config/config-document.js';
import { loadConfig } from '../config/load-config.js';
import { isEmpty, mergeValue, requireValue } from '../config/precedence.js';
import { MissingRequiredFieldError } from '../errors.js';
import { formatAssignmentJson, formatAssignmentTable } from '../role-assignments/format.js';
import { resolvePrincipalId, type PrincipalReference } from '../role-assignments/principal-lookup.js';
import { findResource } from '../role-assignments/resource-lookup.js';
import { listClassifiedAssignments } from '../role-assignments/role-assignment-report.js';
import type { ClassifiedAssignment, ResourceQuery, ResourceSummary } from '../role-assignments/types.js';
import { getLogger } from '../utils/logger.js';
import {
  configLocation,
  defaultDependencies,
  openSession,
  resolveContextParameters,
  type CommandDependencies,
  type ContextParameters,
} from './common.js';

export const ROLE_ASSIGNMENTS_CONFIG_PREFIX = 'Get-RoleAssignments';

export interface RoleAssignmentsOptions extends CommonOptions {
  resourceName?: string;
  resourceType?: string;
  resourceGroup?: string;
  upn?: string;
  objectId?: string;
  json: boolean;
}

export interface RoleAssignmentsParameters extends ContextParameters {
  subscriptionId: string;
  resource: ResourceQuery;
  principal: PrincipalReference;
  json: boolean;
}

export interface RoleAssignmentsResult {
  resourceId: string;
  principalId: string;
  assignments: ClassifiedAssignment[];
}

export function parseRoleAssignmentsArgs(args: readonly string[]): RoleAssignmentsOptions {
  const options: RoleAssignmentsOptions = { help: false, json: false };

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    switch (flag) {
      case '--resource-name':
        options.resourceName = takeValue(args, i++, flag);
        break;
      case '--resource-type':
        options.resourceType = takeValue(args, i++, flag);
        break;
      case '--resource-group':
        options.resourceGroup = takeValue(args, i++, flag);
        break;
      case '--upn':
        options.upn = takeValue(args, i++, flag);
        break;
      case '--object-id':
        options.objectId = takeValue(args, i++, flag);
        break;
      case '--json':
        options.json = true;
        break;
      default: {
        const consumed = parseCommonOption(args, i, options);
        if (consumed === undefined) {
          throw unknownArgument(flag);
        }
        i = consumed;
      }
    }
  }

  return options;
}

/**
 * Principal flags are taken as a pair: when either --upn or --object-id is
 * given, the config's principal section is ignored.
 */
export function resolveRoleAssignmentsParameters(
  options: RoleAssignmentsOptions,
  document: ConfigDocument | undefined
): Readonly<RoleAssignmentsParameters> {
  const context = resolveContextParameters(options, document);
  const principalSource = isEmpty(options.objectId) && isEmpty(options.upn) ? document : undefined;

  const principal: PrincipalReference = {
    objectId: mergeValue(options.objectId, principalSource, 'principal', 'objectId'),
    userPrincipalName: mergeValue(options.upn, principalSource, 'principal', 'upn'),
  };

  if (!principal.objectId && !principal.userPrincipalName) {
    throw new MissingRequiredFieldError('principal.objectId or principal.upn', '--object-id or --upn');
  }

  return Object.freeze({
    ...context,
    subscriptionId: requireValue(context.subscriptionId, 'context.subscriptionId', '--subscription-id'),
    resource: {
      name: requireValue(
        mergeValue(options.resourceName, document, 'lookup', 'resourceName'),
        'lookup.resourceName',
        '--resource-name'
      ),
      resourceType: mergeValue(options.resourceType, document, 'lookup', 'resourceType'),
      resourceGroup: mergeValue(options.resourceGroup, document, 'lookup', 'resourceGroup'),
    },
    principal,
    json: options.json,
  });
}

async function lookUpAssignments(options: RoleAssignmentsOptions, deps: CommandDependencies) {
  const { document } = await loadConfig(configLocation(options, ROLE_ASSIGNMENTS_CONFIG_PREFIX));
  const parameters = resolveRoleAssignmentsParameters(options, document);

  const { credential } = await openSession(parameters, deps);

  const resource = await findResource(
    deps.gateways.resources(credential, parameters.subscriptionId),
    parameters.resource
  );
  const principalId = await resolvePrincipalId(deps.gateways.directory(credential), parameters.principal);
  const assignments = await listClassifiedAssignments(
    deps.gateways.authorization(credential, parameters.subscriptionId),
    resource.id,
    principalId
  );

  return { resource, principalId, assignments };
}

/**
 * Print the role assignments a principal holds on a resource
 */
export async function runRoleAssignments(
  options: RoleAssignmentsOptions,
  deps: CommandDependencies = defaultDependencies
): Promise<RoleAssignmentsResult> {
  const logger = getLogger();

  // stdout carries only the JSON document
  logger.setConsoleEnabled(!options.json);
  let lookup: { resource: ResourceSummary; principalId: string; assignments: ClassifiedAssignment[] };
  try {
    lookup = await lookUpAssignments(options, deps);
  } finally {
    logger.setConsoleEnabled(true);
  }
  const { resource, principalId, assignments } = lookup;

  if (options.json) {
    logger.output(formatAssignmentJson(assignments));
  } else if (assignments.length === 0) {
    logger.info(`No role assignments found for ${principalId} on ${resource.id}`);
  } else {
    const direct = assignments.filter(a => a.kind === 'direct').length;
    logger.output(`\nResource:  ${resource.id}`);
    logger.output(`Principal: ${principalId}`);
    logger.output(`Found ${assignments.length} assignment(s): ${direct} direct, ${assignments.length - direct} inherited\n`);
    logger.output(formatAssignmentTable(assignments));
  }

  return { resourceId: resource.id, principalId, assignments };
}

export function printRoleAssignmentsHelp(): void {
  console.log(`
Get Role Assignments - List a principal's role assignments on a resource

Usage: npm run get-role-assignments -- [options]

Reads ${ROLE_ASSIGNMENTS_CONFIG_PREFIX}.<name>.json when --config-name is given.

Options:
  --resource-name <name>    Resource to inspect (lookup.resourceName)
  --resource-type <type>    Narrow by type, e.g. Microsoft.Web/sites (lookup.resourceType)
  --resource-group <name>   Narrow by resource group (lookup.resourceGroup)
  --object-id <id>          Principal object ID (principal.objectId)
  --upn <upn>               User principal name (principal.upn); ignored when an object ID is set
  --json                    Print only the assignments, as JSON (status lines are suppressed)

Assignments made at the resource scope are reported as Direct, all others as
Inherited. Only the scope is compared.

${COMMON_HELP}
`);
}
