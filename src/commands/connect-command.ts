import { COMMON_HELP, parseCommonOption, unknownArgument, type CommonOptions } from '../cli/args.js';
import type { ConfigDocument } from '../config/config-document.js';
import { loadConfig } from '../config/load-config.js';
import type { AzureContext } from '../context/context-setter.js';
import { getLogger } from '../utils/logger.js';
import {
  configLocation,
  defaultDependencies,
  openSession,
  resolveContextParameters,
  type CommandDependencies,
  type ContextParameters,
} from './common.js';

export const CONNECT_CONFIG_PREFIX = 'Connect-AzToolkit';

export type ConnectOptions = CommonOptions;

export function parseConnectArgs(args: readonly string[]): ConnectOptions {
  const options: ConnectOptions = { help: false };

  for (let i = 0; i < args.length; i++) {
    const consumed = parseCommonOption(args, i, options);
    if (consumed === undefined) {
      throw unknownArgument(args[i]);
    }
    i = consumed;
  }

  return options;
}

export function resolveConnectParameters(
  options: ConnectOptions,
  document: ConfigDocument | undefined
): Readonly<ContextParameters> {
  return Object.freeze(resolveContextParameters(options, document));
}

export function formatContext(context: AzureContext): string {
  return [
    `  Subscription: ${context.subscriptionName ?? '(unnamed)'}`,
    `  ID:           ${context.subscriptionId}`,
    `  Tenant:       ${context.tenantId ?? '(unknown)'}`,
    `  State:        ${context.state ?? '(unknown)'}`,
  ].join('\n');
}

/**
 * Sign in and select the configured subscription
 */
export async function runConnect(
  options: ConnectOptions,
  deps: CommandDependencies = defaultDependencies
): Promise<AzureContext | undefined> {
  const logger = getLogger();
  const { document } = await loadConfig(configLocation(options, CONNECT_CONFIG_PREFIX));
  const parameters = resolveConnectParameters(options, document);

  const session = await openSession(parameters, deps);

  if (!session.context) {
    logger.success(
      parameters.tenantId ? `Authenticated against tenant ${parameters.tenantId}` : 'Authenticated'
    );
    return undefined;
  }

  logger.output('\nCurrent context:');
  logger.output(formatContext(session.context));
  return session.context;
}

export function printConnectHelp(): void {
  console.log(`
Connect - Sign in and select a subscription

Usage: npm run connect -- [options]

Reads ${CONNECT_CONFIG_PREFIX}.<name>.json when --config-name is given.

Config keys:
  context.subscriptionId        Subscription to select (legacy alias: context.defaultSubscriptionId)
  context.tenantId              Tenant to sign in to
  auth.useDeviceAuthentication  Use device code sign-in

${COMMON_HELP}
`);
}
