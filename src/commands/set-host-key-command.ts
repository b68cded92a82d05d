import { COMMON_HELP, parseCommonOption, takeValue, unknownArgument, type CommonOptions } from '../cli/args.js';
import type { ConfigDocument } from '../config/config-document.js';
import { loadConfig } from '../config/load-config.js';
import { mergeValue, requireValue } from '../config/precedence.js';
import {
  HOST_KEY_TYPES,
  maskSecret,
  parseHostKeyType,
  setHostKey,
  type HostKeyRequest,
  type HostKeyResult,
} from '../function-app/host-keys.js';
import { getLogger } from '../utils/logger.js';
import {
  configLocation,
  defaultDependencies,
  openSession,
  resolveContextParameters,
  type CommandDependencies,
  type ContextParameters,
} from './common.js';

export const SET_HOST_KEY_CONFIG_PREFIX = 'Set-FunctionHostKey';

export interface SetHostKeyOptions extends CommonOptions {
  resourceGroup?: string;
  functionApp?: string;
  keyName?: string;
  keyValue?: string;
  keyType?: string;
}

export interface SetHostKeyParameters extends ContextParameters, HostKeyRequest {
  subscriptionId: string;
}

export function parseSetHostKeyArgs(args: readonly string[]): SetHostKeyOptions {
  const options: SetHostKeyOptions = { help: false };

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    switch (flag) {
      case '--resource-group':
        options.resourceGroup = takeValue(args, i++, flag);
        break;
      case '--function-app':
        options.functionApp = takeValue(args, i++, flag);
        break;
      case '--key-name':
        options.keyName = takeValue(args, i++, flag);
        break;
      case '--key-value':
        options.keyValue = takeValue(args, i++, flag);
        break;
      case '--key-type':
        options.keyType = takeValue(args, i++, flag);
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

export function resolveSetHostKeyParameters(
  options: SetHostKeyOptions,
  document: ConfigDocument | undefined
): Readonly<SetHostKeyParameters> {
  const context = resolveContextParameters(options, document);

  return Object.freeze({
    ...context,
    subscriptionId: requireValue(context.subscriptionId, 'context.subscriptionId', '--subscription-id'),
    resourceGroupName: requireValue(
      mergeValue(options.resourceGroup, document, 'functionApp', 'resourceGroupName'),
      'functionApp.resourceGroupName',
      '--resource-group'
    ),
    functionAppName: requireValue(
      mergeValue(options.functionApp, document, 'functionApp', 'name'),
      'functionApp.name',
      '--function-app'
    ),
    keyName: requireValue(mergeValue(options.keyName, document, 'hostKey', 'name'), 'hostKey.name', '--key-name'),
    keyValue: mergeValue(options.keyValue, document, 'hostKey', 'value'),
    keyType: parseHostKeyType(mergeValue(options.keyType, document, 'hostKey', 'type')),
  });
}

/**
 * Create or update a Function App host key
 */
export async function runSetHostKey(
  options: SetHostKeyOptions,
  deps: CommandDependencies = defaultDependencies
): Promise<HostKeyResult> {
  const logger = getLogger();
  const { document } = await loadConfig(configLocation(options, SET_HOST_KEY_CONFIG_PREFIX));
  const parameters = resolveSetHostKeyParameters(options, document);

  const session = await openSession(parameters, deps);
  const gateway = deps.gateways.hostKeys(session.credential, parameters.subscriptionId);
  const result = await setHostKey(gateway, parameters);

  logger.output(`\n  Function App: ${parameters.functionAppName}`);
  logger.output(`  Key type:     ${parameters.keyType}`);
  logger.output(`  Key name:     ${result.name}`);
  logger.output(`  Key value:    ${maskSecret(result.value)}`);
  return result;
}

export function printSetHostKeyHelp(): void {
  console.log(`
Set Host Key - Create or update a Function App host key

Usage: npm run set-host-key -- [options]

Reads ${SET_HOST_KEY_CONFIG_PREFIX}.<name>.json when --config-name is given.

Options:
  --resource-group <name>   Resource group (functionApp.resourceGroupName)
  --function-app <name>     Function App name (functionApp.name)
  --key-name <name>         Host key name (hostKey.name)
  --key-value <value>       Key value (hostKey.value); generated when omitted
  --key-type <type>         ${HOST_KEY_TYPES.join(' | ')} (hostKey.type, default functionKeys)

${COMMON_HELP}
`);
}
