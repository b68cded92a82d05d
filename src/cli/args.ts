import { ArgumentError } from '../errors.js';

/**
 * Flags every script accepts
 */
export interface CommonOptions {
  configPath?: string;
  configName?: string;
  configDir?: string;
  subscriptionId?: string;
  tenantId?: string;
  deviceAuth?: boolean;
  help: boolean;
}

export const COMMON_HELP = `Config:
  --config-path <path>      Read this config file
  --config-name <name>      Read <prefix>.<name>.json from the config directory
  --config-dir <dir>        Config directory (default: $AZ_TOOLKIT_CONFIG_DIR or ./config)

Context:
  --subscription-id <id>    Subscription (overrides context.subscriptionId)
  --tenant-id <id>          Tenant (overrides context.tenantId)
  --device-auth             Sign in with a device code
  --no-device-auth          Never use device code sign-in, even if the config asks for it

  --help, -h                Show help`;

/**
 * Value following a flag. Another flag or the end of the list is an error.
 */
export function takeValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ArgumentError(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Apply args[index] if it is one of the common flags.
 * Returns the index of the last consumed argument, or undefined if the flag is not a common one.
 */
export function parseCommonOption(
  args: readonly string[],
  index: number,
  options: CommonOptions
): number | undefined {
  const flag = args[index];

  switch (flag) {
    case '--config-path':
      options.configPath = takeValue(args, index, flag);
      return index + 1;
    case '--config-name':
      options.configName = takeValue(args, index, flag);
      return index + 1;
    case '--config-dir':
      options.configDir = takeValue(args, index, flag);
      return index + 1;
    case '--subscription-id':
      options.subscriptionId = takeValue(args, index, flag);
      return index + 1;
    case '--tenant-id':
      options.tenantId = takeValue(args, index, flag);
      return index + 1;
    case '--device-auth':
      options.deviceAuth = true;
      return index;
    case '--no-device-auth':
      options.deviceAuth = false;
      return index;
    case '--help':
    case '-h':
      options.help = true;
      return index;
    default:
      return undefined;
  }
}

export function unknownArgument(arg: string): ArgumentError {
  return arg.startsWith('-')
    ? new ArgumentError(`Unknown option: ${arg}`)
    : new ArgumentError(`Unexpected argument: ${arg} (all values are passed as named flags)`);
}
