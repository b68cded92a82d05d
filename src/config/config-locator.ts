import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigNotFoundError } from '../errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface ConfigLocation {
  /** Used verbatim when given; no existence check */
  explicitPath?: string;
  /** Config name, e.g. "prod" in Connect-AzToolkit.prod.json */
  name?: string;
  directory?: string;
  /** File name prefix, normally the script's config prefix */
  prefix: string;
}

/**
 * Directory searched for named configs when none is given.
 * `config/` at the package root, from both src/ and dist/.
 */
export function getDefaultConfigDirectory(): string {
  const fromEnv = process.env.AZ_TOOLKIT_CONFIG_DIR;
  if (fromEnv && fromEnv.trim()) {
    return path.resolve(fromEnv.trim());
  }
  return path.resolve(__dirname, '..', '..', 'config');
}

export function getConfigFileName(prefix: string, name: string): string {
  return `${prefix}.${name}.json`;
}

/**
 * Resolve which config file a script should read.
 * Returns undefined when neither an explicit path nor a name was given.
 */
export function resolveConfigPath(location: ConfigLocation): string | undefined {
  if (location.explicitPath && location.explicitPath.trim()) {
    return location.explicitPath;
  }

  if (!location.name || !location.name.trim()) {
    return undefined;
  }

  const directory = location.directory ?? getDefaultConfigDirectory();
  const candidate = path.join(directory, getConfigFileName(location.prefix, location.name.trim()));

  if (!fs.existsSync(candidate)) {
    throw new ConfigNotFoundError(candidate);
  }

  return candidate;
}
