import { getLogger } from '../utils/logger.js';
import type { ConfigDocument } from './config-document.js';
import { resolveConfigPath, type ConfigLocation } from './config-locator.js';
import { readConfigDocument } from './config-reader.js';

export interface LoadedConfig {
  path?: string;
  document?: ConfigDocument;
}

/**
 * Locate and read a script's config file in one step
 */
export async function loadConfig(location: ConfigLocation): Promise<LoadedConfig> {
  const logger = getLogger();
  const configPath = resolveConfigPath(location);

  if (!configPath) {
    logger.debug('No config file requested, using command-line values only');
    return {};
  }

  const document = await readConfigDocument(configPath);
  logger.info(`Using config: ${configPath}`);
  return { path: configPath, document };
}
