import fs from 'fs/promises';
import { ConfigParseError, errorMessage } from '../errors.js';
import { isJsonObject, type ConfigDocument, type JsonValue } from './config-document.js';

const BYTE_ORDER_MARK = '\uFEFF';
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Parse config text. The top-level value must be an object.
 */
export function parseConfigDocument(content: string, sourcePath: string): ConfigDocument {
  const text = content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigParseError(sourcePath, errorMessage(error));
  }

  if (!isJsonObject(parsed)) {
    const actual = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
    throw new ConfigParseError(sourcePath, `expected a JSON object at the top level, found ${actual}`);
  }

  return parsed;
}

/**
 * Load a config document. No path means no config, which is not an error.
 */
export async function readConfigDocument(configPath: string | undefined): Promise<ConfigDocument | undefined> {
  if (configPath === undefined) {
    return undefined;
  }

  let content: string;
  try {
    const bytes = await fs.readFile(configPath);
    content = utf8.decode(bytes);
  } catch (error) {
    throw new ConfigParseError(configPath, errorMessage(error));
  }

  return parseConfigDocument(content, configPath);
}
