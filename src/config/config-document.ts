/**
 * Config Document
 *
 * A parsed JSON config file. Sections are looked up by path and every
 * accessor returns undefined instead of throwing when a node is missing
 * or has the wrong shape.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type ConfigDocument = JsonObject;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a section path such as "context" or "functionApp.settings" into keys
 */
export function splitSectionPath(sectionPath: string | readonly string[]): string[] {
  if (typeof sectionPath !== 'string') {
    return [...sectionPath];
  }
  return sectionPath.split('.').filter(part => part.length > 0);
}

export function getSection(
  document: ConfigDocument | undefined,
  sectionPath: string | readonly string[]
): JsonObject | undefined {
  let node: JsonValue | undefined = document;

  for (const key of splitSectionPath(sectionPath)) {
    if (!isJsonObject(node)) {
      return undefined;
    }
    node = node[key];
  }

  return isJsonObject(node) ? node : undefined;
}

export function getValue(
  document: ConfigDocument | undefined,
  sectionPath: string | readonly string[],
  key: string
): JsonValue | undefined {
  const section = getSection(document, sectionPath);
  if (!section || !Object.prototype.hasOwnProperty.call(section, key)) {
    return undefined;
  }
  return section[key];
}

/**
 * Read a scalar as a string. Numbers are converted, objects and arrays are not.
 */
export function getString(
  document: ConfigDocument | undefined,
  sectionPath: string | readonly string[],
  key: string
): string | undefined {
  const value = getValue(document, sectionPath, key);
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

export function getBoolean(
  document: ConfigDocument | undefined,
  sectionPath: string | readonly string[],
  key: string
): boolean | undefined {
  const value = getValue(document, sectionPath, key);
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return undefined;
}
