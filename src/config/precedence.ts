/**
 * Precedence Merge
 *
 * Every script parameter resolves in the same order:
 *   1. explicit command-line value
 *   2. primary key in the config section
 *   3. legacy alias key in the same section
 *   4. absent
 */

import { MissingRequiredFieldError } from '../errors.js';
import { getBoolean, getString, type ConfigDocument } from './config-document.js';

export function isEmpty(value: string | null | undefined): value is '' | null | undefined {
  return value === undefined || value === null || value.trim() === '';
}

export function mergeValue(
  explicitValue: string | null | undefined,
  document: ConfigDocument | undefined,
  sectionPath: string | readonly string[],
  primaryKey: string,
  aliasKey?: string
): string | undefined {
  if (!isEmpty(explicitValue)) {
    return explicitValue;
  }

  const primary = getString(document, sectionPath, primaryKey);
  if (!isEmpty(primary)) {
    return primary;
  }

  if (aliasKey) {
    const alias = getString(document, sectionPath, aliasKey);
    if (!isEmpty(alias)) {
      return alias;
    }
  }

  return undefined;
}

export function mergeFlag(
  explicitValue: boolean | undefined,
  document: ConfigDocument | undefined,
  sectionPath: string | readonly string[],
  primaryKey: string
): boolean | undefined {
  if (explicitValue !== undefined) {
    return explicitValue;
  }
  return getBoolean(document, sectionPath, primaryKey);
}

export function requireValue(value: string | undefined, field: string, hint?: string): string {
  if (isEmpty(value)) {
    throw new MissingRequiredFieldError(field, hint);
  }
  return value;
}
