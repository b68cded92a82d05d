import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigParseError } from '../errors.js';
import { rejectionOf } from '../testing/errors.js';
import { getSection, type JsonValue } from './config-document.js';
import { parseConfigDocument, readConfigDocument } from './config-reader.js';

describe('readConfigDocument', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'az-toolkit-reader-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  it('returns undefined when there is no path', async () => {
    await expect(readConfigDocument(undefined)).resolves.toBeUndefined();
  });

  it('parses nested sections', async () => {
    const filePath = writeConfig(
      'nested.json',
      JSON.stringify({ context: { subscriptionId: 'S1' }, functionApp: { name: 'func-a' } })
    );

    const document = await readConfigDocument(filePath);

    expect(document).toEqual({ context: { subscriptionId: 'S1' }, functionApp: { name: 'func-a' } });
  });

  it('yields equal documents when the same file is read twice', async () => {
    const filePath = writeConfig('twice.json', '{"lookup":{"resourceName":"app","tags":["a","b"]}}');

    const first = await readConfigDocument(filePath);
    const second = await readConfigDocument(filePath);

    expect(second).toEqual(first);
  });

  it('handles 60 levels of nesting', async () => {
    let text = '"leaf"';
    for (let i = 59; i >= 0; i--) {
      text = `{"level${i}":${text}}`;
    }
    const filePath = writeConfig('deep.json', text);

    const document = await readConfigDocument(filePath);
    const parentPath = Array.from({ length: 59 }, (_, i) => `level${i}`);
    const parent = getSection(document, parentPath);

    expect(parent).toEqual({ level59: 'leaf' });
  });

  it('ignores a leading byte order mark', async () => {
    const filePath = writeConfig('bom.json', '\uFEFF{"context":{"tenantId":"T1"}}');

    await expect(readConfigDocument(filePath)).resolves.toEqual({ context: { tenantId: 'T1' } });
  });

  it('reports the path and parser message for malformed JSON', async () => {
    const filePath = writeConfig('broken.json', '{"context": {');

    const error = await rejectionOf(readConfigDocument(filePath), ConfigParseError);

    expect(error.path).toBe(filePath);
    expect(error.reason.length).toBeGreaterThan(0);
    expect(error.message).toBe(`Failed to parse config file ${filePath}: ${error.reason}`);
  });

  it('rejects bytes that are not valid UTF-8', async () => {
    const filePath = path.join(tempDir, 'latin.json');
    fs.writeFileSync(
      filePath,
      Buffer.concat([Buffer.from('{"context":{"subscriptionId":"S'), Buffer.from([0xff, 0xfe]), Buffer.from('1"}}')])
    );

    const error = await rejectionOf(readConfigDocument(filePath), ConfigParseError);

    expect(error.path).toBe(filePath);
    expect(error.message).toBe(`Failed to parse config file ${filePath}: ${error.reason}`);
  });

  it('reports a missing explicit file as a read failure with its path', async () => {
    const filePath = path.join(tempDir, 'absent.json');

    const error = await rejectionOf(readConfigDocument(filePath), ConfigParseError);

    expect(error.path).toBe(filePath);
  });
});

describe('parseConfigDocument', () => {
  it.each<[string, string]>([
    ['[1, 2]', 'array'],
    ['null', 'null'],
    ['"text"', 'string'],
    ['42', 'number'],
  ])('rejects a top-level %s', (content, actual) => {
    expect(() => parseConfigDocument(content, 'inline.json')).toThrow(
      `Failed to parse config file inline.json: expected a JSON object at the top level, found ${actual}`
    );
  });

  it('keeps all JSON value types', () => {
    const document = parseConfigDocument('{"a":{"n":1,"b":true,"z":null,"list":[1,"x"]}}', 'inline.json');
    const expected: JsonValue = { a: { n: 1, b: true, z: null, list: [1, 'x'] } };

    expect(document).toEqual(expected);
  });
});
