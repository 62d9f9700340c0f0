/**
 * Lux CLI Tests: .luxrc.yaml configuration
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from '../../src/cli-config.js';

describe('parseConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(parseConfig('')).toEqual({ prompt: '> ', echo: true, globals: {} });
  });

  it('reads every setting', () => {
    const content = [
      'prompt: "lux> "',
      'echo: false',
      'globals:',
      '  answer: 42',
      '  name: lux',
      '  flag: true',
      '  nothing: null',
    ].join('\n');
    expect(parseConfig(content)).toEqual({
      prompt: 'lux> ',
      echo: false,
      globals: { answer: 42, name: 'lux', flag: true, nothing: null },
    });
  });

  it('keeps defaults for omitted settings', () => {
    expect(parseConfig('echo: false')).toEqual({
      ...createDefaultConfig(),
      echo: false,
    });
    expect(parseConfig('globals:')).toEqual(createDefaultConfig());
  });

  it.each([
    ['- a\n- b', 'Invalid configuration: must be a mapping'],
    ['colour: red', 'Invalid configuration: unknown key colour'],
    ['prompt: 3', 'Invalid configuration: prompt must be a string'],
    ['echo: "no"', 'Invalid configuration: echo must be a boolean'],
    ['globals: [1]', 'Invalid configuration: globals must be a mapping'],
    [
      'globals:\n  1x: 1',
      'Invalid configuration: global "1x" is not a valid identifier',
    ],
    [
      'globals:\n  list: [1, 2]',
      'Invalid configuration: global list must be a number, string, boolean or null',
    ],
  ])('rejects %j', (content, message) => {
    expect(() => parseConfig(content)).toThrow(message);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseConfig('prompt: "unterminated')).toThrow(
      /^Invalid configuration: invalid YAML \(/
    );
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lux-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('returns the defaults when no file exists', () => {
    expect(loadConfig(tempDir)).toEqual(createDefaultConfig());
  });

  it('reads the file from the directory', async () => {
    await fs.writeFile(
      path.join(tempDir, CONFIG_FILE_NAME),
      'prompt: "$ "\n'
    );
    expect(loadConfig(tempDir)).toEqual({
      prompt: '$ ',
      echo: true,
      globals: {},
    });
  });
});
