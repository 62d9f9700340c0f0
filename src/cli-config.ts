/**
 * Configuration Loader for the lux CLI
 * Loads and validates .luxrc.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { LuxValue } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.luxrc.yaml';

/** Primitive values a config file may predefine as globals */
export type ConfigGlobal = null | boolean | number | string;

export interface LuxConfig {
  /** REPL prompt */
  readonly prompt: string;
  /** Whether the REPL prints the value of each line */
  readonly echo: boolean;
  /** Globals defined before any source runs */
  readonly globals: Record<string, LuxValue>;
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): LuxConfig {
  return { prompt: '> ', echo: true, globals: {} };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfigGlobal(value: unknown): value is ConfigGlobal {
  return (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'string'
  );
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is Record<
  string,
  unknown
> {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (key !== 'prompt' && key !== 'echo' && key !== 'globals') {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  if ('prompt' in data && typeof data['prompt'] !== 'string') {
    throw new Error('Invalid configuration: prompt must be a string');
  }

  if ('echo' in data && typeof data['echo'] !== 'boolean') {
    throw new Error('Invalid configuration: echo must be a boolean');
  }
}

function readGlobals(data: unknown): Record<string, LuxValue> {
  if (data === undefined || data === null) return {};
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: globals must be a mapping');
  }

  const globals: Record<string, LuxValue> = {};
  for (const [name, value] of Object.entries(data)) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw new Error(
        `Invalid configuration: global "${name}" is not a valid identifier`
      );
    }
    if (!isConfigGlobal(value)) {
      throw new Error(
        `Invalid configuration: global ${name} must be a number, string, boolean or null`
      );
    }
    globals[name] = value;
  }
  return globals;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration YAML. An empty document yields the defaults.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function parseConfig(content: string): LuxConfig {
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(content);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const defaults = createDefaultConfig();
  if (parsedData === null || parsedData === undefined) return defaults;

  validateConfig(parsedData);

  const prompt = parsedData['prompt'];
  const echo = parsedData['echo'];
  return {
    prompt: typeof prompt === 'string' ? prompt : defaults.prompt,
    echo: typeof echo === 'boolean' ? echo : defaults.echo,
    globals: readGlobals(parsedData['globals']),
  };
}

/**
 * Load configuration from .luxrc.yaml in the specified directory.
 *
 * @returns the defaults when no file exists
 * @throws Error with "Invalid configuration: {reason}"
 */
export function loadConfig(cwd: string): LuxConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent);
}
