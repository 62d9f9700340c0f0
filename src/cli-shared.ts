/**
 * CLI Shared Utilities
 * Exit codes, error formatting and version lookup for the lux CLI
 */

import { readFileSync } from 'node:fs';
import type { RunResult } from './run.js';

/** Process exit codes */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** Bad arguments, unreadable files, invalid configuration */
  USAGE: 1,
  /** Scan, parse or resolve diagnostics */
  DIAGNOSTICS: 65,
  RUNTIME_ERROR: 70,
} as const;

/**
 * Determine exit code from a run result
 */
export function determineExitCode(result: RunResult): number {
  switch (result.status) {
    case 'ok':
      return EXIT_CODES.SUCCESS;
    case 'diagnostics':
      return EXIT_CODES.DIAGNOSTICS;
    case 'runtime-error':
      return EXIT_CODES.RUNTIME_ERROR;
  }
}

/**
 * Format a host-level error (file access, configuration, arguments) for
 * stderr output. Lux diagnostics and runtime errors are formatted by
 * `reportRunResult` instead.
 */
export function formatError(err: Error): string {
  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** Package version from package.json, or 0.0.0 when unreadable */
export function readVersion(): string {
  try {
    const data: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
    );
    if (
      typeof data === 'object' &&
      data !== null &&
      'version' in data &&
      typeof data.version === 'string'
    ) {
      return data.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0'; // Fallback version
  }
}
