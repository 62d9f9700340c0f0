/**
 * Reporting
 * One-line text forms for diagnostics and runtime errors
 */

import { LineOffsets } from './line-offsets.js';
import type { RunResult } from './run.js';
import type { Diagnostic, LuxError } from './types.js';

/** `[line N] Error: message` */
export function formatDiagnostic(
  diagnostic: Diagnostic,
  lines: LineOffsets
): string {
  return `[line ${lines.line(diagnostic.span.start)}] Error: ${diagnostic.message}`;
}

/** `[line N] Runtime error: message`, without the prefix when no span */
export function formatRuntimeError(error: LuxError, lines: LineOffsets): string {
  if (!error.span) return `Runtime error: ${error.message}`;
  return `[line ${lines.line(error.span.start)}] Runtime error: ${error.message}`;
}

/**
 * Send each problem in a failed result to `onError`, one line each.
 * Does nothing for a successful result.
 */
export function reportRunResult(
  result: RunResult,
  source: string,
  onError: (message: string) => void
): void {
  if (result.status === 'ok') return;

  const lines = new LineOffsets(source);
  if (result.status === 'diagnostics') {
    for (const diagnostic of result.diagnostics) {
      onError(formatDiagnostic(diagnostic, lines));
    }
  } else {
    onError(formatRuntimeError(result.error, lines));
  }
}

export { LineOffsets };
