/**
 * Statement Outcomes
 *
 * Statement execution reports how it completed instead of throwing for
 * control flow. A `return` outcome unwinds blocks and loops until the
 * nearest function call consumes it.
 */

import type { LuxValue } from './values.js';

export type StatementOutcome =
  /** Completed; `value` is the statement's result, if it produces one */
  | { readonly kind: 'normal'; readonly value: LuxValue | undefined }
  | { readonly kind: 'return'; readonly value: LuxValue };

export function normal(value?: LuxValue): StatementOutcome {
  return { kind: 'normal', value };
}

export function returning(value: LuxValue): StatementOutcome {
  return { kind: 'return', value };
}
