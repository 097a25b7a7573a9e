/**
 * Completed-column predicate.
 *
 * The task listing treats "done", "DONE" and "Done" alike, while trend
 * analytics only recognise the exact spelling. Both behaviours are kept
 * and built from this one matcher so the difference stays explicit.
 */

import { COMPLETED_COLUMNS } from "./config.js";

export interface CompletionMatcherOptions {
  columns?: readonly string[];
  caseSensitive: boolean;
}

export type CompletionMatcher = (column: string) => boolean;

export function createCompletionMatcher(
  options: CompletionMatcherOptions
): CompletionMatcher {
  const columns = options.columns ?? COMPLETED_COLUMNS;
  if (options.caseSensitive) {
    const exact = new Set(columns);
    return (column) => exact.has(column);
  }
  const folded = new Set(columns.map((c) => c.toLowerCase()));
  return (column) => folded.has(column.toLowerCase());
}

/** Used by the task listing and the priority analysis */
export const isCompletedColumn = createCompletionMatcher({ caseSensitive: false });

/** Used by trend analytics */
export const isCompletedColumnExact = createCompletionMatcher({ caseSensitive: true });
