/**
 * Formatter contract for turning display columns and job records into
 * output text.
 *
 * Each output kind (table, JSON) is a function conforming to this type.
 * Formatters depend only on the Types layer.
 */

import type { ColumnSpec } from "../types/column.js";
import type { JobRecord } from "../types/job.js";
import type { HighlightPolicy } from "./highlight.js";

/**
 * Options that control formatter output behavior.
 */
export interface FormatterOptions {
  /** Disable ANSI color codes in terminal output. */
  readonly noColor?: boolean;
  /** Chooses a foreground color per data entry. Defaults to no highlighting. */
  readonly highlight?: HighlightPolicy;
}

export type Formatter = (
  columns: readonly ColumnSpec[],
  jobs: readonly JobRecord[],
  options?: FormatterOptions,
) => string;

/**
 * The value a job holds for a column; missing fields render empty.
 */
export function entryFor(job: JobRecord, column: ColumnSpec): string {
  return job[column.name] ?? "";
}
