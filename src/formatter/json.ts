/**
 * JSON formatter: serializes the displayed columns of each job.
 *
 * Width, alignment and highlighting do not apply; each job becomes an
 * object keyed by column name in display order. Output is deterministic
 * for identical input.
 */

import type { ColumnSpec } from "../types/column.js";
import type { JobRecord } from "../types/job.js";
import { entryFor } from "./formatter.js";

export function formatJson(
  columns: readonly ColumnSpec[],
  jobs: readonly JobRecord[],
): string {
  const rows = jobs.map((job) => {
    const row: Record<string, string> = {};
    for (const column of columns) {
      row[column.name] = entryFor(job, column);
    }
    return row;
  });
  return JSON.stringify(rows, null, 2);
}
