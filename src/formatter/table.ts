/**
 * Table formatter: renders job records as an aligned terminal table.
 *
 * Columns are separated by two spaces, the header row comes first in
 * bold, and each job fills one row. Widths left unset by the format
 * string are fixed here from the title and the column's entries.
 */

import type { ColumnSpec } from "../types/column.js";
import type { JobRecord } from "../types/job.js";
import type { FormatterOptions } from "./formatter.js";
import { entryFor } from "./formatter.js";
import { formatEntry, formatTitle } from "./entry-formatter.js";
import { noHighlight } from "./highlight.js";

const COLUMN_SEPARATOR = "  ";

export function formatTable(
  columns: readonly ColumnSpec[],
  jobs: readonly JobRecord[],
  options?: FormatterOptions,
): string {
  const noColor = options?.noColor ?? false;
  const highlight = options?.highlight ?? noHighlight;

  for (const column of columns) {
    column.computeWidth(jobs.map((job) => entryFor(job, column)));
  }

  const lines: string[] = [];
  lines.push(columns.map((column) => formatTitle(column, noColor)).join(COLUMN_SEPARATOR));

  for (const job of jobs) {
    const cells = columns.map((column) => {
      const value = entryFor(job, column);
      return formatEntry(column, value, highlight(column.name, value, job), noColor);
    });
    lines.push(cells.join(COLUMN_SEPARATOR));
  }

  return lines.join("\n");
}
