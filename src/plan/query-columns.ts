/**
 * Query column resolver: which raw fields must be fetched to display a
 * set of columns.
 */

import type { ColumnSpec } from "../types/column.js";
import type { DerivedFieldCatalog } from "./derived-fields.js";
import { DERIVED_FIELDS, expandField } from "./derived-fields.js";
import { REQUIRED_FIELDS } from "./always-included.js";
import type { Vocabulary } from "./vocabulary.js";

/**
 * Expand derived columns into their prerequisites, append the required
 * fields, and deduplicate. The set keeps first-seen order.
 *
 * When a vocabulary is given, every field takes its canonical casing
 * first, so "REQMEM" and "ReqMem" count as one field.
 */
export function resolveQueryColumns(
  columns: readonly ColumnSpec[],
  catalog: DerivedFieldCatalog = DERIVED_FIELDS,
  required: readonly string[] = REQUIRED_FIELDS,
  vocabulary?: Vocabulary,
): ReadonlySet<string> {
  const fields = [
    ...columns.flatMap((column) => expandField(column.name, catalog)),
    ...required,
  ];
  if (vocabulary === undefined) {
    return new Set(fields);
  }
  return new Set(fields.map((field) => vocabulary.canonicalize(field) ?? field));
}

/**
 * Render a query set as the comma-separated list `sacct --format=` takes.
 */
export function formatQueryArgument(queryColumns: ReadonlySet<string>): string {
  return [...queryColumns].join(",");
}
