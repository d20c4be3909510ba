/**
 * Mandatory columns.
 *
 * Some columns are always displayed, and some fields are always fetched
 * because downstream row identification depends on them.
 */

import type { ColumnSpec } from "../types/column.js";
import type { Result } from "../types/result.js";
import type { FormatError } from "../types/errors.js";
import { ok } from "../types/result.js";
import { parseColumnToken } from "./parse-format.js";
import type { Vocabulary } from "./vocabulary.js";

/** Columns always shown, in display order, with their default formatting. */
export const ALWAYS_INCLUDED: readonly string[] = ["JobID%>", "State"];

/** Fields always requested from the accounting source. */
export const REQUIRED_FIELDS: readonly string[] = ["JobID", "JobIDRaw", "State"];

/**
 * Prepend every always-included column that is missing from `columns`.
 *
 * Membership is by bare name, case-insensitively. A column the user
 * already requested keeps the user's formatting. Walking the list in
 * reverse and prepending keeps the declared order at the front.
 */
export function includeMandatoryColumns(
  columns: readonly ColumnSpec[],
  vocabulary: Vocabulary,
  alwaysIncluded: readonly string[] = ALWAYS_INCLUDED,
): Result<ColumnSpec[], FormatError> {
  const result = [...columns];
  for (const token of [...alwaysIncluded].reverse()) {
    const parsed = parseColumnToken(token);
    if (!parsed.ok) {
      return parsed;
    }
    const spec = parsed.value;
    const name = vocabulary.canonicalize(spec.name) ?? spec.name;
    const present = result.some(
      (column) => column.name.toLowerCase() === name.toLowerCase(),
    );
    if (!present) {
      result.unshift(name === spec.name ? spec : spec.withName(name));
    }
  }
  return ok(result);
}
