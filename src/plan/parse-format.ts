/**
 * Format grammar parser.
 *
 * Grammar:
 *   Format = Token { "," Token }
 *   Token  = Name [ "%" [ Align ] [ Width ] ]
 *   Align  = "<" | "^" | ">"
 *   Width  = non-negative decimal integer, at most MAX_COLUMN_WIDTH
 *
 * Empty tokens (stray commas) are ignored.
 * Depends only on the Types layer.
 */

import { ColumnSpec, DEFAULT_ALIGNMENT, isAlignment } from "../types/column.js";
import type { Alignment } from "../types/column.js";
import type { FormatError } from "../types/errors.js";
import { formatError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { ok, err, collect } from "../types/result.js";

const WIDTH_PATTERN = /^\d+$/;

/** Widest column the grammar accepts. */
export const MAX_COLUMN_WIDTH = 1024;

/**
 * Parse a single `NAME[%[ALIGN]WIDTH]` token into a ColumnSpec.
 */
export function parseColumnToken(token: string): Result<ColumnSpec, FormatError> {
  const separator = token.indexOf("%");
  if (separator === -1) {
    return ok(new ColumnSpec(token));
  }

  const name = token.slice(0, separator);
  let rest = token.slice(separator + 1);
  let alignment: Alignment = DEFAULT_ALIGNMENT;

  const first = rest.charAt(0);
  if (isAlignment(first)) {
    alignment = first;
    rest = rest.slice(1);
  }

  if (rest === "") {
    return ok(new ColumnSpec(name, alignment));
  }
  if (!WIDTH_PATTERN.test(rest)) {
    return err(formatError(token));
  }
  const width = Number.parseInt(rest, 10);
  if (width > MAX_COLUMN_WIDTH) {
    return err(formatError(token));
  }
  return ok(new ColumnSpec(name, alignment, width));
}

/**
 * Parse a comma-separated format string into column specs, in token order.
 * Returns the first token that fails to parse.
 */
export function parseFormat(format: string): Result<ColumnSpec[], FormatError> {
  return collect(
    format.split(",").filter((token) => token !== ""),
    parseColumnToken,
  );
}
