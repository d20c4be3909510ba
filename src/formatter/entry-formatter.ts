/**
 * Entry formatter: fits a single value into its column.
 *
 * Depends only on the Types layer.
 */

import type { Alignment, ColumnSpec } from "../types/column.js";
import { UnsetWidthError } from "../types/errors.js";
import type { HighlightColor } from "./style.js";
import { bold, colorize } from "./style.js";

function pad(text: string, width: number, alignment: Alignment): string {
  const padding = Math.max(0, width - text.length);
  switch (alignment) {
    case "<":
      return text + " ".repeat(padding);
    case ">":
      return " ".repeat(padding) + text;
    case "^": {
      const left = Math.floor(padding / 2);
      return " ".repeat(left) + text + " ".repeat(padding - left);
    }
  }
}

/**
 * Truncate `entry` to the column width (dropping the end), align it, and
 * optionally wrap it in a foreground color.
 *
 * Throws UnsetWidthError if the column width has not been resolved.
 */
export function formatEntry(
  spec: ColumnSpec,
  entry: string,
  highlight?: HighlightColor,
  noColor = false,
): string {
  const width = spec.width;
  if (width === undefined) {
    throw new UnsetWidthError(spec.name);
  }
  const result = pad(entry.slice(0, width), width, spec.alignment);
  return highlight === undefined ? result : colorize(result, highlight, noColor);
}

/**
 * Format the column's title as a bold header entry.
 */
export function formatTitle(spec: ColumnSpec, noColor = false): string {
  return bold(formatEntry(spec, spec.name), noColor);
}
