/**
 * Title validator.
 *
 * A Vocabulary maps case-folded titles to their canonical casing. It is
 * built once per rendering plan, so validation is a single map lookup
 * and everything downstream can compare names exactly.
 */

import type { ColumnSpec } from "../types/column.js";
import type { UnknownTitleError } from "../types/errors.js";
import { unknownTitleError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

// Simple lowercasing, not full Unicode case folding; field titles are ASCII.
function fold(title: string): string {
  return title.toLowerCase();
}

export class Vocabulary {
  private readonly canonical: Map<string, string> = new Map();

  /**
   * Titles are registered in order; when two titles fold to the same key
   * the first one keeps the canonical casing.
   */
  constructor(titles: Iterable<string>) {
    for (const title of titles) {
      const key = fold(title);
      if (!this.canonical.has(key)) {
        this.canonical.set(key, title);
      }
    }
  }

  /**
   * Returns the canonical casing of `name`, or undefined if unknown.
   */
  canonicalize(name: string): string | undefined {
    return this.canonical.get(fold(name));
  }

  /** Canonical titles in registration order. */
  titles(): readonly string[] {
    return [...this.canonical.values()];
  }
}

/**
 * Validate a column's title against the vocabulary. On success the
 * returned spec carries the vocabulary's casing of the name.
 */
export function validateColumn(
  spec: ColumnSpec,
  vocabulary: Vocabulary,
): Result<ColumnSpec, UnknownTitleError> {
  const canonical = vocabulary.canonicalize(spec.name);
  if (canonical === undefined) {
    return err(unknownTitleError(spec.name));
  }
  return ok(canonical === spec.name ? spec : spec.withName(canonical));
}
