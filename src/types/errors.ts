/**
 * Error taxonomy for building and rendering a report.
 *
 * Format and title errors depend only on user input and are returned as
 * Result values. An unset width at format time is a sequencing bug and
 * is thrown.
 */

/**
 * A format token whose alignment/width section could not be parsed.
 */
export interface FormatError {
  readonly kind: "format";
  /** The offending token, verbatim. */
  readonly token: string;
  readonly message: string;
}

/**
 * A requested column title that is neither in the vocabulary nor a
 * derived field.
 */
export interface UnknownTitleError {
  readonly kind: "unknown-title";
  readonly title: string;
  readonly message: string;
}

export type PlanError = FormatError | UnknownTitleError;

export function formatError(token: string): FormatError {
  return {
    kind: "format",
    token,
    message: `Unable to parse format token '${token}'`,
  };
}

export function unknownTitleError(title: string): UnknownTitleError {
  return {
    kind: "unknown-title",
    title,
    message: `'${title}' is not a valid title`,
  };
}

/**
 * Thrown when an entry is formatted before its column width is resolved.
 */
export class UnsetWidthError extends Error {
  constructor(readonly column: string) {
    super(`Attempting to format ${column} with unset width`);
    this.name = "UnsetWidthError";
  }
}
