/**
 * ANSI styling for terminal output.
 */

const ANSI_RESET = "\x1b[0m";
const ANSI_BOLD = "\x1b[1m";

/**
 * Foreground colors a highlight policy may request.
 */
export type HighlightColor =
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan";

const FOREGROUND: Readonly<Record<HighlightColor, string>> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
};

export function bold(text: string, noColor = false): string {
  return noColor ? text : `${ANSI_BOLD}${text}${ANSI_RESET}`;
}

export function colorize(text: string, color: HighlightColor, noColor = false): string {
  return noColor ? text : `${FOREGROUND[color]}${text}${ANSI_RESET}`;
}
