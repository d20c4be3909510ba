/**
 * CLI argument parser.
 *
 * Translates a process.argv-style string array into a ReportConfig
 * or a structured error. Uses only Node.js built-ins — no external
 * argument-parsing libraries.
 *
 * Dependencies: Types and Plan layers.
 */

import type { ReportConfig } from "../types/config.js";
import { DEFAULT_FORMAT } from "../plan/rendering-plan.js";
import { VERSION } from "../version.js";

/**
 * Non-config results from parsing: help request, version request, or error.
 */
export interface ParseError {
  readonly kind: "error" | "help" | "version" | "mcp" | "list-fields";
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly value: ReportConfig }
  | { readonly ok: false; readonly error: ParseError };

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  "--format",
  "--output",
  "--json",
  "--query",
  "--list-fields",
  "--no-color",
  "--mcp",
  "--help",
  "--version",
]);

/** Flags whose next argument is their value, never a flag. */
const VALUE_FLAGS: ReadonlySet<string> = new Set(["--format", "--output"]);

/**
 * Maps short flag aliases to their long equivalents.
 */
const SHORT_TO_LONG: ReadonlyMap<string, string> = new Map([
  ["-f", "--format"],
  ["-o", "--output"],
  ["-q", "--query"],
  ["-h", "--help"],
  ["-V", "--version"],
]);

/**
 * Parse a CLI argument array into a ReportConfig.
 *
 * Expected usage:
 *   jobtable [options] <jobs.json>
 *   jobtable --query [--format <columns>]
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  // Expand short flags to their long equivalents before parsing.
  const expandedArgv = argv.map((arg) => SHORT_TO_LONG.get(arg) ?? arg);

  const flags = flagsOutsideValues(expandedArgv);

  // --help, --version, --mcp and --list-fields short-circuit.
  if (flags.has("--help")) {
    return { ok: false, error: { kind: "help", message: helpText() } };
  }

  if (flags.has("--version")) {
    return { ok: false, error: { kind: "version", message: `jobtable ${VERSION}` } };
  }

  if (flags.has("--mcp")) {
    return { ok: false, error: { kind: "mcp", message: "Starting MCP server" } };
  }

  if (flags.has("--list-fields")) {
    return { ok: false, error: { kind: "list-fields", message: "Listing fields" } };
  }

  let format = DEFAULT_FORMAT;
  let jobsPath: string | undefined;
  let outputPath: string | undefined;
  let json = false;
  let queryOnly = false;
  let noColor = false;

  let i = 0;
  while (i < expandedArgv.length) {
    const arg = expandedArgv[i] ?? "";
    const originalArg = argv[i] ?? arg;

    if (arg === "--format" || arg === "--output") {
      const value = argv[i + 1];
      if (value === undefined) {
        return {
          ok: false,
          error: { kind: "error", message: `${originalArg} requires a value` },
        };
      }
      if (arg === "--format") {
        format = value;
      } else {
        outputPath = value;
      }
      i += 2;
      continue;
    }

    if (arg === "--json") {
      json = true;
      i += 1;
      continue;
    }

    if (arg === "--query") {
      queryOnly = true;
      i += 1;
      continue;
    }

    if (arg === "--no-color") {
      noColor = true;
      i += 1;
      continue;
    }

    // A lone "-" names stdin as the jobs document.
    if (arg.startsWith("-") && arg !== "-") {
      if (!KNOWN_FLAGS.has(arg)) {
        return {
          ok: false,
          error: { kind: "error", message: `Unknown flag "${originalArg}"` },
        };
      }
      i += 1;
      continue;
    }

    // Positional argument: jobs path (first positional wins).
    if (jobsPath === undefined) {
      jobsPath = arg;
    }
    i += 1;
  }

  if (jobsPath === undefined && !queryOnly) {
    return {
      ok: false,
      error: {
        kind: "error",
        message: "Missing jobs file. Usage: jobtable [options] <jobs.json>",
      },
    };
  }

  const config: ReportConfig = {
    format,
    jobsPath,
    outputPath,
    outputKind: json ? "json" : "table",
    noColor,
    queryOnly,
  };

  return { ok: true, value: config };
}

/**
 * Collects the arguments that stand as flags, skipping the value slot
 * that follows --format and --output.
 */
function flagsOutsideValues(expandedArgv: readonly string[]): ReadonlySet<string> {
  const flags = new Set<string>();
  for (let i = 0; i < expandedArgv.length; i++) {
    const arg = expandedArgv[i] ?? "";
    if (VALUE_FLAGS.has(arg)) {
      i += 1;
      continue;
    }
    flags.add(arg);
  }
  return flags;
}

function helpText(): string {
  return [
    "Usage: jobtable [options] <jobs.json>",
    "       jobtable --query [--format <columns>]",
    "",
    "Render job accounting records as a table.",
    "",
    "Options:",
    "  -f, --format <columns>  Column format: NAME[%[<^>][WIDTH]],... (case-insensitive names)",
    `                          default: ${DEFAULT_FORMAT}`,
    "  -o, --output <path>     Write output to file instead of stdout",
    "      --json              Emit the displayed fields as JSON instead of a table",
    "  -q, --query             Print the fields to request from sacct and exit",
    "      --list-fields       List the valid column names",
    "      --no-color          Disable ANSI color codes (also honors NO_COLOR env var)",
    "      --mcp               Start as MCP server (stdio transport)",
    "  -h, --help              Show this help message",
    "  -V, --version           Show version number",
    "",
    "Use \"-\" as the jobs file to read from stdin.",
  ].join("\n");
}
