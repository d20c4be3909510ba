/**
 * CLI runner — the top-level entry point that wires everything together.
 *
 * Responsibilities:
 *   1. Parse arguments into a ReportConfig
 *   2. Build the rendering plan over the sacct vocabulary
 *   3. Load job records and format them as a table or JSON
 *   4. Write output to stdout or a file
 *
 * Dependencies: All layers (Types, Source, Plan, Formatter).
 */

import type { ReportConfig } from "../types/config.js";
import type { JobRecord } from "../types/job.js";
import type { HighlightPolicy } from "../formatter/highlight.js";
import { stateHighlight } from "../formatter/highlight.js";
import type { RenderingPlan } from "../plan/rendering-plan.js";
import { createRenderingPlan } from "../plan/rendering-plan.js";
import { formatQueryArgument } from "../plan/query-columns.js";
import type { ReadFn } from "../source/json-file.js";
import { createJsonFileSource } from "../source/json-file.js";
import { SACCT_FIELDS } from "../source/sacct-fields.js";
import { parseArgs } from "./parse-args.js";

/**
 * Injectable dependencies for testability.
 * Production code provides real I/O; tests provide mocks.
 */
export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readFn: ReadFn;
  readonly writeFn?: (path: string, content: string) => Promise<void>;
  readonly startMcpServer?: () => Promise<void>;
  /** Valid column titles. Defaults to the sacct field list. */
  readonly fields?: readonly string[];
  /** Entry highlighting for table output. Defaults to stateHighlight. */
  readonly highlight?: HighlightPolicy;
  /** When true, suppresses ANSI color codes (mirrors the NO_COLOR env var). */
  readonly noColorEnv?: boolean;
}

function renderOutput(
  plan: RenderingPlan,
  jobs: readonly JobRecord[],
  config: ReportConfig,
  deps: CliDeps,
): string {
  if (config.outputKind === "json") {
    return plan.renderJson(jobs);
  }
  // Escape codes never go to a file.
  const noColor = config.noColor || deps.noColorEnv === true || config.outputPath !== undefined;
  return plan.renderTable(jobs, {
    noColor,
    highlight: deps.highlight ?? stateHighlight,
  });
}

/**
 * Run the CLI with the given argument array and dependencies.
 * Returns a process exit code (0 = success, 1 = error).
 */
export async function run(
  argv: readonly string[],
  deps: CliDeps,
): Promise<number> {
  const parseResult = parseArgs(argv);
  const fields = deps.fields ?? SACCT_FIELDS;

  if (!parseResult.ok) {
    const { kind, message } = parseResult.error;
    if (kind === "help" || kind === "version") {
      deps.stdout(message);
      return 0;
    }
    if (kind === "list-fields") {
      const plan = createRenderingPlan(fields, "");
      if (!plan.ok) {
        deps.stderr(plan.error.message);
        return 1;
      }
      deps.stdout(plan.value.vocabulary.titles().join("\n"));
      return 0;
    }
    if (kind === "mcp") {
      if (deps.startMcpServer === undefined) {
        deps.stderr("MCP server is not available");
        return 1;
      }
      await deps.startMcpServer();
      return 0;
    }
    // Parsing error.
    deps.stderr(message);
    return 1;
  }

  const config = parseResult.value;

  const planResult = createRenderingPlan(fields, config.format);
  if (!planResult.ok) {
    deps.stderr(planResult.error.message);
    return 1;
  }
  const plan = planResult.value;

  if (config.queryOnly) {
    deps.stdout(formatQueryArgument(plan.queryColumns()));
    return 0;
  }

  // parseArgs guarantees a jobs path outside query mode.
  const source = createJsonFileSource(config.jobsPath ?? "-", deps.readFn);
  const loaded = await source.load();
  if (!loaded.ok) {
    deps.stderr(loaded.error.message);
    return 1;
  }

  const output = renderOutput(plan, loaded.value, config, deps);

  if (config.outputPath !== undefined && deps.writeFn !== undefined) {
    try {
      await deps.writeFn(config.outputPath, output);
    } catch (cause: unknown) {
      const message = cause instanceof Error ? cause.message : String(cause);
      deps.stderr(`Failed to write report: ${message}`);
      return 1;
    }
    deps.stdout(`Report written to ${config.outputPath}`);
  } else {
    deps.stdout(output);
  }

  return 0;
}
