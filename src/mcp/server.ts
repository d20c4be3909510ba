/**
 * MCP server for jobtable.
 *
 * Exposes report rendering to AI agents via the Model Context Protocol
 * (stdio transport). Two tools are registered:
 *   - "query_columns" returns the sacct fields a format string needs
 *   - "render_jobs" renders supplied job records as a plain table or JSON
 *
 * Dependencies: Types, Source, Plan, Formatter (same level as CLI).
 */

import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { JobRecord } from "../types/job.js";
import { createRenderingPlan, DEFAULT_FORMAT } from "../plan/rendering-plan.js";
import { formatQueryArgument } from "../plan/query-columns.js";
import { parseJobDocument } from "../source/json-file.js";
import { VERSION } from "../version.js";

/**
 * Injectable dependencies for the MCP server.
 */
export interface McpServerDeps {
  /** Valid column titles. */
  readonly fields: readonly string[];
}

/**
 * The shape returned by the tool handlers.
 */
export interface ToolResult {
  readonly content: { type: "text"; text: string }[];
  readonly isError?: boolean;
}

function textResult(text: string, isError = false): ToolResult {
  return isError
    ? { content: [{ type: "text", text }], isError: true }
    : { content: [{ type: "text", text }] };
}

/**
 * Core logic for the query_columns tool, extracted for testability.
 */
export function handleQueryColumnsCall(
  args: { readonly format?: string | undefined },
  deps: McpServerDeps,
): ToolResult {
  const plan = createRenderingPlan(deps.fields, args.format ?? DEFAULT_FORMAT);
  if (!plan.ok) {
    return textResult(plan.error.message, true);
  }
  return textResult(formatQueryArgument(plan.value.queryColumns()));
}

interface RenderJobsArgs {
  readonly format?: string | undefined;
  readonly jobs: unknown;
  readonly json?: boolean | undefined;
}

/**
 * Core logic for the render_jobs tool, extracted for testability.
 * Tables are rendered without ANSI codes.
 */
export function handleRenderJobsCall(
  args: RenderJobsArgs,
  deps: McpServerDeps,
): ToolResult {
  const plan = createRenderingPlan(deps.fields, args.format ?? DEFAULT_FORMAT);
  if (!plan.ok) {
    return textResult(plan.error.message, true);
  }

  const jobs = parseJobDocument("render_jobs", args.jobs);
  if (!jobs.ok) {
    return textResult(jobs.error.message, true);
  }

  const records: readonly JobRecord[] = jobs.value;
  const text = args.json === true
    ? plan.value.renderJson(records)
    : plan.value.renderTable(records, { noColor: true });
  return textResult(text);
}

/**
 * Create a configured McpServer instance with both tools registered.
 *
 * The caller is responsible for connecting the server to a transport
 * (e.g., StdioServerTransport) and starting it.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: "jobtable",
    version: VERSION,
  });

  const formatSchema = z
    .string()
    .optional()
    .describe(
      "Comma-separated column format NAME[%[<^>][WIDTH]]. " +
      `Defaults to ${DEFAULT_FORMAT}`,
    );

  server.registerTool(
    "query_columns",
    {
      title: "Resolve Query Columns",
      description:
        "List the raw sacct fields that must be fetched to display a column format, " +
        "as a comma-separated value for `sacct --format=`.",
      inputSchema: { format: formatSchema },
    },
    async (args) => {
      const result = handleQueryColumnsCall({ format: args.format }, deps);
      return { content: result.content, isError: result.isError };
    },
  );

  server.registerTool(
    "render_jobs",
    {
      title: "Render Job Table",
      description:
        "Render job records (objects mapping field names to values) as an aligned " +
        "table using a column format string, or as JSON.",
      inputSchema: {
        format: formatSchema,
        jobs: z
          .array(z.record(z.string(), z.union([z.string(), z.number(), z.null()])))
          .describe("Job records; keys are field names such as JobID, State, CPUEff"),
        json: z.boolean().optional().describe("Emit JSON instead of a table"),
      },
    },
    async (args) => {
      const result = handleRenderJobsCall(
        { format: args.format, jobs: args.jobs, json: args.json },
        deps,
      );
      return { content: result.content, isError: result.isError };
    },
  );

  return server;
}
