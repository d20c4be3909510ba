#!/usr/bin/env node

/**
 * jobtable CLI entry point.
 *
 * This file is the bin target. It wires together real dependencies
 * (process I/O, filesystem, MCP transport) and delegates to the runner.
 */

import * as node_fs from "node:fs/promises";
import node_process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "../mcp/server.js";
import { SACCT_FIELDS } from "../source/sacct-fields.js";
import { run } from "./run.js";
import type { CliDeps } from "./run.js";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of node_process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

const deps: CliDeps = {
  stdout: (text: string) => node_process.stdout.write(text + "\n"),
  stderr: (text: string) => node_process.stderr.write(text + "\n"),
  readFn: async (path: string) =>
    path === "-" ? readStdin() : node_fs.readFile(path, "utf-8"),
  writeFn: async (path: string, content: string) => {
    await node_fs.writeFile(path, content + "\n", "utf-8");
  },
  startMcpServer: async () => {
    const server = createMcpServer({ fields: SACCT_FIELDS });
    const transport = new StdioServerTransport();
    await server.connect(transport);
  },
  noColorEnv: node_process.env["NO_COLOR"] !== undefined && node_process.env["NO_COLOR"] !== "",
};

// Strip the first two entries (node binary, script path).
const argv = node_process.argv.slice(2);

// Set the exit code only; a connected MCP server keeps reading stdin.
run(argv, deps).then(
  (code) => {
    node_process.exitCode = code;
  },
  (cause: unknown) => {
    deps.stderr(cause instanceof Error ? cause.stack ?? cause.message : String(cause));
    node_process.exitCode = 1;
  },
);
