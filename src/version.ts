/**
 * Package version, read from package.json so the CLI and MCP server
 * report the same string.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export const VERSION: string = pkg.version;
