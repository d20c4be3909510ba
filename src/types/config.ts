/**
 * Configuration schema for a report run.
 */

/**
 * Supported output kinds.
 */
export type OutputKind = "table" | "json";

/**
 * Configuration for a single report invocation.
 */
export interface ReportConfig {
  /** Column format string, e.g. "JobID%>,State,Elapsed%>". */
  readonly format: string;
  /** Path to the JSON document holding job records. Undefined only in query mode. */
  readonly jobsPath?: string | undefined;
  /** Optional output file path. If omitted, output goes to stdout. */
  readonly outputPath?: string | undefined;
  readonly outputKind: OutputKind;
  /** Disable ANSI color codes in table output. */
  readonly noColor: boolean;
  /** Print the fields to request from sacct and exit. */
  readonly queryOnly: boolean;
}
