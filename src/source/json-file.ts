/**
 * JSON file source.
 *
 * Reads a JSON array of job objects. Field values may be strings, numbers
 * or null; numbers are stringified and null becomes an empty entry, so
 * every record reaches the renderer as a string-to-string mapping.
 */

import { z } from "zod";
import type { JobRecord } from "../types/job.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import type { JobSource, SourceError } from "./job-source.js";

/** Reads a file's text content — injectable for testing. */
export type ReadFn = (path: string) => Promise<string>;

const fieldValueSchema = z
  .union([z.string(), z.number(), z.null()])
  .transform((value) => (value === null ? "" : String(value)));

export const jobDocumentSchema = z.array(z.record(z.string(), fieldValueSchema));

/**
 * Validate an already-parsed JSON value as a list of job records.
 */
export function parseJobDocument(
  sourceId: string,
  document: unknown,
): Result<JobRecord[], SourceError> {
  const parsed = jobDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0
      ? ` at ${issue.path.join(".")}`
      : "";
    return err({
      sourceId,
      message: `Invalid job document${where}: ${issue?.message ?? "unexpected shape"}`,
      cause: parsed.error,
    });
  }
  return ok(parsed.data);
}

export function createJsonFileSource(path: string, readFn: ReadFn): JobSource {
  return {
    id: path,
    async load(): Promise<Result<JobRecord[], SourceError>> {
      let text: string;
      try {
        text = await readFn(path);
      } catch (cause: unknown) {
        const message = cause instanceof Error ? cause.message : String(cause);
        return err({ sourceId: path, message: `Failed to read ${path}: ${message}`, cause });
      }

      let document: unknown;
      try {
        document = JSON.parse(text);
      } catch (cause: unknown) {
        const message = cause instanceof Error ? cause.message : String(cause);
        return err({ sourceId: path, message: `Failed to parse ${path}: ${message}`, cause });
      }

      return parseJobDocument(path, document);
    },
  };
}
