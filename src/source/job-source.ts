/**
 * Job source interface.
 *
 * A source supplies job records whose raw fields and derived metrics have
 * already been computed by the accounting collaborator.
 */

import type { JobRecord } from "../types/job.js";
import type { Result } from "../types/result.js";

/**
 * Error returned when a source cannot produce job records.
 */
export interface SourceError {
  readonly sourceId: string;
  readonly message: string;
  readonly cause?: unknown;
}

export interface JobSource {
  /** Identifier used in error messages (e.g., a file path). */
  readonly id: string;

  load(): Promise<Result<JobRecord[], SourceError>>;
}
