/**
 * A single job row as supplied by the accounting collaborator: raw and
 * derived field names mapped to their already-formatted string values.
 */
export type JobRecord = Readonly<Record<string, string>>;
