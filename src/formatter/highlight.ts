/**
 * Highlight policies decide the foreground color of a data entry.
 *
 * The renderer only asks the policy for a color; which job states or
 * metric values deserve attention is the policy's business.
 */

import type { JobRecord } from "../types/job.js";
import type { HighlightColor } from "./style.js";

export type HighlightPolicy = (
  column: string,
  value: string,
  job: JobRecord,
) => HighlightColor | undefined;

/** Never highlights anything. */
export const noHighlight: HighlightPolicy = () => undefined;

const STATE_COLORS: ReadonlyMap<string, HighlightColor> = new Map([
  ["COMPLETED", "green"],
  ["RUNNING", "cyan"],
  ["PENDING", "blue"],
  ["FAILED", "red"],
  ["TIMEOUT", "red"],
  ["OUT_OF_MEMORY", "red"],
  ["CANCELLED", "red"],
  ["NODE_FAIL", "red"],
  ["PREEMPTED", "red"],
  ["BOOT_FAIL", "red"],
]);

const EFFICIENCY_COLUMNS: ReadonlySet<string> = new Set(["CPUEff", "MemEff", "TimeEff"]);

const EFFICIENCY_PATTERN = /^(\d+(?:\.\d+)?)%$/;

function stateColor(value: string): HighlightColor | undefined {
  // sacct reports e.g. "CANCELLED by 1234"; only the first word names the state.
  const state = value.trim().split(/\s+/)[0] ?? "";
  return STATE_COLORS.get(state.toUpperCase());
}

function efficiencyColor(value: string): HighlightColor | undefined {
  const match = EFFICIENCY_PATTERN.exec(value.trim());
  if (match === null || match[1] === undefined) {
    return undefined;
  }
  const percent = Number.parseFloat(match[1]);
  if (percent < 20) {
    return "red";
  }
  if (percent < 50) {
    return "yellow";
  }
  return undefined;
}

/**
 * Default policy: colors the State column by job outcome and flags
 * low efficiency values.
 */
export const stateHighlight: HighlightPolicy = (column, value) => {
  if (column === "State") {
    return stateColor(value);
  }
  if (EFFICIENCY_COLUMNS.has(column)) {
    return efficiencyColor(value);
  }
  return undefined;
};
