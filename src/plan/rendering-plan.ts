/**
 * Rendering plan builder.
 *
 * Turns a format string and a field vocabulary into:
 *   1. the ordered display columns, validated and canonicalized, with the
 *      mandatory columns in front
 *   2. the set of raw fields to request from the accounting source
 *
 * A plan is built once per report and reused for every row. Rendering
 * back-fills unset column widths on the plan's own specs, so a plan must
 * not be shared between reports.
 *
 * Dependencies: Types, Formatter.
 */

import type { ColumnSpec } from "../types/column.js";
import type { PlanError } from "../types/errors.js";
import type { JobRecord } from "../types/job.js";
import type { Result } from "../types/result.js";
import { ok, collect } from "../types/result.js";
import type { FormatterOptions } from "../formatter/formatter.js";
import { formatTable } from "../formatter/table.js";
import { formatJson } from "../formatter/json.js";
import { ALWAYS_INCLUDED, REQUIRED_FIELDS, includeMandatoryColumns } from "./always-included.js";
import type { DerivedFieldCatalog } from "./derived-fields.js";
import { DERIVED_FIELDS } from "./derived-fields.js";
import { parseFormat } from "./parse-format.js";
import { resolveQueryColumns } from "./query-columns.js";
import { Vocabulary, validateColumn } from "./vocabulary.js";

export const DEFAULT_FORMAT = "JobID%>,State,Elapsed%>,CPUEff,MemEff";

export interface RenderingPlanOptions {
  /** Derived fields and their prerequisites. Keys are valid titles. */
  readonly derivedFields?: DerivedFieldCatalog;
  /** Columns always displayed, as format tokens. */
  readonly alwaysIncluded?: readonly string[];
  /** Fields always requested from the source. */
  readonly required?: readonly string[];
}

export class RenderingPlan {
  constructor(
    readonly displayColumns: readonly ColumnSpec[],
    private readonly query: ReadonlySet<string>,
    readonly vocabulary: Vocabulary,
  ) {}

  /** Raw fields the accounting source must supply. */
  queryColumns(): ReadonlySet<string> {
    return this.query;
  }

  /** Render jobs as an aligned table, header first. */
  renderTable(jobs: readonly JobRecord[], options?: FormatterOptions): string {
    return formatTable(this.displayColumns, jobs, options);
  }

  /** Render the displayed fields of each job as JSON. */
  renderJson(jobs: readonly JobRecord[]): string {
    return formatJson(this.displayColumns, jobs);
  }
}

/**
 * Build a rendering plan. Fails on the first malformed token or unknown
 * title.
 */
export function createRenderingPlan(
  titles: Iterable<string>,
  format: string = DEFAULT_FORMAT,
  options?: RenderingPlanOptions,
): Result<RenderingPlan, PlanError> {
  const catalog = options?.derivedFields ?? DERIVED_FIELDS;
  const vocabulary = new Vocabulary([...titles, ...catalog.keys()]);

  const parsed = parseFormat(format);
  if (!parsed.ok) {
    return parsed;
  }

  const validated = collect(parsed.value, (spec) => validateColumn(spec, vocabulary));
  if (!validated.ok) {
    return validated;
  }

  const withMandatory = includeMandatoryColumns(
    validated.value,
    vocabulary,
    options?.alwaysIncluded ?? ALWAYS_INCLUDED,
  );
  if (!withMandatory.ok) {
    return withMandatory;
  }

  const query = resolveQueryColumns(
    withMandatory.value,
    catalog,
    options?.required ?? REQUIRED_FIELDS,
    vocabulary,
  );
  return ok(new RenderingPlan(withMandatory.value, query, vocabulary));
}
