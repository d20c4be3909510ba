export { MAX_COLUMN_WIDTH, parseColumnToken, parseFormat } from "./parse-format.js";
export { Vocabulary, validateColumn } from "./vocabulary.js";
export { type DerivedFieldCatalog, DERIVED_FIELDS, expandField } from "./derived-fields.js";
export { ALWAYS_INCLUDED, REQUIRED_FIELDS, includeMandatoryColumns } from "./always-included.js";
export { resolveQueryColumns, formatQueryArgument } from "./query-columns.js";
export {
  type RenderingPlanOptions,
  DEFAULT_FORMAT,
  RenderingPlan,
  createRenderingPlan,
} from "./rendering-plan.js";
