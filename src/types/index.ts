export { type Result, ok, err, collect } from "./result.js";
export {
  type Alignment,
  type ColumnWidth,
  ColumnSpec,
  DEFAULT_ALIGNMENT,
  isAlignment,
} from "./column.js";
export {
  type FormatError,
  type UnknownTitleError,
  type PlanError,
  formatError,
  unknownTitleError,
  UnsetWidthError,
} from "./errors.js";
export { type JobRecord } from "./job.js";
export { type OutputKind, type ReportConfig } from "./config.js";
