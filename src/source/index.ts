export { type JobSource, type SourceError } from "./job-source.js";
export {
  type ReadFn,
  createJsonFileSource,
  jobDocumentSchema,
  parseJobDocument,
} from "./json-file.js";
export { SACCT_FIELDS } from "./sacct-fields.js";
