/**
 * Default vocabulary: the field titles `sacct --helpformat` lists.
 *
 * Kept in data/sacct-fields.json and read relative to this module so it
 * resolves the same way from src/ and dist/.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const fields = require("../../data/sacct-fields.json") as { fields: string[] };

export const SACCT_FIELDS: readonly string[] = fields.fields;
