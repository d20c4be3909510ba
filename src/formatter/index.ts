export { type Formatter, type FormatterOptions } from "./formatter.js";
export { formatEntry, formatTitle } from "./entry-formatter.js";
export { formatTable } from "./table.js";
export { formatJson } from "./json.js";
export { type HighlightPolicy, noHighlight, stateHighlight } from "./highlight.js";
export { type HighlightColor, bold, colorize } from "./style.js";
