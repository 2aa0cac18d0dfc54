export { aggregate, flattenReport } from "./aggregator.js";
export { renderMarkdown, formatEntry } from "./markdown.js";
export { renderJson } from "./json.js";
export type { JsonReport, JsonReportItem } from "./json.js";
export { writeReport } from "./writer.js";
export * from "./types.js";
