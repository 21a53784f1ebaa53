export { buildTrendReport, renderJsonReport } from "./json-reporter.js";
export { renderMarkdownTrendReport } from "./markdown-reporter.js";
export { renderCsv, escapeCsvField } from "./csv-reporter.js";
export {
  renderAsciiBox,
  renderAsciiTable,
  truncateText,
} from "./report-utils.js";
export type { ReportOptions, TrendReport, ToolInfo } from "./types.js";
