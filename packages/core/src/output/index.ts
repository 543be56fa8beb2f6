export {
  type ReportFormat,
  type WriteReportOptions,
  reportBaseName,
  resolveReportPath,
  writeFilingReport,
} from './writer.js';

export {
  renderReconciliationMarkdown,
  renderDuplicateMarkdown,
  type MarkdownFormatOptions,
  type DuplicateMarkdownOptions,
} from './markdown.js';

export {
  renderFilingJSON,
  renderDuplicateJSON,
  toJsonOutput,
  toJsonDuplicateReport,
  type JsonFormatOptions,
  type JsonOutput,
  type JsonOutputMetadata,
  type JsonStatementOutput,
  type JsonDuplicateGroup,
  type JsonDuplicateReport,
} from './json.js';

export { formatDuration, formatPercent, toJsonStatistics, type JsonStatistics } from './format.js';
