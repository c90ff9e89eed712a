/**
 * Formatter Exports
 */

export { formatCsvReport } from './csv-report.js';
export type { CsvReportOptions } from './csv-report.js';
export { formatSummary, DEFAULT_DASHBOARD_URL } from './summary.js';
export type { SummaryOptions } from './summary.js';
export { formatJsonReport, toJsonReport } from './json-report.js';
export type { JsonReport } from './json-report.js';
export { formatGermanDateTime, formatPercent, reportFileName } from './utils.js';
