/**
 * @billing-audit/cli
 *
 * Command line front end: configuration, source loading, report output.
 */

export { runAudit } from './run.js';
export type { AuditRunResult } from './run.js';
export { loadBillingSource, loadCrmSource } from './source-loader.js';
export type { LoadResult, BillingSourceOptions, CrmSourceOptions } from './source-loader.js';
export { writeReport } from './report-writer.js';
export type { WriteReportOptions } from './report-writer.js';
export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
  resolveSettings,
  DEFAULT_SALES_PARTNERS,
  DEFAULT_CRM_DELIMITERS,
} from './config.js';
export type { ConfigFile, AuditSettings, EnvExpansionOptions } from './config.js';
export { parseArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';
export { Logger, createRunId } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
