#!/usr/bin/env node
/**
 * CLI entry point for the billing audit
 *
 * Usage:
 *   billing-audit --billing ./billing.xlsx --crm ./crm.csv --out ./reports
 */

import { ConnectorError, wrapError } from '@billing-audit/core';
import { AuditError, formatJsonReport, formatSummary } from '@billing-audit/audit-core';
import { parseArgs, USAGE } from './args.js';
import { ConfigError, loadConfig, resolveSettings, type ConfigFile } from './config.js';
import { Logger, createRunId } from './logger.js';
import { runAudit } from './run.js';

/** Exit code when entries need a manual check and --fail-on-issues is set */
const EXIT_ISSUES = 2;

function describeError(error: unknown): string {
  if (error instanceof ConnectorError || error instanceof AuditError) {
    return error.toActionableMessage();
  }
  if (error instanceof ConfigError) {
    return `Error [CONFIG]: ${error.message}`;
  }
  return wrapError(error).toActionableMessage();
}

async function main(): Promise<number> {
  let logger = new Logger();

  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.help) {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }

    const config: ConfigFile = args.config ? await loadConfig(args.config) : {};
    const settings = resolveSettings(config, args);
    logger = new Logger(settings.logging).child({ runId: createRunId() });

    const now = new Date();
    const { result, reportPath } = await runAudit(settings, logger, now);

    const output =
      settings.output === 'json'
        ? formatJsonReport(result, now)
        : formatSummary(result, {
            filter: settings.filter,
            dashboardUrl: settings.report.dashboardUrl,
            generatedAt: now,
          });
    process.stdout.write(`${output}\n`);
    if (reportPath && settings.output === 'summary') {
      process.stdout.write(`\nCSV-Bericht: ${reportPath}\n`);
    }

    return settings.failOnIssues && result.issuesCount > 0 ? EXIT_ISSUES : 0;
  } catch (error) {
    logger.error('Audit failed', { error });
    process.stderr.write(`${describeError(error)}\n`);
    if (error instanceof ConfigError) {
      process.stderr.write(`\n${USAGE}\n`);
    }
    return 1;
  }
}

main().then((code) => {
  process.exitCode = code;
});
