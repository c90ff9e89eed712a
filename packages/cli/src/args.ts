/**
 * Command line arguments
 */

import { ConfigError } from './config.js';

export interface CliArgs {
  config?: string;
  billing?: string;
  crm?: string;
  sheet?: string;
  out?: string;
  filter?: string;
  logLevel?: string;
  json: boolean;
  failOnIssues: boolean;
  help: boolean;
}

export const USAGE = `Usage: billing-audit --billing <billing.xlsx> --crm <crm.csv> [options]

Options:
  --config <file>       JSON config file (\${VAR} and \${VAR:-default} are expanded)
  --billing <file>      Billing export (Excel)
  --sheet <name>        Worksheet of the billing export (default: first sheet)
  --crm <file>          CRM export (CSV)
  --out <dir>           Write the CSV report into this directory
  --filter <type>       Alle | Location nicht im CRM | Status-Kombination Problem
  --json                Print the result as JSON instead of the summary
  --fail-on-issues      Exit with code 2 when entries need a manual check
  --log-level <level>   debug | info | warn | error
  --help                Show this help`;

type ValueFlag = 'config' | 'billing' | 'crm' | 'sheet' | 'out' | 'filter' | 'logLevel';

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['--config', 'config'],
  ['--billing', 'billing'],
  ['--crm', 'crm'],
  ['--sheet', 'sheet'],
  ['--out', 'out'],
  ['--filter', 'filter'],
  ['--log-level', 'logLevel'],
]);

/**
 * Parse argv (without node and script path). `--flag=value` is accepted too.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { json: false, failOnIssues: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);

    if (flag === '--json') {
      args.json = true;
      continue;
    }
    if (flag === '--fail-on-issues') {
      args.failOnIssues = true;
      continue;
    }
    if (flag === '--help' || flag === '-h') {
      args.help = true;
      continue;
    }

    const key = VALUE_FLAGS.get(flag);
    if (!key) {
      throw new ConfigError(`Unknown argument: ${token}`);
    }

    const value = eq === -1 ? argv[++i] : token.slice(eq + 1);
    if (value === undefined || (eq === -1 && value.startsWith('--'))) {
      throw new ConfigError(`Missing value for ${flag}`);
    }
    args[key] = value;
  }

  return args;
}
