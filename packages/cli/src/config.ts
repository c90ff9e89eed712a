import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import {
  ALL_PROBLEMS,
  parseIssueFilter,
  resolveColumns,
  type ColumnMapping,
  type IssueFilter,
} from '@billing-audit/audit-core';
import type { CliArgs } from './args.js';
import type { LogFormat, LogLevel } from './logger.js';

/** Salespartners whose locations are audited */
export const DEFAULT_SALES_PARTNERS = ['Edelweiss Digital GmbH', 'Edelweiss (Russmedia)'];

/** Delimiters tried for the CRM export, in order */
export const DEFAULT_CRM_DELIMITERS = [';', ',', '\t'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;

  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace ${VAR} and ${VAR:-default} in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const logFormatSchema = z.enum(['text', 'json']);

const columnName = z.string().min(1);

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    billing: z
      .object({
        filePath: z.string().min(1).optional(),
        sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
      })
      .strict()
      .optional(),
    crm: z
      .object({
        filePath: z.string().min(1).optional(),
        encoding: z.enum(['auto', 'utf-8', 'cp1252']).optional(),
        delimiters: z.array(z.string().min(1)).min(1).optional(),
      })
      .strict()
      .optional(),
    salesPartners: z.array(z.string().min(1)).min(1).optional(),
    columns: z
      .object({
        billing: z
          .object({
            identifier: columnName.optional(),
            salesPartner: columnName.optional(),
            state: columnName.optional(),
            displayName: columnName.optional(),
            plan: columnName.optional(),
          })
          .strict()
          .optional(),
        crm: z
          .object({
            identifier: columnName.optional(),
            workflowStatus: columnName.optional(),
            projectName: columnName.optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    report: z
      .object({
        outDir: z.string().min(1).optional(),
        dashboardUrl: z.string().url().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: logFormatSchema.optional(),
        level: logLevelSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid config file'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Parse config file content. A leading UTF-8 BOM is ignored.
 */
export function parseConfig(content: string, env?: NodeJS.ProcessEnv): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(
      `Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, { env }));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(content);
}

/**
 * Everything one audit run needs, after merging config file and flags
 */
export interface AuditSettings {
  billing: { filePath: string; sheet?: string | number };
  crm: { filePath: string; encoding: 'auto' | 'utf-8' | 'cp1252'; delimiters: string[] };
  salesPartners: string[];
  columns: ColumnMapping;
  report: { outDir: string | null; dashboardUrl?: string };
  filter: IssueFilter;
  output: 'summary' | 'json';
  failOnIssues: boolean;
  logging: { level: LogLevel; format: LogFormat };
}

/**
 * Merge the config file with command line flags; flags win.
 * Relative paths resolve against `cwd`.
 */
export function resolveSettings(
  config: ConfigFile,
  args: CliArgs,
  cwd: string = process.cwd()
): AuditSettings {
  const billingPath = args.billing ?? config.billing?.filePath;
  if (!billingPath) {
    throw new ConfigError('No billing export given. Use --billing <file.xlsx> or billing.filePath.');
  }

  const crmPath = args.crm ?? config.crm?.filePath;
  if (!crmPath) {
    throw new ConfigError('No CRM export given. Use --crm <file.csv> or crm.filePath.');
  }

  let level: LogLevel = config.logging?.level ?? 'info';
  if (args.logLevel !== undefined) {
    const parsed = logLevelSchema.safeParse(args.logLevel);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid --log-level "${args.logLevel}". Use one of: ${logLevelSchema.options.join(', ')}`
      );
    }
    level = parsed.data;
  }

  const outDir = args.out ?? config.report?.outDir;

  return {
    billing: {
      filePath: resolve(cwd, billingPath),
      sheet: args.sheet ?? config.billing?.sheet,
    },
    crm: {
      filePath: resolve(cwd, crmPath),
      encoding: config.crm?.encoding ?? 'auto',
      delimiters: config.crm?.delimiters ?? DEFAULT_CRM_DELIMITERS,
    },
    salesPartners: config.salesPartners ?? DEFAULT_SALES_PARTNERS,
    columns: resolveColumns(config.columns),
    report: {
      outDir: outDir ? resolve(cwd, outDir) : null,
      dashboardUrl: config.report?.dashboardUrl,
    },
    filter: args.filter !== undefined ? parseIssueFilter(args.filter) : ALL_PROBLEMS,
    output: args.json ? 'json' : 'summary',
    failOnIssues: args.failOnIssues,
    logging: {
      level,
      format: config.logging?.format ?? 'text',
    },
  };
}
