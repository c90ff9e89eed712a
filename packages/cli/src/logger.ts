import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  runId?: string;
  [key: string]: unknown;
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Line sink, stderr by default. stdout is reserved for the report. */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function toLoggable(value: unknown): unknown {
  if (value instanceof Error) {
    // ConnectorError and AuditError carry code, suggestion and context
    if ('toJSON' in value && typeof value.toJSON === 'function') {
      const json: unknown = value.toJSON();
      return json;
    }
    const withCode = 'code' in value ? { code: value.code } : {};
    return { name: value.name, message: value.message, ...withCode };
  }
  return value;
}

function formatField(key: string, value: unknown): string {
  return `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`;
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  private shouldLog(level: LogLevel): boolean {
    const configured = this.options.level ?? 'info';
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(extra ?? {})) {
      fields[key] = toLoggable(value);
    }

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...fields,
    };

    const write = this.options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

    if ((this.options.format ?? 'text') === 'json') {
      write(JSON.stringify(record));
      return;
    }

    const { runId, ...rest } = fields;
    const runPart = typeof runId === 'string' ? ` run=${runId}` : '';
    const restPart = Object.entries(rest)
      .map(([key, value]) => ` ${formatField(key, value)}`)
      .join('');
    write(`[${record.ts}] ${level.toUpperCase()}${runPart} ${msg}${restPart}`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}

export function createRunId(): string {
  return randomUUID();
}
