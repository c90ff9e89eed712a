/**
 * CSV Connector
 * Reads CSV exports with encoding detection and delimiter probing
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import type { Row } from '@billing-audit/core';
import { ConnectorError } from '@billing-audit/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
  type ParsedTable,
} from './base-file-connector.js';
import { decodeText, detectEncoding, type TextEncodingName } from './encoding.js';

export interface CsvConnectorConfig extends FileConnectorConfig {
  type: 'csv';
  /**
   * Delimiter, or candidates tried in order (default: ',').
   * With several candidates the first one whose header row contains
   * `probeColumn` wins; without a match the last parseable candidate is used.
   */
  delimiter?: string | string[];
  /** Column expected in the header row when probing delimiters */
  probeColumn?: string;
  /** Text encoding (default: 'auto') */
  encoding?: TextEncodingName | 'auto';
  /** Convert numeric and boolean cells (default: true). Disable to keep identifiers verbatim. */
  cast?: boolean;
}

const FORBIDDEN_ROW_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export class CsvConnector extends BaseFileConnector<CsvConnectorConfig> {
  private _delimiter: string | null = null;
  private _encoding: TextEncodingName | null = null;

  constructor(config: Omit<CsvConnectorConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  /** Delimiter used for the last successful parse */
  get detectedDelimiter(): string | null {
    return this._delimiter;
  }

  /** Encoding used for the last successful read */
  get detectedEncoding(): TextEncodingName | null {
    return this._encoding;
  }

  protected async loadTable(): Promise<ParsedTable> {
    const bytes = await readFile(this.config.filePath);
    const requested = this.config.encoding ?? 'auto';
    const encoding = requested === 'auto' ? detectEncoding(bytes) : requested;
    const content = decodeText(bytes, encoding);
    this._encoding = encoding;

    const configured = this.config.delimiter ?? ',';
    const candidates = Array.isArray(configured) ? configured : [configured];
    const probeColumn = this.config.probeColumn;

    let fallback: { table: ParsedTable; delimiter: string } | null = null;
    let lastError: Error | undefined;

    for (const delimiter of candidates) {
      let table: ParsedTable;
      try {
        table = this.parseWith(content, delimiter);
      } catch (error) {
        if (error instanceof ConnectorError) throw error;
        lastError = error instanceof Error ? error : new Error(String(error));
        continue;
      }

      if (!probeColumn || table.headers.includes(probeColumn)) {
        this._delimiter = delimiter;
        return table;
      }
      fallback = { table, delimiter };
    }

    if (fallback) {
      this._delimiter = fallback.delimiter;
      return fallback.table;
    }

    throw new ConnectorError({
      code: 'READ_FAILED',
      message: `Could not parse CSV file with any delimiter (${candidates
        .map((d) => JSON.stringify(d))
        .join(', ')})`,
      connectorId: this.config.id,
      suggestion: 'Export the file as CSV separated by semicolon, comma or tab.',
      cause: lastError,
    });
  }

  private parseWith(content: string, delimiter: string): ParsedTable {
    const rows: unknown[][] = parse(content, {
      columns: false, // Parse rows first so we can safely map headers ourselves
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
      cast: this.config.cast !== false,
      cast_date: false,
    });
    if (rows.length === 0) return { headers: [], rows: [] };

    const [headerRow = [], ...bodyRows] = rows;
    const headers = headerRow.map((h) => String(h ?? ''));

    for (const header of headers) {
      if (FORBIDDEN_ROW_KEYS.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe CSV header name: ${header}`,
          connectorId: this.config.id,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    return {
      headers,
      rows: bodyRows.map((cells) => {
        const row: Row = Object.create(null);
        headers.forEach((header, i) => {
          row[header] = cells[i] ?? null;
        });
        return row;
      }),
    };
  }
}

/**
 * Factory function to create a CSV connector
 */
export function createCsvConnector(config: Omit<CsvConnectorConfig, 'type'>): CsvConnector {
  return new CsvConnector(config);
}
