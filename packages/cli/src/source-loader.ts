/**
 * Source Loader
 *
 * Reads the billing workbook and the CRM export through the file
 * connectors, checks the required columns and hands typed records to the
 * reconciliation core.
 */

import type { FilterCondition, ISourceConnector, Row } from '@billing-audit/core';
import { ConnectorError, missingColumns } from '@billing-audit/core';
import { createCsvConnector, createExcelConnector } from '@billing-audit/connector-file';
import type { CsvConnector, TextEncodingName } from '@billing-audit/connector-file';
import {
  RecordNormalizer,
  requiredBillingColumns,
  requiredCrmColumns,
  type BillingRecord,
  type ColumnMapping,
  type CrmRecord,
} from '@billing-audit/audit-core';
import { Logger } from './logger.js';

export interface LoadResult<T> {
  records: T[];
  /** Data rows in the source */
  totalRows: number;
  /** Rows left after the source filter */
  filteredRows: number;
  /** Filtered rows the normalizer dropped for an empty identifier */
  droppedRows: number;
}

export interface BillingSourceOptions {
  filePath: string;
  /** Worksheet name or 1-based index, first sheet by default */
  sheet?: string | number;
  salesPartners: readonly string[];
  columns: ColumnMapping;
  /** Replaces the Excel connector, used for other sources and in tests */
  connector?: ISourceConnector;
}

export interface CrmSourceOptions {
  filePath: string;
  encoding?: TextEncodingName | 'auto';
  delimiters: readonly string[];
  columns: ColumnMapping;
  connector?: ISourceConnector;
}

const silentLogger = new Logger({ level: 'error', write: () => undefined });

/**
 * Connect, verify the required columns and read the filtered rows.
 * The connector is always disconnected afterwards.
 */
async function readSource(
  connector: ISourceConnector,
  required: readonly string[],
  where: FilterCondition[]
): Promise<{ rows: Row[]; sourceCount: number }> {
  await connector.connect();
  try {
    const schema = await connector.getSchema();
    const missing = missingColumns(schema, required);
    if (missing.length > 0) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `${connector.config.name} is missing required columns: ${missing.join(', ')}`,
        connectorId: connector.config.id,
        suggestion: `Export the file with the columns ${required.join(', ')}.`,
        context: { missing, found: schema.columns },
      });
    }

    const result = await connector.readRows({ where });
    return { rows: result.rows, sourceCount: result.sourceCount };
  } finally {
    await connector.disconnect();
  }
}

/**
 * Load the billing export, restricted to the configured salespartners
 */
export async function loadBillingSource(
  options: BillingSourceOptions,
  logger: Logger = silentLogger
): Promise<LoadResult<BillingRecord>> {
  const columns = options.columns.billing;
  const connector =
    options.connector ??
    createExcelConnector({
      id: 'billing',
      name: 'Billing export',
      filePath: options.filePath,
      sheet: options.sheet,
    });

  const startTime = Date.now();
  const { rows, sourceCount } = await readSource(connector, requiredBillingColumns(columns), [
    { column: columns.salesPartner, op: 'in', value: [...options.salesPartners] },
  ]);
  const { records, dropped } = new RecordNormalizer(options.columns).normalizeBillingRows(rows);

  logger.info('Billing export loaded', {
    file: options.filePath,
    rows: sourceCount,
    salesPartnerRows: rows.length,
    dropped,
    durationMs: Date.now() - startTime,
  });
  if (dropped > 0) {
    logger.warn('Billing rows without location id were skipped', { dropped });
  }

  return { records, totalRows: sourceCount, filteredRows: rows.length, droppedRows: dropped };
}

/**
 * Load the CRM export. Rows without identifier are filtered out.
 */
export async function loadCrmSource(
  options: CrmSourceOptions,
  logger: Logger = silentLogger
): Promise<LoadResult<CrmRecord>> {
  const columns = options.columns.crm;
  let csv: CsvConnector | null = null;
  let connector: ISourceConnector;
  if (options.connector) {
    connector = options.connector;
  } else {
    csv = createCsvConnector({
      id: 'crm',
      name: 'CRM export',
      filePath: options.filePath,
      encoding: options.encoding ?? 'auto',
      delimiter: [...options.delimiters],
      probeColumn: columns.identifier,
      cast: false,
    });
    connector = csv;
  }

  const startTime = Date.now();
  const { rows, sourceCount } = await readSource(connector, requiredCrmColumns(columns), [
    { column: columns.identifier, op: 'present' },
  ]);
  const { records, dropped } = new RecordNormalizer(options.columns).normalizeCrmRows(rows);

  logger.info('CRM export loaded', {
    file: options.filePath,
    encoding: csv?.detectedEncoding ?? undefined,
    delimiter: csv?.detectedDelimiter ?? undefined,
    rows: sourceCount,
    withIdentifier: rows.length,
    durationMs: Date.now() - startTime,
  });

  return { records, totalRows: sourceCount, filteredRows: rows.length, droppedRows: dropped };
}
