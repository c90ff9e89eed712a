/**
 * @billing-audit/connector-file
 *
 * Read-only connectors for CSV exports and Excel workbooks
 */

export { BaseFileConnector } from './base-file-connector.js';
export type { FileConnectorConfig, ParsedTable } from './base-file-connector.js';

export { CsvConnector, createCsvConnector } from './csv-connector.js';
export type { CsvConnectorConfig } from './csv-connector.js';

export { ExcelConnector, createExcelConnector } from './excel-connector.js';
export type { ExcelConnectorConfig } from './excel-connector.js';

export { detectEncoding, decodeText } from './encoding.js';
export type { TextEncodingName } from './encoding.js';

// Re-export core types for convenience
export type {
  ISourceConnector,
  ConnectorConfig,
  ConnectionState,
  SourceSchema,
  FilterOptions,
  ReadResult,
  Row,
} from '@billing-audit/core';
