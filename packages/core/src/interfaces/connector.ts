/**
 * Source Connector Interface
 *
 * Every tabular source (CSV export, Excel workbook) implements this
 * interface. Sources are read once into memory and never written back.
 */

import type { FilterOptions, ReadResult, SourceSchema } from '../types/index.js';

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Connector type (csv, excel) */
  type: string;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Base interface all source connectors implement
 */
export interface ISourceConnector<TConfig extends ConnectorConfig = ConnectorConfig> {
  /** Connector configuration */
  readonly config: TConfig;

  /** Current connection state */
  readonly state: ConnectionState;

  /**
   * Read and parse the source
   * @throws ConnectorError if the source cannot be read or parsed
   */
  connect(): Promise<void>;

  /**
   * Release the parsed rows
   */
  disconnect(): Promise<void>;

  /**
   * Describe the columns of the source, in header order
   */
  getSchema(): Promise<SourceSchema>;

  /**
   * Read rows from the source
   * @param options - Row filter
   */
  readRows(options?: FilterOptions): Promise<ReadResult>;
}
