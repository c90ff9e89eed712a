/**
 * Base class for file-based connectors
 * Handles common functionality: file access, header schema, in-memory filtering
 */

import { access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  ISourceConnector,
  ConnectorConfig,
  ConnectionState,
  SourceSchema,
  FilterOptions,
  ReadResult,
  Row,
} from '@billing-audit/core';
import { ConnectorError, applyFilter } from '@billing-audit/core';

export interface FileConnectorConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
}

/** Header row plus data rows, as produced by a parser */
export interface ParsedTable {
  headers: string[];
  rows: Row[];
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Abstract base class for file connectors
 */
export abstract class BaseFileConnector<TConfig extends FileConnectorConfig>
  implements ISourceConnector<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _table: ParsedTable = { headers: [], rows: [] };

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      await access(this.config.filePath, constants.R_OK);
      this._table = await this.loadTable();
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof ConnectorError) {
        throw error;
      }

      const code = errnoCode(error);

      if (code === 'ENOENT') {
        throw new ConnectorError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    this._table = { headers: [], rows: [] };
    this._state = 'disconnected';
  }

  async getSchema(): Promise<SourceSchema> {
    this.ensureConnected();
    return { name: this.config.name, columns: [...this._table.headers] };
  }

  async readRows(options?: FilterOptions): Promise<ReadResult> {
    this.ensureConnected();

    const rows = this._table.rows;
    return { rows: applyFilter(rows, options), sourceCount: rows.length };
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Connector is not connected',
        connectorId: this.config.id,
        suggestion: 'Call connect() before reading rows.',
      });
    }
  }

  /**
   * Read and parse the file (implemented by subclasses)
   */
  protected abstract loadTable(): Promise<ParsedTable>;
}
