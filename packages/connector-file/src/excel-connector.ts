/**
 * Excel Connector
 * Reads Excel workbooks (.xlsx) row by row
 */

import ExcelJS from 'exceljs';
import type { Row } from '@billing-audit/core';
import { ConnectorError } from '@billing-audit/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
  type ParsedTable,
} from './base-file-connector.js';

export interface ExcelConnectorConfig extends FileConnectorConfig {
  type: 'excel';
  /** Sheet name or 1-based index (default: first sheet) */
  sheet?: string | number;
}

type CellPrimitive = string | number | boolean | null;

const FORBIDDEN_ROW_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export class ExcelConnector extends BaseFileConnector<ExcelConnectorConfig> {
  constructor(config: Omit<ExcelConnectorConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async loadTable(): Promise<ParsedTable> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);

    const sheet = this.getSheet(workbook);
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        connectorId: this.config.id,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    // Header row; an empty header cell leaves its column unread
    const headers: string[] = [];
    sheet.getRow(1).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      const value = this.getCellValue(cell);
      if (value === null) return;

      const header = String(value).trim();
      if (FORBIDDEN_ROW_KEYS.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe Excel header name: ${header}`,
          connectorId: this.config.id,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
      headers[colNumber - 1] = header;
    });

    const rows: Row[] = [];
    sheet.eachRow({ includeEmpty: false }, (sheetRow, rowNumber) => {
      if (rowNumber === 1) return;

      const row: Row = Object.create(null);
      for (const header of headers) {
        if (header !== undefined) row[header] = null;
      }
      let hasData = false;

      sheetRow.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        const header = headers[colNumber - 1];
        if (!header) return;

        const value = this.getCellValue(cell);
        if (value !== null && value !== '') {
          hasData = true;
        }
        row[header] = value;
      });

      // Only add row if it has some data
      if (hasData) {
        rows.push(row);
      }
    });

    // Sparse arrays leave holes where a header cell was empty
    return { headers: headers.filter((h): h is string => typeof h === 'string'), rows };
  }

  private getSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet | undefined {
    if (this.config.sheet !== undefined) {
      return workbook.getWorksheet(this.config.sheet);
    }

    // Default: first sheet
    return workbook.worksheets[0];
  }

  private getCellValue(cell: ExcelJS.Cell): CellPrimitive {
    return this.toPrimitive(cell.value);
  }

  private toPrimitive(value: ExcelJS.CellValue): CellPrimitive {
    if (value === null || value === undefined) {
      return null;
    }

    if (value instanceof Date) {
      return value.toISOString();
    }

    if (typeof value !== 'object') {
      return value;
    }

    // Formula results
    if ('result' in value) {
      return value.result === undefined ? null : this.toPrimitive(value.result);
    }

    // Rich text
    if ('richText' in value) {
      return value.richText.map((rt) => rt.text).join('');
    }

    // Hyperlinks
    if ('hyperlink' in value) {
      return value.text;
    }

    // Error values (#N/A, #REF!, ...) and formulas without cached result
    return null;
  }
}

/**
 * Factory function to create an Excel connector
 */
export function createExcelConnector(
  config: Omit<ExcelConnectorConfig, 'type'>
): ExcelConnector {
  return new ExcelConnector(config);
}
