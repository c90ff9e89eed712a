import { describe, expect, it } from 'vitest';
import type { Row, SourceSchema } from '../src/index.js';
import {
  ConnectorError,
  applyFilter,
  isBlank,
  missingColumns,
  wrapError,
} from '../src/index.js';

const rows: Row[] = [
  { id: 'A', partner: 'Edelweiss', n: 1 },
  { id: '', partner: 'Other', n: 2 },
  { id: 'C', partner: 'Edelweiss', n: 3 },
  { id: null, partner: 'Third' },
];

const ids = (selected: Row[]) => selected.map((row) => row['n'] ?? 'none');

describe('applyFilter', () => {
  it('returns every row without conditions', () => {
    expect(applyFilter(rows)).toBe(rows);
    expect(applyFilter(rows, { where: [] })).toBe(rows);
  });

  it('selects rows by list membership and presence', () => {
    expect(ids(applyFilter(rows, { where: [{ column: 'partner', op: 'in', value: ['Edelweiss'] }] }))).toEqual([1, 3]);
    expect(ids(applyFilter(rows, { where: [{ column: 'id', op: 'present' }] }))).toEqual([1, 3]);
  });

  it('matches list values exactly', () => {
    expect(applyFilter(rows, { where: [{ column: 'partner', op: 'in', value: ['edelweiss', 'Edelweiss '] }] })).toEqual([]);
  });

  it('combines conditions', () => {
    expect(
      ids(
        applyFilter(rows, {
          where: [
            { column: 'partner', op: 'in', value: ['Edelweiss', 'Other'] },
            { column: 'id', op: 'present' },
          ],
        })
      )
    ).toEqual([1, 3]);
  });
});

describe('column helpers', () => {
  it('detects blank values', () => {
    expect(isBlank(null)).toBe(true);
    expect(isBlank('  ')).toBe(true);
    expect(isBlank(0)).toBe(false);
  });

  it('lists missing columns in the requested order', () => {
    const schema: SourceSchema = { name: 'crm', columns: ['a', 'b'] };

    expect(missingColumns(schema, ['a', 'd', 'c'])).toEqual(['d', 'c']);
  });
});

describe('ConnectorError', () => {
  it('formats an actionable message', () => {
    const error = new ConnectorError({
      code: 'SCHEMA_MISMATCH',
      message: 'CRM export is missing required columns: Projektname',
      connectorId: 'crm',
      suggestion: 'Export the file with the column Projektname.',
    });

    expect(error.toActionableMessage()).toBe(
      [
        'Error [SCHEMA_MISMATCH]: CRM export is missing required columns: Projektname',
        'Source: crm',
        'Suggested action: Export the file with the column Projektname.',
      ].join('\n')
    );
  });

  it('wraps unknown errors once', () => {
    const wrapped = wrapError(new Error('disk full'), 'report');
    expect(wrapped.code).toBe('UNKNOWN');
    expect(wrapped.message).toBe('disk full');
    expect(wrapError(wrapped)).toBe(wrapped);
  });
});
