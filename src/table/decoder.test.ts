import { describe, it, expect } from 'vitest';
import { decodeCell, decodeRows } from './decoder';
import type { ColumnSchema, SelectionColumn, TextColumn } from './types';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const text: TextColumn = { kind: 'text', id: 1, title: 'Vorname' };

const single: SelectionColumn = {
  kind: 'selection',
  id: 2,
  title: 'Status',
  subtype: 'single',
  options: [
    { id: 1, label: 'aktiv' },
    { id: 2, label: 'ruhend' },
  ],
};

const multi: SelectionColumn = {
  kind: 'selection',
  id: 3,
  title: 'Funktion',
  subtype: 'multi',
  options: [
    { id: 1, label: 'A' },
    { id: 2, label: 'B' },
  ],
};

const check: SelectionColumn = {
  kind: 'selection',
  id: 4,
  title: 'Aktiv',
  subtype: 'check',
  options: [],
};

const schema: ColumnSchema = [text, single, multi, check];

// ---------------------------------------------------------------------------
// decodeCell
// ---------------------------------------------------------------------------

describe('decodeCell', () => {
  it('decodes a string in a text column', () => {
    expect(decodeCell(text, 'Jane')).toEqual({ type: 'string', value: 'Jane' });
  });

  it('drops non-string payloads in a text column', () => {
    expect(decodeCell(text, 5)).toBeNull();
    expect(decodeCell(text, [1])).toBeNull();
  });

  it('decodes "true" and "false" in a check column', () => {
    expect(decodeCell(check, 'true')).toEqual({ type: 'bool', value: true });
    expect(decodeCell(check, 'false')).toEqual({ type: 'bool', value: false });
  });

  it('drops any other string in a check column', () => {
    expect(decodeCell(check, 'yes')).toBeNull();
    expect(decodeCell(check, 'TRUE')).toBeNull();
  });

  it('drops numbers in a check column', () => {
    expect(decodeCell(check, 1)).toBeNull();
  });

  it('resolves a single selection by option id', () => {
    expect(decodeCell(single, 2)).toEqual({ type: 'string', value: 'ruhend' });
  });

  it('drops a single selection with an unknown option id', () => {
    expect(decodeCell(single, 99)).toBeNull();
  });

  it('drops a list payload in a single selection column', () => {
    expect(decodeCell(single, [1])).toBeNull();
  });

  it('resolves multi selection ids in order, skipping unknown ones', () => {
    expect(decodeCell(multi, [1, 99, 2])).toEqual({ type: 'list', value: ['A', 'B'] });
    expect(decodeCell(multi, [2, 1])).toEqual({ type: 'list', value: ['B', 'A'] });
  });

  it('keeps a multi selection cell whose ids are all unknown as an empty list', () => {
    expect(decodeCell(multi, [7, 8])).toEqual({ type: 'list', value: [] });
  });

  it('drops a scalar payload in a multi selection column', () => {
    expect(decodeCell(multi, 1)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// decodeRows
// ---------------------------------------------------------------------------

describe('decodeRows', () => {
  it('maps each row to title → value, preserving row order', () => {
    const rows = decodeRows(schema, [
      [
        { columnId: 1, payload: 'Jane' },
        { columnId: 3, payload: [2] },
      ],
      [{ columnId: 4, payload: 'true' }],
    ]);

    expect(rows).toHaveLength(2);
    expect([...rows[0].entries()]).toEqual([
      ['Vorname', { type: 'string', value: 'Jane' }],
      ['Funktion', { type: 'list', value: ['B'] }],
    ]);
    expect([...rows[1].entries()]).toEqual([['Aktiv', { type: 'bool', value: true }]]);
  });

  it('drops cells that reference a column missing from the schema', () => {
    const [row] = decodeRows(schema, [
      [
        { columnId: 42, payload: 'stale' },
        { columnId: 1, payload: 'Jane' },
      ],
    ]);
    expect([...row.keys()]).toEqual(['Vorname']);
  });

  it('leaves a check cell with an unrecognised string out of the row', () => {
    const [row] = decodeRows(schema, [[{ columnId: 4, payload: 'yes' }]]);
    expect(row.has('Aktiv')).toBe(false);
    expect(row.size).toBe(0);
  });

  it('lets a later column win when two columns share a title', () => {
    const duplicated: ColumnSchema = [
      { kind: 'text', id: 1, title: 'Name' },
      { kind: 'text', id: 2, title: 'Name' },
    ];
    const [row] = decodeRows(duplicated, [
      [
        { columnId: 1, payload: 'first' },
        { columnId: 2, payload: 'second' },
      ],
    ]);
    expect(row.get('Name')).toEqual({ type: 'string', value: 'second' });
  });

  it('never produces a cell for a mismatched payload shape', () => {
    const [row] = decodeRows(schema, [
      [
        { columnId: 1, payload: 3 },
        { columnId: 2, payload: 'aktiv' },
        { columnId: 3, payload: 'A' },
        { columnId: 4, payload: [1] },
      ],
    ]);
    expect(row.size).toBe(0);
  });

  it('returns an empty list for no rows', () => {
    expect(decodeRows(schema, [])).toEqual([]);
  });
});
