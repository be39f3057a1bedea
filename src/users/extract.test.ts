import { describe, it, expect } from 'vitest';
import { rowToCanonicalUser } from '../config/mapping';
import { decodeRows } from '../table/decoder';
import type { CellValue, ColumnSchema, DecodedRow } from '../table/types';
import { extractDesiredState } from './extract';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function str(value: string): CellValue {
  return { type: 'string', value };
}

function list(...value: string[]): CellValue {
  return { type: 'list', value };
}

function row(
  identifier: string,
  functions: string[],
  overrides: Record<string, CellValue | undefined> = {},
): DecodedRow {
  const cells: Record<string, CellValue | undefined> = {
    Funktionskennung: str(identifier),
    Vorname: str('Jane'),
    Nachname: str('Doe'),
    Funktion: list(...functions),
    Fachschaft: str('CS'),
    ...overrides,
  };
  const decoded = new Map<string, CellValue>();
  for (const [title, value] of Object.entries(cells)) {
    if (value) decoded.set(title, value);
  }
  return decoded;
}

// ---------------------------------------------------------------------------
// rowToCanonicalUser
// ---------------------------------------------------------------------------

describe('rowToCanonicalUser', () => {
  it('derives email and department-prefixed roles', () => {
    expect(rowToCanonicalUser(row('jdoe', ['Admin', 'Kasse']))).toEqual({
      identifier: 'jdoe',
      firstName: 'Jane',
      lastName: 'Doe',
      email: 'jdoe@hhu.de',
      matrixId: null,
      roles: ['CS - Admin', 'CS - Kasse', 'CS'],
      enabled: true,
    });
  });

  it('keeps the bare department when the function list is empty', () => {
    expect(rowToCanonicalUser(row('jdoe', []))?.roles).toEqual(['CS']);
  });

  it.each(['Funktionskennung', 'Vorname', 'Nachname', 'Funktion', 'Fachschaft'])(
    'drops the row when %s is missing',
    (title) => {
      expect(rowToCanonicalUser(row('jdoe', ['Admin'], { [title]: undefined }))).toBeNull();
    },
  );

  it('drops the row when a field decoded to the wrong variant', () => {
    expect(rowToCanonicalUser(row('jdoe', ['Admin'], { Vorname: list('Jane') }))).toBeNull();
    expect(rowToCanonicalUser(row('jdoe', ['Admin'], { Funktion: str('Admin') }))).toBeNull();
    expect(
      rowToCanonicalUser(row('jdoe', ['Admin'], { Funktionskennung: { type: 'bool', value: true } })),
    ).toBeNull();
  });

  it('drops the row when the identifier is empty', () => {
    expect(rowToCanonicalUser(row('', ['Admin']))).toBeNull();
  });

  it('honours a custom column mapping and email domain', () => {
    const decoded = new Map<string, CellValue>([
      ['login', str('mmu')],
      ['given', str('Max')],
      ['family', str('Muster')],
      ['jobs', list('Vorsitz')],
      ['unit', str('Physik')],
    ]);
    const user = rowToCanonicalUser(decoded, {
      identifier: 'login',
      firstName: 'given',
      lastName: 'family',
      roles: 'jobs',
      department: 'unit',
      emailDomain: 'example.org',
    });
    expect(user?.email).toBe('mmu@example.org');
    expect(user?.roles).toEqual(['Physik - Vorsitz', 'Physik']);
  });
});

// ---------------------------------------------------------------------------
// extractDesiredState
// ---------------------------------------------------------------------------

describe('extractDesiredState', () => {
  it('merges rows sharing an identifier by appending roles', () => {
    const desired = extractDesiredState([
      row('abc123', ['X']),
      row('abc123', ['Y'], { Vorname: str('Other'), Fachschaft: str('Math') }),
    ]);

    expect(desired.size).toBe(1);
    const user = desired.get('abc123');
    expect(user?.firstName).toBe('Jane');
    expect(user?.email).toBe('abc123@hhu.de');
    expect(user?.roles).toEqual(['CS - X', 'CS', 'Math - Y', 'Math']);
  });

  it('retains duplicate roles when merging', () => {
    const desired = extractDesiredState([row('abc', ['X']), row('abc', ['X'])]);
    expect(desired.get('abc')?.roles).toEqual(['CS - X', 'CS', 'CS - X', 'CS']);
  });

  it('skips incomplete rows without affecting the others', () => {
    const desired = extractDesiredState([
      row('a', ['X'], { Nachname: undefined }),
      row('b', ['Y']),
    ]);
    expect([...desired.keys()]).toEqual(['b']);
  });

  it('decodes and extracts a table end to end', () => {
    const schema: ColumnSchema = [
      { kind: 'text', id: 1, title: 'Vorname' },
      {
        kind: 'selection',
        id: 2,
        title: 'Funktion',
        subtype: 'multi',
        options: [{ id: 10, label: 'Admin' }],
      },
      { kind: 'text', id: 3, title: 'Funktionskennung' },
      { kind: 'text', id: 4, title: 'Nachname' },
      { kind: 'text', id: 5, title: 'Fachschaft' },
    ];
    const rows = decodeRows(schema, [
      [
        { columnId: 1, payload: 'Jane' },
        { columnId: 2, payload: [10] },
        { columnId: 3, payload: 'jdoe' },
        { columnId: 4, payload: 'Doe' },
        { columnId: 5, payload: 'CS' },
      ],
    ]);

    const desired = extractDesiredState(rows);

    expect([...desired.values()]).toEqual([
      {
        identifier: 'jdoe',
        firstName: 'Jane',
        lastName: 'Doe',
        email: 'jdoe@hhu.de',
        matrixId: null,
        roles: ['CS - Admin', 'CS'],
        enabled: true,
      },
    ]);
  });
});
