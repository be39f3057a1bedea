// ---------------------------------------------------------------------------
// Schema-directed cell decoding
//
// Lenient by contract: a cell whose (column kind, payload shape) pair is not
// recognised, or whose column id is unknown, is left out of the row.  Stale
// or malformed source data degrades to "field absent", never to an error.
// ---------------------------------------------------------------------------

import type {
  CellPayload,
  CellValue,
  ColumnDefinition,
  ColumnSchema,
  DecodedRow,
  RawRow,
  SelectionColumn,
} from './types';

export function decodeRows(schema: ColumnSchema, rows: readonly RawRow[]): DecodedRow[] {
  const columns = new Map<number, ColumnDefinition>(schema.map((c) => [c.id, c]));

  return rows.map((row) => {
    const decoded = new Map<string, CellValue>();
    for (const cell of row) {
      const column = columns.get(cell.columnId);
      if (!column) continue;

      const value = decodeCell(column, cell.payload);
      if (value) decoded.set(column.title, value);
    }
    return decoded;
  });
}

/** Resolves one payload against its column, or null when the pair is not decodable. */
export function decodeCell(column: ColumnDefinition, payload: CellPayload): CellValue | null {
  switch (column.kind) {
    case 'text':
      return typeof payload === 'string' ? { type: 'string', value: payload } : null;
    case 'selection':
      return decodeSelection(column, payload);
    default:
      return assertNever(column);
  }
}

function decodeSelection(column: SelectionColumn, payload: CellPayload): CellValue | null {
  switch (column.subtype) {
    case 'check':
      if (payload === 'true') return { type: 'bool', value: true };
      if (payload === 'false') return { type: 'bool', value: false };
      return null;

    case 'single': {
      if (typeof payload !== 'number') return null;
      const label = optionLabel(column, payload);
      return label === undefined ? null : { type: 'string', value: label };
    }

    case 'multi': {
      if (!Array.isArray(payload)) return null;
      const labels: string[] = [];
      for (const id of payload) {
        const label = optionLabel(column, id);
        if (label !== undefined) labels.push(label);
      }
      return { type: 'list', value: labels };
    }

    default:
      return assertNever(column.subtype);
  }
}

function optionLabel(column: SelectionColumn, id: number): string | undefined {
  return column.options.find((o) => o.id === id)?.label;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled column variant: ${JSON.stringify(value)}`);
}
