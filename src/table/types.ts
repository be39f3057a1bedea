// ---------------------------------------------------------------------------
// Tabular source model: column schema, raw cells, decoded cells
// ---------------------------------------------------------------------------

export type SelectionSubtype = 'single' | 'multi' | 'check';

export interface SelectionOption {
  id: number;
  label: string;
}

export interface TextColumn {
  kind: 'text';
  id: number;
  title: string;
}

export interface SelectionColumn {
  kind: 'selection';
  id: number;
  title: string;
  subtype: SelectionSubtype;
  options: SelectionOption[];
}

export type ColumnDefinition = TextColumn | SelectionColumn;

/** Ids are unique within a schema; titles need not be. */
export type ColumnSchema = readonly ColumnDefinition[];

export type CellPayload = number | string | number[];

/**
 * A cell as the source delivers it.  Nothing guarantees the payload fits the
 * column it points at.
 */
export interface RawCell {
  columnId: number;
  payload: CellPayload;
}

export type RawRow = readonly RawCell[];

export type CellValue =
  | { type: 'string'; value: string }
  | { type: 'bool'; value: boolean }
  | { type: 'list'; value: string[] };

/** Column title → decoded value. */
export type DecodedRow = ReadonlyMap<string, CellValue>;
