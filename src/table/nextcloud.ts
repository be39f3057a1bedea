// ---------------------------------------------------------------------------
// Nextcloud Tables data source
//
// Fetches a table's column scheme and its rows and converts the wire format
// into ColumnSchema / RawRow.  Column types other than text and selection
// are skipped here, so their cells later fall out as "unknown column".
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { basicAuthorization } from '../auth/credentials';
import { SourceError, describeError } from '../errors';
import { HttpClient } from '../http';
import type { HttpClientOptions } from '../http';
import type {
  CellPayload,
  ColumnDefinition,
  ColumnSchema,
  RawCell,
  RawRow,
  SelectionSubtype,
} from './types';

export interface NextcloudConnection {
  url: string;
  username: string;
  password: string;
}

/** Where a table's schema and rows come from. */
export interface TableDataSource {
  fetchSchema(tableId: number): Promise<ColumnSchema>;
  fetchRows(tableId: number): Promise<RawRow[]>;
}

// ---------------------------------------------------------------------------
// Wire schemas
// ---------------------------------------------------------------------------

const WireColumnSchema = z.object({
  id: z.number(),
  title: z.string(),
  type: z.string(),
  subtype: z.string().nullish(),
  selectionOptions: z.array(z.object({ id: z.number(), label: z.string() })).nullish(),
});

type WireColumn = z.infer<typeof WireColumnSchema>;

const SchemeResponseSchema = z.object({
  ocs: z.object({
    data: z.object({
      title: z.string(),
      columns: z.array(WireColumnSchema),
    }),
  }),
});

const WireCellSchema = z.object({
  columnId: z.number(),
  value: z.unknown(),
});

const RowsResponseSchema = z.array(
  z.object({
    data: z.array(WireCellSchema).nullish(),
  }),
);

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class NextcloudTablesClient implements TableDataSource {
  private readonly http: HttpClient;

  constructor(
    connection: NextcloudConnection,
    options: Omit<HttpClientOptions, 'backend' | 'baseUrl' | 'authorize' | 'headers'>,
  ) {
    const authorization = basicAuthorization(connection.username, connection.password);
    this.http = new HttpClient({
      ...options,
      backend: 'nextcloud',
      baseUrl: connection.url,
      authorize: async () => authorization,
      headers: { 'OCS-APIRequest': 'true' },
    });
  }

  async fetchSchema(tableId: number): Promise<ColumnSchema> {
    try {
      const scheme = await this.http.get(
        `/ocs/v2.php/apps/tables/api/2/tables/scheme/${tableId}`,
        SchemeResponseSchema,
      );
      return toColumnSchema(scheme.ocs.data.columns);
    } catch (err) {
      throw new SourceError(`Cannot load scheme of table ${tableId}: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async fetchRows(tableId: number): Promise<RawRow[]> {
    try {
      const rows = await this.http.get(
        `/index.php/apps/tables/api/1/tables/${tableId}/rows`,
        RowsResponseSchema,
      );
      return rows.map((row) => toRawRow(row.data ?? []));
    } catch (err) {
      throw new SourceError(`Cannot load rows of table ${tableId}: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Wire → model
// ---------------------------------------------------------------------------

export function toColumnSchema(columns: readonly WireColumn[]): ColumnSchema {
  const schema: ColumnDefinition[] = [];
  for (const column of columns) {
    if (column.type === 'text') {
      schema.push({ kind: 'text', id: column.id, title: column.title });
      continue;
    }
    if (column.type === 'selection') {
      const subtype = toSelectionSubtype(column.subtype ?? '');
      if (!subtype) continue;
      schema.push({
        kind: 'selection',
        id: column.id,
        title: column.title,
        subtype,
        options: column.selectionOptions ?? [],
      });
    }
  }
  return schema;
}

/** An empty subtype is how Nextcloud spells single selection. */
function toSelectionSubtype(subtype: string): SelectionSubtype | null {
  switch (subtype) {
    case '':
      return 'single';
    case 'multi':
      return 'multi';
    case 'check':
      return 'check';
    default:
      return null;
  }
}

export function toRawRow(cells: ReadonlyArray<{ columnId: number; value?: unknown }>): RawRow {
  const row: RawCell[] = [];
  for (const cell of cells) {
    const payload = toPayload(cell.value);
    if (payload !== null) row.push({ columnId: cell.columnId, payload });
  }
  return row;
}

function toPayload(value: unknown): CellPayload | null {
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (Array.isArray(value)) {
    const ids: number[] = [];
    for (const item of value) {
      if (typeof item !== 'number') return null;
      ids.push(item);
    }
    return ids;
  }
  return null;
}
