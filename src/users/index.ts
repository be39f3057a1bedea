import type { UsersProviderConfig } from '../config';
import { DEFAULT_USER_COLUMN_MAPPING } from '../config/mapping';
import type { UserColumnMapping } from '../config/mapping';
import type { Logger } from '../logger';
import { decodeRows } from '../table/decoder';
import type { TableDataSource } from '../table/nextcloud';
import type { DesiredState } from '../types';
import { extractDesiredState } from './extract';
import { readUsersFile } from './file-source';

export interface DesiredStateDeps {
  /** Builds the table client for a nextcloud_table provider. */
  tableSource: (provider: Extract<UsersProviderConfig, { type: 'nextcloud_table' }>) => TableDataSource;
  logger: Logger;
}

/** Builds the desired state once per run from the configured provider. */
export async function loadDesiredState(
  provider: UsersProviderConfig,
  deps: DesiredStateDeps,
): Promise<DesiredState> {
  if (provider.type === 'file') {
    const users = await readUsersFile(provider.path);
    deps.logger.info({ users: users.size, path: provider.path }, 'Loaded users file');
    return users;
  }

  const source = deps.tableSource(provider);
  const schema = await source.fetchSchema(provider.table_id);
  const rawRows = await source.fetchRows(provider.table_id);
  const users = extractDesiredState(decodeRows(schema, rawRows), columnMapping(provider));

  deps.logger.info(
    { users: users.size, rows: rawRows.length, tableId: provider.table_id },
    'Loaded users from table',
  );
  return users;
}

export function columnMapping(
  provider: Extract<UsersProviderConfig, { type: 'nextcloud_table' }>,
): UserColumnMapping {
  const { columns } = provider;
  return {
    identifier: columns.identifier ?? DEFAULT_USER_COLUMN_MAPPING.identifier,
    firstName: columns.first_name ?? DEFAULT_USER_COLUMN_MAPPING.firstName,
    lastName: columns.last_name ?? DEFAULT_USER_COLUMN_MAPPING.lastName,
    roles: columns.roles ?? DEFAULT_USER_COLUMN_MAPPING.roles,
    department: columns.department ?? DEFAULT_USER_COLUMN_MAPPING.department,
    emailDomain: provider.email_domain,
  };
}
