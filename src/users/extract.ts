import { DEFAULT_USER_COLUMN_MAPPING, rowToCanonicalUser } from '../config/mapping';
import type { UserColumnMapping } from '../config/mapping';
import type { DecodedRow } from '../table/types';
import type { CanonicalUser, DesiredState } from '../types';

/**
 * Builds the desired state from decoded table rows.
 *
 * Rows that do not map to a complete user are dropped.  When an identifier
 * repeats, the first row's names and email stay and the roles of every
 * later row are appended, duplicates included.
 */
export function extractDesiredState(
  rows: readonly DecodedRow[],
  mapping: UserColumnMapping = DEFAULT_USER_COLUMN_MAPPING,
): DesiredState {
  const users = new Map<string, CanonicalUser>();

  for (const row of rows) {
    const user = rowToCanonicalUser(row, mapping);
    if (!user) continue;

    const existing = users.get(user.identifier);
    if (existing) {
      existing.roles.push(...user.roles);
    } else {
      users.set(user.identifier, user);
    }
  }

  return users;
}
