// ---------------------------------------------------------------------------
// Table columns ↔ canonical user mapping
//
// This file is the single source of truth for which column titles feed
// which canonical user fields.  The titles are the integration contract with
// the people maintaining the table; change them through configuration, not
// through extractor code.
// ---------------------------------------------------------------------------

import type { CellValue, DecodedRow } from '../table/types';
import type { CanonicalUser } from '../types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface UserColumnMapping {
  /** Login name; also the local part of the email address. */
  identifier: string;
  firstName: string;
  lastName: string;
  /** Multi-selection of functions held within the department. */
  roles: string;
  /** Department the functions belong to, e.g. a student council. */
  department: string;
  /** Appended to the identifier to form the email address. */
  emailDomain: string;
}

export const DEFAULT_USER_COLUMN_MAPPING: UserColumnMapping = {
  identifier: 'Funktionskennung',
  firstName: 'Vorname',
  lastName: 'Nachname',
  roles: 'Funktion',
  department: 'Fachschaft',
  emailDomain: 'hhu.de',
};

// ---------------------------------------------------------------------------
// Row → user
// ---------------------------------------------------------------------------

/**
 * Maps one decoded row to a canonical user, or null when any required field
 * is absent or decoded to the wrong variant.  No partially populated user is
 * ever produced.
 *
 * Roles are derived: every function becomes "{department} - {function}",
 * followed by the bare department name.
 */
export function rowToCanonicalUser(
  row: DecodedRow,
  mapping: UserColumnMapping = DEFAULT_USER_COLUMN_MAPPING,
): CanonicalUser | null {
  const identifier = stringCell(row.get(mapping.identifier));
  const firstName = stringCell(row.get(mapping.firstName));
  const lastName = stringCell(row.get(mapping.lastName));
  const functions = listCell(row.get(mapping.roles));
  const department = stringCell(row.get(mapping.department));

  if (!identifier || firstName === null || lastName === null) return null;
  if (functions === null || department === null) return null;

  return {
    identifier,
    firstName,
    lastName,
    email: `${identifier}@${mapping.emailDomain}`,
    matrixId: null,
    roles: [...functions.map((fn) => `${department} - ${fn}`), department],
    enabled: true,
  };
}

function stringCell(cell: CellValue | undefined): string | null {
  return cell?.type === 'string' ? cell.value : null;
}

function listCell(cell: CellValue | undefined): string[] | null {
  return cell?.type === 'list' ? cell.value : null;
}
