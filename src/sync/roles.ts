// ---------------------------------------------------------------------------
// Role catalog synchronization
//
// Two phases, always in this order:
//   1. catalog     create every desired role name the backend lacks, once,
//                  then re-read the catalog
//   2. assignment  for each matched user, fetch assigned roles, diff against
//                  the desired roles, apply
// Users created in the same pass are not assigned roles until the next run.
// ---------------------------------------------------------------------------

import type { RoleCatalog } from '../backend';
import type { Logger } from '../logger';
import type {
  DesiredState,
  ProviderUser,
  RoleAssignment,
  RoleCatalogEntry,
  UpdatePair,
} from '../types';

export interface RoleSyncReport {
  rolesCreated: string[];
  usersAssigned: number;
}

export interface CatalogPhaseResult {
  /** Catalog as re-read after creation. */
  catalog: RoleCatalogEntry[];
  created: string[];
}

/** Every role name held by any desired user, in first-seen order. */
export function desiredRoleNames(desired: DesiredState): string[] {
  const names = new Set<string>();
  for (const user of desired.values()) {
    for (const role of user.roles) names.add(role);
  }
  return [...names];
}

export async function syncRoleCatalog<P extends ProviderUser>(
  roles: RoleCatalog<P>,
  desired: DesiredState,
  logger: Logger,
): Promise<CatalogPhaseResult> {
  const existing = new Set((await roles.fetchRoleCatalog()).map((r) => r.name));
  const created: string[] = [];

  for (const name of desiredRoleNames(desired)) {
    if (existing.has(name)) continue;
    await roles.createRole(name);
    created.push(name);
    logger.info({ role: name }, 'Created role');
  }

  return { catalog: await roles.fetchRoleCatalog(), created };
}

/**
 * add    = desired ∩ catalog − assigned
 * remove = assigned − desired
 */
export function computeRoleAssignment(
  desiredRoles: readonly string[],
  catalog: readonly RoleCatalogEntry[],
  assigned: readonly RoleCatalogEntry[],
): RoleAssignment {
  const wanted = new Set(desiredRoles);
  const assignedIds = new Set(assigned.map((r) => r.providerRoleId));

  return {
    rolesToAdd: catalog.filter((r) => wanted.has(r.name) && !assignedIds.has(r.providerRoleId)),
    rolesToRemove: assigned.filter((r) => !wanted.has(r.name)),
  };
}

export async function synchronizeRoles<P extends ProviderUser>(
  roles: RoleCatalog<P>,
  desired: DesiredState,
  matched: readonly UpdatePair<P>[],
  logger: Logger,
): Promise<RoleSyncReport> {
  const { catalog, created } = await syncRoleCatalog(roles, desired, logger);

  let usersAssigned = 0;
  for (const { actual, desired: user } of matched) {
    const assigned = await roles.fetchUserRoles(actual);
    const assignment = computeRoleAssignment(user.roles, catalog, assigned);

    // Nothing to send: skip the call instead of posting empty sets
    if (assignment.rolesToAdd.length === 0 && assignment.rolesToRemove.length === 0) continue;

    await roles.assignRoles(actual, assignment);
    usersAssigned += 1;
    logger.info(
      {
        user: actual.identifier,
        added: assignment.rolesToAdd.map((r) => r.name),
        removed: assignment.rolesToRemove.map((r) => r.name),
      },
      'Updated role assignment',
    );
  }

  return { rolesCreated: created, usersAssigned };
}
