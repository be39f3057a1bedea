// ---------------------------------------------------------------------------
// Convergence of one backend
//
// fetch actual → plan → creates → updates → role sync → deletes
//
// Creates and updates grant access before deletes revoke it.  One user at a
// time, strictly sequential.  The first failing call rejects the whole pass;
// operations already applied stay applied.
// ---------------------------------------------------------------------------

import type { BackendAdapter } from '../backend';
import type { Logger } from '../logger';
import type { DesiredState, ProviderUser } from '../types';
import { planReconciliation } from './plan';
import { synchronizeRoles } from './roles';

export interface ConvergenceReport {
  backend: string;
  created: number;
  updated: number;
  deleted: number;
  rolesCreated: string[];
  roleAssignments: number;
}

export async function converge<P extends ProviderUser>(
  backend: BackendAdapter<P>,
  desired: DesiredState,
  logger: Logger,
): Promise<ConvergenceReport> {
  const log = logger.child({ backend: backend.name });

  const scoped = backend.selectDesired ? await backend.selectDesired(desired) : desired;
  const actual = await backend.fetchActualUsers();
  const plan = planReconciliation(scoped, actual);

  log.info(
    {
      desired: scoped.size,
      actual: actual.length,
      toCreate: plan.toCreate.length,
      toUpdate: plan.toUpdate.length,
      toDelete: plan.toDelete.length,
    },
    'Planned reconciliation',
  );

  // ── Creates ─────────────────────────────────────────────────────────────
  for (const user of plan.toCreate) {
    await backend.create(user);
    log.info({ user: user.identifier }, 'Created user');
  }

  // ── Updates ─────────────────────────────────────────────────────────────
  for (const { actual: current, desired: user } of plan.toUpdate) {
    await backend.update(current, user);
    log.debug({ user: user.identifier }, 'Updated user');
  }

  // ── Roles ───────────────────────────────────────────────────────────────
  const roleReport = backend.roles
    ? await synchronizeRoles(backend.roles, scoped, plan.toUpdate, log)
    : { rolesCreated: [], usersAssigned: 0 };

  // ── Deletes ─────────────────────────────────────────────────────────────
  for (const user of plan.toDelete) {
    await backend.delete(user);
    log.info({ user: user.identifier }, 'Removed user');
  }

  const report: ConvergenceReport = {
    backend: backend.name,
    created: plan.toCreate.length,
    updated: plan.toUpdate.length,
    deleted: plan.toDelete.length,
    rolesCreated: roleReport.rolesCreated,
    roleAssignments: roleReport.usersAssigned,
  };
  log.info(report, 'Backend converged');
  return report;
}
