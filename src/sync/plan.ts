import type { DesiredState, ProviderUser, ReconciliationPlan, UpdatePair } from '../types';

/**
 * Partitions desired and actual users by identifier.
 *
 * Membership only: a matched user is always updated with the full desired
 * record, never diffed field by field.  Output order follows the desired
 * state for creates and the backend listing for updates and deletes.
 */
export function planReconciliation<P extends ProviderUser>(
  desired: DesiredState,
  actual: readonly P[],
): ReconciliationPlan<P> {
  const toUpdate: UpdatePair<P>[] = [];
  const toDelete: P[] = [];
  const matched = new Set<string>();

  for (const user of actual) {
    const wanted = desired.get(user.identifier);
    if (wanted) {
      toUpdate.push({ actual: user, desired: wanted });
      matched.add(user.identifier);
    } else {
      toDelete.push(user);
    }
  }

  const toCreate = [...desired.values()].filter((user) => !matched.has(user.identifier));

  return { toCreate, toUpdate, toDelete };
}
