import { describe, it, expect } from 'vitest';
import { silentLogger } from '../logger';
import { FakeRoleCatalog, canonicalUser, desiredOf } from '../testing/fake-backend';
import type { FakeCall } from '../testing/fake-backend';
import type { ProviderUser, RoleCatalogEntry } from '../types';
import {
  computeRoleAssignment,
  desiredRoleNames,
  synchronizeRoles,
  syncRoleCatalog,
} from './roles';

const logger = silentLogger();

function role(name: string): RoleCatalogEntry {
  return { providerRoleId: `role-${name}`, name };
}

function account(identifier: string): ProviderUser {
  return { providerId: `id-${identifier}`, identifier };
}

describe('desiredRoleNames', () => {
  it('collects each role name once in first-seen order', () => {
    const desired = desiredOf(canonicalUser('a', ['X', 'Y', 'X']), canonicalUser('b', ['Z', 'Y']));
    expect(desiredRoleNames(desired)).toEqual(['X', 'Y', 'Z']);
  });
});

describe('computeRoleAssignment', () => {
  it('adds desired catalog roles the user lacks and removes undesired ones', () => {
    const catalog = [role('A'), role('B'), role('C')];
    const assigned = [role('A'), role('D')];

    expect(computeRoleAssignment(['A', 'B', 'missing'], catalog, assigned)).toEqual({
      rolesToAdd: [role('B')],
      rolesToRemove: [role('D')],
    });
  });

  it('returns empty sets when the user already matches', () => {
    expect(computeRoleAssignment(['A'], [role('A')], [role('A')])).toEqual({
      rolesToAdd: [],
      rolesToRemove: [],
    });
  });

  it('removes everything when no roles are desired', () => {
    expect(computeRoleAssignment([], [role('A')], [role('A'), role('B')])).toEqual({
      rolesToAdd: [],
      rolesToRemove: [role('A'), role('B')],
    });
  });
});

describe('syncRoleCatalog', () => {
  it('creates each missing role exactly once and returns the refreshed catalog', async () => {
    const calls: FakeCall[] = [];
    const roles = new FakeRoleCatalog(calls);
    roles.catalog.push(role('X'));
    const desired = desiredOf(canonicalUser('a', ['X', 'Y']), canonicalUser('b', ['Y', 'Z']));

    const result = await syncRoleCatalog(roles, desired, logger);

    expect(result.created).toEqual(['Y', 'Z']);
    expect(result.catalog.map((r) => r.name)).toEqual(['X', 'Y', 'Z']);
    expect(calls).toEqual([
      { op: 'createRole', role: 'Y' },
      { op: 'createRole', role: 'Z' },
    ]);
    expect(roles.catalogFetches).toBe(2);
  });

  it('issues no creates on a second run with the same roles', async () => {
    const calls: FakeCall[] = [];
    const roles = new FakeRoleCatalog(calls);
    const desired = desiredOf(canonicalUser('a', ['X', 'Y']));

    await syncRoleCatalog(roles, desired, logger);
    const before = calls.length;
    const second = await syncRoleCatalog(roles, desired, logger);

    expect(second.created).toEqual([]);
    expect(calls.length).toBe(before);
  });
});

describe('synchronizeRoles', () => {
  it('assigns roles only to matched users and skips users already in sync', async () => {
    const calls: FakeCall[] = [];
    const roles = new FakeRoleCatalog(calls);
    roles.catalog.push(role('R'), role('old'));
    roles.assignments.set('id-a', [role('old')]);
    roles.assignments.set('id-b', [role('R')]);

    const a = canonicalUser('a', ['R']);
    const b = canonicalUser('b', ['R']);
    const fresh = canonicalUser('fresh', ['R']);

    const report = await synchronizeRoles(
      roles,
      desiredOf(a, b, fresh),
      [
        { actual: account('a'), desired: a },
        { actual: account('b'), desired: b },
      ],
      logger,
    );

    expect(calls).toEqual([{ op: 'assignRoles', user: 'a', add: ['R'], remove: ['old'] }]);
    expect(report).toEqual({ rolesCreated: [], usersAssigned: 1 });
    expect(roles.assignments.get('id-a')).toEqual([role('R')]);
  });

  it('assigns roles created in the same pass', async () => {
    const calls: FakeCall[] = [];
    const roles = new FakeRoleCatalog(calls);
    const user = canonicalUser('a', ['CS - Admin', 'CS']);

    await synchronizeRoles(roles, desiredOf(user), [{ actual: account('a'), desired: user }], logger);

    expect(calls).toEqual([
      { op: 'createRole', role: 'CS - Admin' },
      { op: 'createRole', role: 'CS' },
      { op: 'assignRoles', user: 'a', add: ['CS - Admin', 'CS'], remove: [] },
    ]);
  });

  it('propagates the first failure', async () => {
    const roles = new FakeRoleCatalog([]);
    roles.fetchUserRoles = async () => {
      throw new Error('role lookup failed');
    };
    const user = canonicalUser('a', ['R']);

    await expect(
      synchronizeRoles(roles, desiredOf(user), [{ actual: account('a'), desired: user }], logger),
    ).rejects.toThrow('role lookup failed');
  });
});
