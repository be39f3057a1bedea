// ---------------------------------------------------------------------------
// Backend adapter contract
//
// One implementation per target system.  The convergence engine only talks
// to backends through these interfaces; every method maps to one or more
// remote calls and rejects with BackendApiError (or AuthError) on failure.
// ---------------------------------------------------------------------------

import type {
  CanonicalUser,
  DesiredState,
  ProviderUser,
  RoleAssignment,
  RoleCatalogEntry,
} from './types';

export interface BackendAdapter<P extends ProviderUser = ProviderUser> {
  readonly name: string;

  /**
   * Narrows the run's desired state to the users this backend manages.
   * Backends that manage everyone leave this out.
   */
  selectDesired?(desired: DesiredState): Promise<DesiredState>;

  fetchActualUsers(): Promise<P[]>;

  /** Lookup by login name, for backends where listing and lookup differ. */
  resolveIdentifier(username: string): Promise<P | null>;

  create(user: CanonicalUser): Promise<void>;
  update(actual: P, user: CanonicalUser): Promise<void>;
  delete(actual: P): Promise<void>;

  /** Present on backends with a provider-wide named role catalog. */
  readonly roles?: RoleCatalog<P>;
}

export interface RoleCatalog<P extends ProviderUser = ProviderUser> {
  fetchRoleCatalog(): Promise<RoleCatalogEntry[]>;
  createRole(name: string): Promise<void>;
  fetchUserRoles(user: P): Promise<RoleCatalogEntry[]>;
  assignRoles(user: P, assignment: RoleAssignment): Promise<void>;
}
