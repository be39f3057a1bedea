// ---------------------------------------------------------------------------
// Canonical user model and reconciliation types for identity-sync
// ---------------------------------------------------------------------------

/** Desired-state record for one person, independent of any backend. */
export interface CanonicalUser {
  /** Reconciliation key across all backends. Never empty. */
  identifier: string;
  firstName: string;
  lastName: string;
  email: string;
  matrixId: string | null;
  /** Ordered; duplicates are permitted. */
  roles: string[];
  enabled: boolean;
}

/** identifier → user. Built once per run and never mutated afterwards. */
export type DesiredState = ReadonlyMap<string, CanonicalUser>;

/** Minimum shape of an account as a backend reports it. */
export interface ProviderUser {
  providerId: string;
  /** Comparable to CanonicalUser.identifier. */
  identifier: string;
}

export interface UpdatePair<P extends ProviderUser> {
  actual: P;
  desired: CanonicalUser;
}

export interface ReconciliationPlan<P extends ProviderUser> {
  toCreate: CanonicalUser[];
  toUpdate: UpdatePair<P>[];
  toDelete: P[];
}

export interface RoleCatalogEntry {
  providerRoleId: string;
  name: string;
}

export interface RoleAssignment {
  rolesToAdd: RoleCatalogEntry[];
  rolesToRemove: RoleCatalogEntry[];
}

// ---------------------------------------------------------------------------
// Audit database row
// ---------------------------------------------------------------------------

export interface BackendRequestRow {
  id: number;
  run_id: string;
  backend: string;
  method: string;
  url: string;
  /** JSON body as sent, with credential fields redacted */
  request_body: string | null;
  response_status: number | null;
  duration_ms: number;
  error: string | null;
  created_at: string;
}
