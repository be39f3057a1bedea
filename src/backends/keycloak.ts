// ---------------------------------------------------------------------------
// Keycloak backend
//
// Manages the users of one realm and its realm-level role catalog through
// the admin REST API.  Authenticates with an OAuth2 password grant against
// the admin realm.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { BearerAuthorization, PasswordGrantProvider } from '../auth/credentials';
import type { CredentialProvider } from '../auth/credentials';
import type { BackendAdapter, RoleCatalog } from '../backend';
import type { KeycloakConfig } from '../config';
import { HttpClient } from '../http';
import type { HttpClientOptions } from '../http';
import type { CanonicalUser, ProviderUser, RoleAssignment, RoleCatalogEntry } from '../types';

export interface KeycloakUser extends ProviderUser {
  enabled: boolean;
}

const PAGE_SIZE = 100;

const KeycloakUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  enabled: z.boolean().default(true),
});

const KeycloakRoleSchema = z.object({
  id: z.string(),
  name: z.string(),
});

type KeycloakRole = z.infer<typeof KeycloakRoleSchema>;

export type KeycloakClientOptions = Omit<HttpClientOptions, 'backend' | 'baseUrl' | 'authorize'> & {
  /** Overrides the password grant, e.g. for a pre-issued token. */
  credentials?: CredentialProvider;
};

export function keycloakTokenUrl(config: Pick<KeycloakConfig, 'url' | 'auth_realm'>): string {
  return `${config.url.replace(/\/+$/, '')}/realms/${encodeURIComponent(config.auth_realm)}/protocol/openid-connect/token`;
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export class KeycloakBackend implements BackendAdapter<KeycloakUser> {
  readonly name = 'keycloak';
  readonly roles: KeycloakRoleCatalog;
  private readonly http: HttpClient;
  private readonly realmPath: string;

  constructor(
    private readonly config: KeycloakConfig,
    options: KeycloakClientOptions,
  ) {
    const { credentials, ...httpOptions } = options;
    const authorization = new BearerAuthorization(
      credentials ??
        new PasswordGrantProvider({
          backend: this.name,
          tokenUrl: keycloakTokenUrl(config),
          clientId: config.client_id,
          username: config.username,
          password: config.password,
          fetchFn: httpOptions.fetchFn,
          timeoutMs: httpOptions.timeoutMs,
        }),
    );

    this.http = new HttpClient({
      ...httpOptions,
      backend: this.name,
      baseUrl: config.url,
      authorize: () => authorization.header(),
    });
    this.realmPath = `/admin/realms/${encodeURIComponent(config.realm)}`;
    this.roles = new KeycloakRoleCatalog(this.http, this.realmPath);
  }

  // ── List ────────────────────────────────────────────────────────────────

  async fetchActualUsers(): Promise<KeycloakUser[]> {
    const users: KeycloakUser[] = [];
    for (let first = 0; ; first += PAGE_SIZE) {
      const page = await this.http.get(`${this.realmPath}/users`, z.array(KeycloakUserSchema), {
        first,
        max: PAGE_SIZE,
        briefRepresentation: true,
      });
      users.push(...page.map(toKeycloakUser));
      if (page.length < PAGE_SIZE) return users;
    }
  }

  async resolveIdentifier(username: string): Promise<KeycloakUser | null> {
    const matches = await this.http.get(`${this.realmPath}/users`, z.array(KeycloakUserSchema), {
      username,
      exact: true,
    });
    const match = matches.find((u) => u.username === username);
    return match ? toKeycloakUser(match) : null;
  }

  // ── Mutations ───────────────────────────────────────────────────────────

  async create(user: CanonicalUser): Promise<void> {
    await this.http.send('POST', `${this.realmPath}/users`, {
      body: { username: user.identifier, ...profile(user) },
    });
  }

  async update(actual: KeycloakUser, user: CanonicalUser): Promise<void> {
    await this.http.send('PUT', this.userPath(actual), {
      body: { username: actual.identifier, ...profile(user) },
    });
  }

  async delete(actual: KeycloakUser): Promise<void> {
    if (this.config.removal === 'disable') {
      if (!actual.enabled) return;
      await this.http.send('PUT', this.userPath(actual), { body: { enabled: false } });
      return;
    }
    await this.http.send('DELETE', this.userPath(actual));
  }

  private userPath(user: KeycloakUser): string {
    return `${this.realmPath}/users/${encodeURIComponent(user.providerId)}`;
  }
}

// ---------------------------------------------------------------------------
// Realm role catalog
// ---------------------------------------------------------------------------

export class KeycloakRoleCatalog implements RoleCatalog<KeycloakUser> {
  constructor(
    private readonly http: HttpClient,
    private readonly realmPath: string,
  ) {}

  async fetchRoleCatalog(): Promise<RoleCatalogEntry[]> {
    const roles: RoleCatalogEntry[] = [];
    for (let first = 0; ; first += PAGE_SIZE) {
      const page = await this.http.get(`${this.realmPath}/roles`, z.array(KeycloakRoleSchema), {
        first,
        max: PAGE_SIZE,
      });
      roles.push(...page.map(toCatalogEntry));
      if (page.length < PAGE_SIZE) return roles;
    }
  }

  async createRole(name: string): Promise<void> {
    await this.http.send('POST', `${this.realmPath}/roles`, { body: { name } });
  }

  async fetchUserRoles(user: KeycloakUser): Promise<RoleCatalogEntry[]> {
    const roles = await this.http.get(this.mappingsPath(user), z.array(KeycloakRoleSchema));
    return roles.map(toCatalogEntry);
  }

  async assignRoles(user: KeycloakUser, assignment: RoleAssignment): Promise<void> {
    if (assignment.rolesToAdd.length > 0) {
      await this.http.send('POST', this.mappingsPath(user), {
        body: assignment.rolesToAdd.map(toKeycloakRole),
      });
    }
    if (assignment.rolesToRemove.length > 0) {
      await this.http.send('DELETE', this.mappingsPath(user), {
        body: assignment.rolesToRemove.map(toKeycloakRole),
      });
    }
  }

  private mappingsPath(user: KeycloakUser): string {
    return `${this.realmPath}/users/${encodeURIComponent(user.providerId)}/role-mappings/realm`;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function profile(user: CanonicalUser): Record<string, unknown> {
  return {
    firstName: user.firstName,
    lastName: user.lastName,
    email: user.email,
    enabled: user.enabled,
  };
}

function toKeycloakUser(raw: z.infer<typeof KeycloakUserSchema>): KeycloakUser {
  return { providerId: raw.id, identifier: raw.username, enabled: raw.enabled };
}

function toCatalogEntry(role: KeycloakRole): RoleCatalogEntry {
  return { providerRoleId: role.id, name: role.name };
}

function toKeycloakRole(entry: RoleCatalogEntry): KeycloakRole {
  return { id: entry.providerRoleId, name: entry.name };
}
