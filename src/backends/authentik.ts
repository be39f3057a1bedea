// ---------------------------------------------------------------------------
// Authentik backend
//
// Manages the users stored under one user path (other users, such as the
// built-in admin and service accounts, are invisible to the sync) and uses
// groups as the role catalog.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { BearerAuthorization, StaticTokenProvider } from '../auth/credentials';
import type { BackendAdapter, RoleCatalog } from '../backend';
import type { AuthentikConfig } from '../config';
import { HttpClient } from '../http';
import type { HttpClientOptions } from '../http';
import type { CanonicalUser, ProviderUser, RoleAssignment, RoleCatalogEntry } from '../types';

export type AuthentikUser = ProviderUser;

const PAGE_SIZE = 100;

const PaginationSchema = z.object({
  /** Next page number, 0 when this is the last page. */
  next: z.number(),
});

const AuthentikUserSchema = z.object({
  pk: z.number(),
  username: z.string(),
});

const AuthentikGroupSchema = z.object({
  pk: z.string(),
  name: z.string(),
});

const UserDetailSchema = AuthentikUserSchema.extend({
  groups_obj: z.array(AuthentikGroupSchema).nullish(),
});

function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({ pagination: PaginationSchema, results: z.array(item) });
}

const UserPageSchema = pageOf(AuthentikUserSchema);
const GroupPageSchema = pageOf(AuthentikGroupSchema);

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export class AuthentikBackend implements BackendAdapter<AuthentikUser> {
  readonly name = 'authentik';
  readonly roles: AuthentikGroupCatalog;
  private readonly http: HttpClient;

  constructor(
    private readonly config: AuthentikConfig,
    options: Omit<HttpClientOptions, 'backend' | 'baseUrl' | 'authorize'>,
  ) {
    const authorization = new BearerAuthorization(new StaticTokenProvider(config.token));
    this.http = new HttpClient({
      ...options,
      backend: this.name,
      baseUrl: `${config.url.replace(/\/+$/, '')}/api/v3`,
      authorize: () => authorization.header(),
    });
    this.roles = new AuthentikGroupCatalog(this.http);
  }

  // ── List ────────────────────────────────────────────────────────────────

  async fetchActualUsers(): Promise<AuthentikUser[]> {
    const users = await collectPages((page) =>
      this.http.get('/core/users/', UserPageSchema, {
        path: this.config.path,
        page,
        page_size: PAGE_SIZE,
      }),
    );
    return users.map(toAuthentikUser);
  }

  async resolveIdentifier(username: string): Promise<AuthentikUser | null> {
    const page = await this.http.get('/core/users/', UserPageSchema, {
      username,
      path: this.config.path,
    });
    const match = page.results.find((u) => u.username === username);
    return match ? toAuthentikUser(match) : null;
  }

  // ── Mutations ───────────────────────────────────────────────────────────

  async create(user: CanonicalUser): Promise<void> {
    await this.http.send('POST', '/core/users/', {
      body: {
        username: user.identifier,
        path: this.config.path,
        type: 'internal',
        ...profile(user),
      },
    });
  }

  async update(actual: AuthentikUser, user: CanonicalUser): Promise<void> {
    await this.http.send('PATCH', userPath(actual), { body: profile(user) });
  }

  async delete(actual: AuthentikUser): Promise<void> {
    await this.http.send('DELETE', userPath(actual));
  }
}

// ---------------------------------------------------------------------------
// Groups as role catalog
// ---------------------------------------------------------------------------

export class AuthentikGroupCatalog implements RoleCatalog<AuthentikUser> {
  constructor(private readonly http: HttpClient) {}

  async fetchRoleCatalog(): Promise<RoleCatalogEntry[]> {
    const groups = await collectPages((page) =>
      this.http.get('/core/groups/', GroupPageSchema, {
        include_users: false,
        page,
        page_size: PAGE_SIZE,
      }),
    );
    return groups.map(toCatalogEntry);
  }

  async createRole(name: string): Promise<void> {
    await this.http.send('POST', '/core/groups/', { body: { name } });
  }

  async fetchUserRoles(user: AuthentikUser): Promise<RoleCatalogEntry[]> {
    const detail = await this.http.get(userPath(user), UserDetailSchema);
    return (detail.groups_obj ?? []).map(toCatalogEntry);
  }

  /** Authentik has no bulk membership call: one request per group. */
  async assignRoles(user: AuthentikUser, assignment: RoleAssignment): Promise<void> {
    const body = { pk: Number(user.providerId) };
    for (const group of assignment.rolesToAdd) {
      await this.http.send('POST', `${groupPath(group)}add_user/`, { body });
    }
    for (const group of assignment.rolesToRemove) {
      await this.http.send('POST', `${groupPath(group)}remove_user/`, { body });
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Page<T> {
  pagination: { next: number };
  results: T[];
}

async function collectPages<T>(fetchPage: (page: number) => Promise<Page<T>>): Promise<T[]> {
  const results: T[] = [];
  for (let page = 1; page > 0; ) {
    const batch = await fetchPage(page);
    results.push(...batch.results);
    page = batch.pagination.next;
  }
  return results;
}

function profile(user: CanonicalUser): Record<string, unknown> {
  return {
    name: `${user.firstName} ${user.lastName}`.trim(),
    email: user.email,
    is_active: user.enabled,
    ...(user.matrixId ? { attributes: { matrix_id: user.matrixId } } : {}),
  };
}

function userPath(user: AuthentikUser): string {
  return `/core/users/${encodeURIComponent(user.providerId)}/`;
}

function groupPath(group: RoleCatalogEntry): string {
  return `/core/groups/${encodeURIComponent(group.providerRoleId)}/`;
}

function toAuthentikUser(raw: z.infer<typeof AuthentikUserSchema>): AuthentikUser {
  return { providerId: String(raw.pk), identifier: raw.username };
}

function toCatalogEntry(group: z.infer<typeof AuthentikGroupSchema>): RoleCatalogEntry {
  return { providerRoleId: group.pk, name: group.name };
}
