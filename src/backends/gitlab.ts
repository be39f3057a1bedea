// ---------------------------------------------------------------------------
// GitLab backend
//
// Manages the direct members of one group.  Only users holding the owner or
// maintainer role are desired, and only if a GitLab account with the same
// username exists; accounts are never created here.  Owners get access
// level Owner, everyone else Maintainer.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { BearerAuthorization, StaticTokenProvider } from '../auth/credentials';
import type { BackendAdapter } from '../backend';
import type { GitLabConfig } from '../config';
import { BackendApiError } from '../errors';
import { HttpClient } from '../http';
import type { HttpClientOptions } from '../http';
import type { Logger } from '../logger';
import type { CanonicalUser, DesiredState, ProviderUser } from '../types';

export const ACCESS_LEVEL = {
  maintainer: 40,
  owner: 50,
} as const;

export type AccessLevel = (typeof ACCESS_LEVEL)[keyof typeof ACCESS_LEVEL];

export interface GitLabMember extends ProviderUser {
  /** Level as listed; null for accounts found by username lookup. */
  accessLevel: number | null;
}

const PAGE_SIZE = 100;

const GitLabUserSchema = z.object({
  id: z.number(),
  username: z.string(),
  access_level: z.number().optional(),
});

export class GitLabBackend implements BackendAdapter<GitLabMember> {
  readonly name = 'gitlab';
  private readonly http: HttpClient;
  private readonly groupPath: string;
  private readonly logger: Logger;
  /** Accounts found by selectDesired, reused by create. */
  private readonly resolved = new Map<string, GitLabMember>();

  constructor(
    private readonly config: GitLabConfig,
    options: Omit<HttpClientOptions, 'backend' | 'baseUrl' | 'authorize'>,
  ) {
    const authorization = new BearerAuthorization(new StaticTokenProvider(config.token));
    this.http = new HttpClient({
      ...options,
      backend: this.name,
      baseUrl: `${config.url.replace(/\/+$/, '')}/api/v4`,
      authorize: () => authorization.header(),
    });
    this.groupPath = `/groups/${config.group_id}`;
    this.logger = options.logger.child({ backend: this.name });
  }

  accessLevelFor(user: CanonicalUser): AccessLevel {
    return user.roles.includes(this.config.owner_role) ? ACCESS_LEVEL.owner : ACCESS_LEVEL.maintainer;
  }

  // ── Scope ───────────────────────────────────────────────────────────────

  async selectDesired(desired: DesiredState): Promise<DesiredState> {
    const scoped = new Map<string, CanonicalUser>();
    for (const user of desired.values()) {
      const eligible = user.roles.some(
        (r) => r === this.config.owner_role || r === this.config.maintainer_role,
      );
      if (!eligible) continue;

      const account = await this.resolveIdentifier(user.identifier);
      if (!account) {
        this.logger.warn({ user: user.identifier }, 'No GitLab account for user; skipping');
        continue;
      }
      this.resolved.set(user.identifier, account);
      scoped.set(user.identifier, user);
    }
    return scoped;
  }

  // ── List ────────────────────────────────────────────────────────────────

  async fetchActualUsers(): Promise<GitLabMember[]> {
    const members: GitLabMember[] = [];
    for (let page = 1; ; page += 1) {
      const batch = await this.http.get(`${this.groupPath}/members`, z.array(GitLabUserSchema), {
        page,
        per_page: PAGE_SIZE,
      });
      members.push(...batch.map(toMember));
      if (batch.length < PAGE_SIZE) return members;
    }
  }

  async resolveIdentifier(username: string): Promise<GitLabMember | null> {
    const users = await this.http.get('/users', z.array(GitLabUserSchema), { username });
    const match = users.find((u) => u.username === username);
    return match ? toMember(match) : null;
  }

  // ── Mutations ───────────────────────────────────────────────────────────

  async create(user: CanonicalUser): Promise<void> {
    const account = this.resolved.get(user.identifier) ?? (await this.resolveIdentifier(user.identifier));
    if (!account) {
      throw new BackendApiError(
        this.name,
        'POST',
        `${this.groupPath}/members`,
        null,
        `no GitLab account named ${user.identifier}`,
        { reason: 'notFound' },
      );
    }
    await this.http.send('POST', `${this.groupPath}/members`, {
      body: { user_id: Number(account.providerId), access_level: this.accessLevelFor(user) },
    });
  }

  async update(actual: GitLabMember, user: CanonicalUser): Promise<void> {
    const accessLevel = this.accessLevelFor(user);
    if (actual.accessLevel === accessLevel) return;
    await this.http.send('PUT', `${this.groupPath}/members/${actual.providerId}`, {
      body: { access_level: accessLevel },
    });
    this.logger.info(
      { user: actual.identifier, from: actual.accessLevel, to: accessLevel },
      'Changed access level',
    );
  }

  async delete(actual: GitLabMember): Promise<void> {
    await this.http.send('DELETE', `${this.groupPath}/members/${actual.providerId}`);
  }
}

function toMember(raw: z.infer<typeof GitLabUserSchema>): GitLabMember {
  return {
    providerId: String(raw.id),
    identifier: raw.username,
    accessLevel: raw.access_level ?? null,
  };
}
