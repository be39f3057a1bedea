// ---------------------------------------------------------------------------
// Bearer credential acquisition
//
// Backends only ever see an Authorization header value.  How it is obtained
// (a configured API token, or an OAuth2 password grant) is decided here.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { AuthError, describeError } from '../errors';
import { DEFAULT_TIMEOUT_MS } from '../http';
import type { FetchFn } from '../http';

export interface Credential {
  accessToken: string;
  /** Epoch milliseconds, or null when the credential does not expire. */
  expiresAt: number | null;
}

export interface CredentialProvider {
  acquire(): Promise<Credential>;
}

/** A long-lived API token taken verbatim from configuration. */
export class StaticTokenProvider implements CredentialProvider {
  constructor(private readonly token: string) {}

  async acquire(): Promise<Credential> {
    return { accessToken: this.token, expiresAt: null };
  }
}

// ---------------------------------------------------------------------------
// OAuth2 resource-owner password grant
// ---------------------------------------------------------------------------

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

export interface PasswordGrantOptions {
  backend: string;
  tokenUrl: string;
  clientId: string;
  username: string;
  password: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
  now?: () => number;
}

export class PasswordGrantProvider implements CredentialProvider {
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(private readonly options: PasswordGrantOptions) {
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.now = options.now ?? Date.now;
  }

  async acquire(): Promise<Credential> {
    const { backend, tokenUrl, clientId, username, password } = this.options;
    const form = new URLSearchParams({
      grant_type: 'password',
      client_id: clientId,
      username,
      password,
    });

    let response: Response;
    try {
      response = await this.fetchFn(tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (err) {
      throw new AuthError(backend, `token request failed: ${describeError(err)}`, { cause: err });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new AuthError(backend, `token endpoint answered ${response.status}: ${detail}`);
    }

    const parsed = TokenResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new AuthError(backend, 'token endpoint returned no access_token');
    }

    const { access_token, expires_in } = parsed.data;
    return {
      accessToken: access_token,
      expiresAt: expires_in === undefined ? null : this.now() + expires_in * 1000,
    };
  }
}

// ---------------------------------------------------------------------------
// Header helpers
// ---------------------------------------------------------------------------

/** Re-acquire this long before the reported expiry. */
const EXPIRY_MARGIN_MS = 10_000;

/**
 * Caches a credential and renews it shortly before it expires, so a long
 * pass against a backend with short-lived admin tokens keeps working.
 */
export class BearerAuthorization {
  private current: Credential | null = null;

  constructor(
    private readonly provider: CredentialProvider,
    private readonly now: () => number = Date.now,
  ) {}

  async header(): Promise<string> {
    if (
      !this.current ||
      (this.current.expiresAt !== null && this.current.expiresAt - EXPIRY_MARGIN_MS <= this.now())
    ) {
      this.current = await this.provider.acquire();
    }
    return `Bearer ${this.current.accessToken}`;
  }
}

export function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}
