// ---------------------------------------------------------------------------
// Outgoing request audit log
//
// Every backend call made during a run is written to backend_requests.  The
// table is write-only from the engine's point of view: nothing here feeds
// back into reconciliation.
// ---------------------------------------------------------------------------

import type { Knex } from 'knex';
import type { Logger } from './logger';
import type { BackendRequestRow } from './types';

export interface AuditEntry {
  backend: string;
  method: string;
  url: string;
  requestBody?: unknown;
  responseStatus: number | null;
  durationMs: number;
  error?: string;
}

const MAX_TEXT = 65_535;

export class AuditLog {
  constructor(
    private readonly db: Knex,
    private readonly runId: string,
    private readonly logger: Logger,
  ) {}

  /** Never throws: a failed audit write is logged and the run goes on. */
  async record(entry: AuditEntry): Promise<void> {
    try {
      await this.db<BackendRequestRow>('backend_requests').insert({
        run_id: this.runId,
        backend: entry.backend,
        method: entry.method,
        url: entry.url,
        request_body:
          entry.requestBody === undefined
            ? null
            : JSON.stringify(sanitizeBody(entry.requestBody)).substring(0, MAX_TEXT),
        response_status: entry.responseStatus,
        duration_ms: entry.durationMs,
        error: entry.error ? entry.error.substring(0, MAX_TEXT) : null,
      });
    } catch (err) {
      this.logger.warn({ err, backend: entry.backend }, 'Audit write failed');
    }
  }
}

// ---------------------------------------------------------------------------
// Security helpers
// ---------------------------------------------------------------------------

const SENSITIVE_KEYS = new Set(['password', 'secret', 'token', 'credentials']);

export function sanitizeBody(body: unknown): unknown {
  if (Array.isArray(body)) return body.map(sanitizeBody);
  if (!body || typeof body !== 'object') return body;

  const safe: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    safe[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? '***REDACTED***' : sanitizeBody(value);
  }
  return safe;
}
