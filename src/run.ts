// ---------------------------------------------------------------------------
// One synchronization run
//
// Desired state is built once; configured backends are then converged one
// after the other.  The first failing backend ends the run: later backends
// are not attempted (fail-fast).
// ---------------------------------------------------------------------------

import type { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { AuditLog } from './audit';
import type { BackendAdapter } from './backend';
import { createBackends } from './backends';
import type { SharedHttpOptions } from './backends';
import type { SyncConfig } from './config';
import { createAuditDb, initAuditDb } from './db';
import type { FetchFn } from './http';
import type { Logger } from './logger';
import { converge } from './sync/converge';
import type { ConvergenceReport } from './sync/converge';
import { NextcloudTablesClient } from './table/nextcloud';
import { loadDesiredState } from './users';

export interface RunOptions {
  logger: Logger;
  fetchFn?: FetchFn;
  runId?: string;
  /** Replaces the backends built from configuration. */
  backends?: BackendAdapter[];
}

export async function runSync(config: SyncConfig, options: RunOptions): Promise<ConvergenceReport[]> {
  const runId = options.runId ?? uuidv4();
  const logger = options.logger.child({ runId });

  const auditDb = config.audit ? await openAuditDb(config.audit.database, logger) : null;
  try {
    const audit = auditDb ? new AuditLog(auditDb, runId, logger) : undefined;

    const http: SharedHttpOptions = {
      fetchFn: options.fetchFn,
      timeoutMs: config.request_timeout_ms,
      audit,
      logger,
    };

    const desired = await loadDesiredState(config.users_provider, {
      tableSource: (provider) => new NextcloudTablesClient(provider.nextcloud, http),
      logger,
    });

    const reports: ConvergenceReport[] = [];
    for (const backend of options.backends ?? createBackends(config, http)) {
      reports.push(await converge(backend, desired, logger));
    }
    return reports;
  } finally {
    await auditDb?.destroy();
  }
}

/** An audit database that cannot be opened leaves the run without an audit log. */
async function openAuditDb(filename: string, logger: Logger): Promise<Knex | null> {
  let db: Knex | null = null;
  try {
    db = createAuditDb(filename);
    await initAuditDb(db);
    return db;
  } catch (err) {
    logger.warn({ err, database: filename }, 'Audit database unavailable; running without audit log');
    await db?.destroy().catch((closeErr: unknown) => {
      logger.debug({ err: closeErr }, 'Closing audit database failed');
    });
    return null;
  }
}
