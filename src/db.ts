import { knex } from 'knex';
import type { Knex } from 'knex';

// ---------------------------------------------------------------------------
// Audit database client
// ---------------------------------------------------------------------------

export function createAuditDb(filename: string): Knex {
  return knex({
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
  });
}

// ---------------------------------------------------------------------------
// Schema bootstrap (idempotent)
// ---------------------------------------------------------------------------

export async function initAuditDb(db: Knex): Promise<void> {
  // --- backend_requests ----------------------------------------------------
  // One row per outgoing call to a backend or user source.
  if (!(await db.schema.hasTable('backend_requests'))) {
    await db.schema.createTable('backend_requests', (t) => {
      t.increments('id').primary();
      t.string('run_id').notNullable();
      t.string('backend').notNullable();
      t.string('method').notNullable();
      t.text('url').notNullable();
      t.text('request_body').nullable();
      t.integer('response_status').nullable();
      t.integer('duration_ms').notNullable();
      t.text('error').nullable();
      t.timestamp('created_at').defaultTo(db.fn.now());
    });
  }
}
