import { Pool } from 'pg';

export const MIGRATIONS = [
    {
        name: '001_create_audit_log',
        sql: `
      CREATE TABLE IF NOT EXISTS audit_log (
        id          SERIAL PRIMARY KEY,
        request_id  VARCHAR(64) NOT NULL,
        carrier     VARCHAR(32) NOT NULL,
        operation   VARCHAR(32) NOT NULL,
        status      VARCHAR(16) NOT NULL,
        item_count  INTEGER NOT NULL DEFAULT 0,
        duration_ms INTEGER,
        error_code  VARCHAR(32),
        error_msg   TEXT,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_audit_log_request_id
        ON audit_log(request_id);
    `,
    },
    {
        name: '002_index_audit_log_carrier_time',
        sql: `
      -- "how has FedEx been doing this week?"
      CREATE INDEX IF NOT EXISTS idx_audit_log_carrier_created
        ON audit_log(carrier, created_at);
    `,
    },
];

/** Applies every migration in order; stops at the first failure. */
export async function runMigrations(pool: Pick<Pool, 'query'>): Promise<void> {
    console.log('[migrate] Running database migrations...');

    for (const migration of MIGRATIONS) {
        try {
            await pool.query(migration.sql);
            console.log(`[migrate] ✓ ${migration.name}`);
        } catch (err) {
            console.error(`[migrate] ✗ ${migration.name} failed:`, err instanceof Error ? err.message : err);
            throw err;
        }
    }

    console.log('[migrate] All migrations complete.');
}
