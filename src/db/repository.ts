import { Pool } from 'pg';
import { DbConfig } from '../config';
import { runMigrations } from './migrate';

export interface AuditEntry {
    requestId: string;
    carrier: string;
    operation: string;
    status: 'success' | 'partial' | 'error';
    itemCount: number;
    durationMs: number;
    errorCode?: string;
    errorMsg?: string;
}

/**
 * One row per carrier per tracking call. Tracking results themselves are
 * never stored.
 */
export class AuditRepository {
    constructor(
        private pool: Pick<Pool, 'query'>,
        private onClose: () => Promise<void> = async () => { },
    ) { }

    /** Opens a pool for `config` that the repository ends on `close()`. */
    static connect(config: DbConfig): AuditRepository {
        const pool = new Pool({
            connectionString: config.connectionString,
            max: config.maxConnections,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
            application_name: 'parcel-tracking-core',
        });
        pool.on('error', (err) => {
            console.error('[db] Idle audit connection failed:', err.message);
        });
        return new AuditRepository(pool, () => pool.end());
    }

    async migrate(): Promise<void> {
        await runMigrations(this.pool);
    }

    async logOperation(entry: AuditEntry): Promise<void> {
        await this.pool.query(
            `INSERT INTO audit_log (request_id, carrier, operation, status, item_count, duration_ms, error_code, error_msg)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
            [
                entry.requestId,
                entry.carrier,
                entry.operation,
                entry.status,
                entry.itemCount,
                entry.durationMs,
                entry.errorCode ?? null,
                entry.errorMsg ?? null,
            ],
        );
    }

    async close(): Promise<void> {
        await this.onClose();
    }
}
