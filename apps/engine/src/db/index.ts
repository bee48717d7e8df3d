/**
 * Connection factories for Postgres and Redis.
 */
import Redis from 'ioredis';
import { Pool, QueryResult } from 'pg';
import { EngineConfig } from '../config';

/** The slice of a pg Pool or PoolClient the repositories use. */
export interface SqlClient {
    query(text: string, values?: unknown[]): Promise<QueryResult>;
}

/**
 * Postgres pool:
 * - max: PG_POOL_MAX connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(config: Pick<EngineConfig, 'databaseUrl' | 'pgPoolMax'>): Pool {
    const pool = new Pool({
        connectionString: config.databaseUrl,
        max: config.pgPoolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
    // An idle client erroring out is reported; the next query reconnects.
    pool.on('error', (err) => {
        console.error('[db] unexpected error on idle client', err);
    });
    return pool;
}

export function createRedis(url: string): Redis {
    const redis = new Redis(url, { maxRetriesPerRequest: 2 });
    redis.on('error', (err) => {
        console.error('[redis] connection error', err);
    });
    return redis;
}

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS runs (
    id               UUID PRIMARY KEY,
    template_id      TEXT NOT NULL,
    template_version INTEGER NOT NULL,
    scope            TEXT NOT NULL,
    parent_run_id    UUID REFERENCES runs(id),
    branch_sequence  INTEGER,
    created_at       TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS run_events (
    run_id     UUID NOT NULL REFERENCES runs(id),
    sequence   INTEGER NOT NULL,
    event_type TEXT NOT NULL,
    body       TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (run_id, sequence)
);

CREATE INDEX IF NOT EXISTS run_events_snapshots
    ON run_events (run_id, sequence DESC)
    WHERE event_type = 'StateSnapshot';
`;

export async function applySchema(client: SqlClient): Promise<void> {
    await client.query(SCHEMA_SQL);
}
