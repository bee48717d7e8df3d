import 'dotenv/config';

export interface EngineConfig {
    databaseUrl?: string;
    redisUrl?: string;
    pgPoolMax: number;
    stageConcurrency: number;
    snapshotInterval: number;
    cacheMemoryCapacity: number;
    cacheTtlMs: number;
    cancelTimeoutMs: number;
    failFast: boolean;
    defaultScope: string;
}

function int(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value || '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    return {
        databaseUrl: env.DATABASE_URL || undefined,
        redisUrl: env.REDIS_URL || undefined,
        pgPoolMax: int(env.PG_POOL_MAX, 20),
        stageConcurrency: Math.max(1, int(env.STAGE_CONCURRENCY, 4)),
        snapshotInterval: Math.max(1, int(env.SNAPSHOT_INTERVAL, 50)),
        cacheMemoryCapacity: Math.max(1, int(env.CACHE_MEMORY_CAPACITY, 1000)),
        cacheTtlMs: int(env.CACHE_TTL_SECONDS, 24 * 60 * 60) * 1000,
        cancelTimeoutMs: int(env.CANCEL_TIMEOUT_MS, 5000),
        failFast: (env.FAIL_FAST ?? 'true').toLowerCase() !== 'false',
        defaultScope: env.CACHE_SCOPE || 'default',
    };
}
