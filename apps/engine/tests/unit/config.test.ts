import { loadConfig } from '../../src/config';

describe('loadConfig', () => {
    it('falls back to defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            databaseUrl: undefined,
            redisUrl: undefined,
            pgPoolMax: 20,
            stageConcurrency: 4,
            snapshotInterval: 50,
            cacheMemoryCapacity: 1000,
            cacheTtlMs: 86_400_000,
            cancelTimeoutMs: 5000,
            failFast: true,
            defaultScope: 'default',
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            DATABASE_URL: 'postgres://localhost/plotline',
            REDIS_URL: 'redis://localhost:6379',
            STAGE_CONCURRENCY: '8',
            SNAPSHOT_INTERVAL: '10',
            CACHE_TTL_SECONDS: '60',
            FAIL_FAST: 'FALSE',
            CACHE_SCOPE: 'team-a',
        });

        expect(config).toMatchObject({
            databaseUrl: 'postgres://localhost/plotline',
            redisUrl: 'redis://localhost:6379',
            stageConcurrency: 8,
            snapshotInterval: 10,
            cacheTtlMs: 60_000,
            failFast: false,
            defaultScope: 'team-a',
        });
    });

    it('ignores unparseable numbers and clamps counts to at least 1', () => {
        const config = loadConfig({ PG_POOL_MAX: 'lots', STAGE_CONCURRENCY: '0', SNAPSHOT_INTERVAL: '-3' });

        expect(config.pgPoolMax).toBe(20);
        expect(config.stageConcurrency).toBe(1);
        expect(config.snapshotInterval).toBe(1);
    });

    it('treats empty urls as unset', () => {
        const config = loadConfig({ DATABASE_URL: '', REDIS_URL: '' });

        expect(config.databaseUrl).toBeUndefined();
        expect(config.redisUrl).toBeUndefined();
    });
});
