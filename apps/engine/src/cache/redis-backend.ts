import { deserialize, serialize } from '@plotline/sdk';
import { CacheBackendError } from '../errors';
import { CacheBackend, CacheEntry } from './types';

/** The ioredis commands the backend issues; a Redis client satisfies it. */
export interface RedisClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
    del(...keys: string[]): Promise<number>;
    sadd(key: string, ...members: string[]): Promise<number>;
    smembers(key: string): Promise<string[]>;
}

const PREFIX = 'plotline:cache:';
const entryKey = (key: string) => `${PREFIX}entry:${key}`;
const scopeKey = (scope: string) => `${PREFIX}scope:${scope}`;

function isCacheEntry(value: unknown): value is CacheEntry {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'key' in value && typeof value.key === 'string' &&
        'scope' in value && typeof value.scope === 'string' &&
        'expiresAt' in value && typeof value.expiresAt === 'number' &&
        'value' in value && typeof value.value === 'object' && value.value !== null
    );
}

export class RedisCacheBackend implements CacheBackend {
    constructor(private readonly redis: RedisClient) { }

    async get(key: string): Promise<CacheEntry | null> {
        let raw: string | null;
        try {
            raw = await this.redis.get(entryKey(key));
        } catch (err) {
            throw new CacheBackendError('get', err);
        }
        if (raw === null) return null;
        let value: unknown;
        try {
            value = deserialize<unknown>(raw);
        } catch (err) {
            console.warn(`[cache] discarding unreadable entry ${key}:`, err);
            return null;
        }
        if (!isCacheEntry(value)) {
            console.warn(`[cache] discarding malformed entry ${key}`);
            return null;
        }
        return value;
    }

    async put(entry: CacheEntry, ttlMs: number): Promise<void> {
        const body = serialize(entry);
        try {
            await this.redis.set(entryKey(entry.key), body, 'PX', Math.max(1, Math.floor(ttlMs)));
            await this.redis.sadd(scopeKey(entry.scope), entry.key);
        } catch (err) {
            throw new CacheBackendError('put', err);
        }
    }

    async delete(key: string): Promise<void> {
        try {
            await this.redis.del(entryKey(key));
        } catch (err) {
            throw new CacheBackendError('delete', err);
        }
    }

    async invalidateScope(scope: string): Promise<void> {
        try {
            const keys = await this.redis.smembers(scopeKey(scope));
            if (keys.length > 0) await this.redis.del(...keys.map(entryKey));
            await this.redis.del(scopeKey(scope));
        } catch (err) {
            throw new CacheBackendError('invalidateScope', err);
        }
    }
}

/** Second tier kept in process, for single-node setups and tests. */
export class InMemoryCacheBackend implements CacheBackend {
    private readonly entries = new Map<string, { entry: CacheEntry; expiresAt: number }>();

    constructor(private readonly clock: () => number = Date.now) { }

    async get(key: string): Promise<CacheEntry | null> {
        const stored = this.entries.get(key);
        if (!stored) return null;
        if (stored.expiresAt <= this.clock()) {
            this.entries.delete(key);
            return null;
        }
        return stored.entry;
    }

    async put(entry: CacheEntry, ttlMs: number): Promise<void> {
        this.entries.set(entry.key, { entry, expiresAt: this.clock() + ttlMs });
    }

    async delete(key: string): Promise<void> {
        this.entries.delete(key);
    }

    async invalidateScope(scope: string): Promise<void> {
        for (const [key, stored] of this.entries) {
            if (stored.entry.scope === scope) this.entries.delete(key);
        }
    }

    get size(): number {
        return this.entries.size;
    }
}
