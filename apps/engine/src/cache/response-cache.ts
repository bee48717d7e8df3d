import { CacheBackendError } from '../errors';
import { MemoryTier } from './memory-tier';
import { CacheBackend, CacheEntry, CacheStats, CachedGeneration } from './types';

const TAG = '[cache]';

export interface ResponseCacheOptions {
    capacity: number;
    ttlMs: number;
    backend?: CacheBackend | null;
    clock?: () => number;
}

/**
 * Two-tier cache of generation results.
 *
 * Tier 1 is a process-local LRU; tier 2 is an optional shared backend. Tier 2
 * writes are fire-and-forget but tracked, so invalidation drains them before
 * deleting. Reads that overlap an invalidation of their key or scope never
 * return tier-2 data: a generation counter is bumped when any invalidation
 * starts and again when it ends, and a fence is held on the key or scope
 * while it runs.
 */
export class ResponseCache {
    private readonly memory: MemoryTier;
    private readonly backend: CacheBackend | null;
    private readonly clock: () => number;
    private readonly ttlMs: number;
    // Invalidations in progress per `key:` / `scope:` id; an id leaves the map at zero.
    private readonly fences = new Map<string, number>();
    private generation = 0;
    private readonly pendingWrites = new Map<Promise<void>, string>();
    private hits = 0;
    private misses = 0;
    private tier2Hits = 0;
    private evictions = 0;
    private backendErrors = 0;

    constructor(options: ResponseCacheOptions) {
        this.memory = new MemoryTier(options.capacity);
        this.backend = options.backend ?? null;
        this.clock = options.clock ?? Date.now;
        this.ttlMs = options.ttlMs;
    }

    async get(key: string, scope: string): Promise<CacheEntry | null> {
        const now = this.clock();
        const local = this.memory.get(key);
        if (local) {
            if (local.expiresAt > now) {
                const touched = this.touch(local, now);
                this.memory.set(touched);
                this.hits++;
                return touched;
            }
            this.memory.delete(key);
        }

        if (!this.backend || this.isFenced(key, scope)) return this.miss();

        const before = this.generation;
        let remote: CacheEntry | null;
        try {
            remote = await this.backend.get(key);
        } catch (err) {
            this.recordBackendError('get', err);
            return this.miss();
        }

        if (
            !remote ||
            remote.scope !== scope ||
            remote.expiresAt <= this.clock() ||
            this.isFenced(key, scope) ||
            this.generation !== before
        ) {
            return this.miss();
        }

        // A put that landed while tier 2 was being read wins over the remote copy.
        const fresher = this.memory.peek(key);
        const promoted = this.touch(fresher && fresher.expiresAt > now ? fresher : remote, now);
        this.evictions += this.memory.set(promoted);
        this.hits++;
        this.tier2Hits++;
        return promoted;
    }

    put(key: string, scope: string, value: CachedGeneration, ttlMs: number = this.ttlMs): CacheEntry {
        const now = this.clock();
        const entry: CacheEntry = {
            key,
            scope,
            value,
            createdAt: now,
            expiresAt: now + ttlMs,
            lastAccessedAt: now,
            accessCount: 0,
        };
        this.evictions += this.memory.set(entry);

        if (this.backend) {
            const write: Promise<void> = this.backend
                .put(entry, ttlMs)
                .catch((err: unknown) => this.recordBackendError('put', err))
                .then(() => {
                    this.pendingWrites.delete(write);
                });
            this.pendingWrites.set(write, scope);
        }
        return entry;
    }

    async invalidate(key: string, scope: string): Promise<void> {
        await this.fenced(`key:${key}`, async () => {
            this.memory.delete(key);
            await this.drain(scope);
            await this.backend?.delete(key);
        });
    }

    async invalidateScope(scope: string): Promise<void> {
        await this.fenced(`scope:${scope}`, async () => {
            const removed = this.memory.deleteScope(scope);
            await this.drain(scope);
            await this.backend?.invalidateScope(scope);
            console.log(`${TAG} invalidated scope "${scope}" (${removed} local entries)`);
        });
    }

    /** Drops expired tier-1 entries; tier 2 expires on its own TTL. */
    cleanupExpired(): number {
        return this.memory.deleteExpired(this.clock());
    }

    /** Waits for every outstanding tier-2 write. */
    async flush(): Promise<void> {
        await Promise.all([...this.pendingWrites.keys()]);
    }

    stats(): CacheStats {
        return {
            hits: this.hits,
            misses: this.misses,
            tier2Hits: this.tier2Hits,
            evictions: this.evictions,
            backendErrors: this.backendErrors,
            memoryEntries: this.memory.size,
        };
    }

    get pendingWriteCount(): number {
        return this.pendingWrites.size;
    }

    get activeFenceCount(): number {
        return this.fences.size;
    }

    private async fenced(id: string, body: () => Promise<void>): Promise<void> {
        this.fences.set(id, (this.fences.get(id) ?? 0) + 1);
        this.generation++;
        try {
            await body();
        } catch (err) {
            this.backendErrors++;
            throw err instanceof CacheBackendError ? err : new CacheBackendError('invalidate', err);
        } finally {
            const left = (this.fences.get(id) ?? 1) - 1;
            if (left > 0) this.fences.set(id, left);
            else this.fences.delete(id);
            this.generation++;
        }
    }

    private async drain(scope: string): Promise<void> {
        const writes = [...this.pendingWrites].filter(([, s]) => s === scope).map(([w]) => w);
        await Promise.all(writes);
    }

    private isFenced(key: string, scope: string): boolean {
        return this.fences.has(`key:${key}`) || this.fences.has(`scope:${scope}`);
    }

    private touch(entry: CacheEntry, now: number): CacheEntry {
        return { ...entry, lastAccessedAt: now, accessCount: entry.accessCount + 1 };
    }

    private miss(): null {
        this.misses++;
        return null;
    }

    private recordBackendError(operation: string, err: unknown): void {
        this.backendErrors++;
        console.warn(`${TAG} tier-2 ${operation} failed, continuing without it:`, err instanceof Error ? err.message : err);
    }
}
