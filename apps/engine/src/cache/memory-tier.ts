import { CacheEntry } from './types';

/**
 * Bounded LRU over a Map: insertion order is recency order, so the first
 * key is always the least recently used.
 */
export class MemoryTier {
    private readonly entries = new Map<string, CacheEntry>();

    constructor(private readonly capacity: number) {
        if (capacity < 1) throw new Error(`Memory tier capacity must be at least 1, got ${capacity}`);
    }

    get(key: string): CacheEntry | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        this.entries.delete(key);
        this.entries.set(key, entry);
        return entry;
    }

    peek(key: string): CacheEntry | undefined {
        return this.entries.get(key);
    }

    /** Stores the entry as most recent; returns how many entries were evicted. */
    set(entry: CacheEntry): number {
        this.entries.delete(entry.key);
        this.entries.set(entry.key, entry);
        let evicted = 0;
        while (this.entries.size > this.capacity) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
            evicted++;
        }
        return evicted;
    }

    delete(key: string): boolean {
        return this.entries.delete(key);
    }

    deleteScope(scope: string): number {
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (entry.scope === scope) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    deleteExpired(now: number): number {
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (entry.expiresAt <= now) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    keys(): string[] {
        return [...this.entries.keys()];
    }

    get size(): number {
        return this.entries.size;
    }
}
