import { TokenUsage } from '@plotline/sdk';

export interface CachedGeneration {
    text: string;
    model: string;
    tokens: TokenUsage;
}

/** Immutable once written; a later write for the same key replaces it whole. */
export interface CacheEntry {
    key: string;
    scope: string;
    value: CachedGeneration;
    createdAt: number;
    expiresAt: number;
    lastAccessedAt: number;
    accessCount: number;
}

/** Shared second tier. Implementations throw CacheBackendError on transport failure. */
export interface CacheBackend {
    get(key: string): Promise<CacheEntry | null>;
    put(entry: CacheEntry, ttlMs: number): Promise<void>;
    delete(key: string): Promise<void>;
    invalidateScope(scope: string): Promise<void>;
}

export interface CacheStats {
    hits: number;
    misses: number;
    tier2Hits: number;
    evictions: number;
    backendErrors: number;
    memoryEntries: number;
}
