export class CacheBackendError extends Error {
    constructor(
        public readonly operation: string,
        public readonly cause: unknown,
    ) {
        super(`Cache backend ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'CacheBackendError';
    }
}
