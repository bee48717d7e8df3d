import { DuplicateAttemptError } from '../errors';

/**
 * Guards each (run, stage, attempt) so at most one execution of it is in
 * flight in this process.
 */
export class SingleFlight {
    private readonly inFlight = new Set<string>();

    static key(runId: string, stageId: string, attempt: number): string {
        return `${runId}:${stageId}:${attempt}`;
    }

    /** Claims the key and returns its release; throws if it is already claimed. */
    acquire(key: string): () => void {
        if (this.inFlight.has(key)) throw new DuplicateAttemptError(key);
        this.inFlight.add(key);
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.inFlight.delete(key);
        };
    }

    async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const release = this.acquire(key);
        try {
            return await fn();
        } finally {
            release();
        }
    }

    has(key: string): boolean {
        return this.inFlight.has(key);
    }

    get size(): number {
        return this.inFlight.size;
    }
}
