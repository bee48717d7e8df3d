import { FeedbackSelection } from '../events/types';
import { AbortedError } from '../utils/sleep';

export interface FeedbackInput {
    selection: FeedbackSelection;
    feedback?: string;
}

export interface Waiter {
    resolve: (input: FeedbackInput) => void;
    reject: (err: Error) => void;
}

/**
 * Parks a stage until a human answers. A wait ends on `take` + resolve,
 * or rejects with an AbortError when the stage's signal fires.
 */
export class FeedbackGate {
    private readonly waiters = new Map<string, Waiter>();

    wait(stageId: string, signal: AbortSignal): Promise<FeedbackInput> {
        return new Promise((resolve, reject) => {
            if (signal.aborted) {
                reject(new AbortedError());
                return;
            }
            const onAbort = () => {
                this.waiters.delete(stageId);
                reject(new AbortedError());
            };
            signal.addEventListener('abort', onAbort, { once: true });
            this.waiters.set(stageId, {
                resolve: (input) => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(input);
                },
                reject: (err) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(err);
                },
            });
        });
    }

    isWaiting(stageId: string): boolean {
        return this.waiters.has(stageId);
    }

    /** Removes and returns the waiter so exactly one caller can answer it. */
    take(stageId: string): Waiter | undefined {
        const waiter = this.waiters.get(stageId);
        this.waiters.delete(stageId);
        return waiter;
    }

    get size(): number {
        return this.waiters.size;
    }
}
