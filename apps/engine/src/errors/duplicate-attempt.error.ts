export class DuplicateAttemptError extends Error {
    constructor(public readonly key: string) {
        super(`Attempt ${key} is already in flight`);
        this.name = 'DuplicateAttemptError';
    }
}
