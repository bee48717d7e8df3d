export class RunNotFoundError extends Error {
    constructor(public readonly runId: string) {
        super(`Run "${runId}" not found`);
        this.name = 'RunNotFoundError';
    }
}
