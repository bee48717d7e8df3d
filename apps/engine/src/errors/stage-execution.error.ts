export class StageExecutionError extends Error {
    constructor(
        public readonly stageId: string,
        public readonly attempt: number,
        public readonly cause: unknown,
        public readonly retryable = true,
    ) {
        super(`Stage "${stageId}" attempt ${attempt} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'StageExecutionError';
    }
}
