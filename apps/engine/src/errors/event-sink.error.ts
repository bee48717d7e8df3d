export class EventSinkError extends Error {
    constructor(
        public readonly runId: string,
        message: string,
        public readonly cause?: unknown,
    ) {
        super(`Event log for run ${runId}: ${message}`);
        this.name = 'EventSinkError';
    }
}
