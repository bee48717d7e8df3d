export class FeedbackError extends Error {
    constructor(
        public readonly runId: string,
        public readonly stageId: string,
        message: string,
    ) {
        super(`Feedback for ${runId}/${stageId} rejected: ${message}`);
        this.name = 'FeedbackError';
    }
}
