export class ValidationError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = [message],
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}
