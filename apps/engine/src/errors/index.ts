export { ValidationError } from './validation.error';
export { StageExecutionError } from './stage-execution.error';
export { DependencyUnsatisfiableError } from './dependency-unsatisfiable.error';
export { CacheBackendError } from './cache-backend.error';
export { EventSinkError } from './event-sink.error';
export { RunNotFoundError } from './run-not-found.error';
export { FeedbackError } from './feedback.error';
export { DuplicateAttemptError } from './duplicate-attempt.error';

export interface ErrorObject {
    message: string;
    name: string;
    stack?: string;
}

export function toErrorObject(error: unknown): ErrorObject {
    return error instanceof Error
        ? { message: error.message, name: error.name, stack: error.stack }
        : { message: String(error), name: 'Error' };
}
