export class DependencyUnsatisfiableError extends Error {
    constructor(
        public readonly stageId: string,
        public readonly failedDependency: string,
    ) {
        super(`Stage "${stageId}" cannot run: required stage "${failedDependency}" failed`);
        this.name = 'DependencyUnsatisfiableError';
    }
}
