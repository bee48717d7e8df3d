import type { RunOrchestrator } from './run-orchestrator';

/** Orchestrators of the runs this engine is currently driving. */
export class RunRegistry {
    private readonly runs = new Map<string, RunOrchestrator>();

    add(orchestrator: RunOrchestrator): void {
        if (this.runs.has(orchestrator.runId)) {
            throw new Error(`Run ${orchestrator.runId} is already active`);
        }
        this.runs.set(orchestrator.runId, orchestrator);
    }

    get(runId: string): RunOrchestrator | undefined {
        return this.runs.get(runId);
    }

    has(runId: string): boolean {
        return this.runs.has(runId);
    }

    remove(runId: string): void {
        this.runs.delete(runId);
    }

    list(): RunOrchestrator[] {
        return [...this.runs.values()];
    }

    get size(): number {
        return this.runs.size;
    }
}
