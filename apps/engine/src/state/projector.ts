import { ValidationError } from '../errors';
import { EventLog } from '../events/event-log';
import { RunEvent } from '../events/types';
import { foldEvent, replay } from './fold';
import { RunState, isTerminalRun } from './run-state';

/**
 * Keeps the folded state of active runs and rebuilds any run, at any
 * sequence, from the newest snapshot plus the events after it.
 */
export class StateProjector {
    private readonly states = new Map<string, RunState>();

    constructor(
        private readonly log: EventLog,
        private readonly snapshotInterval: number,
    ) { }

    current(runId: string): RunState | undefined {
        return this.states.get(runId);
    }

    /** Folds a freshly appended event into the cached state; ignored for runs not held here. */
    apply(event: RunEvent): RunState | undefined {
        const previous = this.states.get(event.runId);
        if (!previous && event.type !== 'RunCreated') return undefined;
        const next = foldEvent(previous, event);
        this.states.set(event.runId, next);
        return next;
    }

    seed(runId: string, state: RunState): void {
        this.states.set(runId, state);
    }

    async load(runId: string, atSequence?: number): Promise<RunState> {
        if (atSequence !== undefined && atSequence < 1) {
            throw new ValidationError(`Sequence must be at least 1, got ${atSequence}`);
        }
        const snapshot = await this.log.latestSnapshot(runId, atSequence);
        const initial = snapshot ? foldEvent(undefined, snapshot) : undefined;
        const events = await this.log.read(runId, snapshot ? snapshot.sequence + 1 : 1, atSequence);
        const state = replay(events, initial);
        if (!state) throw new ValidationError(`Run ${runId} has no events`);
        if (atSequence !== undefined && state.lastSequence < atSequence) {
            throw new ValidationError(`Run ${runId} has no event at sequence ${atSequence}; last is ${state.lastSequence}`);
        }
        return state;
    }

    async rebuild(runId: string): Promise<RunState> {
        const state = await this.load(runId);
        this.states.set(runId, state);
        return state;
    }

    shouldSnapshot(state: RunState): boolean {
        if (state.eventsSinceSnapshot === 0) return false;
        return state.eventsSinceSnapshot >= this.snapshotInterval || isTerminalRun(state.status);
    }

    evict(runId: string): void {
        this.states.delete(runId);
    }

    get size(): number {
        return this.states.size;
    }
}
