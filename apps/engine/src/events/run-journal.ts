import { RunRecord } from '../repositories/types';
import { StateProjector } from '../state/projector';
import { RunState } from '../state/run-state';
import { KeyedMutex } from '../utils/keyed-mutex';
import { EventLog } from './event-log';
import { RunEvent, RunEventPayload } from './types';

/**
 * The single write path for run events: append durably, fold into the
 * projection, and append a snapshot when one is due, all under a per-run lock
 * so the projection sees events in sequence order.
 */
export class RunJournal {
    private readonly locks = new KeyedMutex();

    constructor(
        readonly log: EventLog,
        readonly projector: StateProjector,
    ) { }

    current(runId: string): RunState | undefined {
        return this.projector.current(runId);
    }

    /** Creates a run (or branch) whose first own event is `payload`. */
    async create(record: RunRecord, payload: RunEventPayload, inherited?: RunState): Promise<RunState> {
        return this.locks.run(record.id, async () => {
            if (inherited) this.projector.seed(record.id, inherited);
            const event = await this.log.create(record, payload);
            const state = this.projector.apply(event);
            if (!state) throw new Error(`Run ${record.id} was created without a projection`);
            return state;
        });
    }

    async open(runId: string): Promise<RunState> {
        return this.locks.run(runId, async () => {
            if (!this.log.isOpen(runId)) await this.log.open(runId);
            const cached = this.projector.current(runId);
            return cached ?? this.projector.rebuild(runId);
        });
    }

    async record(runId: string, payload: RunEventPayload): Promise<RunEvent> {
        return this.locks.run(runId, async () => {
            const event = await this.log.append(runId, payload);
            const state = this.projector.apply(event);
            if (state && this.projector.shouldSnapshot(state)) {
                try {
                    const snapshot = await this.log.append(runId, { type: 'StateSnapshot', state });
                    this.projector.apply(snapshot);
                } catch (err) {
                    // The event itself is durable; replay simply starts from an older snapshot.
                    console.warn(`[journal] snapshot for run ${runId} at ${state.lastSequence} not written:`, err);
                }
            }
            return event;
        });
    }

    /** Releases the projection and the log's bookkeeping for a run nobody drives. */
    evict(runId: string): void {
        this.projector.evict(runId);
        this.log.forget(runId);
    }
}
