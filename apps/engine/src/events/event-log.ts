import { deserialize, serialize } from '@plotline/sdk';
import { v7 as uuidv7 } from 'uuid';
import { EventSinkError, RunNotFoundError } from '../errors';
import { EventSink, RunCatalog, RunRecord, StoredEvent } from '../repositories/types';
import { EventBus } from './event-bus';
import { RunEvent, RunEventPayload, isRunEvent } from './types';

const TAG = '[event-log]';

// Snapshots carry every stage output, so events get more room than a single payload.
export const MAX_EVENT_BYTES = 8 * 1024 * 1024;

/**
 * Append-only, per-run event log over an EventSink.
 *
 * Sequence numbers are contiguous from 1. A branched run inherits its parent's
 * events up to `branchSequence` and appends its own from `branchSequence + 1`;
 * reads stitch the two together.
 *
 * Callers serialize appends per run (see RunJournal); the log only tracks
 * the next free sequence.
 */
export class EventLog {
    private readonly lastSequence = new Map<string, number>();
    private readonly records = new Map<string, RunRecord>();

    get openRuns(): number {
        return this.lastSequence.size;
    }

    constructor(
        private readonly sink: EventSink,
        private readonly catalog: RunCatalog,
        private readonly bus: EventBus,
        private readonly now: () => Date = () => new Date(),
    ) { }

    async create(record: RunRecord, payload: RunEventPayload): Promise<RunEvent> {
        const sequence = (record.branchSequence ?? 0) + 1;
        const event = this.build(record.id, sequence, payload);
        try {
            await this.catalog.create(record, this.encode(event));
        } catch (err) {
            if (err instanceof EventSinkError) throw err;
            throw new EventSinkError(record.id, 'failed to create run', err);
        }
        this.records.set(record.id, record);
        this.lastSequence.set(record.id, sequence);
        this.bus.publish(event);
        return event;
    }

    /**
     * Prepares a run's log for appending. Unreadable events at the tail are a
     * partial write and get truncated; an unreadable event followed by readable
     * ones means corruption and is fatal.
     */
    async open(runId: string): Promise<number> {
        const record = await this.recordOf(runId);
        const base = record.branchSequence ?? 0;
        const stored = await this.sink.readFrom(runId, base + 1);

        let last = base;
        let firstBad = -1;
        for (let i = 0; i < stored.length; i++) {
            if (stored[i].sequence !== last + 1) {
                throw new EventSinkError(runId, `gap in log: expected sequence ${last + 1}, found ${stored[i].sequence}`);
            }
            if (this.decode(stored[i]) === null) {
                firstBad = i;
                break;
            }
            last = stored[i].sequence;
        }

        if (firstBad >= 0) {
            const rest = stored.slice(firstBad + 1);
            if (rest.some(e => this.decode(e) !== null)) {
                throw new EventSinkError(runId, `unreadable event at sequence ${stored[firstBad].sequence} precedes readable events`);
            }
            const dropped = await this.sink.truncateAfter(runId, last);
            console.warn(`${TAG} run ${runId}: truncated ${dropped} unreadable trailing event(s) after sequence ${last}`);
        }

        this.lastSequence.set(runId, last);
        this.records.set(runId, record);
        return last;
    }

    /** Drops what the log holds for a run; `open` brings it back. */
    forget(runId: string): void {
        this.lastSequence.delete(runId);
        this.records.delete(runId);
    }

    isOpen(runId: string): boolean {
        return this.lastSequence.has(runId);
    }

    async append(runId: string, payload: RunEventPayload): Promise<RunEvent> {
        const last = this.lastSequence.get(runId);
        if (last === undefined) throw new EventSinkError(runId, 'log is not open');

        const event = this.build(runId, last + 1, payload);
        let stored: StoredEvent;
        try {
            stored = this.encode(event);
        } catch (err) {
            throw new EventSinkError(runId, `event ${payload.type} cannot be serialized`, err);
        }

        this.lastSequence.set(runId, event.sequence);
        try {
            await this.sink.append(stored);
        } catch (err) {
            this.lastSequence.set(runId, last);
            if (err instanceof EventSinkError) throw err;
            throw new EventSinkError(runId, `append of sequence ${event.sequence} failed`, err);
        }
        this.bus.publish(event);
        return event;
    }

    /** Events in [from, to] including inherited parent events. */
    async read(runId: string, from = 1, to?: number): Promise<RunEvent[]> {
        const record = await this.recordOf(runId);
        const branchAt = record.branchSequence;
        if (record.parentRunId !== null && branchAt !== null && from <= branchAt) {
            const inherited = await this.read(record.parentRunId, from, Math.min(to ?? branchAt, branchAt));
            const own = to !== undefined && to <= branchAt ? [] : await this.readOwn(runId, branchAt + 1, to);
            return [...inherited, ...own];
        }
        return this.readOwn(runId, from, to);
    }

    /** Newest snapshot at or before `atOrBefore`, following the branch lineage. */
    async latestSnapshot(runId: string, atOrBefore?: number): Promise<RunEvent | null> {
        const record = await this.recordOf(runId);
        const branchAt = record.branchSequence;
        if (atOrBefore === undefined || branchAt === null || atOrBefore > branchAt) {
            const stored = await this.sink.readLatestSnapshot(runId, atOrBefore);
            if (stored && (branchAt === null || stored.sequence > branchAt)) {
                const event = this.decode(stored);
                if (event) return event;
                console.warn(`${TAG} run ${runId}: snapshot at ${stored.sequence} is unreadable, replaying without it`);
                return null;
            }
        }
        if (record.parentRunId !== null && branchAt !== null) {
            return this.latestSnapshot(record.parentRunId, Math.min(atOrBefore ?? branchAt, branchAt));
        }
        return null;
    }

    listRuns(): Promise<string[]> {
        return this.catalog.listIds();
    }

    lastSequenceOf(runId: string): number | undefined {
        return this.lastSequence.get(runId);
    }

    async recordOf(runId: string): Promise<RunRecord> {
        const cached = this.records.get(runId);
        if (cached) return cached;
        const record = await this.catalog.findById(runId);
        if (!record) throw new RunNotFoundError(runId);
        // Only open runs are kept; the rest are looked up again.
        if (this.lastSequence.has(runId)) this.records.set(runId, record);
        return record;
    }

    private async readOwn(runId: string, from: number, to?: number): Promise<RunEvent[]> {
        const stored = await this.sink.readFrom(runId, from, to);
        return stored.map(e => {
            const event = this.decode(e);
            if (!event) throw new EventSinkError(runId, `unreadable event at sequence ${e.sequence}`);
            return event;
        });
    }

    private build(runId: string, sequence: number, payload: RunEventPayload): RunEvent {
        return { ...payload, id: uuidv7(), runId, sequence, timestamp: this.now().toISOString() };
    }

    private encode(event: RunEvent): StoredEvent {
        return { runId: event.runId, sequence: event.sequence, type: event.type, body: serialize(event, MAX_EVENT_BYTES) };
    }

    private decode(stored: StoredEvent): RunEvent | null {
        let value: unknown;
        try {
            value = deserialize<unknown>(stored.body);
        } catch {
            return null;
        }
        if (!isRunEvent(value) || value.sequence !== stored.sequence || value.type !== stored.type) return null;
        return value;
    }
}
