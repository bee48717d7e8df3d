import { EventSinkError } from '../errors';
import { EventSink, RunCatalog, RunRecord, StoredEvent } from './types';

/**
 * Process-local sink used when no DATABASE_URL is configured, and by tests.
 * Records are kept exactly as written, bodies included.
 */
export class InMemoryEventSink implements EventSink {
    private readonly logs = new Map<string, StoredEvent[]>();

    async append(event: StoredEvent): Promise<void> {
        const log = this.logs.get(event.runId) ?? [];
        if (log.some(e => e.sequence === event.sequence)) {
            throw new EventSinkError(event.runId, `sequence ${event.sequence} is already written`);
        }
        log.push({ ...event });
        log.sort((a, b) => a.sequence - b.sequence);
        this.logs.set(event.runId, log);
    }

    async readFrom(runId: string, fromSequence: number, toSequence?: number): Promise<StoredEvent[]> {
        return (this.logs.get(runId) ?? [])
            .filter(e => e.sequence >= fromSequence && (toSequence === undefined || e.sequence <= toSequence))
            .map(e => ({ ...e }));
    }

    async readLatestSnapshot(runId: string, atOrBefore?: number): Promise<StoredEvent | null> {
        const log = this.logs.get(runId) ?? [];
        for (let i = log.length - 1; i >= 0; i--) {
            const e = log[i];
            if (e.type === 'StateSnapshot' && (atOrBefore === undefined || e.sequence <= atOrBefore)) return { ...e };
        }
        return null;
    }

    async truncateAfter(runId: string, sequence: number): Promise<number> {
        const log = this.logs.get(runId) ?? [];
        const kept = log.filter(e => e.sequence <= sequence);
        this.logs.set(runId, kept);
        return log.length - kept.length;
    }

    count(runId: string): number {
        return this.logs.get(runId)?.length ?? 0;
    }
}

export class InMemoryRunCatalog implements RunCatalog {
    private readonly runs = new Map<string, RunRecord>();

    constructor(private readonly sink: EventSink) { }

    async create(record: RunRecord, firstEvent: StoredEvent): Promise<void> {
        if (this.runs.has(record.id)) {
            throw new EventSinkError(record.id, 'run already exists');
        }
        await this.sink.append(firstEvent);
        this.runs.set(record.id, { ...record });
    }

    async findById(runId: string): Promise<RunRecord | null> {
        const record = this.runs.get(runId);
        return record ? { ...record } : null;
    }

    async listIds(): Promise<string[]> {
        return [...this.runs.keys()];
    }
}
