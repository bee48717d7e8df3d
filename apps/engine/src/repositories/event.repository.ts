import { SqlClient } from '../db';
import { RunEventEntity } from '../db/run_event.entity';
import { EventSinkError } from '../errors';
import { EventSink, StoredEvent } from './types';

export const INSERT_EVENT_SQL =
    'INSERT INTO run_events (run_id, sequence, event_type, body) VALUES ($1, $2, $3, $4)';

const UNIQUE_VIOLATION = '23505';

function hasCode(err: unknown, code: string): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

function toStored(row: RunEventEntity): StoredEvent {
    return { runId: row.run_id, sequence: row.sequence, type: row.event_type, body: row.body };
}

export class EventRepository implements EventSink {
    constructor(private readonly db: SqlClient) { }

    async append(event: StoredEvent): Promise<void> {
        try {
            await this.db.query(INSERT_EVENT_SQL, [event.runId, event.sequence, event.type, event.body]);
        } catch (err) {
            // The primary key is the single-writer guard for a sequence slot
            if (hasCode(err, UNIQUE_VIOLATION)) {
                throw new EventSinkError(event.runId, `sequence ${event.sequence} is already written`, err);
            }
            throw err;
        }
    }

    async readFrom(runId: string, fromSequence: number, toSequence?: number): Promise<StoredEvent[]> {
        const res = await this.db.query(
            `SELECT run_id, sequence, event_type, body, created_at
             FROM run_events
             WHERE run_id = $1 AND sequence >= $2 AND ($3::int IS NULL OR sequence <= $3)
             ORDER BY sequence ASC`,
            [runId, fromSequence, toSequence ?? null],
        );
        return res.rows.map((row: RunEventEntity) => toStored(row));
    }

    async readLatestSnapshot(runId: string, atOrBefore?: number): Promise<StoredEvent | null> {
        const res = await this.db.query(
            `SELECT run_id, sequence, event_type, body, created_at
             FROM run_events
             WHERE run_id = $1 AND event_type = 'StateSnapshot' AND ($2::int IS NULL OR sequence <= $2)
             ORDER BY sequence DESC
             LIMIT 1`,
            [runId, atOrBefore ?? null],
        );
        const row: RunEventEntity | undefined = res.rows[0];
        return row ? toStored(row) : null;
    }

    async truncateAfter(runId: string, sequence: number): Promise<number> {
        const res = await this.db.query('DELETE FROM run_events WHERE run_id = $1 AND sequence > $2', [runId, sequence]);
        return res.rowCount ?? 0;
    }
}
