/**
 * A row of `run_events`. `body` holds the serialized event; the (run_id, sequence)
 * primary key rejects a second writer for the same position.
 */
export interface RunEventEntity {
    run_id: string;
    sequence: number;
    event_type: string;
    body: string;
    created_at: Date;
}
