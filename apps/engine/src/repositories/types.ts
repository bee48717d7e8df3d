/** One event as the sink stores it: envelope columns plus the serialized body. */
export interface StoredEvent {
    runId: string;
    sequence: number;
    type: string;
    body: string;
}

export interface RunRecord {
    id: string;
    templateId: string;
    templateVersion: number;
    scope: string;
    parentRunId: string | null;
    branchSequence: number | null;
    createdAt: Date;
}

/**
 * Durable append-only storage for run events. `append` resolves only once the
 * record is durable and rejects a sequence that is already taken.
 */
export interface EventSink {
    append(event: StoredEvent): Promise<void>;
    readFrom(runId: string, fromSequence: number, toSequence?: number): Promise<StoredEvent[]>;
    readLatestSnapshot(runId: string, atOrBefore?: number): Promise<StoredEvent | null>;
    /** Drops events past `sequence`; returns how many were removed. */
    truncateAfter(runId: string, sequence: number): Promise<number>;
}

export interface RunCatalog {
    /** Registers the run and writes its first event atomically. */
    create(record: RunRecord, firstEvent: StoredEvent): Promise<void>;
    findById(runId: string): Promise<RunRecord | null>;
    listIds(): Promise<string[]>;
}
