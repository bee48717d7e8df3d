import { EventEmitter, on } from 'node:events';
import { RunEvent, isRunEvent } from './types';

export interface ChunkNotice {
    runId: string;
    stageId: string;
    attempt: number;
    chunk: string;
}

export interface LiveEvents extends AsyncIterable<RunEvent> {
    close(): Promise<void>;
}

const eventChannel = (runId: string) => `event:${runId}`;
const chunkChannel = (runId: string) => `chunk:${runId}`;

/**
 * In-process fan-out of durable events and transient generation chunks.
 * Events reach the bus only after the sink acknowledged them.
 */
export class EventBus {
    private readonly emitter = new EventEmitter();

    constructor() {
        this.emitter.setMaxListeners(0);
    }

    publish(event: RunEvent): void {
        this.emitter.emit(eventChannel(event.runId), event);
    }

    publishChunk(notice: ChunkNotice): void {
        this.emitter.emit(chunkChannel(notice.runId), notice);
    }

    onChunk(runId: string, listener: (notice: ChunkNotice) => void): () => void {
        this.emitter.on(chunkChannel(runId), listener);
        return () => {
            this.emitter.off(chunkChannel(runId), listener);
        };
    }

    /**
     * Live events for one run. The listener is attached immediately, so events
     * published before iteration starts are buffered; `close` detaches it.
     */
    listen(runId: string, signal?: AbortSignal): LiveEvents {
        const source = on(this.emitter, eventChannel(runId), { signal });
        return {
            async *[Symbol.asyncIterator]() {
                for await (const args of source) {
                    const event: unknown = Array.isArray(args) ? args[0] : undefined;
                    if (isRunEvent(event)) yield event;
                }
            },
            async close() {
                await source.return?.();
            },
        };
    }

    listenerCount(runId: string): number {
        return this.emitter.listenerCount(eventChannel(runId));
    }
}
