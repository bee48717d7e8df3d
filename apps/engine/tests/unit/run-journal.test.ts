import { ValidationError } from '../../src/errors';
import { EventBus } from '../../src/events/event-bus';
import { EventLog } from '../../src/events/event-log';
import { RunJournal } from '../../src/events/run-journal';
import { RunEventPayload } from '../../src/events/types';
import { InMemoryEventSink, InMemoryRunCatalog } from '../../src/repositories/in-memory';
import { RunRecord, StoredEvent } from '../../src/repositories/types';
import { replay } from '../../src/state/fold';
import { StateProjector } from '../../src/state/projector';
import { plan } from '../helpers/events';

const RECORD: RunRecord = {
    id: 'run-1',
    templateId: 'tpl',
    templateVersion: 1,
    scope: 'test-scope',
    parentRunId: null,
    branchSequence: null,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
};

const CREATED: RunEventPayload = {
    type: 'RunCreated',
    templateId: 'tpl',
    templateVersion: 1,
    inputs: { topic: 'kelp' },
    scope: 'test-scope',
    stages: [plan('a'), plan('b', ['a'])],
};

describe('RunJournal', () => {
    let sink: InMemoryEventSink;
    let log: EventLog;
    let journal: RunJournal;

    function build(interval: number): void {
        sink = new InMemoryEventSink();
        log = new EventLog(sink, new InMemoryRunCatalog(sink), new EventBus());
        journal = new RunJournal(log, new StateProjector(log, interval));
    }

    // Restarting one stage over and over is an easy way to grow a log.
    async function restartStage(times: number, firstAttempt = 1): Promise<void> {
        for (let i = 0; i < times; i++) {
            await journal.record('run-1', { type: 'StageStarted', stageId: 'a', attempt: firstAttempt + i });
        }
    }

    const typesOf = async () => (await log.read('run-1')).map(e => e.type);

    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('projects the created run', async () => {
        build(50);
        const state = await journal.create(RECORD, CREATED);

        expect(state.status).toBe('pending');
        expect(state.inputs).toEqual({ topic: 'kelp' });
        expect(journal.current('run-1')).toBe(state);
    });

    it('writes a snapshot once the interval is reached', async () => {
        build(5);
        await journal.create(RECORD, CREATED);
        await restartStage(4);

        const types = await typesOf();
        expect(types).toHaveLength(6);
        expect(types[5]).toBe('StateSnapshot');
        expect(journal.current('run-1')).toMatchObject({ lastSequence: 6, eventsSinceSnapshot: 0 });
    });

    it('snapshots a run as soon as it is terminal', async () => {
        build(50);
        await journal.create(RECORD, CREATED);
        await journal.record('run-1', { type: 'RunStarted' });
        await journal.record('run-1', { type: 'RunCancelled', inFlight: [] });

        expect(await typesOf()).toEqual(['RunCreated', 'RunStarted', 'RunCancelled', 'StateSnapshot']);
    });

    it('rebuilds the same state from a snapshot as from a full replay', async () => {
        build(50);
        await journal.create(RECORD, CREATED);
        await journal.record('run-1', { type: 'RunStarted' });
        await restartStage(48);
        // sequence 51 is the snapshot written after event 50
        await restartStage(10, 49);

        const all = await log.read('run-1');
        expect(all).toHaveLength(61);
        expect(all[50].type).toBe('StateSnapshot');

        const withoutSnapshots = all.filter(e => e.type !== 'StateSnapshot');
        const fromScratch = replay(withoutSnapshots);
        const fromSnapshot = await journal.projector.load('run-1');

        expect(fromSnapshot).toEqual(replay(all));
        expect(fromSnapshot).toEqual(journal.current('run-1'));
        expect(fromSnapshot.stages).toEqual(fromScratch?.stages);
        expect(fromSnapshot.stages.a.attempt).toBe(58);
        expect(fromSnapshot.lastSequence).toBe(61);
    });

    it('loads a run as of an earlier sequence', async () => {
        build(50);
        await journal.create(RECORD, CREATED);
        await journal.record('run-1', { type: 'RunStarted' });
        await restartStage(3);

        const past = await journal.projector.load('run-1', 3);
        expect(past.lastSequence).toBe(3);
        expect(past.stages.a).toMatchObject({ status: 'running', attempt: 1 });
    });

    it('rejects sequences outside the log', async () => {
        build(50);
        await journal.create(RECORD, CREATED);

        await expect(journal.projector.load('run-1', 0)).rejects.toThrow(ValidationError);
        await expect(journal.projector.load('run-1', 9)).rejects.toThrow('Run run-1 has no event at sequence 9; last is 1');
    });

    it('keeps the event when its snapshot cannot be written', async () => {
        build(2);
        await journal.create(RECORD, CREATED);
        const append = sink.append.bind(sink);
        jest.spyOn(sink, 'append').mockImplementation(async (event: StoredEvent) => {
            if (event.type === 'StateSnapshot') throw new Error('disk full');
            return append(event);
        });

        const event = await journal.record('run-1', { type: 'RunStarted' });
        expect(event.sequence).toBe(2);
        expect(await typesOf()).toEqual(['RunCreated', 'RunStarted']);
        expect(journal.current('run-1')?.eventsSinceSnapshot).toBe(2);

        const next = await journal.record('run-1', { type: 'RunPaused' });
        expect(next.sequence).toBe(3);
    });

    it('reopens an evicted run from its log', async () => {
        build(50);
        await journal.create(RECORD, CREATED);
        await journal.record('run-1', { type: 'RunStarted' });
        journal.evict('run-1');
        expect(journal.current('run-1')).toBeUndefined();

        const state = await journal.open('run-1');
        expect(state.status).toBe('running');
        expect(journal.current('run-1')).toEqual(state);
    });

    it('releases the log of an evicted run until it is reopened', async () => {
        build(50);
        await journal.create(RECORD, CREATED);
        journal.evict('run-1');

        expect(log.isOpen('run-1')).toBe(false);
        expect(log.openRuns).toBe(0);
        await expect(journal.record('run-1', { type: 'RunStarted' })).rejects.toThrow(
            'Event log for run run-1: log is not open',
        );

        await journal.open('run-1');
        const started = await journal.record('run-1', { type: 'RunStarted' });
        expect(started.sequence).toBe(2);
        expect(journal.current('run-1')?.status).toBe('running');
    });
});
