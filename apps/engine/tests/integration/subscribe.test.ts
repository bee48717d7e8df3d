import { defineTemplate } from '@plotline/sdk';
import { ChunkNotice } from '../../src/events/event-bus';
import { RunEvent } from '../../src/events/types';
import { FakeCapability, createTestEngine, history, reply, silenceConsole } from '../helpers/fakes';
import { sleep, waitUntil } from '../helpers/poll';

const asking = defineTemplate({
    id: 'asking',
    stages: [
        { kind: 'user-input', id: 'ask', prompt: 'Favourite fish?' },
        { id: 'poem', prompt: 'Poem about {{ stages.ask }}', models: ['model-a'], dependsOn: ['ask'] },
    ],
});

describe('observing runs', () => {
    beforeEach(() => {
        silenceConsole();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('streams history and then live events until the run ends', async () => {
        const engine = createTestEngine(new FakeCapability());
        engine.registerTemplate(asking);
        const runId = await engine.startRun('asking');

        const seen: RunEvent[] = [];
        const reader = (async () => {
            for await (const event of engine.subscribe(runId)) seen.push(event);
        })();

        await waitUntil(() => seen.some(e => e.type === 'StageAwaitingFeedback'), 2000, 5);
        await engine.supplyFeedback(runId, 'ask', { text: 'wrasse' });
        await reader;

        expect(seen.map(e => e.sequence)).toEqual(seen.map((_e, i) => i + 1));
        expect(seen[0].type).toBe('RunCreated');
        expect(seen[seen.length - 1]).toMatchObject({ type: 'RunCompleted', outputs: { ask: 'wrasse', poem: 'out(Poem about wrasse)' } });
    });

    it('starts from a given sequence', async () => {
        const engine = createTestEngine(new FakeCapability());
        engine.registerTemplate(asking);
        const runId = await engine.startRun('asking');
        await waitUntil(async () => (await engine.getRunState(runId)).stages.ask.awaitingFeedback, 2000, 5);
        await engine.supplyFeedback(runId, 'ask', { text: 'wrasse' });
        await engine.waitForRun(runId);

        const events = await history(engine, runId, 3);

        expect(events[0].sequence).toBe(3);
        expect(events[events.length - 1].type).toBe('RunCompleted');
    });

    it('ends quietly when the caller aborts', async () => {
        const engine = createTestEngine(new FakeCapability());
        engine.registerTemplate(asking);
        const runId = await engine.startRun('asking');
        const controller = new AbortController();

        const seen: string[] = [];
        const reader = (async () => {
            for await (const event of engine.subscribe(runId, { signal: controller.signal })) seen.push(event.type);
        })();
        await waitUntil(() => seen.includes('StageAwaitingFeedback'), 2000, 5);

        controller.abort();
        await expect(reader).resolves.toBeUndefined();
        expect(seen).not.toContain('RunCompleted');

        await engine.cancelRun(runId);
    });

    it('forwards generation chunks to chunk listeners only', async () => {
        const capability = new FakeCapability(async (request) => {
            await sleep(10);
            request.onChunk('Hel');
            request.onChunk('lo');
            return reply('Hello');
        });
        const engine = createTestEngine(capability);
        engine.registerTemplate(defineTemplate({ id: 'greet', stages: [{ id: 'hi', prompt: 'Greet', models: ['model-a'] }] }));

        const runId = await engine.startRun('greet');
        const chunks: ChunkNotice[] = [];
        const unsubscribe = engine.onChunk(runId, notice => chunks.push(notice));
        await engine.waitForRun(runId);
        unsubscribe();

        expect(chunks).toEqual([
            { runId, stageId: 'hi', attempt: 1, chunk: 'Hel' },
            { runId, stageId: 'hi', attempt: 1, chunk: 'lo' },
        ]);
        expect((await engine.getRunState(runId)).outputs.hi).toBe('Hello');
    });
});
