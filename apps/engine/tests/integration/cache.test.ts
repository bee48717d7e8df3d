import { defineTemplate } from '@plotline/sdk';
import { InMemoryCacheBackend } from '../../src/cache/redis-backend';
import { FakeCapability, createTestEngine, history, silenceConsole } from '../helpers/fakes';
import { waitUntil } from '../helpers/poll';

const summary = defineTemplate({
    id: 'summary',
    inputs: { topic: { required: true }, tone: { default: 'plain' } },
    stages: [
        { id: 'sum', prompt: 'Summarize {{ inputs.topic }}', models: ['model-a'], contextKeys: ['tone'] },
    ],
});

describe('response reuse', () => {
    beforeEach(() => {
        silenceConsole();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('serves an identical stage from the cache without calling the model', async () => {
        const capability = new FakeCapability();
        const engine = createTestEngine(capability);
        engine.registerTemplate(summary);

        await engine.waitForRun(await engine.startRun('summary', { topic: 'kelp' }));
        const second = await engine.startRun('summary', { topic: 'kelp' });
        const state = await engine.waitForRun(second);

        expect(capability.calls).toHaveLength(1);
        expect(state.stages.sum).toMatchObject({ status: 'completed', source: 'cache', output: 'out(Summarize kelp)' });
        expect(state.tokenUsage).toEqual({ fresh: { prompt: 0, completion: 0 }, cached: { prompt: 10, completion: 20 } });

        const completed = (await history(engine, second)).find(e => e.type === 'StageCompleted');
        expect(completed).toMatchObject({ source: 'cache', model: 'model-a' });
        expect(engine.cacheStats()).toMatchObject({ hits: 1, misses: 1, memoryEntries: 1 });
    });

    it('misses when a context input or the scope differs', async () => {
        const capability = new FakeCapability();
        const engine = createTestEngine(capability);
        engine.registerTemplate(summary);

        await engine.waitForRun(await engine.startRun('summary', { topic: 'kelp' }));
        await engine.waitForRun(await engine.startRun('summary', { topic: 'kelp', tone: 'wry' }));
        await engine.waitForRun(await engine.startRun('summary', { topic: 'kelp' }, { scope: 'other-team' }));

        expect(capability.calls).toHaveLength(3);
        expect(engine.cacheStats()).toMatchObject({ hits: 0, misses: 3 });
    });

    it('regenerates after the scope is invalidated', async () => {
        const capability = new FakeCapability();
        const engine = createTestEngine(capability);
        engine.registerTemplate(summary);

        await engine.waitForRun(await engine.startRun('summary', { topic: 'kelp' }));
        await engine.invalidateCacheScope('test-scope');
        const state = await engine.waitForRun(await engine.startRun('summary', { topic: 'kelp' }));

        expect(capability.calls).toHaveLength(2);
        expect(state.stages.sum.source).toBe('fresh');
    });

    it('shares results between engines through the persistent tier', async () => {
        const backend = new InMemoryCacheBackend();
        const first = new FakeCapability();
        const writer = createTestEngine(first, { cacheBackend: backend });
        writer.registerTemplate(summary);
        await writer.waitForRun(await writer.startRun('summary', { topic: 'kelp' }));
        await writer.shutdown();

        const second = new FakeCapability();
        const reader = createTestEngine(second, { cacheBackend: backend });
        reader.registerTemplate(summary);
        const state = await reader.waitForRun(await reader.startRun('summary', { topic: 'kelp' }));

        expect(second.calls).toHaveLength(0);
        expect(state.stages.sum.source).toBe('cache');
        expect(reader.cacheStats()).toMatchObject({ hits: 1, tier2Hits: 1 });
    });

    it('keeps running on memory alone when there is no persistent tier', async () => {
        const capability = new FakeCapability();
        const engine = createTestEngine(capability, { cacheBackend: null });
        engine.registerTemplate(summary);

        await engine.waitForRun(await engine.startRun('summary', { topic: 'kelp' }));
        const state = await engine.waitForRun(await engine.startRun('summary', { topic: 'kelp' }));

        expect(state.stages.sum.source).toBe('cache');
        expect(engine.cache.pendingWriteCount).toBe(0);
    });

    it('bypasses the cache for candidate stages', async () => {
        const capability = new FakeCapability();
        const engine = createTestEngine(capability);
        engine.registerTemplate(defineTemplate({
            id: 'names',
            stages: [{ id: 'name', prompt: 'Name a boat', models: ['model-a'], candidates: 2 }],
        }));

        const runId = await engine.startRun('names');
        await waitUntil(async () => (await engine.getRunState(runId)).stages.name.awaitingFeedback, 2000, 5);
        await engine.cancelRun(runId);

        expect(capability.calls).toHaveLength(2);

        expect(engine.cacheStats()).toMatchObject({ hits: 0, misses: 0, memoryEntries: 0 });
    });
});
