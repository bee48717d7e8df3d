import { defineTemplate } from '@plotline/sdk';
import { ValidationError } from '../../src/errors';
import { Engine } from '../../src/engine';
import { FakeCapability, createTestEngine, history, silenceConsole, typesOf } from '../helpers/fakes';

const article = defineTemplate({
    id: 'article',
    inputs: { topic: { required: true } },
    stages: [
        { id: 'outline', prompt: 'Outline {{ inputs.topic }}', models: ['model-a'] },
        { id: 'draft', prompt: 'Expand {{ stages.outline }}', models: ['model-a'], dependsOn: ['outline'] },
    ],
});

async function sequenceOf(engine: Engine, runId: string, type: string, stageId?: string): Promise<number> {
    const event = (await history(engine, runId)).find(
        e => e.type === type && (stageId === undefined || ('stageId' in e && e.stageId === stageId)),
    );
    if (!event) throw new Error(`no ${type} in ${runId}`);
    return event.sequence;
}

describe('branching', () => {
    let capability: FakeCapability;
    let engine: Engine;
    let parentId: string;

    beforeEach(async () => {
        silenceConsole();
        capability = new FakeCapability();
        engine = createTestEngine(capability);
        engine.registerTemplate(article);
        parentId = await engine.startRun('article', { topic: 'kelp' });
        await engine.waitForRun(parentId);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('replays the parent prefix and then its own events', async () => {
        const at = await sequenceOf(engine, parentId, 'StageCompleted', 'outline');
        const parentBefore = await history(engine, parentId);

        const childId = await engine.branchRun(parentId, at);
        const child = await engine.waitForRun(childId);

        expect(child).toMatchObject({ status: 'completed', parentRunId: parentId, branchSequence: at, scope: 'test-scope' });
        expect(child.outputs).toEqual({ outline: 'out(Outline kelp)', draft: 'out(Expand out(Outline kelp))' });

        const events = await history(engine, childId);
        expect(events.slice(0, at)).toEqual(parentBefore.slice(0, at));
        expect(events[at]).toMatchObject({ type: 'RunBranched', runId: childId, sequence: at + 1 });
        expect(events.map(e => e.sequence)).toEqual(events.map((_e, i) => i + 1));

        expect(await history(engine, parentId)).toEqual(parentBefore);
    });

    it('reuses the parent scope cache for stages that run again', async () => {
        const at = await sequenceOf(engine, parentId, 'StageCompleted', 'outline');

        const child = await engine.waitForRun(await engine.branchRun(parentId, at));

        expect(child.stages.outline.source).toBe('fresh');
        expect(child.stages.draft.source).toBe('cache');
        expect(capability.calls).toHaveLength(2);
    });

    it('regenerates reset stages and recomputes their dependents', async () => {
        const at = await sequenceOf(engine, parentId, 'RunCompleted');

        const childId = await engine.branchRun(parentId, at, { resetStages: ['outline'], regenerate: true });
        const child = await engine.waitForRun(childId);

        expect(child.status).toBe('completed');
        expect(child.stages.outline).toMatchObject({ source: 'fresh', bypassCache: true });
        expect(child.stages.draft.source).toBe('cache');
        expect(capability.calls.filter(c => c.prompt === 'Outline kelp')).toHaveLength(2);

        const own = (await history(engine, childId)).slice(at);
        expect(own[0]).toMatchObject({ type: 'RunBranched', runId: childId, sequence: at + 1 });
        expect(typesOf(own, 'outline')).toEqual(['StageStarted', 'StageCompleted']);
        expect(own.filter(e => e.type === 'RunCompleted').map(e => e.runId)).toEqual([childId]);
    });

    it('branches from a branch', async () => {
        const at = await sequenceOf(engine, parentId, 'StageCompleted', 'outline');
        const childId = await engine.branchRun(parentId, at);
        await engine.waitForRun(childId);
        const childAt = await sequenceOf(engine, childId, 'StageCompleted', 'draft');

        const grandchildId = await engine.branchRun(childId, childAt, { resetStages: ['draft'] });
        const grandchild = await engine.waitForRun(grandchildId);

        expect(grandchild.parentRunId).toBe(childId);
        expect(grandchild.outputs.draft).toBe('out(Expand out(Outline kelp))');
        const events = await history(engine, grandchildId);
        expect(events.map(e => e.runId).slice(0, childAt + 1)).toEqual([
            ...Array.from({ length: at }, () => parentId),
            ...Array.from({ length: childAt - at }, () => childId),
            grandchildId,
        ]);
    });

    it('reads a run as it was at an earlier sequence', async () => {
        const at = await sequenceOf(engine, parentId, 'StageCompleted', 'outline');

        const past = await engine.getRunState(parentId, { atSequence: at });

        expect(past.status).toBe('running');
        expect(past.stages.outline.status).toBe('completed');
        expect(past.stages.draft.status).toBe('waiting');
        expect(past.lastSequence).toBe(at);
    });

    it('rejects unknown stages and sequences past the end', async () => {
        await expect(engine.branchRun(parentId, 2, { resetStages: ['nope'] })).rejects.toThrow('Unknown stages to reset: nope');
        await expect(engine.branchRun(parentId, 999)).rejects.toThrow(ValidationError);
        await expect(engine.branchRun('missing-run', 1)).rejects.toThrow('Run "missing-run" not found');
    });
});
