import { GenerationCapability, InputValues, PipelineTemplate } from '@plotline/sdk';
import { v7 as uuidv7 } from 'uuid';
import { ResponseCache } from './cache/response-cache';
import { InMemoryCacheBackend, RedisCacheBackend } from './cache/redis-backend';
import { CacheBackend, CacheStats } from './cache/types';
import { EngineConfig, loadConfig } from './config';
import { applySchema, createPool, createRedis } from './db';
import { TransactionManager } from './db/transaction.manager';
import { FeedbackError, ValidationError } from './errors';
import { ChunkNotice, EventBus } from './events/event-bus';
import { EventLog } from './events/event-log';
import { RunJournal } from './events/run-journal';
import { FeedbackSelection, RunEvent, StagePlan, isTerminalEvent } from './events/types';
import { RunOrchestrator } from './orchestrator/run-orchestrator';
import { RunRegistry } from './orchestrator/run-registry';
import { SingleFlight } from './orchestrator/single-flight';
import { StageHandlers, createStageHandlers } from './orchestrator/stage-handlers';
import { EventRepository } from './repositories/event.repository';
import { InMemoryEventSink, InMemoryRunCatalog } from './repositories/in-memory';
import { RunRepository } from './repositories/run.repository';
import { EventSink, RunCatalog, RunRecord } from './repositories/types';
import { StateProjector } from './state/projector';
import { RunState, isTerminalRun } from './state/run-state';
import { CompiledTemplate, TemplateRegistry } from './templates/template-registry';
import { isAbortError } from './utils/sleep';

const TAG = '[engine]';

export interface EngineOptions {
    capability: GenerationCapability;
    sink?: EventSink;
    catalog?: RunCatalog;
    cacheBackend?: CacheBackend | null;
    config?: Partial<EngineConfig>;
    /** Milliseconds clock for cache expiry. */
    clock?: () => number;
    /** Connections the engine owns and closes on shutdown. */
    closers?: Array<() => Promise<unknown>>;
}

export interface StartRunOptions {
    version?: number;
    scope?: string;
}

export interface BranchOptions {
    /** Completed stages to run again in the branch, together with everything downstream. */
    resetStages?: string[];
    /** Bypass the cache for the reset stages. */
    regenerate?: boolean;
}

export interface SubscribeOptions {
    fromSequence?: number;
    signal?: AbortSignal;
}

function stagePlans(template: PipelineTemplate): StagePlan[] {
    return template.stages.map(stage => ({
        id: stage.id,
        kind: stage.kind,
        dependsOn: [...stage.dependsOn],
        optional: stage.optional,
        maxAttempts: stage.retry.maxAttempts,
    }));
}

export function resolveInputs(template: PipelineTemplate, provided: InputValues): InputValues {
    const issues: string[] = [];
    const resolved: InputValues = {};
    for (const [name, def] of Object.entries(template.inputs)) {
        const value = Object.prototype.hasOwnProperty.call(provided, name) ? provided[name] : def.default;
        if (value !== undefined) resolved[name] = value;
        else if (def.required) issues.push(`Missing required input "${name}"`);
    }
    for (const name of Object.keys(provided)) {
        if (!Object.prototype.hasOwnProperty.call(template.inputs, name)) issues.push(`Unknown input "${name}"`);
    }
    if (issues.length > 0) {
        throw new ValidationError(`Invalid inputs for template "${template.id}": ${issues.join('; ')}`, issues);
    }
    return resolved;
}

/**
 * The control surface: registers templates, starts, steers and observes runs.
 * Every run the engine drives has exactly one RunOrchestrator.
 */
export class Engine {
    readonly config: EngineConfig;
    readonly templates = new TemplateRegistry();
    readonly cache: ResponseCache;
    private readonly bus = new EventBus();
    private readonly log: EventLog;
    private readonly journal: RunJournal;
    private readonly runs = new RunRegistry();
    private readonly singleFlight = new SingleFlight();
    private readonly handlers: StageHandlers;
    private readonly closers: Array<() => Promise<unknown>>;
    private closed = false;

    constructor(options: EngineOptions) {
        this.config = { ...loadConfig(), ...options.config };
        const sink = options.sink ?? new InMemoryEventSink();
        const catalog = options.catalog ?? new InMemoryRunCatalog(sink);
        this.log = new EventLog(sink, catalog, this.bus);
        this.journal = new RunJournal(this.log, new StateProjector(this.log, this.config.snapshotInterval));
        this.cache = new ResponseCache({
            capacity: this.config.cacheMemoryCapacity,
            ttlMs: this.config.cacheTtlMs,
            backend: options.cacheBackend === undefined ? new InMemoryCacheBackend(options.clock) : options.cacheBackend,
            clock: options.clock,
        });
        this.handlers = createStageHandlers({ cache: this.cache, capability: options.capability });
        this.closers = options.closers ?? [];
    }

    registerTemplate(template: PipelineTemplate): PipelineTemplate {
        this.templates.register(template);
        return template;
    }

    /** Creates the run durably and returns its id; the run proceeds in the background. */
    async startRun(templateId: string, inputs: InputValues = {}, options: StartRunOptions = {}): Promise<string> {
        this.assertOpen();
        const compiled = this.templates.get(templateId, options.version);
        if (!compiled) {
            const version = options.version !== undefined ? ` v${options.version}` : '';
            throw new ValidationError(`Unknown template "${templateId}"${version}`);
        }
        const { template } = compiled;
        const scope = options.scope ?? this.config.defaultScope;
        if (scope.length === 0) throw new ValidationError('Scope cannot be empty');

        const runId = uuidv7();
        const record: RunRecord = {
            id: runId,
            templateId: template.id,
            templateVersion: template.version,
            scope,
            parentRunId: null,
            branchSequence: null,
            createdAt: new Date(),
        };
        await this.journal.create(record, {
            type: 'RunCreated',
            templateId: template.id,
            templateVersion: template.version,
            inputs: resolveInputs(template, inputs),
            scope,
            stages: stagePlans(template),
        });
        this.activate(runId, compiled);
        console.log(`${TAG} run ${runId} started from ${template.id} v${template.version}`);
        return runId;
    }

    async getRunState(runId: string, options: { atSequence?: number } = {}): Promise<RunState> {
        if (options.atSequence === undefined) {
            const live = this.journal.current(runId);
            if (live) return live;
        }
        return this.journal.projector.load(runId, options.atSequence);
    }

    async supplyFeedback(runId: string, stageId: string, selection: FeedbackSelection, feedback?: string): Promise<void> {
        const orchestrator = this.runs.get(runId);
        if (!orchestrator) {
            await this.log.recordOf(runId);
            throw new FeedbackError(runId, stageId, 'run is not active');
        }
        await orchestrator.supplyFeedback(stageId, { selection, ...(feedback !== undefined ? { feedback } : {}) });
    }

    async cancelRun(runId: string): Promise<RunState> {
        const orchestrator = this.runs.get(runId);
        if (orchestrator) return orchestrator.cancel();

        const state = await this.journal.open(runId);
        if (isTerminalRun(state.status)) {
            this.journal.evict(runId);
            return state;
        }
        // Nobody is driving it, so nothing is in flight.
        await this.journal.record(runId, { type: 'RunCancelled', inFlight: [] });
        const cancelled = await this.getRunState(runId);
        this.journal.evict(runId);
        return cancelled;
    }

    async pauseRun(runId: string): Promise<RunState> {
        return (await this.ensureActive(runId)).pause();
    }

    async resumeRun(runId: string): Promise<RunState> {
        return (await this.ensureActive(runId)).resume();
    }

    /**
     * Forks `runId` after `atSequence`. The branch inherits every event up to
     * that point, shares the parent's cache scope, and starts right away.
     */
    async branchRun(runId: string, atSequence: number, options: BranchOptions = {}): Promise<string> {
        this.assertOpen();
        const parent = await this.log.recordOf(runId);
        const compiled = this.templates.get(parent.templateId, parent.templateVersion);
        if (!compiled) {
            throw new ValidationError(`Template "${parent.templateId}" v${parent.templateVersion} is not registered`);
        }
        const resetStages = options.resetStages ?? [];
        const unknown = resetStages.filter(id => !compiled.stages.has(id));
        if (unknown.length > 0) {
            throw new ValidationError(`Unknown stages to reset: ${unknown.join(', ')}`);
        }

        const inherited = await this.journal.projector.load(runId, atSequence);
        const childId = uuidv7();
        await this.journal.create(
            {
                id: childId,
                templateId: parent.templateId,
                templateVersion: parent.templateVersion,
                scope: parent.scope,
                parentRunId: runId,
                branchSequence: atSequence,
                createdAt: new Date(),
            },
            {
                type: 'RunBranched',
                parentRunId: runId,
                branchSequence: atSequence,
                resetStages: [...resetStages],
                regenerate: options.regenerate ?? false,
            },
            inherited,
        );
        this.activate(childId, compiled);
        console.log(`${TAG} run ${childId} branched from ${runId} at sequence ${atSequence}`);
        return childId;
    }

    /**
     * Every event of the run from `fromSequence` on, history first and then
     * live, ending after the run's own terminal event. A branch inherits its
     * parent's events (parent runId) and may inherit a terminal one.
     */
    async *subscribe(runId: string, options: SubscribeOptions = {}): AsyncGenerator<RunEvent> {
        await this.log.recordOf(runId);
        const live = this.bus.listen(runId, options.signal);
        let last = Math.max(1, options.fromSequence ?? 1) - 1;
        try {
            for (const event of await this.log.read(runId, last + 1)) {
                yield event;
                last = event.sequence;
                if (isTerminalEvent(event) && event.runId === runId) return;
            }
            for await (const event of live) {
                if (event.sequence <= last) continue;
                yield event;
                last = event.sequence;
                if (isTerminalEvent(event) && event.runId === runId) return;
            }
        } catch (err) {
            if (!isAbortError(err)) throw err;
        } finally {
            await live.close();
        }
    }

    onChunk(runId: string, listener: (notice: ChunkNotice) => void): () => void {
        return this.bus.onChunk(runId, listener);
    }

    async waitForRun(runId: string): Promise<RunState> {
        const orchestrator = this.runs.get(runId);
        if (orchestrator) return orchestrator.run();
        return this.getRunState(runId);
    }

    /** Picks up every non-terminal run in the log; returns the ids now being driven. */
    async recoverRuns(): Promise<string[]> {
        this.assertOpen();
        const recovered: string[] = [];
        for (const runId of await this.log.listRuns()) {
            if (this.runs.has(runId)) continue;
            try {
                if (await this.reactivate(runId)) recovered.push(runId);
            } catch (err) {
                console.error(`${TAG} run ${runId} cannot be recovered:`, err);
            }
        }
        if (recovered.length > 0) console.log(`${TAG} recovered ${recovered.length} run(s)`);
        return recovered;
    }

    cacheStats(): CacheStats {
        return this.cache.stats();
    }

    async invalidateCacheScope(scope: string): Promise<void> {
        await this.cache.invalidateScope(scope);
    }

    activeRuns(): string[] {
        return this.runs.list().map(o => o.runId);
    }

    /** Stops driving runs without ending them, so a later recoverRuns picks them up. */
    async shutdown(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        console.log(`${TAG} shutting down (${this.runs.size} active run(s))`);

        const results = await Promise.allSettled(this.runs.list().map(o => o.detach()));
        for (const result of results) {
            if (result.status === 'rejected') console.error(`${TAG} run did not stop cleanly:`, result.reason);
        }
        await this.cache.flush();
        for (const close of this.closers) await close();
        console.log(`${TAG} shutdown complete`);
    }

    private activate(runId: string, compiled: CompiledTemplate): RunOrchestrator {
        const orchestrator = new RunOrchestrator({
            runId,
            compiled,
            journal: this.journal,
            bus: this.bus,
            handlers: this.handlers,
            singleFlight: this.singleFlight,
            options: {
                concurrency: this.config.stageConcurrency,
                cancelTimeoutMs: this.config.cancelTimeoutMs,
                failFast: this.config.failFast,
            },
        });
        this.runs.add(orchestrator);
        orchestrator
            .run()
            .finally(() => {
                this.runs.remove(runId);
                this.journal.evict(runId);
            })
            .catch((err) => console.error(`${TAG} run ${runId} crashed:`, err));
        return orchestrator;
    }

    private async reactivate(runId: string): Promise<RunOrchestrator | null> {
        const state = await this.journal.open(runId);
        // A concurrent caller may have activated it while the log was opening.
        const active = this.runs.get(runId);
        if (active) return active;
        if (isTerminalRun(state.status)) {
            this.journal.evict(runId);
            return null;
        }
        const compiled = this.templates.get(state.templateId, state.templateVersion);
        if (!compiled) {
            this.journal.evict(runId);
            throw new ValidationError(`Template "${state.templateId}" v${state.templateVersion} is not registered`);
        }
        return this.activate(runId, compiled);
    }

    private async ensureActive(runId: string): Promise<RunOrchestrator> {
        const active = this.runs.get(runId);
        if (active) return active;
        this.assertOpen();
        const orchestrator = await this.reactivate(runId);
        if (!orchestrator) {
            const state = await this.getRunState(runId);
            throw new ValidationError(`Run ${runId} is already ${state.status}`);
        }
        return orchestrator;
    }

    private assertOpen(): void {
        if (this.closed) throw new Error('Engine has been shut down');
    }
}

/**
 * Builds an engine from configuration: Postgres and Redis when their URLs
 * are set, in-process stores otherwise.
 */
export async function createEngine(capability: GenerationCapability, config: EngineConfig = loadConfig()): Promise<Engine> {
    const closers: Array<() => Promise<unknown>> = [];
    let sink: EventSink | undefined;
    let catalog: RunCatalog | undefined;
    let cacheBackend: CacheBackend | undefined;

    if (config.databaseUrl) {
        const pool = createPool(config);
        await pool.query('SELECT 1');
        await applySchema(pool);
        console.log(`${TAG} postgres connected`);
        sink = new EventRepository(pool);
        catalog = new RunRepository(pool, new TransactionManager(pool));
        closers.push(() => pool.end());
    } else {
        console.warn(`${TAG} WARNING: DATABASE_URL is not set. Run events are kept in memory and lost on exit.`);
    }

    if (config.redisUrl) {
        const redis = createRedis(config.redisUrl);
        await redis.ping();
        console.log(`${TAG} redis connected`);
        cacheBackend = new RedisCacheBackend(redis);
        closers.push(() => redis.quit());
    }

    return new Engine({ capability, sink, catalog, cacheBackend, config, closers });
}
