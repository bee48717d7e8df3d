import { StageDefinition } from '@plotline/sdk';
import {
    DependencyUnsatisfiableError,
    DuplicateAttemptError,
    EventSinkError,
    FeedbackError,
    RunNotFoundError,
    StageExecutionError,
    ValidationError,
    toErrorObject,
} from '../errors';
import { EventBus } from '../events/event-bus';
import { RunJournal } from '../events/run-journal';
import { FeedbackSelection, RunEvent, RunEventPayload, StageErrorRecord } from '../events/types';
import { RunState, StageExecution, isSettledStage, isTerminalRun, requiredFailures } from '../state/run-state';
import { CompiledTemplate } from '../templates/template-registry';
import { retryDelay } from '../utils/backoff';
import { isAbortError, sleep } from '../utils/sleep';
import { FeedbackGate, FeedbackInput } from './feedback-gate';
import { SingleFlight } from './single-flight';
import { PendingFeedback, StageContext, StageHandlers, runStageHandler } from './stage-handlers';

const TAG = '[orchestrator]';

export interface OrchestratorOptions {
    concurrency: number;
    cancelTimeoutMs: number;
    /** Abort in-flight work as soon as a required stage has finally failed. */
    failFast: boolean;
}

export interface RunOrchestratorDeps {
    runId: string;
    compiled: CompiledTemplate;
    journal: RunJournal;
    bus: EventBus;
    handlers: StageHandlers;
    singleFlight: SingleFlight;
    options: OrchestratorOptions;
}

interface InFlightStage {
    attempt: number;
    controller: AbortController;
    done: Promise<void>;
}

type AttemptOutcome = { kind: 'done' } | { kind: 'retry'; delayMs: number };

interface Signal {
    promise: Promise<void>;
    fire: () => void;
}

function signal(): Signal {
    let fire: () => void = () => undefined;
    const promise = new Promise<void>(resolve => {
        fire = resolve;
    });
    return { promise, fire };
}

function errorChain(stages: StageExecution[]): StageErrorRecord[] {
    return stages.flatMap(stage => stage.errors);
}

/**
 * Drives one run to a terminal state: asks the resolver for eligible stages,
 * runs them up to the concurrency limit, and turns every transition into a
 * durable event through the journal.
 *
 * The loop never decides from anything but the projected state, so a run
 * recovered from its log continues exactly where the events left it.
 */
export class RunOrchestrator {
    readonly runId: string;
    private readonly inFlight = new Map<string, InFlightStage>();
    private readonly gate = new FeedbackGate();
    private wakeSignal = signal();
    private cancelRequested: string[] | null = null;
    private detached = false;
    private fatal: Error | null = null;
    private completion: Promise<RunState> | null = null;

    constructor(private readonly deps: RunOrchestratorDeps) {
        this.runId = deps.runId;
    }

    state(): RunState {
        const state = this.deps.journal.current(this.runId);
        if (!state) throw new RunNotFoundError(this.runId);
        return state;
    }

    /** Starts driving the run; every call returns the same completion promise. */
    run(): Promise<RunState> {
        if (!this.completion) this.completion = this.drive();
        return this.completion;
    }

    get activeStages(): string[] {
        return [...this.inFlight.keys()];
    }

    async supplyFeedback(stageId: string, input: FeedbackInput): Promise<void> {
        const state = this.state();
        const stage = state.stages[stageId];
        if (!stage) throw new FeedbackError(this.runId, stageId, 'unknown stage');
        if (isTerminalRun(state.status)) throw new FeedbackError(this.runId, stageId, `run is ${state.status}`);
        if (!stage.awaitingFeedback || !this.gate.isWaiting(stageId)) {
            throw new FeedbackError(this.runId, stageId, 'stage is not awaiting feedback');
        }
        this.checkSelection(stageId, stage, input.selection);

        const waiter = this.gate.take(stageId);
        if (!waiter) throw new FeedbackError(this.runId, stageId, 'feedback was already supplied');

        try {
            await this.record({
                type: 'UserFeedbackRecorded',
                stageId,
                attempt: stage.attempt,
                selection: input.selection,
                ...(input.feedback !== undefined ? { feedback: input.feedback } : {}),
            });
        } catch (err) {
            waiter.reject(err instanceof Error ? err : new Error(String(err)));
            throw err;
        }
        waiter.resolve(input);
    }

    /** Aborts in-flight work and resolves once RunCancelled is durable. */
    async cancel(): Promise<RunState> {
        if (isTerminalRun(this.state().status)) return this.state();
        if (!this.cancelRequested) {
            this.cancelRequested = this.activeStages;
            for (const stage of this.inFlight.values()) stage.controller.abort();
            console.log(`${TAG} run ${this.runId}: cancelling (${this.cancelRequested.length} stage(s) in flight)`);
        }
        this.wake();
        return this.run();
    }

    async pause(): Promise<RunState> {
        const state = this.state();
        if (state.status !== 'running') {
            throw new ValidationError(`Run ${this.runId} is ${state.status}; only a running run can be paused`);
        }
        await this.record({ type: 'RunPaused' });
        this.wake();
        return this.state();
    }

    async resume(): Promise<RunState> {
        const state = this.state();
        if (state.status !== 'paused') {
            throw new ValidationError(`Run ${this.runId} is ${state.status}; only a paused run can be resumed`);
        }
        await this.record({ type: 'RunResumed' });
        this.wake();
        return this.state();
    }

    /**
     * Stops driving without writing a terminal event, leaving the run to be
     * recovered later. In-flight stages are aborted and not recorded as failed.
     */
    async detach(): Promise<void> {
        this.detached = true;
        for (const stage of this.inFlight.values()) stage.controller.abort();
        this.wake();
        await this.settle();
        if (this.completion) await this.completion;
    }

    private async drive(): Promise<RunState> {
        try {
            if (this.state().status === 'pending') await this.record({ type: 'RunStarted' });
            this.rearm();
            await this.loop();
        } catch (err) {
            await this.failOnError(err);
        }
        return this.state();
    }

    private async loop(): Promise<void> {
        const { resolver } = this.deps.compiled;
        const { concurrency, failFast } = this.deps.options;

        while (!this.detached) {
            if (this.fatal) throw this.fatal;
            let state = this.state();
            if (isTerminalRun(state.status)) return;

            if (this.cancelRequested) {
                await this.finishCancelled(this.cancelRequested);
                return;
            }

            await this.propagateSkips(state);
            if (this.detached) return;
            state = this.state();

            const failures = requiredFailures(state);
            if (failures.length > 0 && failFast) {
                await this.finishFailed(failures[0]);
                return;
            }

            if (state.status === 'running') {
                const decision = resolver.next(state.stages, {
                    limit: concurrency - this.executingCount(),
                    exclude: new Set(this.inFlight.keys()),
                });
                if (decision.kind === 'ready') {
                    for (const id of decision.stageIds) this.launch(id, state.stages[id].attempt + 1);
                } else if (this.inFlight.size === 0) {
                    if (decision.kind === 'exhausted') {
                        await this.finishExhausted();
                    } else {
                        const waiting = state.stageOrder.filter(id => !isSettledStage(state.stages[id]));
                        await this.finishStuck(waiting);
                    }
                    return;
                }
            }

            await this.waitForChange();
        }
    }

    // Stages left running or mid-backoff by a previous process get a fresh attempt;
    // stages that were waiting on a human wait again without re-generating.
    private rearm(): void {
        const state = this.state();
        for (const id of state.stageOrder) {
            const stage = state.stages[id];
            if (stage.status === 'running' && stage.awaitingFeedback && stage.prompt !== undefined) {
                this.launch(id, stage.attempt, { prompt: stage.prompt, candidates: stage.candidates ?? [] });
            } else if (stage.status === 'running' || (stage.status === 'failed' && stage.willRetry)) {
                console.log(`${TAG} run ${this.runId}: re-running orphaned stage ${id} as attempt ${stage.attempt + 1}`);
                this.launch(id, stage.attempt + 1);
            }
        }
    }

    // Stages parked on the feedback gate hold no concurrency slot.
    private executingCount(): number {
        let count = 0;
        for (const stageId of this.inFlight.keys()) {
            if (!this.gate.isWaiting(stageId)) count++;
        }
        return count;
    }

    private launch(stageId: string, attempt: number, pendingFeedback?: PendingFeedback): void {
        const stage = this.deps.compiled.stages.get(stageId);
        if (!stage) throw new Error(`Stage ${stageId} is not part of template ${this.deps.compiled.template.id}`);

        const controller = new AbortController();
        const done = this.execute(stage, attempt, controller.signal, pendingFeedback)
            .catch((err: unknown) => {
                this.fatal ??= err instanceof Error ? err : new Error(String(err));
            })
            .finally(() => {
                this.inFlight.delete(stageId);
                this.wake();
            });
        this.inFlight.set(stageId, { attempt, controller, done });
    }

    private async execute(
        stage: StageDefinition,
        firstAttempt: number,
        abort: AbortSignal,
        pendingFeedback?: PendingFeedback,
    ): Promise<void> {
        let attempt = firstAttempt;
        let pending = pendingFeedback;
        for (;;) {
            const outcome = await this.attempt(stage, attempt, abort, pending);
            pending = undefined;
            if (outcome.kind === 'done') return;

            try {
                await sleep(outcome.delayMs, abort);
            } catch (err) {
                if (!isAbortError(err)) throw err;
                if (!this.detached) {
                    await this.record({ type: 'StageFailed', stageId: stage.id, attempt, error: toErrorObject(err), cancelled: true });
                }
                return;
            }
            attempt++;
        }
    }

    private async attempt(
        stage: StageDefinition,
        attempt: number,
        abort: AbortSignal,
        pendingFeedback?: PendingFeedback,
    ): Promise<AttemptOutcome> {
        const release = this.claim(stage.id, attempt);
        if (!release) return { kind: 'done' };

        try {
            if (!pendingFeedback) await this.record({ type: 'StageStarted', stageId: stage.id, attempt });
            const started = Date.now();
            try {
                const ctx = this.context(stage, attempt, abort, pendingFeedback);
                const outcome = await runStageHandler(this.deps.handlers, stage.kind, ctx);
                await this.record({ type: 'StageCompleted', stageId: stage.id, attempt, ...outcome, durationMs: Date.now() - started });
                return { kind: 'done' };
            } catch (err) {
                if (err instanceof EventSinkError) throw err;
                if (this.detached) return { kind: 'done' };

                const error = toErrorObject(err);
                const cancelled = abort.aborted;
                const permanent = err instanceof StageExecutionError && !err.retryable;
                if (cancelled || permanent || attempt >= stage.retry.maxAttempts) {
                    await this.record({ type: 'StageFailed', stageId: stage.id, attempt, error, cancelled });
                    if (!cancelled) {
                        console.warn(`${TAG} run ${this.runId}: stage ${stage.id} failed on attempt ${attempt}: ${error.message}`);
                    }
                    return { kind: 'done' };
                }

                const delayMs = retryDelay(stage.retry, attempt);
                await this.record({ type: 'StageRetried', stageId: stage.id, attempt, nextAttempt: attempt + 1, delayMs, error });
                return { kind: 'retry', delayMs };
            }
        } finally {
            release();
        }
    }

    private claim(stageId: string, attempt: number): (() => void) | null {
        try {
            return this.deps.singleFlight.acquire(SingleFlight.key(this.runId, stageId, attempt));
        } catch (err) {
            if (!(err instanceof DuplicateAttemptError)) throw err;
            console.warn(`${TAG} ${err.message}; not starting it twice`);
            return null;
        }
    }

    private context(
        stage: StageDefinition,
        attempt: number,
        abort: AbortSignal,
        pendingFeedback?: PendingFeedback,
    ): StageContext {
        const state = this.state();
        return {
            runId: this.runId,
            stage,
            attempt,
            state,
            signal: abort,
            bypassCache: state.stages[stage.id].bypassCache,
            ...(pendingFeedback ? { pendingFeedback } : {}),
            emitChunk: (chunk) => this.deps.bus.publishChunk({ runId: this.runId, stageId: stage.id, attempt, chunk }),
            awaitFeedback: async (question) => {
                // Register before recording so an answer can never arrive ahead of the waiter.
                const answer = this.gate.wait(stage.id, abort);
                // Rejections surface through `answer` itself; this only marks it handled while recording.
                void answer.catch(() => undefined);
                if (!pendingFeedback) {
                    try {
                        await this.record({
                            type: 'StageAwaitingFeedback',
                            stageId: stage.id,
                            attempt,
                            prompt: question.prompt,
                            candidates: question.candidates,
                        });
                    } catch (err) {
                        this.gate.take(stage.id);
                        throw err;
                    }
                }
                this.wake();
                return answer;
            },
        };
    }

    private checkSelection(stageId: string, stage: StageExecution, selection: FeedbackSelection): void {
        if ('index' in selection) {
            const count = stage.candidates?.length ?? 0;
            if (count === 0) {
                throw new FeedbackError(this.runId, stageId, 'stage has no candidates; supply text instead');
            }
            if (!Number.isInteger(selection.index) || selection.index < 0 || selection.index >= count) {
                throw new FeedbackError(this.runId, stageId, `selection index ${selection.index} is out of range 0-${count - 1}`);
            }
        } else if (typeof selection.text !== 'string') {
            throw new FeedbackError(this.runId, stageId, 'selection text must be a string');
        }
    }

    private async propagateSkips(state: RunState): Promise<void> {
        for (const failed of requiredFailures(state)) {
            for (const id of this.deps.compiled.resolver.downstreamOf(failed.stageId)) {
                if (this.state().stages[id].status !== 'waiting' || this.inFlight.has(id)) continue;
                console.log(`${TAG} run ${this.runId}: skipping ${id}. ${new DependencyUnsatisfiableError(id, failed.stageId).message}`);
                await this.record({ type: 'StageSkipped', stageId: id, reason: 'dependency-failed', cause: failed.stageId });
            }
        }
    }

    private async finishExhausted(): Promise<void> {
        const state = this.state();
        const failures = requiredFailures(state);
        if (failures.length > 0) {
            await this.finishFailed(failures[0]);
            return;
        }
        await this.record({ type: 'RunCompleted', outputs: { ...state.outputs } });
        console.log(`${TAG} run ${this.runId} completed`);
    }

    private async finishFailed(failed: StageExecution): Promise<void> {
        for (const stage of this.inFlight.values()) stage.controller.abort();
        await this.settle();
        const state = this.state();
        if (isTerminalRun(state.status)) return;
        const message = failed.lastError?.message ?? 'unknown error';
        await this.record({
            type: 'RunFailed',
            reason: `Stage "${failed.stageId}" failed: ${message}`,
            failedStage: failed.stageId,
            errors: errorChain(requiredFailures(state)),
        });
        console.warn(`${TAG} run ${this.runId} failed at stage ${failed.stageId}`);
    }

    private async finishStuck(waiting: string[]): Promise<void> {
        await this.record({
            type: 'RunFailed',
            reason: `No stage can make progress; unresolved: ${waiting.join(', ')}`,
            errors: errorChain(requiredFailures(this.state())),
        });
    }

    private async finishCancelled(inFlight: string[]): Promise<void> {
        for (const stage of this.inFlight.values()) stage.controller.abort();
        await this.settle();
        if (isTerminalRun(this.state().status)) return;
        await this.record({ type: 'RunCancelled', inFlight });
        console.log(`${TAG} run ${this.runId} cancelled`);
    }

    private async failOnError(err: unknown): Promise<void> {
        console.error(`${TAG} run ${this.runId} stopped on error:`, err);
        for (const stage of this.inFlight.values()) stage.controller.abort();
        if (this.detached) throw err;
        await this.settle();
        const state = this.deps.journal.current(this.runId);
        if (!state || isTerminalRun(state.status)) throw err;
        const message = err instanceof Error ? err.message : String(err);
        try {
            await this.record({ type: 'RunFailed', reason: `Engine error: ${message}`, errors: errorChain(requiredFailures(state)) });
        } catch (recordErr) {
            console.error(`${TAG} run ${this.runId}: could not record failure`, recordErr);
            throw err;
        }
    }

    // Waits for in-flight stages to wind down, but no longer than cancelTimeoutMs.
    private async settle(): Promise<void> {
        const pending = [...this.inFlight.values()].map(stage => stage.done);
        if (pending.length === 0) return;
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<void>(resolve => {
            timer = setTimeout(resolve, this.deps.options.cancelTimeoutMs);
        });
        await Promise.race([Promise.all(pending).then(() => undefined), timeout]);
        clearTimeout(timer);
    }

    private async waitForChange(): Promise<void> {
        const wake = this.wakeSignal.promise;
        await Promise.race([wake, ...[...this.inFlight.values()].map(stage => stage.done)]);
        this.wakeSignal = signal();
    }

    private wake(): void {
        this.wakeSignal.fire();
    }

    private record(payload: RunEventPayload): Promise<RunEvent> {
        return this.deps.journal.record(this.runId, payload);
    }
}
