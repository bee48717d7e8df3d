import { TokenUsage } from '@plotline/sdk';
import { EventOf, RunEvent, StagePlan } from '../events/types';
import { RunState, StageExecution, isTerminalRun } from './run-state';

const ZERO_TOKENS: TokenUsage = { prompt: 0, completion: 0 };

function addTokens(a: TokenUsage, b: TokenUsage | undefined): TokenUsage {
    if (!b) return a;
    return { prompt: a.prompt + b.prompt, completion: a.completion + b.completion };
}

function initialStage(plan: StagePlan): StageExecution {
    return {
        stageId: plan.id,
        kind: plan.kind,
        dependsOn: [...plan.dependsOn],
        optional: plan.optional,
        maxAttempts: plan.maxAttempts,
        status: 'waiting',
        attempt: 0,
        willRetry: false,
        awaitingFeedback: false,
        bypassCache: false,
        errors: [],
    };
}

// Clears everything an attempt wrote, keeping the error history.
function resetStage(stage: StageExecution, bypassCache: boolean): StageExecution {
    return {
        stageId: stage.stageId,
        kind: stage.kind,
        dependsOn: stage.dependsOn,
        optional: stage.optional,
        maxAttempts: stage.maxAttempts,
        status: 'waiting',
        attempt: 0,
        willRetry: false,
        awaitingFeedback: false,
        bypassCache,
        errors: stage.errors,
    };
}

function withoutKey<T>(record: Record<string, T>, key: string): Record<string, T> {
    const next: Record<string, T> = {};
    for (const [k, v] of Object.entries(record)) {
        if (k !== key) next[k] = v;
    }
    return next;
}

function created(event: EventOf<'RunCreated'>): RunState {
    const stages: Record<string, StageExecution> = {};
    for (const plan of event.stages) stages[plan.id] = initialStage(plan);
    return {
        runId: event.runId,
        templateId: event.templateId,
        templateVersion: event.templateVersion,
        scope: event.scope,
        inputs: { ...event.inputs },
        status: 'pending',
        createdAt: event.timestamp,
        stageOrder: event.stages.map(plan => plan.id),
        stages,
        outputs: {},
        tokenUsage: { fresh: ZERO_TOKENS, cached: ZERO_TOKENS },
        lastSequence: 0,
        eventsSinceSnapshot: 0,
    };
}

function dependentsClosure(state: RunState, roots: Iterable<string>): Set<string> {
    const reached = new Set<string>(roots);
    let grew = true;
    while (grew) {
        grew = false;
        for (const id of state.stageOrder) {
            if (reached.has(id)) continue;
            if (state.stages[id].dependsOn.some(dep => reached.has(dep))) {
                reached.add(id);
                grew = true;
            }
        }
    }
    return reached;
}

function branched(state: RunState, event: EventOf<'RunBranched'>): RunState {
    const explicit = new Set(event.resetStages);
    const unfinished = state.stageOrder.filter(id => state.stages[id].status !== 'completed');
    const reset = dependentsClosure(state, [...explicit, ...unfinished]);

    const stages: Record<string, StageExecution> = {};
    let outputs = state.outputs;
    for (const id of state.stageOrder) {
        const stage = state.stages[id];
        if (reset.has(id)) {
            stages[id] = resetStage(stage, event.regenerate && explicit.has(id));
            outputs = withoutKey(outputs, id);
        } else {
            stages[id] = stage;
        }
    }

    return {
        runId: event.runId,
        templateId: state.templateId,
        templateVersion: state.templateVersion,
        scope: state.scope,
        inputs: state.inputs,
        status: 'pending',
        createdAt: event.timestamp,
        parentRunId: event.parentRunId,
        branchSequence: event.branchSequence,
        stageOrder: state.stageOrder,
        stages,
        outputs,
        tokenUsage: state.tokenUsage,
        lastSequence: state.lastSequence,
        eventsSinceSnapshot: state.eventsSinceSnapshot,
    };
}

function updateStage(state: RunState, stageId: string, update: (stage: StageExecution) => StageExecution): RunState {
    const stage = state.stages[stageId];
    if (!stage) return state;
    return { ...state, stages: { ...state.stages, [stageId]: update(stage) } };
}

function applyStageEvent(state: RunState, event: RunEvent): RunState {
    switch (event.type) {
        case 'StageStarted':
            return updateStage(state, event.stageId, stage => ({
                ...resetStage(stage, stage.bypassCache),
                status: 'running',
                attempt: event.attempt,
                startedAt: event.timestamp,
            }));
        case 'StageAwaitingFeedback': {
            const next = updateStage(state, event.stageId, stage =>
                stage.attempt !== event.attempt
                    ? stage
                    : { ...stage, awaitingFeedback: true, prompt: event.prompt, candidates: event.candidates },
            );
            const spent = event.candidates.reduce<TokenUsage>((sum, c) => addTokens(sum, c.tokens), ZERO_TOKENS);
            return { ...next, tokenUsage: { ...next.tokenUsage, fresh: addTokens(next.tokenUsage.fresh, spent) } };
        }
        case 'UserFeedbackRecorded':
            return updateStage(state, event.stageId, stage =>
                stage.attempt !== event.attempt
                    ? stage
                    : { ...stage, awaitingFeedback: false, ...(event.feedback !== undefined ? { feedback: event.feedback } : {}) },
            );
        case 'StageCompleted': {
            const stage = state.stages[event.stageId];
            if (!stage || stage.attempt !== event.attempt || stage.status !== 'running') return state;
            const next = updateStage(state, event.stageId, s => ({
                ...s,
                status: 'completed',
                awaitingFeedback: false,
                completedAt: event.timestamp,
                output: event.output,
                source: event.source,
                ...(event.model !== undefined ? { model: event.model } : {}),
                ...(event.tokens !== undefined ? { tokens: event.tokens } : {}),
                ...(event.cacheKey !== undefined ? { cacheKey: event.cacheKey } : {}),
            }));
            const tokenUsage =
                event.source === 'cache'
                    ? { ...next.tokenUsage, cached: addTokens(next.tokenUsage.cached, event.tokens) }
                    : event.source === 'fresh'
                        ? { ...next.tokenUsage, fresh: addTokens(next.tokenUsage.fresh, event.tokens) }
                        : next.tokenUsage;
            return { ...next, outputs: { ...next.outputs, [event.stageId]: event.output }, tokenUsage };
        }
        case 'StageRetried':
            return updateStage(state, event.stageId, stage => ({
                ...stage,
                status: 'failed',
                willRetry: true,
                awaitingFeedback: false,
                lastError: event.error,
                errors: [...stage.errors, { stageId: event.stageId, attempt: event.attempt, name: event.error.name, message: event.error.message }],
            }));
        case 'StageFailed': {
            const stage = state.stages[event.stageId];
            if (!stage || stage.attempt !== event.attempt || stage.status === 'completed') return state;
            return updateStage(state, event.stageId, s => ({
                ...s,
                status: event.cancelled ? 'cancelled' : 'failed',
                willRetry: false,
                awaitingFeedback: false,
                completedAt: event.timestamp,
                lastError: event.error,
                errors: [...s.errors, { stageId: event.stageId, attempt: event.attempt, name: event.error.name, message: event.error.message }],
            }));
        }
        case 'StageSkipped':
            return updateStage(state, event.stageId, stage => ({
                ...stage,
                status: 'skipped',
                completedAt: event.timestamp,
                skippedBecause: event.cause,
            }));
        default:
            return state;
    }
}

function applyEvent(state: RunState, event: RunEvent): RunState {
    const terminal = isTerminalRun(state.status);
    switch (event.type) {
        case 'RunCreated':
            return created(event);
        case 'RunBranched':
            return branched(state, event);
        case 'StateSnapshot':
            return event.state;
        case 'RunStarted':
            if (state.status !== 'pending') return state;
            return { ...state, status: 'running', startedAt: state.startedAt ?? event.timestamp };
        case 'RunPaused':
            return state.status === 'running' ? { ...state, status: 'paused' } : state;
        case 'RunResumed':
            return state.status === 'paused' ? { ...state, status: 'running' } : state;
        case 'RunCompleted':
            if (terminal) return state;
            return { ...state, status: 'completed', completedAt: event.timestamp, outputs: { ...event.outputs } };
        case 'RunFailed':
            if (terminal) return state;
            return {
                ...state,
                status: 'failed',
                completedAt: event.timestamp,
                failure: {
                    reason: event.reason,
                    errors: event.errors,
                    ...(event.failedStage !== undefined ? { failedStage: event.failedStage } : {}),
                },
            };
        case 'RunCancelled':
            if (terminal) return state;
            return { ...state, status: 'cancelled', completedAt: event.timestamp, cancelledInFlight: [...event.inFlight] };
        default:
            // Late stage results after a terminal event stay in the log but never change the state.
            return terminal ? state : applyStageEvent(state, event);
    }
}

/**
 * Pure reducer from (state, event) to the next state. `state` is undefined only before
 * a run's first event, which must be RunCreated or a StateSnapshot.
 */
export function foldEvent(state: RunState | undefined, event: RunEvent): RunState {
    let next: RunState;
    if (state === undefined) {
        if (event.type === 'RunCreated') next = created(event);
        else if (event.type === 'StateSnapshot') next = event.state;
        else throw new Error(`Cannot fold ${event.type} at sequence ${event.sequence} without prior state`);
    } else {
        next = applyEvent(state, event);
    }
    const eventsSinceSnapshot = event.type === 'StateSnapshot' ? 0 : next.eventsSinceSnapshot + 1;
    return { ...next, lastSequence: event.sequence, eventsSinceSnapshot };
}

export function replay(events: readonly RunEvent[], initial?: RunState): RunState | undefined {
    let state = initial;
    for (const event of events) state = foldEvent(state, event);
    return state;
}
