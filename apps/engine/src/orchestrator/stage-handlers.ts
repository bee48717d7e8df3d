import {
    GenerationCapability,
    GenerationResult,
    GenerationStage,
    PromptRenderError,
    StageDefinition,
    StageKind,
    TokenUsage,
    TransformStage,
    UserInputStage,
    renderPrompt,
} from '@plotline/sdk';
import { deriveCacheKey, modelIdentifier } from '../cache/cache-key';
import { ResponseCache } from '../cache/response-cache';
import { StageExecutionError } from '../errors';
import { Candidate, OutputSource } from '../events/types';
import { RunState } from '../state/run-state';
import { FeedbackInput } from './feedback-gate';

export interface StageByKind {
    generation: GenerationStage;
    'user-input': UserInputStage;
    transform: TransformStage;
}

export interface PendingFeedback {
    prompt: string;
    candidates: Candidate[];
}

export interface StageContext<S extends StageDefinition = StageDefinition> {
    runId: string;
    stage: S;
    attempt: number;
    state: RunState;
    signal: AbortSignal;
    bypassCache: boolean;
    /** Set when a stage that was already waiting on a human is re-armed after recovery. */
    pendingFeedback?: PendingFeedback;
    emitChunk(chunk: string): void;
    /** Records the question (and candidates) unless re-armed, then waits for the answer. */
    awaitFeedback(question: PendingFeedback): Promise<FeedbackInput>;
}

export interface StageOutcome {
    output: string;
    source: OutputSource;
    model?: string;
    tokens?: TokenUsage;
    cacheKey?: string;
}

export type StageHandler<S extends StageDefinition> = (ctx: StageContext<S>) => Promise<StageOutcome>;

export type StageHandlers = { [K in StageKind]: StageHandler<StageByKind[K]> };

export interface StageHandlerDeps {
    cache: ResponseCache;
    capability: GenerationCapability;
}

// A dependency that settled without output (an optional stage that failed) reads as empty.
function upstreamOutputs(ctx: StageContext): Record<string, string> {
    const outputs = { ...ctx.state.outputs };
    for (const dep of ctx.stage.dependsOn) {
        if (!Object.prototype.hasOwnProperty.call(outputs, dep)) outputs[dep] = '';
    }
    return outputs;
}

function render(ctx: StageContext<GenerationStage | UserInputStage>): string {
    try {
        return renderPrompt(ctx.stage.prompt, { inputs: ctx.state.inputs, stages: upstreamOutputs(ctx) });
    } catch (err) {
        // Missing variables will be missing on every attempt
        if (err instanceof PromptRenderError) throw new StageExecutionError(ctx.stage.id, ctx.attempt, err, false);
        throw err;
    }
}

async function invoke(deps: StageHandlerDeps, ctx: StageContext<GenerationStage>, prompt: string): Promise<GenerationResult> {
    try {
        return await deps.capability.invoke({
            prompt,
            models: ctx.stage.models,
            onChunk: chunk => ctx.emitChunk(chunk),
            signal: ctx.signal,
        });
    } catch (err) {
        if (ctx.signal.aborted) throw err;
        throw new StageExecutionError(ctx.stage.id, ctx.attempt, err);
    }
}

function chosenOutput(input: FeedbackInput, candidates: Candidate[]): StageOutcome {
    if ('index' in input.selection) {
        const candidate = candidates[input.selection.index];
        return { output: candidate.text, source: 'user', model: candidate.model };
    }
    return { output: input.selection.text, source: 'user' };
}

export function generationHandler(deps: StageHandlerDeps): StageHandler<GenerationStage> {
    return async (ctx) => {
        const prompt = render(ctx);

        if (ctx.stage.candidates > 1) {
            let pending = ctx.pendingFeedback;
            if (!pending) {
                const candidates: Candidate[] = [];
                for (let i = 0; i < ctx.stage.candidates; i++) {
                    const result = await invoke(deps, ctx, prompt);
                    candidates.push({ text: result.text, model: result.model, tokens: result.tokens });
                }
                pending = { prompt, candidates };
            }
            const input = await ctx.awaitFeedback(pending);
            return chosenOutput(input, pending.candidates);
        }

        const scope = ctx.state.scope;
        const cacheKey = deriveCacheKey({
            prompt,
            model: modelIdentifier(ctx.stage.models),
            context: Object.fromEntries(ctx.stage.contextKeys.map(k => [k, ctx.state.inputs[k] ?? ''])),
            scope,
        });

        if (!ctx.bypassCache) {
            const hit = await deps.cache.get(cacheKey, scope);
            if (hit) {
                return { output: hit.value.text, source: 'cache', model: hit.value.model, tokens: hit.value.tokens, cacheKey };
            }
        }

        const result = await invoke(deps, ctx, prompt);
        deps.cache.put(cacheKey, scope, { text: result.text, model: result.model, tokens: result.tokens });
        return { output: result.text, source: 'fresh', model: result.model, tokens: result.tokens, cacheKey };
    };
}

export function userInputHandler(): StageHandler<UserInputStage> {
    return async (ctx) => {
        const question = ctx.pendingFeedback ?? { prompt: render(ctx), candidates: [] };
        const input = await ctx.awaitFeedback(question);
        return chosenOutput(input, question.candidates);
    };
}

export function transformHandler(): StageHandler<TransformStage> {
    return async (ctx) => {
        const output = await ctx.stage.transform({ inputs: ctx.state.inputs, stages: upstreamOutputs(ctx) });
        return { output, source: 'transform' };
    };
}

export function createStageHandlers(deps: StageHandlerDeps): StageHandlers {
    return {
        generation: generationHandler(deps),
        'user-input': userInputHandler(),
        transform: transformHandler(),
    };
}

export function runStageHandler<K extends StageKind>(
    handlers: StageHandlers,
    kind: K,
    ctx: StageContext<StageByKind[K]>,
): Promise<StageOutcome> {
    const handler: StageHandler<StageByKind[K]> = handlers[kind];
    return handler(ctx);
}
