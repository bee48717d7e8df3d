// Stage kinds form a closed set; the engine keeps exactly one handler per kind.
export type StageKind = 'generation' | 'user-input' | 'transform';

export interface RetryPolicy {
    maxAttempts: number;
    initialDelayMs: number;
    backoffMultiplier: number;
    maxDelayMs: number;
}

export type InputValues = Record<string, string>;

export interface TransformContext {
    inputs: Readonly<InputValues>;
    stages: Readonly<Record<string, string>>;
}

export type TransformFn = (ctx: TransformContext) => string | Promise<string>;

interface StageBase {
    id: string;
    dependsOn: readonly string[];
    /** A failed optional stage does not fail the run or skip its dependents. */
    optional: boolean;
    retry: RetryPolicy;
}

export interface GenerationStage extends StageBase {
    kind: 'generation';
    prompt: string;
    models: readonly string[];
    /** More than one candidate means a human picks the output. */
    candidates: number;
    /** Run inputs that take part in the cache key besides the rendered prompt. */
    contextKeys: readonly string[];
}

export interface UserInputStage extends StageBase {
    kind: 'user-input';
    prompt: string;
}

export interface TransformStage extends StageBase {
    kind: 'transform';
    transform: TransformFn;
}

export type StageDefinition = GenerationStage | UserInputStage | TransformStage;

export interface InputDefinition {
    required?: boolean;
    default?: string;
}

export interface PipelineTemplate {
    id: string;
    version: number;
    inputs: Readonly<Record<string, InputDefinition>>;
    stages: readonly StageDefinition[];
}

export interface TokenUsage {
    prompt: number;
    completion: number;
}

export interface GenerationResult {
    text: string;
    model: string;
    tokens: TokenUsage;
}

export interface GenerationRequest {
    prompt: string;
    models: readonly string[];
    onChunk: (chunk: string) => void;
    signal: AbortSignal;
}

/**
 * The external model call. Implementations stream zero or more chunks through
 * `onChunk` before resolving, and must stop work once `signal` aborts.
 */
export interface GenerationCapability {
    invoke(request: GenerationRequest): Promise<GenerationResult>;
}
