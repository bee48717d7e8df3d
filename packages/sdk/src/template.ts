import {
    InputDefinition,
    PipelineTemplate,
    RetryPolicy,
    StageDefinition,
    TransformFn,
} from './types';

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
    maxAttempts: 3,
    initialDelayMs: 1000,
    backoffMultiplier: 4,
    maxDelayMs: 60_000,
});

interface StageSpecBase {
    id: string;
    dependsOn?: string[];
    optional?: boolean;
    retry?: Partial<RetryPolicy>;
}

export interface GenerationStageSpec extends StageSpecBase {
    kind?: 'generation';
    prompt: string;
    models: string[];
    candidates?: number;
    contextKeys?: string[];
}

export interface UserInputStageSpec extends StageSpecBase {
    kind: 'user-input';
    prompt: string;
}

export interface TransformStageSpec extends StageSpecBase {
    kind: 'transform';
    transform: TransformFn;
}

export type StageSpec = GenerationStageSpec | UserInputStageSpec | TransformStageSpec;

export interface TemplateSpec {
    id: string;
    version?: number;
    inputs?: Record<string, InputDefinition>;
    stages: StageSpec[];
}

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
const MAX_NAME_LENGTH = 100;

function assertName(kind: string, name: string): void {
    if (!name || name.length === 0) {
        throw new Error(`${kind} id cannot be empty`);
    }
    if (name.length > MAX_NAME_LENGTH) {
        throw new Error(`${kind} id exceeds maximum length of ${MAX_NAME_LENGTH} characters`);
    }
    if (!NAME_PATTERN.test(name)) {
        throw new Error(`${kind} id "${name}" must contain only alphanumeric characters, dashes, and underscores`);
    }
}

function toStage(spec: StageSpec): StageDefinition {
    assertName('Stage', spec.id);
    const base = {
        id: spec.id,
        dependsOn: Object.freeze([...(spec.dependsOn ?? [])]),
        optional: spec.optional ?? false,
        retry: Object.freeze({ ...DEFAULT_RETRY_POLICY, ...spec.retry }),
    };

    if (spec.kind === 'user-input') {
        return Object.freeze({ ...base, kind: 'user-input' as const, prompt: spec.prompt });
    }
    if (spec.kind === 'transform') {
        return Object.freeze({ ...base, kind: 'transform' as const, transform: spec.transform });
    }
    return Object.freeze({
        ...base,
        kind: 'generation' as const,
        prompt: spec.prompt,
        models: Object.freeze([...spec.models]),
        candidates: spec.candidates ?? 1,
        contextKeys: Object.freeze([...(spec.contextKeys ?? [])]),
    });
}

/**
 * Builds an immutable pipeline template. Graph checks (cycles, unknown
 * dependencies) happen when the engine registers the template.
 *
 * @example
 * const article = defineTemplate({
 *   id: 'article',
 *   inputs: { topic: { required: true } },
 *   stages: [
 *     { id: 'outline', prompt: 'Outline {{ inputs.topic }}', models: ['gpt-4o-mini'] },
 *     { id: 'draft', prompt: 'Expand {{ stages.outline }}', models: ['gpt-4o'], dependsOn: ['outline'] },
 *   ],
 * });
 */
export function defineTemplate(spec: TemplateSpec): PipelineTemplate {
    assertName('Template', spec.id);
    const version = spec.version ?? 1;
    if (!Number.isInteger(version) || version < 1) {
        throw new Error(`Template "${spec.id}" version must be a positive integer`);
    }

    const inputs: Record<string, InputDefinition> = {};
    for (const [name, def] of Object.entries(spec.inputs ?? {})) {
        assertName('Input', name);
        inputs[name] = Object.freeze({ ...def });
    }

    return Object.freeze({
        id: spec.id,
        version,
        inputs: Object.freeze(inputs),
        stages: Object.freeze(spec.stages.map(toStage)),
    });
}
