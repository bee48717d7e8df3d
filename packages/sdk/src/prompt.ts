import { InputValues } from './types';

// {{ inputs.topic }} or {{ stages.outline }}
const VARIABLE_PATTERN = /\{\{\s*([a-zA-Z_][a-zA-Z0-9_]*)\.([a-zA-Z0-9_-]+)\s*\}\}/g;

export interface PromptReferences {
    inputs: string[];
    stages: string[];
    unknown: string[];
}

export interface RenderContext {
    inputs: Readonly<InputValues>;
    stages: Readonly<Record<string, string>>;
}

export class PromptRenderError extends Error {
    constructor(public readonly missing: string[]) {
        super(`Prompt references undefined variables: ${missing.join(', ')}`);
        this.name = 'PromptRenderError';
    }
}

export function extractReferences(template: string): PromptReferences {
    const refs: PromptReferences = { inputs: [], stages: [], unknown: [] };
    for (const match of template.matchAll(VARIABLE_PATTERN)) {
        const [, namespace, name] = match;
        const bucket = namespace === 'inputs' ? refs.inputs : namespace === 'stages' ? refs.stages : refs.unknown;
        const label = bucket === refs.unknown ? `${namespace}.${name}` : name;
        if (!bucket.includes(label)) bucket.push(label);
    }
    return refs;
}

export function renderPrompt(template: string, ctx: RenderContext): string {
    const missing: string[] = [];
    const rendered = template.replace(VARIABLE_PATTERN, (whole, namespace: string, name: string) => {
        const source = namespace === 'inputs' ? ctx.inputs : namespace === 'stages' ? ctx.stages : undefined;
        const value = source && Object.prototype.hasOwnProperty.call(source, name) ? source[name] : undefined;
        if (value === undefined) {
            missing.push(`${namespace}.${name}`);
            return whole;
        }
        return value;
    });

    if (missing.length > 0) throw new PromptRenderError(missing);
    return rendered;
}
