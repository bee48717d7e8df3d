import { extractReferences, renderPrompt, PromptRenderError } from '../src/prompt';

describe('renderPrompt', () => {
    it('substitutes inputs and upstream stage outputs', () => {
        const text = renderPrompt('Write about {{ inputs.topic }} using {{stages.outline}}.', {
            inputs: { topic: 'tides' },
            stages: { outline: '1. moon' },
        });
        expect(text).toBe('Write about tides using 1. moon.');
    });

    it('reports every missing variable', () => {
        let caught: unknown;
        try {
            renderPrompt('{{ inputs.a }} {{ stages.b }}', { inputs: {}, stages: {} });
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(PromptRenderError);
        expect(caught instanceof PromptRenderError && caught.missing).toEqual(['inputs.a', 'stages.b']);
    });

    it('does not resolve inherited object properties', () => {
        expect(() => renderPrompt('{{ inputs.toString }}', { inputs: {}, stages: {} })).toThrow(PromptRenderError);
    });
});

describe('extractReferences', () => {
    it('groups references by namespace without duplicates', () => {
        const refs = extractReferences('{{ inputs.topic }} {{ stages.outline }} {{ inputs.topic }} {{ env.HOME }}');
        expect(refs).toEqual({ inputs: ['topic'], stages: ['outline'], unknown: ['env.HOME'] });
    });
});
