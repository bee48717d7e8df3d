import { defineTemplate } from '@plotline/sdk';
import { ValidationError } from '../../src/errors';
import { TemplateRegistry } from '../../src/templates/template-registry';

function article(version: number) {
    return defineTemplate({
        id: 'article',
        version,
        inputs: { topic: { required: true } },
        stages: [
            { id: 'outline', prompt: 'Outline {{ inputs.topic }}', models: ['model-a'] },
            { id: 'draft', prompt: 'Expand {{ stages.outline }}', models: ['model-a'], dependsOn: ['outline'] },
        ],
    });
}

describe('TemplateRegistry', () => {
    let registry: TemplateRegistry;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        registry = new TemplateRegistry();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('compiles a template with its resolver and stage index', () => {
        const compiled = registry.register(article(1));

        expect(compiled.resolver.stageIds).toEqual(['outline', 'draft']);
        expect(compiled.stages.get('draft')?.dependsOn).toEqual(['outline']);
    });

    it('accepts the same template object twice', () => {
        const template = article(1);
        const first = registry.register(template);

        expect(registry.register(template)).toBe(first);
    });

    it('refuses a different template under a taken version', () => {
        registry.register(article(1));

        expect(() => registry.register(article(1))).toThrow('Template "article" v1 is already registered');
    });

    it('refuses an invalid template without registering it', () => {
        const broken = defineTemplate({
            id: 'broken',
            stages: [{ id: 'a', prompt: 'x', models: ['m'], dependsOn: ['missing'] }],
        });

        expect(() => registry.register(broken)).toThrow(ValidationError);
        expect(registry.get('broken')).toBeUndefined();
    });

    it('returns the newest version unless one is named', () => {
        registry.register(article(2));
        registry.register(article(1));

        expect(registry.get('article')?.template.version).toBe(2);
        expect(registry.get('article', 1)?.template.version).toBe(1);
        expect(registry.get('article', 3)).toBeUndefined();
        expect(registry.list()).toEqual([{ id: 'article', versions: [1, 2] }]);
    });
});
