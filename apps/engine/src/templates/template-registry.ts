import { PipelineTemplate, StageDefinition } from '@plotline/sdk';
import { ValidationError } from '../errors';
import { DependencyResolver } from '../resolver/dependency-resolver';
import { validateTemplate } from '../resolver/validate';

export interface CompiledTemplate {
    template: PipelineTemplate;
    resolver: DependencyResolver;
    stages: ReadonlyMap<string, StageDefinition>;
}

/**
 * Registered templates by id and version. A template is validated once
 * here, and a registered (id, version) never changes.
 */
export class TemplateRegistry {
    private readonly templates = new Map<string, Map<number, CompiledTemplate>>();

    register(template: PipelineTemplate): CompiledTemplate {
        const versions = this.templates.get(template.id) ?? new Map<number, CompiledTemplate>();
        const existing = versions.get(template.version);
        if (existing) {
            if (existing.template === template) return existing;
            throw new ValidationError(`Template "${template.id}" v${template.version} is already registered`);
        }

        validateTemplate(template);
        const compiled: CompiledTemplate = {
            template,
            resolver: DependencyResolver.fromTemplate(template),
            stages: new Map(template.stages.map(s => [s.id, s])),
        };
        versions.set(template.version, compiled);
        this.templates.set(template.id, versions);
        console.log(`[templates] registered ${template.id} v${template.version} (${template.stages.length} stages)`);
        return compiled;
    }

    /** The given version, or the newest one when omitted. */
    get(id: string, version?: number): CompiledTemplate | undefined {
        const versions = this.templates.get(id);
        if (!versions) return undefined;
        if (version !== undefined) return versions.get(version);
        const latest = Math.max(...versions.keys());
        return versions.get(latest);
    }

    list(): { id: string; versions: number[] }[] {
        return [...this.templates].map(([id, versions]) => ({
            id,
            versions: [...versions.keys()].sort((a, b) => a - b),
        }));
    }
}
