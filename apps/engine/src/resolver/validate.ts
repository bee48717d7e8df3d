import { PipelineTemplate, StageDefinition, extractReferences } from '@plotline/sdk';
import { ValidationError } from '../errors';

function findCycles(stages: readonly StageDefinition[]): string[][] {
    const byId = new Map(stages.map(s => [s.id, s]));
    const state = new Map<string, 'visiting' | 'done'>();
    const cycles: string[][] = [];
    const path: string[] = [];

    const visit = (id: string): void => {
        const mark = state.get(id);
        if (mark === 'done') return;
        if (mark === 'visiting') {
            cycles.push([...path.slice(path.indexOf(id)), id]);
            return;
        }
        const stage = byId.get(id);
        if (!stage) return;
        state.set(id, 'visiting');
        path.push(id);
        for (const dep of stage.dependsOn) visit(dep);
        path.pop();
        state.set(id, 'done');
    };

    for (const stage of stages) visit(stage.id);
    return cycles;
}

function ancestorsOf(stages: readonly StageDefinition[]): Map<string, Set<string>> {
    const byId = new Map(stages.map(s => [s.id, s]));
    const result = new Map<string, Set<string>>();

    const collect = (id: string, seen: Set<string>): void => {
        for (const dep of byId.get(id)?.dependsOn ?? []) {
            if (seen.has(dep)) continue;
            seen.add(dep);
            collect(dep, seen);
        }
    };

    for (const stage of stages) {
        const seen = new Set<string>();
        collect(stage.id, seen);
        result.set(stage.id, seen);
    }
    return result;
}

function promptIssues(stage: StageDefinition, template: PipelineTemplate, ancestors: Set<string>): string[] {
    if (stage.kind === 'transform') return [];
    const issues: string[] = [];
    const refs = extractReferences(stage.prompt);
    for (const name of refs.inputs) {
        if (!Object.prototype.hasOwnProperty.call(template.inputs, name)) {
            issues.push(`Stage "${stage.id}" references undeclared input "${name}"`);
        }
    }
    for (const name of refs.stages) {
        if (!ancestors.has(name)) {
            issues.push(`Stage "${stage.id}" references stage "${name}" which is not among its dependencies`);
        }
    }
    for (const label of refs.unknown) {
        issues.push(`Stage "${stage.id}" references unknown variable "${label}"`);
    }
    return issues;
}

/** Lists every problem with a template; empty when it can be registered. */
export function collectTemplateIssues(template: PipelineTemplate): string[] {
    const issues: string[] = [];
    const ids = new Set<string>();

    if (template.stages.length === 0) issues.push('Template has no stages');

    for (const stage of template.stages) {
        if (ids.has(stage.id)) issues.push(`Duplicate stage id "${stage.id}"`);
        ids.add(stage.id);
    }

    for (const stage of template.stages) {
        for (const dep of stage.dependsOn) {
            if (!template.stages.some(s => s.id === dep)) {
                issues.push(`Stage "${stage.id}" depends on unknown stage "${dep}"`);
            }
        }
        if (!Number.isInteger(stage.retry.maxAttempts) || stage.retry.maxAttempts < 1) {
            issues.push(`Stage "${stage.id}" must allow at least one attempt`);
        }
        if (stage.kind === 'generation') {
            if (stage.models.length === 0) issues.push(`Stage "${stage.id}" has no models`);
            if (!Number.isInteger(stage.candidates) || stage.candidates < 1) {
                issues.push(`Stage "${stage.id}" candidates must be a positive integer`);
            }
            for (const key of stage.contextKeys) {
                if (!Object.prototype.hasOwnProperty.call(template.inputs, key)) {
                    issues.push(`Stage "${stage.id}" uses undeclared input "${key}" as cache context`);
                }
            }
        }
    }

    for (const cycle of findCycles(template.stages)) {
        issues.push(`Dependency cycle: ${cycle.join(' -> ')}`);
    }

    const ancestors = ancestorsOf(template.stages);
    for (const stage of template.stages) {
        issues.push(...promptIssues(stage, template, ancestors.get(stage.id) ?? new Set()));
    }

    return issues;
}

export function validateTemplate(template: PipelineTemplate): void {
    const issues = collectTemplateIssues(template);
    if (issues.length > 0) {
        throw new ValidationError(`Template "${template.id}" v${template.version} is invalid: ${issues.join('; ')}`, issues);
    }
}
