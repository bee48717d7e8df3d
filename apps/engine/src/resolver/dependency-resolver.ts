import { PipelineTemplate } from '@plotline/sdk';
import { StageExecution, isSettledStage } from '../state/run-state';

export interface StageNode {
    id: string;
    dependsOn: readonly string[];
    optional: boolean;
}

export type StageStatusView = Pick<StageExecution, 'status' | 'willRetry' | 'optional'>;

export type Decision =
    /** Eligible stages in declaration order, cut to the limit (possibly empty). */
    | { kind: 'ready'; stageIds: string[] }
    /** Nothing eligible, but something is running or waiting out a retry. */
    | { kind: 'blocked' }
    /** Waiting stages remain that can never become eligible. */
    | { kind: 'stuck'; waiting: string[] }
    | { kind: 'exhausted' };

export interface NextOptions {
    limit?: number;
    exclude?: ReadonlySet<string>;
}

/**
 * Answers "what can run next" for a validated stage graph. Stateless over
 * runs: every call takes the current stage statuses.
 */
export class DependencyResolver {
    private readonly nodes: readonly StageNode[];
    private readonly index = new Map<string, number>();
    private readonly dependents = new Map<string, string[]>();

    constructor(nodes: readonly StageNode[]) {
        this.nodes = nodes;
        nodes.forEach((node, i) => {
            this.index.set(node.id, i);
            this.dependents.set(node.id, []);
        });
        for (const node of nodes) {
            for (const dep of node.dependsOn) this.dependents.get(dep)?.push(node.id);
        }
    }

    static fromTemplate(template: PipelineTemplate): DependencyResolver {
        return new DependencyResolver(template.stages);
    }

    next(statuses: Readonly<Record<string, StageStatusView>>, options: NextOptions = {}): Decision {
        const limit = options.limit ?? Number.POSITIVE_INFINITY;
        const exclude = options.exclude ?? new Set<string>();
        const eligible: string[] = [];
        const waiting: string[] = [];
        let active = false;

        for (const node of this.nodes) {
            const stage = statuses[node.id];
            if (!stage) continue;
            if (stage.status === 'running' || (stage.status === 'failed' && stage.willRetry) || exclude.has(node.id)) {
                active = true;
                continue;
            }
            if (stage.status !== 'waiting') continue;
            waiting.push(node.id);
            if (node.dependsOn.every(dep => this.satisfies(statuses[dep]))) eligible.push(node.id);
        }

        if (eligible.length > 0) return { kind: 'ready', stageIds: eligible.slice(0, Math.max(0, limit)) };
        if (active) return { kind: 'blocked' };
        if (waiting.length > 0) return { kind: 'stuck', waiting };
        return { kind: 'exhausted' };
    }

    /** Every stage that transitively depends on `stageId`, in declaration order. */
    downstreamOf(stageId: string): string[] {
        const reached = new Set<string>();
        const stack = [...(this.dependents.get(stageId) ?? [])];
        while (stack.length > 0) {
            const id = stack.pop();
            if (id === undefined || reached.has(id)) continue;
            reached.add(id);
            stack.push(...(this.dependents.get(id) ?? []));
        }
        return [...reached].sort((a, b) => (this.index.get(a) ?? 0) - (this.index.get(b) ?? 0));
    }

    /** Stages grouped by depth: each group only depends on earlier groups. */
    executionGroups(): string[][] {
        const depth = new Map<string, number>();
        const depthOf = (id: string): number => {
            const known = depth.get(id);
            if (known !== undefined) return known;
            const node = this.nodes[this.index.get(id) ?? -1];
            const d = node && node.dependsOn.length > 0 ? 1 + Math.max(...node.dependsOn.map(depthOf)) : 0;
            depth.set(id, d);
            return d;
        };
        const groups: string[][] = [];
        for (const node of this.nodes) {
            const d = depthOf(node.id);
            (groups[d] ??= []).push(node.id);
        }
        return groups;
    }

    has(stageId: string): boolean {
        return this.index.has(stageId);
    }

    get stageIds(): string[] {
        return this.nodes.map(n => n.id);
    }

    // Completed or skipped always satisfies; a failure only when the dependency is optional.
    private satisfies(dep: StageStatusView | undefined): boolean {
        if (!dep || !isSettledStage(dep)) return false;
        if (dep.status === 'completed' || dep.status === 'skipped') return true;
        return dep.optional;
    }
}
