import { DependencyResolver, StageStatusView } from '../../src/resolver/dependency-resolver';

type Statuses = Record<string, StageStatusView>;

const waiting = (optional = false): StageStatusView => ({ status: 'waiting', willRetry: false, optional });
const done = (optional = false): StageStatusView => ({ status: 'completed', willRetry: false, optional });
const failed = (optional = false, willRetry = false): StageStatusView => ({ status: 'failed', willRetry, optional });

describe('DependencyResolver', () => {
    // a → b → d, a → c → d, e independent
    const resolver = new DependencyResolver([
        { id: 'a', dependsOn: [], optional: false },
        { id: 'b', dependsOn: ['a'], optional: false },
        { id: 'c', dependsOn: ['a'], optional: true },
        { id: 'd', dependsOn: ['b', 'c'], optional: false },
        { id: 'e', dependsOn: [], optional: false },
    ]);

    it('returns roots first, in declaration order', () => {
        const statuses: Statuses = { a: waiting(), b: waiting(), c: waiting(true), d: waiting(), e: waiting() };
        expect(resolver.next(statuses)).toEqual({ kind: 'ready', stageIds: ['a', 'e'] });
    });

    it('honours the limit and the exclusion set', () => {
        const statuses: Statuses = { a: waiting(), b: waiting(), c: waiting(true), d: waiting(), e: waiting() };
        expect(resolver.next(statuses, { limit: 1 })).toEqual({ kind: 'ready', stageIds: ['a'] });
        expect(resolver.next(statuses, { exclude: new Set(['a']) })).toEqual({ kind: 'ready', stageIds: ['e'] });
        expect(resolver.next(statuses, { limit: 0 })).toEqual({ kind: 'ready', stageIds: [] });
    });

    it('unblocks dependents once their dependencies complete', () => {
        const statuses: Statuses = { a: done(), b: waiting(), c: waiting(true), d: waiting(), e: done() };
        expect(resolver.next(statuses)).toEqual({ kind: 'ready', stageIds: ['b', 'c'] });
    });

    it('lets a failed optional dependency through', () => {
        const statuses: Statuses = { a: done(), b: done(), c: failed(true), d: waiting(), e: done() };
        expect(resolver.next(statuses)).toEqual({ kind: 'ready', stageIds: ['d'] });
    });

    it('waits while a dependency is retrying', () => {
        const statuses: Statuses = { a: done(), b: done(), c: failed(true, true), d: waiting(), e: done() };
        expect(resolver.next(statuses)).toEqual({ kind: 'blocked' });
    });

    it('is stuck when a required dependency failed and nothing runs', () => {
        const statuses: Statuses = { a: failed(), b: waiting(), c: waiting(true), d: waiting(), e: done() };
        expect(resolver.next(statuses)).toEqual({ kind: 'stuck', waiting: ['b', 'c', 'd'] });
    });

    it('is exhausted when every stage settled', () => {
        const statuses: Statuses = {
            a: done(),
            b: { status: 'skipped', willRetry: false, optional: false },
            c: done(true),
            d: { status: 'cancelled', willRetry: false, optional: false },
            e: done(),
        };
        expect(resolver.next(statuses)).toEqual({ kind: 'exhausted' });
    });

    it('lists transitive dependents in declaration order', () => {
        expect(resolver.downstreamOf('a')).toEqual(['b', 'c', 'd']);
        expect(resolver.downstreamOf('c')).toEqual(['d']);
        expect(resolver.downstreamOf('e')).toEqual([]);
    });

    it('groups stages by depth', () => {
        expect(resolver.executionGroups()).toEqual([['a', 'e'], ['b', 'c'], ['d']]);
    });
});
