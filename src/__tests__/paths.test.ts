import { describe, it, expect } from 'vitest';
import { allSimplePaths, enumerateCandidates, findPaths } from '../graph/paths.js';
import { GraphStore } from '../graph/graph-store.js';
import { buildGraph } from '../builder/graph-builder.js';
import { HIERARCHY_EDGE } from '../types/index.js';
import { makeTable, makeRecords, makeRel, buildScenario } from './fixtures.js';

// Helper: a store with the given edges, all hierarchy-styled
function storeOf(...edges: Array<[string, string]>): GraphStore {
    const store = new GraphStore();
    for (const [source, target] of edges) {
        store.addEdge(source, target, { ...HIERARCHY_EDGE });
    }
    return store;
}

describe('Path Enumeration', () => {
    describe('allSimplePaths', () => {
        it('should find every simple path in successor order', () => {
            const store = storeOf(['s', 'x'], ['s', 't'], ['x', 't'], ['x', 'y'], ['y', 't']);
            expect(allSimplePaths(store, 's', 't', 5)).toEqual([
                ['s', 'x', 't'],
                ['s', 'x', 'y', 't'],
                ['s', 't'],
            ]);
        });

        it('should respect the hop limit', () => {
            const store = storeOf(['s', 'x'], ['x', 'y'], ['y', 't'], ['s', 't']);
            expect(allSimplePaths(store, 's', 't', 1)).toEqual([['s', 't']]);
            expect(allSimplePaths(store, 's', 't', 2)).toEqual([['s', 't']]);
            expect(allSimplePaths(store, 's', 't', 3)).toEqual([['s', 'x', 'y', 't'], ['s', 't']]);
        });

        it('should terminate on cycles and never repeat a table', () => {
            const store = storeOf(['s', 'x'], ['x', 's'], ['x', 'y'], ['y', 'x'], ['y', 't']);
            const paths = allSimplePaths(store, 's', 't', 10);

            expect(paths).toEqual([['s', 'x', 'y', 't']]);
            for (const path of paths) {
                expect(new Set(path).size).toBe(path.length);
            }
        });

        it('should not extend a path through the target', () => {
            const store = storeOf(['s', 't'], ['t', 'x'], ['x', 't']);
            expect(allSimplePaths(store, 's', 't', 5)).toEqual([['s', 't']]);
        });

        it('should return nothing for equal endpoints, unknown tables or a zero limit', () => {
            const store = storeOf(['s', 't']);
            expect(allSimplePaths(store, 's', 's', 5)).toEqual([]);
            expect(allSimplePaths(store, 's', 'missing', 5)).toEqual([]);
            expect(allSimplePaths(store, 'missing', 't', 5)).toEqual([]);
            expect(allSimplePaths(store, 's', 't', 0)).toEqual([]);
        });
    });

    describe('enumerateCandidates', () => {
        it('should list direct candidates before inherited ones', () => {
            const ctx = buildScenario();
            expect(enumerateCandidates(ctx, 'e', 'c')).toEqual([
                { tables: ['e', 'd', 'b', 'c'], ancestor: null },
                { tables: ['e', 'd', 'b', 'c'], ancestor: 'b' },
            ]);
        });

        it('should return nothing when the source is not in the graph', () => {
            const ctx = buildScenario();
            expect(enumerateCandidates(ctx, 'missing', 'c')).toEqual([]);
        });

        it('should find inherited paths to a target that is not in the graph', () => {
            const { ctx } = buildGraph(
                makeRecords({
                    tables: [makeTable('parent'), makeTable('leaf', 'missing_parent'), makeTable('app')],
                    relationships: [makeRel('app', 'parent')],
                })
            );
            // leaf's only ancestor cannot be reached from app
            expect(enumerateCandidates(ctx, 'app', 'leaf')).toEqual([]);

            const withParent = buildGraph(
                makeRecords({
                    tables: [makeTable('parent'), makeTable('app')],
                    relationships: [makeRel('app', 'parent')],
                })
            ).ctx;
            // leaf is known to the catalog only
            withParent.catalog.addTable(makeTable('leaf', 'parent'));

            expect(enumerateCandidates(withParent, 'app', 'leaf')).toEqual([
                { tables: ['app', 'parent', 'leaf'], ancestor: 'parent' },
            ]);
        });
    });

    describe('findPaths', () => {
        it('should surface the inherited path in the class hierarchy scenario', () => {
            const ctx = buildScenario();
            const paths = findPaths(ctx, 'e', 'c');

            expect(paths).toContainEqual({ tables: ['e', 'd', 'b', 'c'], ancestor: 'b' });
        });

        it('should return an empty list when no path exists', () => {
            const ctx = buildScenario();
            expect(findPaths(ctx, 'c', 'e')).toEqual([]);
            expect(findPaths(ctx, 'missing', 'c')).toEqual([]);
        });

        it('should honor maxPaths', () => {
            const ctx = buildScenario();
            expect(findPaths(ctx, 'e', 'c', { maxPaths: 1 })).toEqual([
                { tables: ['e', 'd', 'b', 'c'], ancestor: null },
            ]);
        });

        it('should honor maxPathLength for direct and inherited candidates', () => {
            const ctx = buildScenario();
            expect(findPaths(ctx, 'e', 'c', { maxPathLength: 2 })).toEqual([
                { tables: ['e', 'd', 'b', 'c'], ancestor: 'b' },
            ]);
            expect(findPaths(ctx, 'e', 'c', { maxPathLength: 1 })).toEqual([]);
        });

        it('should return identical output when called twice', () => {
            const ctx = buildScenario();
            const first = findPaths(ctx, 'e', 'c', { maxPaths: Infinity });
            const second = findPaths(ctx, 'e', 'c', { maxPaths: Infinity });
            expect(second).toEqual(first);
        });

        it('should never keep an inherited path whose prefix is a direct path', () => {
            // app reaches both server and its parent computer directly
            const { ctx } = buildGraph(
                makeRecords({
                    tables: [makeTable('computer'), makeTable('server', 'computer'), makeTable('app')],
                    relationships: [makeRel('app', 'computer'), makeRel('app', 'server')],
                })
            );
            const paths = findPaths(ctx, 'app', 'server', { maxPaths: Infinity });
            const direct = paths.filter((p) => p.ancestor === null).map((p) => p.tables.join('>'));

            for (const path of paths.filter((p) => p.ancestor !== null)) {
                const prefix = path.tables.slice(0, -1).join('>');
                expect(direct).not.toContain(prefix);
            }
            expect(paths).toEqual([
                { tables: ['app', 'server'], ancestor: null },
                { tables: ['app', 'computer', 'server'], ancestor: null },
                { tables: ['app', 'computer', 'server'], ancestor: 'computer' },
            ]);
        });
    });
});
