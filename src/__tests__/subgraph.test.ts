import { describe, it, expect } from 'vitest';
import { buildGraph } from '../builder/graph-builder.js';
import { createPathGraph, extractNeighborhood, synthesizeSubgraph } from '../graph/subgraph.js';
import { HIERARCHY_EDGE } from '../types/index.js';
import { buildScenario, makeRecords, makeRel, makeTable } from './fixtures.js';

describe('Path Graph', () => {
    it('should mark the final hop of the inherited path', () => {
        const { candidates, subgraph } = createPathGraph(buildScenario(), 'e', 'c');

        expect(candidates).toHaveLength(2);
        expect(subgraph.nodes().sort()).toEqual(['b', 'c', 'd', 'e']);
        expect(subgraph.edges().map(({ source, target }) => `${source}>${target}`)).toEqual(['e>d', 'd>b', 'b>c']);
        expect(subgraph.edgeAttrs('b', 'c')).toEqual({
            ...HIERARCHY_EDGE,
            inheritedEdge: true,
            inheritedFrom: 'b',
        });
    });

    it('should copy the other hops unchanged', () => {
        const { subgraph } = createPathGraph(buildScenario(), 'e', 'c');
        const edge = subgraph.edgeAttrs('e', 'd');

        expect(edge?.kind).toBe('ci');
        expect(edge?.label).toBe('Depends on');
        expect(edge?.inheritedEdge).toBeUndefined();
    });

    it('should leave a target unmarked when a direct path reaches it first', () => {
        const { subgraph } = createPathGraph(buildScenario(), 'e', 'c');
        expect(subgraph.nodeAttrs('c')?.inheritedTarget).toBeUndefined();
    });

    it('should mark the target when only inherited paths reach it', () => {
        const { candidates, subgraph } = createPathGraph(buildScenario(), 'e', 'c', { maxPathLength: 2 });

        expect(candidates).toEqual([{ tables: ['e', 'd', 'b', 'c'], ancestor: 'b' }]);
        expect(subgraph.nodeAttrs('c')).toMatchObject({ inheritedTarget: true, inheritedFrom: 'b' });
    });

    it('should return an empty graph when no path exists', () => {
        const { candidates, subgraph } = createPathGraph(buildScenario(), 'c', 'e');

        expect(candidates).toEqual([]);
        expect(subgraph.order).toBe(0);
        expect(subgraph.size).toBe(0);
    });

    it('should take the edge into the ancestor when the target has none', () => {
        const { ctx } = buildGraph(
            makeRecords({
                tables: [makeTable('p'), makeTable('t', 'p'), makeTable('s')],
                relationships: [makeRel('s', 'p')],
            })
        );

        const subgraph = synthesizeSubgraph(ctx, 't', [{ tables: ['s', 't'], ancestor: 'p' }]);

        expect(subgraph.edgeAttrs('s', 't')).toEqual({
            relationshipType: 'Depends on::Used by',
            relationshipId: 'rt-depends',
            label: 'Depends on',
            sourceFile: 'cmdb_rel_type_suggest.json',
            scope: 'global',
            kind: 'ci',
            style: 'solid',
            inheritedEdge: true,
            inheritedFrom: 'p',
        });
    });

    it('should skip a hop with nothing to copy', () => {
        const { ctx } = buildGraph(
            makeRecords({
                tables: [makeTable('parent'), makeTable('app')],
                relationships: [makeRel('app', 'parent')],
            })
        );
        ctx.catalog.addTable(makeTable('leaf', 'parent'));

        const { subgraph } = createPathGraph(ctx, 'app', 'leaf');

        expect(subgraph.nodes()).toEqual(['app', 'parent', 'leaf']);
        expect(subgraph.nodeAttrs('leaf')).toMatchObject({ inheritedTarget: true, inheritedFrom: 'parent' });
        expect(subgraph.size).toBe(1);
        expect(subgraph.hasEdge('parent', 'leaf')).toBe(false);
    });
});

describe('Neighborhood', () => {
    it('should include edges of the table and its ancestors at depth 1', () => {
        const centered = extractNeighborhood(buildScenario(), 'c', { depth: 1 });

        expect(centered.nodes()).toEqual(['c', 'd', 'b', 'a', 'e']);
        expect(centered.edges().map(({ source, target }) => `${source}>${target}`)).toEqual([
            'd>b',
            'a>b',
            'b>c',
            'a>d',
            'a>e',
        ]);
    });

    it('should record which ancestor stands in for the table', () => {
        const centered = extractNeighborhood(buildScenario(), 'c', { depth: 1 });

        expect(centered.nodeAttrs('b')).toMatchObject({ inheritedFrom: 'b', targetTable: 'c' });
        expect(centered.nodeAttrs('a')).toMatchObject({ inheritedFrom: 'a', targetTable: 'c' });
        expect(centered.nodeAttrs('c')?.inheritedFrom).toBeUndefined();
        expect(centered.nodeAttrs('d')?.inheritedFrom).toBeUndefined();

        expect(centered.edgeAttrs('d', 'b')).toMatchObject({ inheritedFromTarget: 'b', targetTable: 'c' });
        expect(centered.edgeAttrs('a', 'b')).toMatchObject({
            inheritedFromSource: 'a',
            inheritedFromTarget: 'b',
            targetTable: 'c',
        });
        expect(centered.edgeAttrs('b', 'c')).toMatchObject({ inheritedFromSource: 'b', targetTable: 'c' });
    });

    it('should add one more hop at depth 2', () => {
        const { ctx } = buildGraph(
            makeRecords({ relationships: [makeRel('x', 'y'), makeRel('y', 'z'), makeRel('z', 'w')] })
        );

        expect(extractNeighborhood(ctx, 'x', { depth: 1 }).nodes()).toEqual(['x', 'y']);

        const centered = extractNeighborhood(ctx, 'x', { depth: 2 });
        expect(centered.nodes()).toEqual(['x', 'y', 'z']);
        expect(centered.hasEdge('y', 'z')).toBe(true);
        expect(centered.hasNode('w')).toBe(false);
    });

    it('should stop the second hop at maxNodes', () => {
        const { ctx } = buildGraph(
            makeRecords({
                relationships: [makeRel('x', 'y'), makeRel('y', 'p1'), makeRel('y', 'p2'), makeRel('y', 'p3')],
            })
        );

        const centered = extractNeighborhood(ctx, 'x', { depth: 2, maxNodes: 3 });
        expect(centered.nodes()).toEqual(['x', 'y', 'p1']);
        expect(centered.size).toBe(2);
    });

    it('should return an empty graph for an unknown table', () => {
        const centered = extractNeighborhood(buildScenario(), 'nowhere');
        expect(centered.order).toBe(0);
    });
});
