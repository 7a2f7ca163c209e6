import type { PathCandidate, PathQueryOptions, RelationshipEdge, TableNode } from '../types/index.js';
import type { GraphContext } from './catalog.js';
import { GraphStore, defaultTableNode } from './graph-store.js';
import { applicableAncestors } from './inheritance.js';
import { findPaths } from './paths.js';
import { getLogger } from '../utils/logger.js';

/**
 * Result of a path query: the ranked candidates (for textual reporting)
 * and the graph induced by them (for rendering).
 */
export interface PathGraphResult {
    candidates: PathCandidate[];
    subgraph: GraphStore;
}

/**
 * Options for table-centered graphs.
 */
export interface NeighborhoodOptions {
    /** 1 = edges incident to the table or its ancestors; 2 = one more hop */
    depth: number;

    /** Node count at which the second hop stops adding tables */
    maxNodes: number;
}

const DEFAULT_NEIGHBORHOOD: NeighborhoodOptions = { depth: 2, maxNodes: 20 };

/**
 * Project ranked candidates onto a standalone graph.
 *
 * Nodes: copied from the full graph, except that the target of an
 * ancestor-tagged candidate is marked `inheritedTarget` / `inheritedFrom`.
 * The first candidate to touch a node decides its attributes.
 *
 * Edges: every hop that exists in the full graph is copied unchanged. The
 * final hop of an ancestor-tagged candidate is the inherited one: it is
 * copied from the full graph's (u, target) edge when there is one,
 * otherwise from (u, ancestor), and marked `inheritedEdge` /
 * `inheritedFrom`. A hop with neither edge is left out.
 */
export function synthesizeSubgraph(
    ctx: GraphContext,
    target: string,
    candidates: PathCandidate[]
): GraphStore {
    const { store } = ctx;
    const subgraph = new GraphStore();

    for (const { tables, ancestor } of candidates) {
        for (const table of tables) {
            if (subgraph.hasNode(table)) continue;

            const attributes: TableNode = { ...(store.nodeAttrs(table) ?? defaultTableNode(table)) };
            if (table === target && ancestor !== null) {
                attributes.inheritedTarget = true;
                attributes.inheritedFrom = ancestor;
            }
            subgraph.addNode(table, attributes);
        }
    }

    for (const { tables, ancestor } of candidates) {
        for (let i = 0; i < tables.length - 1; i++) {
            const from = tables[i]!;
            const to = tables[i + 1]!;
            const inheritedHop = ancestor !== null && to === target && i === tables.length - 2;

            if (!inheritedHop) {
                const edge = store.edgeAttrs(from, to);
                if (edge) subgraph.addEdge(from, to, edge);
                continue;
            }

            const edge = store.edgeAttrs(from, to) ?? store.edgeAttrs(from, ancestor);
            if (!edge) {
                getLogger().debug({ from, to, ancestor }, 'No edge to project for inherited hop');
                continue;
            }

            subgraph.addEdge(from, to, { ...edge, inheritedEdge: true, inheritedFrom: ancestor });
        }
    }

    return subgraph;
}

/**
 * Find the paths between two tables and build the graph that shows them.
 * No candidates means no path: the subgraph is then empty.
 */
export function createPathGraph(
    ctx: GraphContext,
    source: string,
    target: string,
    options: Partial<PathQueryOptions> = {}
): PathGraphResult {
    const candidates = findPaths(ctx, source, target, options);
    const subgraph = synthesizeSubgraph(ctx, target, candidates);

    getLogger().debug(
        { source, target, paths: candidates.length, nodes: subgraph.order, edges: subgraph.size },
        'Path graph created'
    );

    return { candidates, subgraph };
}

/**
 * Build the overview graph for a single table.
 *
 * Depth 1 takes every edge touching the table or one of its applicable
 * ancestors; ancestor endpoints and their edges record which ancestor
 * stood in for the table. Depth 2 adds neighbors of those tables until
 * the graph holds `maxNodes` tables.
 *
 * An unknown table yields an empty graph.
 */
export function extractNeighborhood(
    ctx: GraphContext,
    table: string,
    options: Partial<NeighborhoodOptions> = {}
): GraphStore {
    const { depth, maxNodes } = { ...DEFAULT_NEIGHBORHOOD, ...options };
    const { store } = ctx;
    const centered = new GraphStore();

    const tableAttributes = store.nodeAttrs(table);
    if (!tableAttributes) return centered;

    centered.addNode(table, tableAttributes);

    const applicable = applicableAncestors(ctx, table);
    const standsIn = (name: string): boolean => name !== table && applicable.has(name);
    const allEdges = store.edges();

    for (const { source, target, attributes } of allEdges) {
        const touches = (name: string): boolean => name === table || applicable.has(name);
        if (!touches(source) && !touches(target)) continue;

        for (const endpoint of [source, target]) {
            if (centered.hasNode(endpoint)) continue;
            const nodeAttributes: TableNode = { ...(store.nodeAttrs(endpoint) ?? defaultTableNode(endpoint)) };
            if (standsIn(endpoint)) {
                nodeAttributes.inheritedFrom = endpoint;
                nodeAttributes.targetTable = table;
            }
            centered.addNode(endpoint, nodeAttributes);
        }

        const edge: RelationshipEdge = { ...attributes };
        if (standsIn(source)) {
            edge.inheritedFromSource = source;
            edge.targetTable = table;
        }
        if (standsIn(target)) {
            edge.inheritedFromTarget = target;
            edge.targetTable = table;
        }
        centered.addEdge(source, target, edge);
    }

    if (depth > 1) {
        const firstHop = centered.nodes().filter((name) => name !== table);

        for (const neighbor of firstHop) {
            for (const { source, target, attributes } of allEdges) {
                let added: string | null = null;
                if (source === neighbor && !centered.hasNode(target)) {
                    added = target;
                } else if (target === neighbor && !centered.hasNode(source)) {
                    added = source;
                }

                if (added === null || centered.order >= maxNodes) continue;

                centered.addNode(added, store.nodeAttrs(added) ?? defaultTableNode(added));
                centered.addEdge(source, target, attributes);
            }
        }
    }

    getLogger().debug({ table, depth, nodes: centered.order, edges: centered.size }, 'Neighborhood extracted');
    return centered;
}
