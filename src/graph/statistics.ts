import type { EdgeEntry, ReadonlyGraphStore } from './graph-store.js';
import { getLogger } from '../utils/logger.js';

/**
 * Summary numbers for a table graph.
 */
export interface GraphStatistics {
    nodes: number;
    edges: number;
    directed: true;

    /** True when every table reaches every other ignoring edge direction */
    weaklyConnected: boolean;
    components: number;
    density: number;
    averageDegree: number;

    /** Up to 10 tables with the highest degree centrality, highest first */
    topTables: Array<{ table: string; centrality: number }>;
}

/**
 * One relationship of a table, as listed in a relationships report.
 */
export interface RelationshipEntry {
    /** The table at the other end */
    table: string;
    relationship: string;
    type: string;
}

export type TableRelationships =
    | {
          found: true;
          table: string;
          incoming: RelationshipEntry[];
          outgoing: RelationshipEntry[];
          totalIncoming: number;
          totalOutgoing: number;
      }
    | { found: false; table: string };

const TOP_TABLES = 10;

/**
 * Weakly connected components, in node order; each lists its tables in
 * breadth-first order from its first table.
 */
export function weakComponents(store: ReadonlyGraphStore): string[][] {
    const seen = new Set<string>();
    const components: string[][] = [];

    for (const start of store.nodes()) {
        if (seen.has(start)) continue;

        const component: string[] = [];
        const queue = [start];
        seen.add(start);

        let node: string | undefined;
        while ((node = queue.shift()) !== undefined) {
            component.push(node);
            for (const next of store.neighbors(node)) {
                if (!seen.has(next)) {
                    seen.add(next);
                    queue.push(next);
                }
            }
        }

        components.push(component);
    }

    return components;
}

/**
 * Compute statistics for a graph. An empty graph yields zeros.
 */
export function graphStatistics(store: ReadonlyGraphStore): GraphStatistics {
    const nodes = store.order;
    const edges = store.size;

    if (nodes === 0) {
        return {
            nodes: 0,
            edges: 0,
            directed: true,
            weaklyConnected: false,
            components: 0,
            density: 0,
            averageDegree: 0,
            topTables: [],
        };
    }

    const components = weakComponents(store).length;

    let topTables: GraphStatistics['topTables'] = [];
    if (nodes > 1) {
        const centrality = store.degreeCentrality();
        topTables = store
            .nodes()
            .map((table) => ({ table, centrality: centrality[table] ?? 0 }))
            .sort((a, b) => b.centrality - a.centrality)
            .slice(0, TOP_TABLES);
    }

    const stats: GraphStatistics = {
        nodes,
        edges,
        directed: true,
        weaklyConnected: components === 1,
        components,
        density: nodes > 1 ? store.density() : 0,
        // Each edge adds one to the degree of both endpoints
        averageDegree: (2 * edges) / nodes,
        topTables,
    };

    getLogger().debug({ nodes, edges, components }, 'Graph statistics computed');
    return stats;
}

/**
 * Incoming and outgoing relationships of one table.
 * A table not in the graph is reported as not found.
 */
export function tableRelationships(store: ReadonlyGraphStore, table: string): TableRelationships {
    if (!store.hasNode(table)) {
        return { found: false, table };
    }

    const toEntry = (other: string, edge: EdgeEntry['attributes']): RelationshipEntry => ({
        table: other,
        relationship: edge.label,
        type: edge.relationshipType,
    });

    const incoming: RelationshipEntry[] = [];
    for (const source of store.neighborsIn(table)) {
        const edge = store.edgeAttrs(source, table);
        if (edge) incoming.push(toEntry(source, edge));
    }

    const outgoing: RelationshipEntry[] = [];
    for (const target of store.neighborsOut(table)) {
        const edge = store.edgeAttrs(table, target);
        if (edge) outgoing.push(toEntry(target, edge));
    }

    return {
        found: true,
        table,
        incoming,
        outgoing,
        totalIncoming: incoming.length,
        totalOutgoing: outgoing.length,
    };
}

/**
 * The first `limit` edges in insertion order.
 */
export function sampleRelationships(store: ReadonlyGraphStore, limit = 10): EdgeEntry[] {
    return store.edges().slice(0, limit);
}

/**
 * Cap a graph for display. A graph within `maxNodes` is returned as is;
 * otherwise the largest weakly connected component, cut to its first
 * `maxNodes` tables when it is still too large.
 */
export function largestComponent(store: ReadonlyGraphStore, maxNodes: number): ReadonlyGraphStore {
    if (store.order <= maxNodes) return store;

    const components = weakComponents(store);
    let largest: string[] = [];
    for (const component of components) {
        if (component.length > largest.length) largest = component;
    }

    getLogger().info(
        { nodes: store.order, component: largest.length, maxNodes },
        'Graph too large, keeping the largest connected component'
    );

    return store.induced(largest.slice(0, maxNodes));
}
