import graphology from 'graphology';
import type { DirectedGraph } from 'graphology';
import densityModule from 'graphology-metrics/graph/density.js';
import degreeModule from 'graphology-metrics/centrality/degree.js';
import type { RelationshipEdge, TableNode } from '../types/index.js';

// Node loads the CommonJS builds, whose exports only exist as properties
// of module.exports
const { density } = densityModule;
const { degreeCentrality } = degreeModule;

/**
 * One directed edge with its attributes.
 */
export interface EdgeEntry {
    source: string;
    target: string;
    attributes: Readonly<RelationshipEdge>;
}

/**
 * Read-only view of a table graph. Every query component takes this view;
 * only the builder holds the writable `GraphStore`.
 *
 * Lookups of unknown tables are not faults: they return `false`,
 * `undefined`, `0` or an empty list.
 */
export interface ReadonlyGraphStore {
    readonly order: number;
    readonly size: number;
    hasNode(name: string): boolean;
    nodeAttrs(name: string): Readonly<TableNode> | undefined;
    hasEdge(source: string, target: string): boolean;
    edgeAttrs(source: string, target: string): Readonly<RelationshipEdge> | undefined;
    neighborsOut(name: string): string[];
    neighborsIn(name: string): string[];
    neighbors(name: string): string[];
    degree(name: string): number;
    nodes(): string[];
    edges(): EdgeEntry[];
    induced(names: Iterable<string>): GraphStore;
    density(): number;
    degreeCentrality(): Record<string, number>;
}

/**
 * Attributes for a table the catalog knows nothing about.
 */
export function defaultTableNode(name: string): TableNode {
    return {
        label: name,
        superClass: '',
        scope: 'unknown',
        package: '',
        extendable: false,
        kind: 'cmdb_table',
    };
}

/**
 * Directed table graph with at most one edge per ordered pair.
 *
 * - `addNode` never overwrites an existing node's attributes.
 * - `addEdge` replaces the attributes of an existing (source, target) edge
 *   outright: the last write wins.
 */
export class GraphStore implements ReadonlyGraphStore {
    private readonly graph: DirectedGraph<TableNode, RelationshipEdge>;

    constructor() {
        this.graph = new graphology.DirectedGraph<TableNode, RelationshipEdge>({ allowSelfLoops: true });
    }

    get order(): number {
        return this.graph.order;
    }

    get size(): number {
        return this.graph.size;
    }

    /**
     * Insert a node. Returns false (and changes nothing) if it already exists.
     */
    addNode(name: string, attributes: Readonly<TableNode>): boolean {
        if (this.graph.hasNode(name)) return false;
        this.graph.addNode(name, { ...attributes });
        return true;
    }

    /**
     * Insert an edge, or replace the attributes of the existing edge for
     * this exact ordered pair. Missing endpoints are added with default
     * attributes.
     */
    addEdge(source: string, target: string, attributes: Readonly<RelationshipEdge>): void {
        this.addNode(source, defaultTableNode(source));
        this.addNode(target, defaultTableNode(target));

        if (this.graph.hasEdge(source, target)) {
            this.graph.replaceEdgeAttributes(source, target, { ...attributes });
        } else {
            this.graph.addEdge(source, target, { ...attributes });
        }
    }

    hasNode(name: string): boolean {
        return this.graph.hasNode(name);
    }

    /** A copy; changing it does not change the graph */
    nodeAttrs(name: string): Readonly<TableNode> | undefined {
        if (!this.graph.hasNode(name)) return undefined;
        return { ...this.graph.getNodeAttributes(name) };
    }

    hasEdge(source: string, target: string): boolean {
        return this.graph.hasNode(source) && this.graph.hasEdge(source, target);
    }

    /** A copy; changing it does not change the graph */
    edgeAttrs(source: string, target: string): Readonly<RelationshipEdge> | undefined {
        if (!this.hasEdge(source, target)) return undefined;
        return { ...this.graph.getEdgeAttributes(source, target) };
    }

    /** Successors, in edge insertion order */
    neighborsOut(name: string): string[] {
        if (!this.graph.hasNode(name)) return [];
        return this.graph.outNeighbors(name);
    }

    /** Predecessors, in edge insertion order */
    neighborsIn(name: string): string[] {
        if (!this.graph.hasNode(name)) return [];
        return this.graph.inNeighbors(name);
    }

    /** Successors and predecessors, ignoring direction */
    neighbors(name: string): string[] {
        if (!this.graph.hasNode(name)) return [];
        return this.graph.neighbors(name);
    }

    /** In-degree + out-degree */
    degree(name: string): number {
        if (!this.graph.hasNode(name)) return 0;
        return this.graph.inDegree(name) + this.graph.outDegree(name);
    }

    nodes(): string[] {
        return this.graph.nodes();
    }

    /** All edges, in insertion order */
    edges(): EdgeEntry[] {
        const result: EdgeEntry[] = [];
        this.graph.forEachEdge((_edge, attributes, source, target) => {
            result.push({ source, target, attributes: { ...attributes } });
        });
        return result;
    }

    /**
     * Copy of the nodes in `names` and every edge between them.
     */
    induced(names: Iterable<string>): GraphStore {
        const keep = new Set<string>();
        const result = new GraphStore();

        for (const name of names) {
            const attributes = this.nodeAttrs(name);
            if (!attributes) continue;
            keep.add(name);
            result.addNode(name, attributes);
        }

        for (const { source, target, attributes } of this.edges()) {
            if (keep.has(source) && keep.has(target)) {
                result.addEdge(source, target, attributes);
            }
        }

        return result;
    }

    /** Edge count over the number of possible directed edges */
    density(): number {
        return density(this.graph);
    }

    /** Degree of every table over `order - 1` */
    degreeCentrality(): Record<string, number> {
        return degreeCentrality(this.graph);
    }
}
