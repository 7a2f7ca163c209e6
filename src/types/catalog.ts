import type { Table, RelationshipType, Package, SuggestedRelationship } from './table.js';

/**
 * Per-kind count of records that were skipped as malformed.
 */
export interface SkippedCounts {
    tables: number;
    relationshipTypes: number;
    packages: number;
    relationships: number;
}

/**
 * Records handed over by the loader.
 * `relationships` must already be in ingestion order.
 */
export interface CatalogRecords {
    tables: Table[];
    relationshipTypes: RelationshipType[];
    packages: Package[];
    relationships: SuggestedRelationship[];

    /** Records the loader already rejected */
    skipped?: Partial<SkippedCounts>;
}

/**
 * Summary of one graph construction.
 */
export interface BuildReport {
    tables: number;
    relationshipTypes: number;
    ciEdges: number;
    hierarchyEdges: number;
    nodes: number;
    edges: number;
    skipped: SkippedCounts;
}
