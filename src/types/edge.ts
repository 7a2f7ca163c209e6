/**
 * Edge kinds in the table graph.
 *
 *   ci        a suggested CI relationship between two tables
 *   hierarchy a class-hierarchy link, directed parent → child
 */
export type EdgeKind = 'ci' | 'hierarchy';

/** Line style hint for the rendering collaborator */
export type EdgeStyle = 'solid' | 'dotted';

/**
 * Edge attributes, one record per ordered (source, target) pair.
 */
export interface RelationshipEdge {
    /** Relationship type name ("class_hierarchy" for hierarchy edges) */
    relationshipType: string;

    /** Relationship type id ("" for hierarchy edges) */
    relationshipId: string;

    /** Human label (parent or child descriptor, or "parent of") */
    label: string;

    /** File the edge was read from */
    sourceFile: string;

    /** Scope of the relationship type, or "hierarchy" */
    scope: string;

    kind: EdgeKind;

    style: EdgeStyle;

    /** Set on an induced-subgraph edge that stands in for an ancestor's edge */
    inheritedEdge?: boolean;

    /** Ancestor whose relationship this edge was taken from */
    inheritedFrom?: string;

    /** Neighborhood graphs: ancestor at the source end of the edge */
    inheritedFromSource?: string;

    /** Neighborhood graphs: ancestor at the target end of the edge */
    inheritedFromTarget?: string;

    /** Neighborhood graphs: the table the inherited edge applies to */
    targetTable?: string;
}

/**
 * Node attributes for a table in the graph.
 */
export interface TableNode {
    label: string;
    superClass: string;
    scope: string;
    package: string;
    extendable: boolean;
    kind: 'cmdb_table';

    /** Path graphs: the target reached only through an ancestor */
    inheritedTarget?: boolean;

    /** Ancestor that supplied the relationship */
    inheritedFrom?: string;

    /** Neighborhood graphs: the table this ancestor stands in for */
    targetTable?: string;
}

/** Hierarchy edges are all written with these attributes */
export const HIERARCHY_EDGE: Readonly<RelationshipEdge> = {
    relationshipType: 'class_hierarchy',
    relationshipId: '',
    label: 'parent of',
    sourceFile: 'sys_db_object.json',
    scope: 'hierarchy',
    kind: 'hierarchy',
    style: 'dotted',
};
