import type {
    CmdbMapConfig,
    SuggestedRelationship,
    RelationshipEdge,
    TableNode,
    SkippedCounts,
    CatalogRecords,
    BuildReport,
} from '../types/index.js';
import { HIERARCHY_EDGE } from '../types/index.js';
import { GraphStore } from '../graph/graph-store.js';
import { TableCatalog, type GraphContext } from '../graph/catalog.js';
import { loadCatalogRecords } from '../sources/catalog-files.js';
import { getLogger } from '../utils/logger.js';

export function emptySkippedCounts(): SkippedCounts {
    return { tables: 0, relationshipTypes: 0, packages: 0, relationships: 0 };
}

/**
 * Node attributes for a table, taken from the catalog.
 * Tables only seen in relationship records get their name as label and
 * an "unknown" scope.
 */
export function nodeAttributesFor(catalog: TableCatalog, name: string): TableNode {
    const table = catalog.getTable(name);
    return {
        label: table?.label ?? name,
        superClass: table?.superClass ?? '',
        scope: table?.scope ?? 'unknown',
        package: table?.package ?? '',
        extendable: table?.extendable ?? false,
        kind: 'cmdb_table',
    };
}

/**
 * Fallback descriptor from a "Parent::Child" style name.
 */
function descriptorFromName(name: string, side: 'parent' | 'child'): string {
    if (!name.includes('::')) return name;
    const [parent = '', child = ''] = name.split('::');
    return side === 'parent' ? parent : child;
}

/**
 * Add CI edges for suggested relationships, in the order given.
 * A later record for the same ordered pair replaces the earlier edge.
 *
 * @returns Number of edges written and number of records skipped
 */
export function addSuggestedRelationships(
    store: GraphStore,
    catalog: TableCatalog,
    relationships: SuggestedRelationship[]
): { added: number; skipped: number } {
    let added = 0;
    let skipped = 0;

    for (const record of relationships) {
        const { baseClass, dependentClass, relationshipTypeId, isParent } = record;
        if (!baseClass || !dependentClass || !relationshipTypeId) {
            skipped++;
            continue;
        }

        const type = catalog.getRelationshipType(relationshipTypeId);
        const typeName = type?.name ?? `rel_${relationshipTypeId.slice(0, 8)}`;

        const [source, target]: [string, string] = isParent ? [baseClass, dependentClass] : [dependentClass, baseClass];
        const label = isParent
            ? type?.parentDescriptor ?? descriptorFromName(typeName, 'parent')
            : type?.childDescriptor ?? descriptorFromName(typeName, 'child');

        store.addNode(source, nodeAttributesFor(catalog, source));
        store.addNode(target, nodeAttributesFor(catalog, target));

        const edge: RelationshipEdge = {
            relationshipType: typeName,
            relationshipId: relationshipTypeId,
            label,
            sourceFile: record.sourceFile,
            scope: type?.scope ?? 'global',
            kind: 'ci',
            style: 'solid',
        };

        store.addEdge(source, target, edge);
        added++;
    }

    return { added, skipped };
}

/**
 * Add a parent → child edge for every table with a super class.
 */
export function addHierarchyEdges(store: GraphStore, catalog: TableCatalog): number {
    let added = 0;

    for (const table of catalog.allTables()) {
        const { name, superClass } = table;
        if (!superClass || superClass === name) continue;

        store.addNode(name, nodeAttributesFor(catalog, name));
        store.addNode(superClass, nodeAttributesFor(catalog, superClass));
        store.addEdge(superClass, name, { ...HIERARCHY_EDGE });
        added++;
    }

    return added;
}

/**
 * Build the catalog from loaded records, skipping records without an identity.
 */
export function buildCatalog(records: CatalogRecords, skipped: SkippedCounts): TableCatalog {
    const catalog = new TableCatalog();

    for (const table of records.tables) {
        if (!table.name) {
            skipped.tables++;
            continue;
        }
        catalog.addTable(table);
    }

    for (const type of records.relationshipTypes) {
        if (!type.id) {
            skipped.relationshipTypes++;
            continue;
        }
        catalog.addRelationshipType(type);
    }

    for (const pkg of records.packages) {
        if (!pkg.id && !pkg.source) {
            skipped.packages++;
            continue;
        }
        catalog.addPackage(pkg);
    }

    return catalog;
}

/**
 * Build the table graph from loaded records:
 *
 * 1. Catalog (tables, relationship types, packages)
 * 2. CI edges from suggested relationships
 * 3. Class hierarchy edges (written last, so they win on a shared pair)
 *
 * Malformed records are skipped and counted; construction never fails.
 */
export function buildGraph(records: CatalogRecords): { ctx: GraphContext; report: BuildReport } {
    const skipped: SkippedCounts = { ...emptySkippedCounts(), ...records.skipped };
    const catalog = buildCatalog(records, skipped);
    const store = new GraphStore();

    const ci = addSuggestedRelationships(store, catalog, records.relationships);
    skipped.relationships += ci.skipped;

    const hierarchyEdges = addHierarchyEdges(store, catalog);

    const report: BuildReport = {
        tables: catalog.tableCount,
        relationshipTypes: catalog.relationshipTypeCount,
        ciEdges: ci.added,
        hierarchyEdges,
        nodes: store.order,
        edges: store.size,
        skipped,
    };

    getLogger().debug(report, 'Graph built');
    if (skipped.relationships > 0) {
        getLogger().warn({ skipped: skipped.relationships }, 'Skipped malformed relationship records');
    }

    return { ctx: { store, catalog }, report };
}

/**
 * Load the catalog export in `config.dataDir` and build its graph.
 *
 * @throws CatalogLoadError if the data directory cannot be read
 */
export function loadGraph(
    config: Pick<CmdbMapConfig, 'dataDir' | 'relationshipFiles'>
): { ctx: GraphContext; report: BuildReport } {
    const records = loadCatalogRecords(config.dataDir, config.relationshipFiles);
    const result = buildGraph(records);

    getLogger().info(
        { nodes: result.report.nodes, edges: result.report.edges, hierarchyEdges: result.report.hierarchyEdges },
        'Graph ready'
    );

    return result;
}
