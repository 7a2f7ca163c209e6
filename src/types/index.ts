/**
 * Barrel export for all shared types.
 */
export type { Table, RelationshipType, Package, SuggestedRelationship } from './table.js';
export type { SkippedCounts, CatalogRecords, BuildReport } from './catalog.js';
export { HIERARCHY_EDGE } from './edge.js';
export type { EdgeKind, EdgeStyle, RelationshipEdge, TableNode } from './edge.js';
export { DEFAULT_PATH_OPTIONS } from './path.js';
export type { PathCandidate, PathQueryOptions } from './path.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CmdbMapConfig,
    LogLevel,
    PathsConfig,
    NeighborhoodConfig,
    LabelsConfig,
} from './config.js';
