/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Path query configuration.
 */
export interface PathsConfig {
    maxPaths: number;
    maxPathLength: number;
    shortestPathOnly: boolean;
}

/**
 * Table-centered (neighborhood) graph configuration.
 */
export interface NeighborhoodConfig {
    /** 1 = incident edges only, 2 = one more hop */
    depth: number;

    /** Node cap applied while adding the second hop */
    maxNodes: number;
}

/**
 * Display label truncation.
 */
export interface LabelsConfig {
    nodeMaxLength: number;
    packageMaxLength: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface CmdbMapConfig {
    // Input
    dataDir: string;
    relationshipFiles: string[];

    // Output
    outDir: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    paths: PathsConfig;
    neighborhood: NeighborhoodConfig;
    labels: LabelsConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CmdbMapConfig = {
    dataDir: '.',
    relationshipFiles: ['cmdb_rel_type_suggest.json', 'em_suggested_relation_type.json'],
    outDir: '.',
    logLevel: 'info',
    jsonLogs: false,
    paths: {
        maxPaths: 10,
        maxPathLength: 5,
        shortestPathOnly: false,
    },
    neighborhood: {
        depth: 2,
        maxNodes: 20,
    },
    labels: {
        nodeMaxLength: 25,
        packageMaxLength: 30,
    },
};
