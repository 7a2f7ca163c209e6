import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CmdbMapConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Shape of cmdbmap.config.json. Every key is optional.
 */
export const ConfigFileSchema = z.object({
    dataDir: z.string().optional(),
    relationshipFiles: z.array(z.string()).optional(),
    outDir: z.string().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
    paths: z
        .object({
            maxPaths: z.number().int().positive().optional(),
            maxPathLength: z.number().int().positive().optional(),
            shortestPathOnly: z.boolean().optional(),
        })
        .optional(),
    neighborhood: z
        .object({
            depth: z.number().int().min(1).max(2).optional(),
            maxNodes: z.number().int().positive().optional(),
        })
        .optional(),
    labels: z
        .object({
            nodeMaxLength: z.number().int().positive().optional(),
            packageMaxLength: z.number().int().positive().optional(),
        })
        .optional(),
});

/**
 * One configuration layer (file, environment or CLI flags).
 */
export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

/**
 * Load configuration from cmdbmap.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('cmdbmap', {
        searchPlaces: ['cmdbmap.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const dataDir = env['CMDBMAP_DATA_DIR'];
    if (dataDir) overrides.dataDir = dataDir;

    const outDir = env['CMDBMAP_OUT_DIR'];
    if (outDir) overrides.outDir = outDir;

    return overrides;
}

/**
 * Merge configuration layers, later layers winning. A key left undefined
 * in a layer does not shadow earlier layers.
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null | undefined>): CmdbMapConfig {
    let merged: CmdbMapConfig = DEFAULT_CONFIG;

    for (const layer of layers) {
        if (!layer) continue;
        const { paths = {}, neighborhood = {}, labels = {} } = layer;

        merged = {
            dataDir: layer.dataDir ?? merged.dataDir,
            relationshipFiles: layer.relationshipFiles ?? merged.relationshipFiles,
            outDir: layer.outDir ?? merged.outDir,
            logLevel: layer.logLevel ?? merged.logLevel,
            jsonLogs: layer.jsonLogs ?? merged.jsonLogs,
            // Deep merge nested objects
            paths: {
                maxPaths: paths.maxPaths ?? merged.paths.maxPaths,
                maxPathLength: paths.maxPathLength ?? merged.paths.maxPathLength,
                shortestPathOnly: paths.shortestPathOnly ?? merged.paths.shortestPathOnly,
            },
            neighborhood: {
                depth: neighborhood.depth ?? merged.neighborhood.depth,
                maxNodes: neighborhood.maxNodes ?? merged.neighborhood.maxNodes,
            },
            labels: {
                nodeMaxLength: labels.nodeMaxLength ?? merged.labels.nodeMaxLength,
                packageMaxLength: labels.packageMaxLength ?? merged.labels.packageMaxLength,
            },
        };
    }

    return merged;
}

/**
 * Resolve the effective configuration for a CLI run.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    searchFrom?: string
): Promise<CmdbMapConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    return mergeConfig(fileConfig, envConfig, cliFlags);
}
