#!/usr/bin/env node
import { join } from 'node:path';
import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { CatalogLoadError, InvalidOptionError, UnsupportedFormatError } from '../utils/errors.js';
import { loadGraph } from '../builder/graph-builder.js';
import { createPathGraph, extractNeighborhood } from '../graph/subgraph.js';
import { formatPath, tableDisplayLabel } from '../graph/labels.js';
import {
    graphStatistics,
    largestComponent,
    sampleRelationships,
    tableRelationships,
} from '../graph/statistics.js';
import { EXPORT_EXTENSIONS, EXPORT_FORMATS, exportGraph, isExportFormat } from '../exporters/export.js';
import {
    TITLE_LABEL_LENGTH,
    createAnalysisDir,
    pathGraphFileName,
    renderTableOverviews,
    writeGraphHtml,
} from '../viewer/html-viewer.js';
import type { CmdbMapConfig } from '../types/index.js';
import { parseCount, parseDepth, parseLogLevel } from './options.js';

const VERSION = '1.0.0';

const program = new Command();

program
    .name('cmdbmap')
    .description('Map relationships between CMDB tables, including relationships inherited from parent classes.')
    .version(VERSION);

// ─── Shared setup ─────────────────────────────────────────

interface CommonOptions {
    dataDir?: string;
    outDir?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

function addCommonOptions(command: Command): Command {
    return command
        .option('--data-dir <dir>', 'Directory holding the catalog JSON exports')
        .option('--out-dir <dir>', 'Directory for generated output')
        .option('--log-level <level>', 'Log level: debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs');
}

async function setup(opts: CommonOptions, overrides: ConfigOverrides = {}): Promise<CmdbMapConfig> {
    const config = await resolveConfig({
        ...overrides,
        dataDir: opts.dataDir,
        outDir: opts.outDir,
        logLevel: parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

/**
 * Log a failure and exit. Known errors are reported by message.
 */
function fail(error: unknown, message: string): never {
    const logger = getLogger();
    if (
        error instanceof CatalogLoadError ||
        error instanceof UnsupportedFormatError ||
        error instanceof InvalidOptionError
    ) {
        logger.error(error.message);
    } else {
        logger.error({ error }, message);
    }
    process.exit(1);
}

// ─── PATH command ─────────────────────────────────────────

interface PathOptions extends CommonOptions {
    source: string;
    target: string;
    shortestPath?: boolean;
    maxPaths?: string;
    maxLength?: string;
}

addCommonOptions(
    program
        .command('path')
        .description('Find the paths between two tables and render them as an HTML graph')
        .requiredOption('-s, --source <table>', 'Source table name (e.g. cmdb_ci_zone)')
        .requiredOption('-t, --target <table>', 'Target table name (e.g. cmdb_ci_server)')
        .option('--shortest-path', 'Show only the shortest path')
        .option('--max-paths <n>', 'Maximum number of paths to show')
        .option('--max-length <n>', 'Maximum number of hops in a path')
).action(async (opts: PathOptions) => {
    const config = await setup(opts, {
        paths: {
            maxPaths: parseCount(opts.maxPaths, '--max-paths'),
            maxPathLength: parseCount(opts.maxLength, '--max-length'),
            shortestPathOnly: opts.shortestPath,
        },
    });

    try {
        const { ctx } = loadGraph(config);
        const shortest = config.paths.shortestPathOnly;
        const { candidates, subgraph } = createPathGraph(ctx, opts.source, opts.target, {
            maxPaths: shortest ? 1 : config.paths.maxPaths,
            maxPathLength: config.paths.maxPathLength,
        });

        if (candidates.length === 0) {
            console.log(`No paths found between '${opts.source}' and '${opts.target}'`);
            process.exit(1);
        }

        candidates.forEach((candidate, i) => {
            console.log(`Path ${i + 1}: ${formatPath(candidate, ctx.catalog, config.labels.nodeMaxLength)}`);
        });

        const outputDir = createAnalysisDir(config.outDir, 'path_graphs');
        const title = `CMDB ${shortest ? 'Shortest Path' : 'Paths'}: ${tableDisplayLabel(ctx.catalog, opts.source, TITLE_LABEL_LENGTH)} → ${tableDisplayLabel(ctx.catalog, opts.target, TITLE_LABEL_LENGTH)}`;
        writeGraphHtml(subgraph, ctx.catalog, join(outputDir, pathGraphFileName(opts.source, opts.target, shortest)), {
            title,
            source: opts.source,
            target: opts.target,
            labels: config.labels,
        });

        console.log(`\nGraph saved to: ${outputDir}/`);
    } catch (error) {
        fail(error, 'Path query failed');
    }
});

// ─── TABLE command ────────────────────────────────────────

interface TableOptions extends CommonOptions {
    depth?: string;
    maxNodes?: string;
}

addCommonOptions(
    program
        .command('table')
        .description('Render the relationships around one table as an HTML graph')
        .argument('<name>', 'Table name')
        .option('-d, --depth <n>', 'Neighborhood depth: 1 | 2')
        .option('--max-nodes <n>', 'Node cap for the second hop')
).action(async (name: string, opts: TableOptions) => {
    const config = await setup(opts, {
        neighborhood: {
            depth: parseDepth(opts.depth),
            maxNodes: parseCount(opts.maxNodes, '--max-nodes'),
        },
    });

    try {
        const { ctx } = loadGraph(config);
        const centered = extractNeighborhood(ctx, name, config.neighborhood);

        if (centered.order === 0) {
            console.log(`Table '${name}' not found in graph`);
            process.exit(1);
        }

        const outputDir = createAnalysisDir(config.outDir, 'table_graphs');
        writeGraphHtml(centered, ctx.catalog, join(outputDir, `${name}.html`), {
            title: `CMDB Relationships for: ${tableDisplayLabel(ctx.catalog, name, TITLE_LABEL_LENGTH)}`,
            source: name,
            labels: config.labels,
        });

        console.log(`Graph saved to: ${outputDir}/`);
    } catch (error) {
        fail(error, 'Table graph failed');
    }
});

// ─── TABLES command ───────────────────────────────────────

interface TablesOptions extends CommonOptions {
    maxTables?: string;
    minRelationships?: string;
}

addCommonOptions(
    program
        .command('tables')
        .description('Render a table-centered HTML graph for every well-connected table')
        .option('--max-tables <n>', 'Render at most this many tables')
        .option('--min-relationships <n>', 'Only tables with at least this many relationships', '1')
).action(async (opts: TablesOptions) => {
    const config = await setup(opts);

    try {
        const { ctx } = loadGraph(config);
        const outputDir = createAnalysisDir(config.outDir, 'table_graphs');
        const written = renderTableOverviews(ctx, outputDir, {
            ...config.neighborhood,
            minRelationships: parseCount(opts.minRelationships, '--min-relationships'),
            maxTables: parseCount(opts.maxTables, '--max-tables'),
            labels: config.labels,
        });

        console.log(`Generated ${written} table graphs in ${outputDir}/`);
    } catch (error) {
        fail(error, 'Table overviews failed');
    }
});

// ─── STATS command ────────────────────────────────────────

interface StatsOptions extends CommonOptions {
    sample?: string;
}

addCommonOptions(
    program
        .command('stats')
        .description('Show graph statistics and a sample of relationships')
        .option('--sample <n>', 'Number of sample relationships to print', '10')
).action(async (opts: StatsOptions) => {
    const config = await setup(opts);

    try {
        const { ctx, report } = loadGraph(config);
        const stats = graphStatistics(ctx.store);

        console.log('\nCMDB Graph Statistics\n');
        console.log(`  Tables:        ${stats.nodes}`);
        console.log(`  Relationships: ${stats.edges} (${report.ciEdges} CI, ${report.hierarchyEdges} hierarchy)`);
        console.log(`  Connected:     ${stats.weaklyConnected ? 'yes' : 'no'} (${stats.components} components)`);
        console.log(`  Density:       ${stats.density.toFixed(6)}`);
        console.log(`  Avg degree:    ${stats.averageDegree.toFixed(2)}`);

        const { skipped } = report;
        const totalSkipped = skipped.tables + skipped.relationshipTypes + skipped.packages + skipped.relationships;
        if (totalSkipped > 0) {
            console.log(`  Skipped:       ${totalSkipped} malformed records`);
        }

        if (stats.topTables.length > 0) {
            console.log('\n  Most connected tables:');
            stats.topTables.forEach(({ table, centrality }, i) => {
                console.log(`    ${i + 1}. ${table} (centrality: ${centrality.toFixed(4)})`);
            });
        }

        const sample = sampleRelationships(ctx.store, parseCount(opts.sample, '--sample'));
        if (sample.length > 0) {
            console.log(`\n  Sample relationships (first ${sample.length}):`);
            for (const { source, target, attributes } of sample) {
                console.log(`    ${source} --[${attributes.label}]--> ${target}`);
                console.log(`      Relationship: ${attributes.relationshipType} (from ${attributes.sourceFile})`);
            }
        }

        console.log('');
    } catch (error) {
        fail(error, 'Statistics failed');
    }
});

// ─── RELATIONSHIPS command ────────────────────────────────

addCommonOptions(
    program
        .command('relationships')
        .description('List the incoming and outgoing relationships of a table')
        .argument('<name>', 'Table name')
).action(async (name: string, opts: CommonOptions) => {
    const config = await setup(opts);

    try {
        const { ctx } = loadGraph(config);
        const result = tableRelationships(ctx.store, name);

        if (!result.found) {
            console.log(`Table '${name}' not found in graph`);
            process.exit(1);
        }

        console.log(`\nRelationships for '${name}':`);
        console.log(`  Incoming: ${result.totalIncoming} relationships`);
        for (const rel of result.incoming) {
            console.log(`    ${rel.table} --[${rel.relationship}]--> ${name}`);
        }
        console.log(`  Outgoing: ${result.totalOutgoing} relationships`);
        for (const rel of result.outgoing) {
            console.log(`    ${name} --[${rel.relationship}]--> ${rel.table}`);
        }
        console.log('');
    } catch (error) {
        fail(error, 'Relationship report failed');
    }
});

// ─── EXPORT command ───────────────────────────────────────

interface ExportOptions extends CommonOptions {
    format: string;
    out?: string;
    maxNodes?: string;
}

addCommonOptions(
    program
        .command('export')
        .description(`Export the graph to ${EXPORT_FORMATS.join(', ')}, or an HTML viewer`)
        .requiredOption('-f, --format <format>', `Export format: ${[...EXPORT_FORMATS, 'html'].join(' | ')}`)
        .option('-o, --out <path>', 'Output file path')
        .option('--max-nodes <n>', 'HTML only: show at most this many tables', '100')
).action(async (opts: ExportOptions) => {
    const config = await setup(opts);
    const format = opts.format.toLowerCase();

    try {
        const { ctx } = loadGraph(config);

        if (format === 'html') {
            const maxNodes = parseCount(opts.maxNodes, '--max-nodes') ?? 100;
            const outputPath = opts.out ?? join(config.outDir, 'cmdb_graph.html');
            writeGraphHtml(largestComponent(ctx.store, maxNodes), ctx.catalog, outputPath, {
                title: 'CMDB Table Graph',
                labels: config.labels,
            });
            console.log(`Viewer generated: ${outputPath}`);
            return;
        }

        const extension = isExportFormat(format) ? EXPORT_EXTENSIONS[format] : `.${format}`;
        const outputPath = opts.out ?? join(config.outDir, `cmdb_graph${extension}`);
        exportGraph(ctx.store, format, outputPath);
        console.log(`Exported to ${outputPath}`);
    } catch (error) {
        fail(error, 'Export failed');
    }
});

program.parseAsync().catch((error: unknown) => fail(error, 'Command failed'));
