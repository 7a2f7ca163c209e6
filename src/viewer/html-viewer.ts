import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { GraphContext, TableCatalog } from '../graph/catalog.js';
import type { ReadonlyGraphStore } from '../graph/graph-store.js';
import { extractNeighborhood, type NeighborhoodOptions } from '../graph/subgraph.js';
import { packageDisplayName, tableDisplayLabel } from '../graph/labels.js';
import { DEFAULT_CONFIG, type LabelsConfig } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * What the page shows: which tables to highlight and what to call it.
 */
export interface ViewerOptions {
    title: string;

    /** Start of a path query, or the center of a table graph */
    source?: string;

    /** End of a path query */
    target?: string;

    /** Label truncation; defaults to `DEFAULT_CONFIG.labels` */
    labels?: LabelsConfig;
}

/**
 * A node or edge in Cytoscape's element format.
 */
export interface CytoscapeElement {
    data: Record<string, string | number | boolean>;
}

interface LegendEntry {
    label: string;
    color: string;
}

const COLORS = {
    source: '#FF5722',
    target: '#E91E63',
    global: '#4CAF50',
    snPackage: '#9C27B0',
    plugin: '#FF9800',
    package: '#607D8B',
    other: '#2196F3',
};

/** Table names in page titles */
export const TITLE_LABEL_LENGTH = 50;

const EDGE_COLORS = {
    ci: '#94a3b8',
    hierarchy: '#3b82f6',
    inherited: '#f59e0b',
};

/**
 * Color and legend entry for a table, by role, then scope, then package.
 */
function nodeCategory(
    catalog: TableCatalog,
    name: string,
    scope: string,
    pkg: string,
    options: ViewerOptions,
    packageMaxLength: number
): LegendEntry {
    if (name === options.source) return { label: 'Source', color: COLORS.source };
    if (name === options.target) return { label: 'Target', color: COLORS.target };
    if (scope === 'global') return { label: 'Global Scope', color: COLORS.global };

    if (pkg && pkg !== 'global') {
        const packageName = packageDisplayName(catalog, pkg, packageMaxLength);
        if (pkg.startsWith('sn_')) return { label: `SN Package (${packageName})`, color: COLORS.snPackage };
        if (pkg.startsWith('com.')) return { label: `Plugin (${packageName})`, color: COLORS.plugin };
        return { label: `Package (${packageName})`, color: COLORS.package };
    }

    return { label: 'Other/Unknown', color: COLORS.other };
}

/**
 * Label shown on a node. A table standing in for another, or reached only
 * through an ancestor, reads "Table (Ancestor)", each side cut to five
 * characters less than `maxLength`.
 */
export function nodeDisplayLabel(
    store: ReadonlyGraphStore,
    catalog: TableCatalog,
    name: string,
    maxLength = DEFAULT_CONFIG.labels.nodeMaxLength
): string {
    const attributes = store.nodeAttrs(name);
    const pairLength = maxLength - 5;

    if (attributes?.targetTable && attributes.inheritedFrom) {
        const target = tableDisplayLabel(catalog, attributes.targetTable, pairLength);
        return `${target} (${tableDisplayLabel(catalog, attributes.inheritedFrom, pairLength)})`;
    }
    if (attributes?.inheritedTarget && attributes.inheritedFrom) {
        const target = tableDisplayLabel(catalog, name, pairLength);
        return `${target} (${tableDisplayLabel(catalog, attributes.inheritedFrom, pairLength)})`;
    }

    return tableDisplayLabel(catalog, name, maxLength);
}

/**
 * Convert a table graph to Cytoscape elements, nodes first.
 */
export function buildCytoscapeElements(
    store: ReadonlyGraphStore,
    catalog: TableCatalog,
    options: ViewerOptions
): { elements: CytoscapeElement[]; legend: LegendEntry[] } {
    const { nodeMaxLength, packageMaxLength } = options.labels ?? DEFAULT_CONFIG.labels;
    const legend = new Map<string, string>();

    const nodes = store.nodes().map((name) => {
        const attributes = store.nodeAttrs(name);
        const scope = attributes?.scope ?? 'unknown';
        const pkg = attributes?.package ?? '';
        const category = nodeCategory(catalog, name, scope, pkg, options, packageMaxLength);
        legend.set(category.label, category.color);

        const highlighted = name === options.source || name === options.target;
        const size = highlighted ? 60 : Math.max(30, Math.min(50, store.degree(name) * 10));

        return {
            data: {
                id: name,
                label: nodeDisplayLabel(store, catalog, name, nodeMaxLength),
                name,
                scope,
                package: packageDisplayName(catalog, pkg, packageMaxLength),
                inherited: Boolean(attributes?.inheritedTarget || attributes?.inheritedFrom),
                color: category.color,
                size,
            },
        };
    });

    const edges = store.edges().map(({ source, target, attributes }, i) => {
        const inherited = Boolean(
            attributes.inheritedEdge || attributes.inheritedFromSource || attributes.inheritedFromTarget
        );
        const lineStyle = inherited ? 'dashed' : attributes.style;
        const color = inherited
            ? EDGE_COLORS.inherited
            : attributes.kind === 'hierarchy'
              ? EDGE_COLORS.hierarchy
              : EDGE_COLORS.ci;

        return {
            data: {
                id: `e${i}`,
                source,
                target,
                label: attributes.label,
                type: attributes.relationshipType,
                kind: attributes.kind,
                sourceFile: attributes.sourceFile,
                lineStyle,
                color,
            },
        };
    });

    return {
        elements: [...nodes, ...edges],
        legend: Array.from(legend, ([label, color]) => ({ label, color })),
    };
}

/**
 * Render a self-contained HTML page for a table graph.
 */
export function renderGraphHtml(
    store: ReadonlyGraphStore,
    catalog: TableCatalog,
    options: ViewerOptions
): string {
    const { elements, legend } = buildCytoscapeElements(store, catalog, options);
    return buildHtml(options.title, elements, legend, store.order, store.size);
}

/**
 * Render a table graph and write it to `outputPath`.
 */
export function writeGraphHtml(
    store: ReadonlyGraphStore,
    catalog: TableCatalog,
    outputPath: string,
    options: ViewerOptions
): void {
    writeFileSync(outputPath, renderGraphHtml(store, catalog, options), 'utf-8');
    getLogger().info({ outputPath, nodes: store.order, edges: store.size }, 'HTML viewer generated');
}

// ─── Output layout ───────────────────────────────────────

function pad(n: number): string {
    return String(n).padStart(2, '0');
}

/**
 * `YYYYMMDD_HHMMSS` in local time.
 */
export function timestamp(now: Date): string {
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return `${date}_${time}`;
}

/**
 * Create `<outDir>/cmdb_analysis_<stamp>/<subdir>` and return its path.
 */
export function createAnalysisDir(outDir: string, subdir: string, now: Date = new Date()): string {
    const dir = join(outDir, `cmdb_analysis_${timestamp(now)}`, subdir);
    mkdirSync(dir, { recursive: true });
    return dir;
}

/**
 * File name for a path graph between two tables.
 */
export function pathGraphFileName(source: string, target: string, shortestPathOnly: boolean): string {
    return shortestPathOnly ? `${source}_to_${target}_shortest_path.html` : `${source}_to_${target}_paths.html`;
}

// ─── Batch overviews ─────────────────────────────────────

export interface OverviewOptions extends Partial<NeighborhoodOptions> {
    /** Only tables with at least this many relationships */
    minRelationships?: number;

    /** Render at most this many tables */
    maxTables?: number;

    labels?: LabelsConfig;
}

/**
 * Write a table-centered page for every table with enough relationships,
 * busiest tables first.
 *
 * @returns Number of pages written
 */
export function renderTableOverviews(
    ctx: GraphContext,
    outputDir: string,
    options: OverviewOptions = {}
): number {
    const { minRelationships = 1, maxTables, labels, ...neighborhood } = options;
    const { store, catalog } = ctx;
    const logger = getLogger();

    let selected = store
        .nodes()
        .map((table) => ({ table, degree: store.degree(table) }))
        .filter(({ degree }) => degree >= minRelationships)
        .sort((a, b) => b.degree - a.degree);

    if (maxTables !== undefined) {
        selected = selected.slice(0, maxTables);
    }

    logger.info({ tables: selected.length, outputDir }, 'Generating table overviews');

    let written = 0;
    for (const { table, degree } of selected) {
        const centered = extractNeighborhood(ctx, table, neighborhood);
        if (centered.order === 0) continue;

        writeFileSync(
            join(outputDir, `${table}.html`),
            renderGraphHtml(centered, catalog, {
                title: `CMDB Relationships for: ${tableDisplayLabel(catalog, table, TITLE_LABEL_LENGTH)}`,
                source: table,
                labels,
            }),
            'utf-8'
        );
        logger.debug({ table, degree }, 'Table overview written');
        written++;
    }

    return written;
}

// ─── HTML template ───────────────────────────────────────

function escapeHtml(s: string): string {
    return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/**
 * JSON that is safe inside a <script> element.
 */
function scriptJson(value: unknown): string {
    return JSON.stringify(value).replace(/</g, '\\u003c');
}

function buildHtml(
    title: string,
    elements: CytoscapeElement[],
    legend: LegendEntry[],
    tableCount: number,
    edgeCount: number
): string {
    const legendItems = legend
        .map(({ label, color }) => `    <div class="legend-item"><div class="legend-dot" style="background:${color}"></div> ${escapeHtml(label)}</div>`)
        .join('\n');

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<script src="https://unpkg.com/cytoscape@3.30.4/dist/cytoscape.min.js"></script>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: 'Inter', -apple-system, BlinkMacSystemFont, sans-serif;
    background: #0f172a;
    color: #e2e8f0;
    height: 100vh;
    overflow: hidden;
  }
  #cy {
    width: 100%;
    height: 100vh;
    position: absolute;
    top: 0;
    left: 0;
  }
  .panel {
    position: absolute;
    background: rgba(15, 23, 42, 0.85);
    backdrop-filter: blur(16px);
    border: 1px solid rgba(100, 116, 139, 0.3);
    border-radius: 12px;
    padding: 16px;
    z-index: 10;
  }
  .header {
    top: 16px;
    left: 16px;
  }
  .header h1 {
    font-size: 16px;
    font-weight: 700;
    margin-bottom: 4px;
  }
  .stats {
    font-size: 12px;
    color: #94a3b8;
  }
  .search-panel {
    top: 16px;
    right: 16px;
    width: 300px;
  }
  .search-panel input {
    width: 100%;
    padding: 8px 12px;
    background: rgba(30, 41, 59, 0.8);
    border: 1px solid rgba(100, 116, 139, 0.3);
    border-radius: 8px;
    color: #e2e8f0;
    font-size: 14px;
    outline: none;
  }
  .detail-panel {
    bottom: 16px;
    right: 16px;
    width: 340px;
    max-height: 50vh;
    overflow-y: auto;
    display: none;
  }
  .detail-panel.active { display: block; }
  .detail-panel h3 {
    font-size: 15px;
    font-weight: 600;
    margin-bottom: 8px;
  }
  .detail-field {
    display: flex;
    justify-content: space-between;
    font-size: 12px;
    padding: 4px 0;
    border-bottom: 1px solid rgba(100, 116, 139, 0.15);
  }
  .detail-field .label { color: #94a3b8; }
  .detail-field .value { color: #e2e8f0; font-weight: 500; }
  .legend {
    bottom: 16px;
    left: 16px;
    font-size: 11px;
  }
  .legend-item {
    display: flex;
    align-items: center;
    gap: 6px;
    margin: 3px 0;
  }
  .legend-dot {
    width: 8px;
    height: 8px;
    border-radius: 50%;
    flex-shrink: 0;
  }
  .legend-line {
    width: 16px;
    border-top: 2px solid #94a3b8;
    flex-shrink: 0;
  }
  .btn {
    padding: 6px 12px;
    background: rgba(30, 41, 59, 0.8);
    border: 1px solid rgba(100, 116, 139, 0.3);
    border-radius: 6px;
    color: #e2e8f0;
    font-size: 12px;
    cursor: pointer;
    margin-top: 8px;
  }
</style>
</head>
<body>
  <div id="cy"></div>

  <div class="panel header">
    <h1>${escapeHtml(title)}</h1>
    <span class="stats">${tableCount} tables · ${edgeCount} relationships</span>
  </div>

  <div class="panel search-panel">
    <input type="text" id="search" placeholder="Search tables..." autocomplete="off" />
    <button class="btn" id="fitBtn">Fit</button>
    <button class="btn" id="resetBtn">Reset</button>
  </div>

  <div class="panel detail-panel" id="detail">
    <h3 id="detail-title"></h3>
    <div id="detail-fields"></div>
  </div>

  <div class="panel legend">
${legendItems}
    <div class="legend-item"><div class="legend-line"></div> CI relationship</div>
    <div class="legend-item"><div class="legend-line" style="border-top-style:dotted;border-color:#3b82f6"></div> Class hierarchy</div>
    <div class="legend-item"><div class="legend-line" style="border-top-style:dashed;border-color:#f59e0b"></div> Inherited</div>
  </div>

<script>
const graphData = ${scriptJson(elements)};

const cy = cytoscape({
  container: document.getElementById('cy'),
  elements: graphData,
  style: [
    {
      selector: 'node',
      style: {
        'label': 'data(label)',
        'background-color': 'data(color)',
        'width': 'data(size)',
        'height': 'data(size)',
        'font-size': '9px',
        'color': '#e2e8f0',
        'text-outline-color': '#0f172a',
        'text-outline-width': 2,
        'text-valign': 'bottom',
        'text-margin-y': 5,
      },
    },
    {
      selector: 'node[?inherited]',
      style: { 'border-width': 3, 'border-style': 'dashed', 'border-color': '#f59e0b' },
    },
    {
      selector: 'edge',
      style: {
        'label': 'data(label)',
        'font-size': '7px',
        'color': '#94a3b8',
        'width': 2,
        'line-color': 'data(color)',
        'line-style': 'data(lineStyle)',
        'target-arrow-color': 'data(color)',
        'target-arrow-shape': 'triangle',
        'curve-style': 'bezier',
        'opacity': 0.7,
      },
    },
    {
      selector: '.highlighted',
      style: { 'opacity': 1, 'border-width': 3, 'border-color': '#f59e0b' },
    },
    {
      selector: '.faded',
      style: { 'opacity': 0.15 },
    },
  ],
  layout: {
    name: 'cose',
    animate: false,
    nodeRepulsion: 8000,
    idealEdgeLength: 140,
  },
  wheelSensitivity: 0.3,
});

cy.on('tap', 'node', function(evt) {
  const d = evt.target.data();
  document.getElementById('detail').classList.add('active');
  document.getElementById('detail-title').textContent = d.label;
  const fields = [['Table', d.name], ['Scope', d.scope], ['Package', d.package], ['Relationships', evt.target.degree()]];
  const container = document.getElementById('detail-fields');
  container.replaceChildren(...fields.map(([l, v]) => {
    const row = document.createElement('div');
    row.className = 'detail-field';
    row.innerHTML = '<span class="label"></span><span class="value"></span>';
    row.children[0].textContent = l;
    row.children[1].textContent = String(v);
    return row;
  }));
  cy.elements().addClass('faded');
  evt.target.closedNeighborhood().removeClass('faded').addClass('highlighted');
});

cy.on('tap', function(evt) {
  if (evt.target === cy) {
    document.getElementById('detail').classList.remove('active');
    cy.elements().removeClass('highlighted faded');
  }
});

document.getElementById('search').addEventListener('input', function(e) {
  const q = e.target.value.toLowerCase().trim();
  cy.elements().removeClass('highlighted faded');
  if (!q) return;
  cy.elements().addClass('faded');
  cy.nodes().filter(n => n.data('name').toLowerCase().includes(q) || n.data('label').toLowerCase().includes(q))
    .removeClass('faded').addClass('highlighted');
});

document.getElementById('fitBtn').addEventListener('click', () => cy.fit(50));
document.getElementById('resetBtn').addEventListener('click', () => {
  cy.elements().removeClass('highlighted faded');
  document.getElementById('search').value = '';
  document.getElementById('detail').classList.remove('active');
  cy.fit(50);
});
</script>
</body>
</html>`;
}
