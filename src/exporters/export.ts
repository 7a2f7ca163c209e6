import { writeFileSync } from 'node:fs';
import type { RelationshipEdge, TableNode } from '../types/index.js';
import type { ReadonlyGraphStore } from '../graph/graph-store.js';
import { UnsupportedFormatError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export const EXPORT_FORMATS = ['json', 'graphml', 'gexf', 'mermaid'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    graphml: '.graphml',
    gexf: '.gexf',
    mermaid: '.md',
};

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

type AttributeType = 'string' | 'boolean';

interface AttributeKey<T> {
    name: keyof T & string;
    type: AttributeType;
}

const NODE_ATTRIBUTES: AttributeKey<TableNode>[] = [
    { name: 'label', type: 'string' },
    { name: 'superClass', type: 'string' },
    { name: 'scope', type: 'string' },
    { name: 'package', type: 'string' },
    { name: 'extendable', type: 'boolean' },
    { name: 'kind', type: 'string' },
    { name: 'inheritedTarget', type: 'boolean' },
    { name: 'inheritedFrom', type: 'string' },
    { name: 'targetTable', type: 'string' },
];

const EDGE_ATTRIBUTES: AttributeKey<RelationshipEdge>[] = [
    { name: 'relationshipType', type: 'string' },
    { name: 'relationshipId', type: 'string' },
    { name: 'label', type: 'string' },
    { name: 'sourceFile', type: 'string' },
    { name: 'scope', type: 'string' },
    { name: 'kind', type: 'string' },
    { name: 'style', type: 'string' },
    { name: 'inheritedEdge', type: 'boolean' },
    { name: 'inheritedFrom', type: 'string' },
    { name: 'inheritedFromSource', type: 'string' },
    { name: 'inheritedFromTarget', type: 'string' },
    { name: 'targetTable', type: 'string' },
];

const MERMAID_MAX_EDGES = 100;

// ─── Main Export Functions ───────────────────────────────

/**
 * Serialize a table graph (full or induced) to text.
 *
 * @throws UnsupportedFormatError for an unknown format
 */
export function serializeGraph(store: ReadonlyGraphStore, format: string): string {
    switch (format) {
        case 'json':
            return exportJson(store);
        case 'graphml':
            return exportGraphML(store);
        case 'gexf':
            return exportGEXF(store);
        case 'mermaid':
            return exportMermaid(store);
        default:
            throw new UnsupportedFormatError(format, EXPORT_FORMATS);
    }
}

/**
 * Serialize a graph and write it to `outputPath`.
 */
export function exportGraph(store: ReadonlyGraphStore, format: string, outputPath: string): void {
    const content = serializeGraph(store, format);
    writeFileSync(outputPath, content, 'utf-8');
    getLogger().info({ format, outputPath, nodes: store.order, edges: store.size }, 'Graph exported');
}

// ─── Format Implementations ─────────────────────────────

const esc = (s: string | null | undefined) =>
    (s ?? '').replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

/**
 * Node-link JSON: `{ directed, multigraph, graph, nodes, links }`.
 */
function exportJson(store: ReadonlyGraphStore): string {
    return JSON.stringify({
        directed: true,
        multigraph: false,
        graph: {},
        nodes: store.nodes().map((id) => ({ ...store.nodeAttrs(id), id })),
        links: store.edges().map(({ source, target, attributes }) => ({ ...attributes, source, target })),
    }, null, 2);
}

function exportGraphML(store: ReadonlyGraphStore): string {
    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
`;

    for (const { name, type } of NODE_ATTRIBUTES) {
        xml += `  <key id="n_${name}" for="node" attr.name="${name}" attr.type="${type}"/>\n`;
    }
    for (const { name, type } of EDGE_ATTRIBUTES) {
        xml += `  <key id="e_${name}" for="edge" attr.name="${name}" attr.type="${type}"/>\n`;
    }

    xml += `  <graph id="cmdbmap" edgedefault="directed">\n`;

    for (const id of store.nodes()) {
        const attributes = store.nodeAttrs(id);
        xml += `    <node id="${esc(id)}">\n`;
        for (const { name } of NODE_ATTRIBUTES) {
            const value = attributes?.[name];
            if (value !== undefined) xml += `      <data key="n_${name}">${esc(String(value))}</data>\n`;
        }
        xml += `    </node>\n`;
    }

    for (const { source, target, attributes } of store.edges()) {
        xml += `    <edge source="${esc(source)}" target="${esc(target)}">\n`;
        for (const { name } of EDGE_ATTRIBUTES) {
            const value = attributes[name];
            if (value !== undefined) xml += `      <data key="e_${name}">${esc(String(value))}</data>\n`;
        }
        xml += `    </edge>\n`;
    }

    xml += `  </graph>
</graphml>`;

    return xml;
}

function exportGEXF(store: ReadonlyGraphStore): string {
    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<gexf xmlns="http://www.gexf.net/1.3"
      version="1.3">
  <meta>
    <creator>cmdbmap</creator>
    <description>CMDB table relationship graph</description>
  </meta>
  <graph defaultedgetype="directed">
    <attributes class="node">
`;

    NODE_ATTRIBUTES.forEach(({ name, type }, i) => {
        xml += `      <attribute id="${i}" title="${name}" type="${type}"/>\n`;
    });
    xml += `    </attributes>
    <attributes class="edge">
`;
    EDGE_ATTRIBUTES.forEach(({ name, type }, i) => {
        xml += `      <attribute id="${i}" title="${name}" type="${type}"/>\n`;
    });
    xml += `    </attributes>
    <nodes>
`;

    for (const id of store.nodes()) {
        const attributes = store.nodeAttrs(id);
        xml += `      <node id="${esc(id)}" label="${esc(attributes?.label ?? id)}">
        <attvalues>
`;
        NODE_ATTRIBUTES.forEach(({ name }, i) => {
            const value = attributes?.[name];
            if (value !== undefined) xml += `          <attvalue for="${i}" value="${esc(String(value))}"/>\n`;
        });
        xml += `        </attvalues>
      </node>
`;
    }

    xml += `    </nodes>
    <edges>
`;

    let edgeIdx = 0;
    for (const { source, target, attributes } of store.edges()) {
        xml += `      <edge id="${edgeIdx++}" source="${esc(source)}" target="${esc(target)}" label="${esc(attributes.label)}">
        <attvalues>
`;
        EDGE_ATTRIBUTES.forEach(({ name }, i) => {
            const value = attributes[name];
            if (value !== undefined) xml += `          <attvalue for="${i}" value="${esc(String(value))}"/>\n`;
        });
        xml += `        </attvalues>
      </edge>
`;
    }

    xml += `    </edges>
  </graph>
</gexf>`;

    return xml;
}

function exportMermaid(store: ReadonlyGraphStore): string {
    let diagram = 'graph TD\n';

    const ids = new Map<string, string>();
    for (const table of store.nodes()) {
        const id = `T${ids.size}`;
        ids.set(table, id);
        diagram += `  ${id}["${table.replace(/"/g, "'")}"]\n`;
    }

    diagram += '\n';

    // Limit edges to keep the diagram readable
    const edges = store.edges();
    const edgesToRender = edges.slice(0, MERMAID_MAX_EDGES);

    for (const { source, target, attributes } of edgesToRender) {
        const from = ids.get(source) ?? source;
        const to = ids.get(target) ?? target;
        const label = attributes.label.replace(/["|]/g, "'");

        if (attributes.kind === 'hierarchy') {
            diagram += `  ${from} -.-> ${to}\n`;
        } else if (label) {
            diagram += `  ${from} -->|${label}| ${to}\n`;
        } else {
            diagram += `  ${from} --> ${to}\n`;
        }
    }

    if (edges.length > MERMAID_MAX_EDGES) {
        diagram += `\n  %% Note: ${edges.length - MERMAID_MAX_EDGES} additional edges omitted\n`;
    }

    return diagram;
}
