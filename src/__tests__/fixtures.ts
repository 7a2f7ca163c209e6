import type { CatalogRecords, RelationshipType, SuggestedRelationship, Table } from '../types/index.js';
import { buildGraph } from '../builder/graph-builder.js';
import type { GraphContext } from '../graph/catalog.js';

// Helper: create a test table
export function makeTable(name: string, superClass = '', overrides: Partial<Table> = {}): Table {
    return {
        name,
        label: name,
        superClass,
        scope: 'global',
        package: '',
        extendable: true,
        ...overrides,
    };
}

// Helper: create a relationship type named "Parent::Child"
export function makeRelType(id: string, parent: string, child: string): RelationshipType {
    return {
        id,
        name: `${parent}::${child}`,
        parentDescriptor: parent,
        childDescriptor: child,
        scope: 'global',
    };
}

// Helper: a suggested relationship whose edge runs from → to
export function makeRel(from: string, to: string, relationshipTypeId = 'rt-depends'): SuggestedRelationship {
    return {
        baseClass: from,
        dependentClass: to,
        relationshipTypeId,
        isParent: true,
        sourceFile: 'cmdb_rel_type_suggest.json',
    };
}

export function makeRecords(overrides: Partial<CatalogRecords> = {}): CatalogRecords {
    return {
        tables: [],
        relationshipTypes: [makeRelType('rt-depends', 'Depends on', 'Used by')],
        packages: [],
        relationships: [],
        ...overrides,
    };
}

/**
 * Tables a (root), b and d and e extending a, c extending b.
 * CI edges e → d and d → b; hierarchy edges a → b, b → c, a → d, a → e.
 */
export function buildScenario(): GraphContext {
    const { ctx } = buildGraph(
        makeRecords({
            tables: [
                makeTable('a'),
                makeTable('b', 'a'),
                makeTable('c', 'b'),
                makeTable('d', 'a'),
                makeTable('e', 'a'),
            ],
            relationships: [makeRel('e', 'd'), makeRel('d', 'b')],
        })
    );
    return ctx;
}
