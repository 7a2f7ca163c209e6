import type { Table, RelationshipType, Package } from '../types/index.js';
import type { ReadonlyGraphStore } from './graph-store.js';

/**
 * Reference data loaded once per session: tables, relationship types
 * and packages. Packages resolve by id or by source string.
 */
export class TableCatalog {
    private readonly tables = new Map<string, Table>();
    private readonly relationshipTypes = new Map<string, RelationshipType>();
    private readonly packages = new Map<string, Package>();

    addTable(table: Table): void {
        this.tables.set(table.name, table);
    }

    addRelationshipType(type: RelationshipType): void {
        this.relationshipTypes.set(type.id, type);
    }

    addPackage(pkg: Package): void {
        if (pkg.source) this.packages.set(pkg.source, pkg);
        if (pkg.id) this.packages.set(pkg.id, pkg);
    }

    getTable(name: string): Table | undefined {
        return this.tables.get(name);
    }

    getRelationshipType(id: string): RelationshipType | undefined {
        return this.relationshipTypes.get(id);
    }

    /** Look up a package by id or source */
    getPackage(key: string): Package | undefined {
        return this.packages.get(key);
    }

    /** Tables in insertion order */
    allTables(): Table[] {
        return Array.from(this.tables.values());
    }

    get tableCount(): number {
        return this.tables.size;
    }

    get relationshipTypeCount(): number {
        return this.relationshipTypes.size;
    }

    /** Number of lookup keys (a package with both id and source counts twice) */
    get packageKeyCount(): number {
        return this.packages.size;
    }
}

/**
 * Everything a query needs: the constructed graph and its catalog.
 */
export interface GraphContext {
    store: ReadonlyGraphStore;
    catalog: TableCatalog;
}
