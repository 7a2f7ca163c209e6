import type { GraphContext, TableCatalog } from './catalog.js';

/**
 * Walk `superClass` pointers from `table` upward.
 *
 * The chain always starts with `table` and ends at the first table that
 * has no parent, names itself as parent, or whose parent is already in the
 * chain. A parent the catalog does not know is included and ends the
 * chain, since it has no record to continue from.
 *
 * @example ancestorChain(catalog, 'cmdb_ci_linux_server')
 *   // ['cmdb_ci_linux_server', 'cmdb_ci_server', 'cmdb_ci_computer', ...]
 */
export function ancestorChain(catalog: TableCatalog, table: string): string[] {
    const chain = [table];
    const seen = new Set<string>([table]);
    let current = table;

    for (;;) {
        const superClass = catalog.getTable(current)?.superClass ?? '';
        if (!superClass || superClass === current || seen.has(superClass)) break;

        chain.push(superClass);
        seen.add(superClass);
        current = superClass;
    }

    return chain;
}

/**
 * Members of the ancestor chain (including `table` itself) that are graph
 * nodes with at least one edge, i.e. the tables whose relationships can
 * apply to `table`.
 */
export function applicableAncestors(ctx: GraphContext, table: string): Set<string> {
    const applicable = new Set<string>();

    for (const ancestor of ancestorChain(ctx.catalog, table)) {
        if (ctx.store.hasNode(ancestor) && ctx.store.degree(ancestor) > 0) {
            applicable.add(ancestor);
        }
    }

    return applicable;
}
