import { DEFAULT_CONFIG, type PathCandidate } from '../types/index.js';
import type { TableCatalog } from './catalog.js';

/**
 * Capitalize the first letter of every run of letters, lowercase the rest.
 */
export function titleCase(text: string): string {
    return text.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Cut `text` to `maxLength` characters, ending in "..." when shortened.
 */
export function truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    return text.slice(0, Math.max(0, maxLength - 3)) + '...';
}

/**
 * Human-readable label for a table.
 *
 * Uses the catalog label; a table without a distinct label shows its name
 * with underscores as spaces, title-cased ("cmdb_ci_server" → "Cmdb Ci Server").
 */
export function tableDisplayLabel(
    catalog: TableCatalog,
    name: string,
    maxLength = DEFAULT_CONFIG.labels.nodeMaxLength
): string {
    const label = catalog.getTable(name)?.label ?? name;
    const display = !label || label === name ? titleCase(name.replace(/_/g, ' ')) : label;
    return truncate(display, maxLength);
}

/**
 * Human-readable name for a package, looked up by source or id.
 *
 *   @servicenow/now-x   → "SN: now-x"
 *   @devsnc/app         → "DevSNC: app"
 *   com.glide.service-portal → "Service Portal"
 *   sn_itom_pattern (no distinct name) → "SN Itom Pattern"
 */
export function packageDisplayName(
    catalog: TableCatalog,
    source: string,
    maxLength = DEFAULT_CONFIG.labels.packageMaxLength
): string {
    if (!source) return 'Unknown Package';

    const pkg = catalog.getPackage(source);
    if (!pkg) return 'Unknown Package';

    let name = pkg.name;

    if (name.startsWith('@servicenow/')) {
        name = 'SN: ' + name.slice('@servicenow/'.length);
    } else if (name.startsWith('@devsnc/')) {
        name = 'DevSNC: ' + name.slice('@devsnc/'.length);
    } else if (name.startsWith('com.')) {
        const parts = name.split('.');
        if (parts.length > 2) {
            name = titleCase(parts.slice(2).join(' ')).replace(/[-_]/g, ' ');
        }
    } else if (source.startsWith('sn_') && (!name || name === source)) {
        name = 'SN ' + titleCase(source.slice('sn_'.length).replace(/_/g, ' '));
    }

    return truncate(name, maxLength);
}

/**
 * One path as text: "A → B → C", plus " (inherited from X)" when the
 * path reaches the target through ancestor X.
 *
 * With a catalog, tables are shown by display label instead of name.
 */
export function formatPath(
    candidate: PathCandidate,
    catalog?: TableCatalog,
    maxLength = DEFAULT_CONFIG.labels.nodeMaxLength
): string {
    const names = catalog
        ? candidate.tables.map((table) => tableDisplayLabel(catalog, table, maxLength))
        : candidate.tables;

    const text = names.join(' → ');
    return candidate.ancestor !== null ? `${text} (inherited from ${candidate.ancestor})` : text;
}
