import { describe, it, expect } from 'vitest';
import { TableCatalog } from '../graph/catalog.js';
import { formatPath, packageDisplayName, tableDisplayLabel, titleCase, truncate } from '../graph/labels.js';
import type { Package } from '../types/index.js';
import { makeTable } from './fixtures.js';

function makePackage(id: string, source: string, name = source): Package {
    return { id, source, name, version: '1.0.0', licenseCategory: 'none', active: true };
}

describe('Labels', () => {
    it('should title-case letter runs', () => {
        expect(titleCase('cmdb ci server')).toBe('Cmdb Ci Server');
        expect(titleCase('SERVICE-portal')).toBe('Service-Portal');
    });

    it('should truncate with an ellipsis', () => {
        expect(truncate('short', 8)).toBe('short');
        expect(truncate('abcdefghij', 8)).toBe('abcde...');
    });

    describe('tableDisplayLabel', () => {
        const catalog = new TableCatalog();
        catalog.addTable(makeTable('cmdb_ci_server', '', { label: 'Server' }));
        catalog.addTable(makeTable('cmdb_ci_disk'));
        catalog.addTable(makeTable('cmdb_ci_rel', '', { label: 'Configuration Item Relationship' }));

        it('should prefer a distinct catalog label', () => {
            expect(tableDisplayLabel(catalog, 'cmdb_ci_server')).toBe('Server');
        });

        it('should humanize the name when the label adds nothing', () => {
            expect(tableDisplayLabel(catalog, 'cmdb_ci_disk')).toBe('Cmdb Ci Disk');
            expect(tableDisplayLabel(catalog, 'u_custom_table')).toBe('U Custom Table');
        });

        it('should truncate long labels', () => {
            expect(tableDisplayLabel(catalog, 'cmdb_ci_rel')).toBe('Configuration Item Rel...');
        });
    });

    describe('packageDisplayName', () => {
        const catalog = new TableCatalog();
        catalog.addPackage(makePackage('pkg-1', '@servicenow/now-graph'));
        catalog.addPackage(makePackage('pkg-2', '@devsnc/app-tools'));
        catalog.addPackage(makePackage('pkg-3', 'com.glide.service-portal'));
        catalog.addPackage(makePackage('pkg-4', 'com.snc'));
        catalog.addPackage(makePackage('pkg-5', 'sn_itom_pattern'));
        catalog.addPackage(makePackage('pkg-6', 'x_custom', 'A very long package name for testing'));

        it('should shorten known prefixes', () => {
            expect(packageDisplayName(catalog, '@servicenow/now-graph')).toBe('SN: now-graph');
            expect(packageDisplayName(catalog, '@devsnc/app-tools')).toBe('DevSNC: app-tools');
        });

        it('should name plugins after the part past the vendor', () => {
            expect(packageDisplayName(catalog, 'com.glide.service-portal')).toBe('Service Portal');
            expect(packageDisplayName(catalog, 'com.snc')).toBe('com.snc');
        });

        it('should humanize sn_ sources without a distinct name', () => {
            expect(packageDisplayName(catalog, 'sn_itom_pattern')).toBe('SN Itom Pattern');
        });

        it('should resolve by id as well as by source', () => {
            expect(packageDisplayName(catalog, 'pkg-1')).toBe('SN: now-graph');
        });

        it('should fall back for empty or unknown packages', () => {
            expect(packageDisplayName(catalog, '')).toBe('Unknown Package');
            expect(packageDisplayName(catalog, 'pkg-404')).toBe('Unknown Package');
        });

        it('should truncate long names', () => {
            expect(packageDisplayName(catalog, 'x_custom')).toBe('A very long package name fo...');
        });
    });

    describe('formatPath', () => {
        it('should join tables with arrows', () => {
            expect(formatPath({ tables: ['a', 'b', 'c'], ancestor: null })).toBe('a → b → c');
        });

        it('should name the ancestor of an inherited path', () => {
            expect(formatPath({ tables: ['e', 'd', 'b', 'c'], ancestor: 'b' })).toBe(
                'e → d → b → c (inherited from b)'
            );
        });

        it('should use display labels with a catalog', () => {
            const catalog = new TableCatalog();
            catalog.addTable(makeTable('cmdb_ci_server', '', { label: 'Server' }));

            expect(formatPath({ tables: ['cmdb_ci_app', 'cmdb_ci_server'], ancestor: null }, catalog)).toBe(
                'Cmdb Ci App → Server'
            );
        });
    });
});
