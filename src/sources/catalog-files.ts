import { existsSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { z, ZodTypeAny } from 'zod';
import type {
    Table,
    RelationshipType,
    Package,
    SuggestedRelationship,
    CatalogRecords,
} from '../types/index.js';
import { CatalogLoadError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    RecordFileSchema,
    TableRecordSchema,
    RelationshipTypeRecordSchema,
    PackageRecordSchema,
    SuggestedRelationshipRecordSchema,
} from './schemas.js';

export const TABLES_FILE = 'sys_db_object.json';
export const RELATIONSHIP_TYPES_FILE = 'cmdb_rel_type.json';
export const PACKAGES_FILE = 'sys_package.json';

// ─── File reading ────────────────────────────────────────

/**
 * Read the `records` array of one export file.
 * A missing, unparsable, or envelope-less file yields no records.
 */
export function readRecordFile(dataDir: string, fileName: string): unknown[] {
    const filePath = join(dataDir, fileName);
    const logger = getLogger();

    if (!existsSync(filePath)) {
        logger.warn({ file: fileName }, 'Data file not found, skipping');
        return [];
    }

    let data: unknown;
    try {
        data = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
        logger.warn({ file: fileName, error }, 'Data file is not valid JSON, skipping');
        return [];
    }

    const parsed = RecordFileSchema.safeParse(data);
    if (!parsed.success) {
        logger.warn({ file: fileName }, 'Data file has no records array, skipping');
        return [];
    }

    return parsed.data.records;
}

/**
 * Validate each raw record; invalid ones are dropped and counted.
 */
function parseRecords<S extends ZodTypeAny>(
    records: unknown[],
    schema: S
): { valid: Array<z.output<S>>; invalid: number } {
    const valid: Array<z.output<S>> = [];
    let invalid = 0;

    for (const record of records) {
        const result = schema.safeParse(record);
        if (result.success) {
            valid.push(result.data);
        } else {
            invalid++;
        }
    }

    return { valid, invalid };
}

// ─── Record normalization ────────────────────────────────

/**
 * Tables from sys_db_object.json. `super_class` holds a sys_id, so table
 * names are indexed by sys_id in a first pass and resolved in a second.
 * An id that resolves to no table leaves the table without a parent.
 */
export function loadTables(dataDir: string): { tables: Table[]; skipped: number } {
    const { valid, invalid } = parseRecords(readRecordFile(dataDir, TABLES_FILE), TableRecordSchema);
    let skipped = invalid;

    const nameBySysId = new Map<string, string>();
    for (const record of valid) {
        if (record.name && record.sys_id) {
            nameBySysId.set(record.sys_id, record.name);
        }
    }

    const tables: Table[] = [];
    for (const record of valid) {
        if (!record.name) {
            skipped++;
            continue;
        }

        tables.push({
            name: record.name,
            label: record.label ?? record.name,
            superClass: record.super_class ? nameBySysId.get(record.super_class) ?? '' : '',
            scope: record.sys_scope,
            package: record.sys_package,
            extendable: record.is_extendable === 'true',
        });
    }

    getLogger().debug({ tables: tables.length, skipped }, 'Tables loaded');
    return { tables, skipped };
}

export function loadRelationshipTypes(dataDir: string): { relationshipTypes: RelationshipType[]; skipped: number } {
    const { valid, invalid } = parseRecords(
        readRecordFile(dataDir, RELATIONSHIP_TYPES_FILE),
        RelationshipTypeRecordSchema
    );
    let skipped = invalid;

    const relationshipTypes: RelationshipType[] = [];
    for (const record of valid) {
        if (!record.sys_id) {
            skipped++;
            continue;
        }

        relationshipTypes.push({
            id: record.sys_id,
            name: record.name,
            parentDescriptor: record.parent_descriptor,
            childDescriptor: record.child_descriptor,
            scope: record.sys_scope,
        });
    }

    getLogger().debug({ relationshipTypes: relationshipTypes.length, skipped }, 'Relationship types loaded');
    return { relationshipTypes, skipped };
}

export function loadPackages(dataDir: string): { packages: Package[]; skipped: number } {
    const { valid, invalid } = parseRecords(readRecordFile(dataDir, PACKAGES_FILE), PackageRecordSchema);
    let skipped = invalid;

    const packages: Package[] = [];
    for (const record of valid) {
        if (!record.source && !record.sys_id) {
            skipped++;
            continue;
        }

        packages.push({
            id: record.sys_id,
            source: record.source,
            name: record.name ?? record.source,
            version: record.version,
            licenseCategory: record.license_category,
            active: record.active === 'true',
        });
    }

    getLogger().debug({ packages: packages.length, skipped }, 'Packages loaded');
    return { packages, skipped };
}

/**
 * Suggested relationships from one file, in file order. Records missing a
 * class or type are passed through; graph construction skips and counts them.
 */
export function loadSuggestedRelationships(
    dataDir: string,
    fileName: string
): { relationships: SuggestedRelationship[]; skipped: number } {
    const { valid, invalid } = parseRecords(
        readRecordFile(dataDir, fileName),
        SuggestedRelationshipRecordSchema
    );

    const relationships = valid.map((record) => ({
        baseClass: record.base_class,
        dependentClass: record.dependent_class,
        relationshipTypeId: record.cmdb_rel_type,
        isParent: record.parent.toLowerCase() === 'true',
        sourceFile: fileName,
    }));

    getLogger().debug({ file: fileName, relationships: relationships.length, skipped: invalid }, 'Relationships loaded');
    return { relationships, skipped: invalid };
}

// ─── Directory loader ────────────────────────────────────

/**
 * Load every catalog file in `dataDir`.
 * Relationship files are read in the order given, which is the order
 * their edges are written to the graph.
 *
 * @throws CatalogLoadError if `dataDir` is not a readable directory
 */
export function loadCatalogRecords(dataDir: string, relationshipFiles: string[]): CatalogRecords {
    let isDirectory = false;
    try {
        isDirectory = statSync(dataDir).isDirectory();
    } catch (error) {
        throw new CatalogLoadError(`Cannot read catalog data directory: ${dataDir} (${String(error)})`, dataDir);
    }
    if (!isDirectory) {
        throw new CatalogLoadError(`Catalog data path is not a directory: ${dataDir}`, dataDir);
    }

    const tables = loadTables(dataDir);
    const types = loadRelationshipTypes(dataDir);
    const packages = loadPackages(dataDir);

    const relationships: SuggestedRelationship[] = [];
    let skippedRelationships = 0;
    for (const fileName of relationshipFiles) {
        const loaded = loadSuggestedRelationships(dataDir, fileName);
        relationships.push(...loaded.relationships);
        skippedRelationships += loaded.skipped;
    }

    getLogger().info(
        {
            tables: tables.tables.length,
            relationshipTypes: types.relationshipTypes.length,
            packages: packages.packages.length,
            relationships: relationships.length,
        },
        'Catalog loaded'
    );

    return {
        tables: tables.tables,
        relationshipTypes: types.relationshipTypes,
        packages: packages.packages,
        relationships,
        skipped: {
            tables: tables.skipped,
            relationshipTypes: types.skipped,
            packages: packages.skipped,
            relationships: skippedRelationships,
        },
    };
}
