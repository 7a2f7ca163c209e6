/**
 * Zod schemas for the catalog export files.
 *
 * Every file is `{ "records": [...] }` and every field is a string.
 * Absent fields are allowed; identity checks happen after parsing.
 */

import { z } from 'zod';

// ─── File envelope ───────────────────────────────────────

export const RecordFileSchema = z.object({
    records: z.array(z.unknown()),
});

// ─── sys_db_object.json ──────────────────────────────────

export const TableRecordSchema = z.object({
    name: z.string().default(''),
    sys_id: z.string().default(''),
    label: z.string().optional(),
    /** sys_id of the parent table */
    super_class: z.string().default(''),
    sys_scope: z.string().default('global'),
    sys_package: z.string().default(''),
    is_extendable: z.string().default('false'),
});

// ─── cmdb_rel_type.json ──────────────────────────────────

export const RelationshipTypeRecordSchema = z.object({
    sys_id: z.string().default(''),
    name: z.string().default(''),
    parent_descriptor: z.string().default(''),
    child_descriptor: z.string().default(''),
    sys_name: z.string().default(''),
    sys_scope: z.string().default('global'),
});

// ─── sys_package.json ────────────────────────────────────

export const PackageRecordSchema = z.object({
    sys_id: z.string().default(''),
    source: z.string().default(''),
    name: z.string().optional(),
    version: z.string().default(''),
    license_category: z.string().default('none'),
    sys_class_name: z.string().default(''),
    active: z.string().default('true'),
});

// ─── Suggested relationship files ────────────────────────

export const SuggestedRelationshipRecordSchema = z.object({
    base_class: z.string().default(''),
    dependent_class: z.string().default(''),
    cmdb_rel_type: z.string().default(''),
    parent: z.string().default('false'),
});

export type TableRecord = z.infer<typeof TableRecordSchema>;
export type RelationshipTypeRecord = z.infer<typeof RelationshipTypeRecordSchema>;
export type PackageRecord = z.infer<typeof PackageRecordSchema>;
export type SuggestedRelationshipRecord = z.infer<typeof SuggestedRelationshipRecordSchema>;
