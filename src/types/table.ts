/**
 * One CMDB table (a class in the CI hierarchy).
 * Normalized from the `sys_db_object` export into this shape.
 */
export interface Table {
    /** Table name, unique across the catalog (e.g. "cmdb_ci_server") */
    name: string;

    /** Human-readable label (falls back to the name) */
    label: string;

    /** Name of the parent table, or "" for a root table */
    superClass: string;

    /** Application scope the table belongs to */
    scope: string;

    /** Package reference (a package source or sys_id) */
    package: string;

    /** Whether other tables may extend this one */
    extendable: boolean;
}

/**
 * Relationship type: reference data used to label CI edges.
 * The canonical name is usually "Parent descriptor::Child descriptor".
 */
export interface RelationshipType {
    id: string;
    name: string;
    parentDescriptor: string;
    childDescriptor: string;
    scope: string;
}

/**
 * Package record. Resolvable by either its id or its source string.
 */
export interface Package {
    id: string;
    source: string;
    name: string;
    version: string;
    licenseCategory: string;
    active: boolean;
}

/**
 * A suggested relationship between two tables.
 *
 * When `isParent` is true the edge runs baseClass → dependentClass and is
 * labelled with the type's parent descriptor; otherwise it runs
 * dependentClass → baseClass with the child descriptor.
 */
export interface SuggestedRelationship {
    baseClass: string;
    dependentClass: string;
    relationshipTypeId: string;
    isParent: boolean;

    /** File the record was read from (becomes the edge's origin file) */
    sourceFile: string;
}
