/**
 * A candidate route between two tables.
 *
 * `ancestor` is null when the path ends at the literal target. Otherwise
 * the path reaches that ancestor of the target and the target itself is
 * appended as a synthetic final hop.
 */
export interface PathCandidate {
    tables: string[];
    ancestor: string | null;
}

/**
 * Limits for path enumeration and ranking.
 */
export interface PathQueryOptions {
    /** Number of candidates kept after ranking (1 = shortest-path mode) */
    maxPaths: number;

    /** Maximum number of hops in an enumerated path */
    maxPathLength: number;
}

export const DEFAULT_PATH_OPTIONS: PathQueryOptions = {
    maxPaths: 10,
    maxPathLength: 5,
};
