import type { PathCandidate } from '../types/index.js';

/**
 * Identity of a candidate: its table sequence plus its ancestor tag.
 *
 * A direct and an inherited candidate over the same tables are both kept,
 * so a direct path that already runs through the target's ancestor into
 * the target is listed twice, once plain and once "inherited from" that
 * ancestor. Keying on the tables alone would drop that duplicate, but would
 * also drop the note that the last hop is one the target inherits.
 */
function candidateKey(candidate: PathCandidate): string {
    return `${candidate.ancestor ?? ''}\u0000${candidate.tables.join('\u0000')}`;
}

function sameSequence(a: string[], b: string[]): boolean {
    return a.length === b.length && a.every((table, i) => table === b[i]);
}

/**
 * True when an inherited candidate is shadowed by a direct candidate:
 * some direct candidate equals its prefix (the candidate without the
 * appended target) and is no longer than the candidate itself.
 *
 * Only identical prefixes count; inheritance depth is not minimized
 * across different ancestors.
 */
function hasBetterDirect(candidate: PathCandidate, all: PathCandidate[]): boolean {
    const prefix = candidate.tables.slice(0, -1);
    return all.some(
        (other) =>
            other.ancestor === null &&
            sameSequence(other.tables, prefix) &&
            other.tables.length <= candidate.tables.length
    );
}

/**
 * Reduce a concatenated candidate list to the paths worth showing.
 *
 * 1. Drop exact duplicates, keeping the first occurrence.
 * 2. Drop inherited candidates shadowed by a direct candidate.
 * 3. Stable sort: fewer tables first; at equal length direct before inherited.
 * 4. Keep the first `maxPaths`.
 *
 * @param candidates - Direct candidates followed by inheritance candidates
 * @param maxPaths - 1 for shortest-path mode; Infinity keeps everything
 */
export function rankPaths(candidates: PathCandidate[], maxPaths: number): PathCandidate[] {
    const seen = new Set<string>();
    const unique: PathCandidate[] = [];

    for (const candidate of candidates) {
        const key = candidateKey(candidate);
        if (seen.has(key)) continue;
        if (candidate.ancestor !== null && hasBetterDirect(candidate, candidates)) continue;

        seen.add(key);
        unique.push(candidate);
    }

    unique.sort((a, b) => {
        if (a.tables.length !== b.tables.length) return a.tables.length - b.tables.length;
        return Number(a.ancestor !== null) - Number(b.ancestor !== null);
    });

    return unique.length > maxPaths ? unique.slice(0, maxPaths) : unique;
}
