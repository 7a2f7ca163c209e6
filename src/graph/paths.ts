import type { PathCandidate, PathQueryOptions } from '../types/index.js';
import { DEFAULT_PATH_OPTIONS } from '../types/index.js';
import type { GraphContext } from './catalog.js';
import type { ReadonlyGraphStore } from './graph-store.js';
import { ancestorChain } from './inheritance.js';
import { rankPaths } from './ranking.js';
import { getLogger } from '../utils/logger.js';

/**
 * Enumerate every simple path from `source` to `target` with at most
 * `maxPathLength` hops.
 *
 * Depth-first over successors in edge insertion order, with the current
 * branch as the visited set. A path stops at the first arrival at
 * `target`; it is never extended through it.
 */
export function allSimplePaths(
    store: ReadonlyGraphStore,
    source: string,
    target: string,
    maxPathLength: number
): string[][] {
    if (!store.hasNode(source) || !store.hasNode(target)) return [];
    if (source === target || maxPathLength < 1) return [];

    const paths: string[][] = [];
    const branch: string[] = [source];
    const onBranch = new Set<string>([source]);

    const walk = (node: string): void => {
        for (const next of store.neighborsOut(node)) {
            if (onBranch.has(next)) continue;

            if (next === target) {
                paths.push([...branch, next]);
                continue;
            }

            // branch.length hops are used once `next` is appended
            if (branch.length < maxPathLength) {
                branch.push(next);
                onBranch.add(next);
                walk(next);
                onBranch.delete(next);
                branch.pop();
            }
        }
    };

    walk(source);
    return paths;
}

/**
 * Collect unranked candidates between two tables.
 *
 * 1. Direct candidates: simple paths `source → target`.
 * 2. Inheritance candidates: for each ancestor A of `target` (nearest
 *    first), simple paths `source → A`, each extended with `target` and
 *    tagged with A.
 *
 * Direct candidates come first, then inheritance candidates in ancestor
 * order. An absent source yields nothing; an absent target only skips the
 * direct step.
 */
export function enumerateCandidates(
    ctx: GraphContext,
    source: string,
    target: string,
    maxPathLength: number = DEFAULT_PATH_OPTIONS.maxPathLength
): PathCandidate[] {
    const { store, catalog } = ctx;
    if (!store.hasNode(source)) return [];

    const candidates: PathCandidate[] = [];

    if (store.hasNode(target)) {
        for (const tables of allSimplePaths(store, source, target, maxPathLength)) {
            candidates.push({ tables, ancestor: null });
        }
    }

    const direct = candidates.length;

    for (const ancestor of ancestorChain(catalog, target).slice(1)) {
        if (!store.hasNode(ancestor)) continue;

        for (const tables of allSimplePaths(store, source, ancestor, maxPathLength)) {
            candidates.push({ tables: [...tables, target], ancestor });
        }
    }

    getLogger().debug(
        { source, target, direct, inherited: candidates.length - direct },
        'Path candidates enumerated'
    );

    return candidates;
}

/**
 * Find, deduplicate and rank the paths from `source` to `target`,
 * including paths that reach the target only through one of its ancestors.
 *
 * An empty result means no path exists (or either table is unknown).
 */
export function findPaths(
    ctx: GraphContext,
    source: string,
    target: string,
    options: Partial<PathQueryOptions> = {}
): PathCandidate[] {
    const { maxPaths, maxPathLength } = { ...DEFAULT_PATH_OPTIONS, ...options };
    const candidates = enumerateCandidates(ctx, source, target, maxPathLength);
    return rankPaths(candidates, maxPaths);
}
