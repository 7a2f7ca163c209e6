import { describe, it, expect } from 'vitest';
import { rankPaths } from '../graph/ranking.js';
import type { PathCandidate } from '../types/index.js';

function direct(...tables: string[]): PathCandidate {
    return { tables, ancestor: null };
}

function inherited(ancestor: string, ...tables: string[]): PathCandidate {
    return { tables, ancestor };
}

describe('Path Ranking', () => {
    it('should order by length, direct before inherited at equal length', () => {
        const ranked = rankPaths(
            [
                direct('s', 'x', 't'),
                direct('s', 'x', 'y', 'u', 't'),
                inherited('p', 's', 'y', 't'),
                inherited('p', 's', 't'),
                direct('s', 'y', 'u', 't'),
            ],
            Infinity
        );

        expect(ranked).toEqual([
            inherited('p', 's', 't'),
            direct('s', 'x', 't'),
            inherited('p', 's', 'y', 't'),
            direct('s', 'y', 'u', 't'),
            direct('s', 'x', 'y', 'u', 't'),
        ]);
    });

    it('should keep the input order among equal candidates', () => {
        const ranked = rankPaths([direct('s', 'b', 't'), direct('s', 'a', 't')], Infinity);
        expect(ranked).toEqual([direct('s', 'b', 't'), direct('s', 'a', 't')]);
    });

    it('should drop exact duplicates, keeping the first', () => {
        const ranked = rankPaths(
            [direct('s', 'x', 't'), direct('s', 'x', 't'), inherited('p', 's', 'p', 't'), inherited('p', 's', 'p', 't')],
            Infinity
        );
        expect(ranked).toEqual([direct('s', 'x', 't'), inherited('p', 's', 'p', 't')]);
    });

    it('should drop an inherited candidate whose prefix is a direct candidate', () => {
        // s → p is a real path and p is also the ancestor the inherited path goes through
        const ranked = rankPaths([direct('s', 'p'), direct('s', 't'), inherited('p', 's', 'p', 't')], Infinity);
        expect(ranked).toEqual([direct('s', 'p'), direct('s', 't')]);
    });

    it('should not compare inherited candidates across ancestors', () => {
        const ranked = rankPaths([inherited('grandparent', 's', 'g', 't'), inherited('parent', 's', 'x', 'y', 't')], Infinity);
        expect(ranked).toHaveLength(2);
    });

    it('should keep a direct and an inherited candidate over the same tables', () => {
        const ranked = rankPaths([direct('e', 'd', 'b', 'c'), inherited('b', 'e', 'd', 'b', 'c')], Infinity);
        expect(ranked).toEqual([direct('e', 'd', 'b', 'c'), inherited('b', 'e', 'd', 'b', 'c')]);
    });

    it('should truncate to maxPaths', () => {
        const candidates = [direct('s', 'a', 't'), direct('s', 't'), direct('s', 'b', 'c', 't')];
        expect(rankPaths(candidates, 1)).toEqual([direct('s', 't')]);
        expect(rankPaths(candidates, 2)).toEqual([direct('s', 't'), direct('s', 'a', 't')]);
    });

    it('should return an empty list for no candidates', () => {
        expect(rankPaths([], 10)).toEqual([]);
    });
});
