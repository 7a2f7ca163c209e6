import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, DEFAULT_PATH_OPTIONS, HIERARCHY_EDGE } from '../types/index.js';

describe('Types', () => {
    describe('HIERARCHY_EDGE', () => {
        it('should be a dotted hierarchy edge labelled "parent of"', () => {
            expect(HIERARCHY_EDGE).toMatchObject({
                relationshipType: 'class_hierarchy',
                label: 'parent of',
                kind: 'hierarchy',
                style: 'dotted',
                scope: 'hierarchy',
            });
        });
    });

    describe('DEFAULT_PATH_OPTIONS', () => {
        it('should keep 10 paths of at most 5 hops', () => {
            expect(DEFAULT_PATH_OPTIONS).toEqual({ maxPaths: 10, maxPathLength: 5 });
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should read both suggested relationship files, in order', () => {
            expect(DEFAULT_CONFIG.relationshipFiles).toEqual([
                'cmdb_rel_type_suggest.json',
                'em_suggested_relation_type.json',
            ]);
        });

        it('should match the default path options', () => {
            expect(DEFAULT_CONFIG.paths.maxPaths).toBe(DEFAULT_PATH_OPTIONS.maxPaths);
            expect(DEFAULT_CONFIG.paths.maxPathLength).toBe(DEFAULT_PATH_OPTIONS.maxPathLength);
            expect(DEFAULT_CONFIG.paths.shortestPathOnly).toBe(false);
        });

        it('should have neighborhood depth 2 by default', () => {
            expect(DEFAULT_CONFIG.neighborhood).toEqual({ depth: 2, maxNodes: 20 });
        });

        it('should log at info level by default', () => {
            expect(DEFAULT_CONFIG.logLevel).toBe('info');
            expect(DEFAULT_CONFIG.jsonLogs).toBe(false);
        });
    });
});
