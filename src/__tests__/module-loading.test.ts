import { describe, it, expect } from 'vitest';
import { spawnSync } from 'node:child_process';
import { fileURLToPath } from 'node:url';

const projectRoot = fileURLToPath(new URL('../..', import.meta.url));

/**
 * Run an ES module snippet under plain Node from the project root, outside
 * the test runner's own module interop.
 */
function runModule(source: string) {
    return spawnSync(process.execPath, ['--input-type=module', '--eval', source], {
        cwd: projectRoot,
        encoding: 'utf-8',
    });
}

describe('Module loading under Node', () => {
    it('should reach the graphology classes through the default import', () => {
        const result = runModule(`
            import graphology from 'graphology';
            const graph = new graphology.DirectedGraph({ allowSelfLoops: true });
            graph.addEdge('a', 'b');
            console.log(graph.size);
        `);

        expect(result.status, result.stderr).toBe(0);
        expect(result.stdout.trim()).toBe('1');
    });

    it('should reach the graphology-metrics functions through the default import', () => {
        const result = runModule(`
            import densityModule from 'graphology-metrics/graph/density.js';
            import degreeModule from 'graphology-metrics/centrality/degree.js';
            console.log(typeof densityModule.density, typeof degreeModule.degreeCentrality);
        `);

        expect(result.status, result.stderr).toBe(0);
        expect(result.stdout.trim()).toBe('function function');
    });
});
