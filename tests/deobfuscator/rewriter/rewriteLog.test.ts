import { describe, expect, it } from 'vitest';
import { Name } from '../../../src/deobfuscator/ast/nodes';
import { RewriteLog } from '../../../src/deobfuscator/rewriter/rewriteLog';

function name(id: string, line: number): Name {
    return { type: 'Name', id, ctx: 'load', loc: { line, column: 0 } };
}

describe('RewriteLog', () => {
    it('records an unsafe node once per pattern', () => {
        const log = new RewriteLog();
        const node = name('a', 1);

        log.recordUnsafe('first', node, 'not safe');
        log.recordUnsafe('first', node, 'not safe');
        log.recordUnsafe('second', node, 'also not safe');

        expect(log.warnings).toEqual([
            {
                kind: 'UnsafeRewriteSkipped',
                pattern: 'first',
                nodeType: 'Name',
                loc: { line: 1, column: 0 },
                reason: 'not safe'
            },
            {
                kind: 'UnsafeRewriteSkipped',
                pattern: 'second',
                nodeType: 'Name',
                loc: { line: 1, column: 0 },
                reason: 'also not safe'
            }
        ]);
    });

    it('flags the rewrites of the last pass as unresolved', () => {
        const log = new RewriteLog();
        log.recordRewrite('early', name('a', 1), 'first pass', 1);
        log.recordRewrite('late', name('b', 2), 'second pass', 2);

        expect(log.hasConverged).toBe(true);
        log.recordNonConvergence(2);

        expect(log.hasConverged).toBe(false);
        expect(log.unresolved).toEqual([{ pattern: 'late', nodeType: 'Name', loc: { line: 2, column: 0 } }]);
    });
});
