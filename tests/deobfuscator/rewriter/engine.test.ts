import { describe, expect, it } from 'vitest';
import generate from '../../../src/deobfuscator/ast/generator';
import { parse } from '../../../src/deobfuscator/ast/parser';
import { patternCatalog } from '../../../src/deobfuscator/patterns/catalog';
import { RewriteEngine } from '../../../src/deobfuscator/rewriter/engine';
import { RewriteLog } from '../../../src/deobfuscator/rewriter/rewriteLog';
import { integerSwap } from '../../util';

describe('RewriteEngine', () => {
    it('runs passes until nothing matches', () => {
        const module = parse('x = (1 + 2) * 3\n');
        const log = new RewriteEngine().rewrite(module);

        expect(generate(module)).toBe('x = 9\n');
        expect(log.hasConverged).toBe(true);
    });

    it('rewrites a replacement only in the next pass', () => {
        const module = parse('x = 1\n');
        const log = new RewriteEngine([integerSwap('oneToTwo', 1n, 2n), integerSwap('twoToThree', 2n, 3n)]).rewrite(
            module
        );

        expect(generate(module)).toBe('x = 3\n');
        expect(log.results.map(r => [r.pattern, r.pass])).toEqual([
            ['oneToTwo', 1],
            ['twoToThree', 2]
        ]);
    });

    it('reports patterns that keep undoing each other', () => {
        const module = parse('x = 1\n');
        const engine = new RewriteEngine([integerSwap('oneToTwo', 1n, 2n), integerSwap('twoToOne', 2n, 1n)], {
            maxIterations: 5
        });
        const log = engine.rewrite(module);

        expect(generate(module)).toBe('x = 2\n');
        expect(log.results).toHaveLength(5);
        expect(log.hasConverged).toBe(false);
        expect(log.warnings).toHaveLength(1);
        expect(log.warnings[0]).toMatchObject({ kind: 'RewriteDidNotConverge', iterations: 5 });
        expect(log.unresolved).toEqual([{ pattern: 'oneToTwo', nodeType: 'Constant', loc: undefined }]);
    });

    it('skips disabled patterns', () => {
        const module = parse("a, b = 1, 2\nx = 'a' + 'b'\n");
        new RewriteEngine(patternCatalog, { isEnabled: key => key != 'opaqueLiteral' }).rewrite(module);

        expect(generate(module)).toBe("a = 1\nb = 2\nx = 'a' + 'b'\n");
    });

    it('counts the rewrites of a single pass', () => {
        const module = parse('f(1 + 1, 2 * 2)\n');
        const log = new RewriteLog();

        expect(new RewriteEngine().runPass(module, 1, log)).toBe(2);
        expect(generate(module)).toBe('f(2, 4)\n');
        expect(new RewriteEngine().runPass(module, 2, log)).toBe(0);
    });
});
