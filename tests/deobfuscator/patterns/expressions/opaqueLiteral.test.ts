import { describe, expect, it } from 'vitest';
import { opaqueLiteral } from '../../../../src/deobfuscator/patterns/expressions/opaqueLiteral';
import { lines, rewrite } from '../../../util';

describe('opaqueLiteral', () => {
    it('folds arithmetic over constants', () => {
        const { code, log } = rewrite('x = (6 * 7) ^ 0\n', opaqueLiteral);

        expect(code).toBe('x = 42\n');
        expect(log.results.map(r => [r.summary, r.pass])).toEqual([
            ['folded BinOp to 42', 1],
            ['folded BinOp to 42', 1]
        ]);
    });

    it('folds builtin calls and methods', () => {
        expect(rewrite('s = bytes([104, 105]).decode()\n', opaqueLiteral).code).toBe("s = 'hi'\n");
        expect(rewrite("t = ''.join([chr(x) for x in (72, 73)])\n", opaqueLiteral).code).toBe("t = 'HI'\n");
    });

    it('leaves expressions that read variables', () => {
        const { code, log } = rewrite('y = x + 1\n', opaqueLiteral);

        expect(code).toBe('y = x + 1\n');
        expect(log.results).toEqual([]);
    });

    it('does not call a builtin the module shadows', () => {
        const source = lines('def chr(n):', "    return 'z'", '', '', 's = chr(65)');

        expect(rewrite(source, opaqueLiteral).code).toBe(source);
    });

    it('keeps operations that raise or grow too large', () => {
        expect(rewrite('x = 1 // 0\n', opaqueLiteral).code).toBe('x = 1 // 0\n');
        expect(rewrite("x = 'a' * 5000\n", opaqueLiteral).code).toBe("x = 'a' * 5000\n");
    });

    it('keeps negative numbers as they are', () => {
        const { code, log } = rewrite('x = -5\n', opaqueLiteral);

        expect(code).toBe('x = -5\n');
        expect(log.results).toEqual([]);
    });
});
