import { describe, expect, it } from 'vitest';
import { ExpressionSimplifier } from '../../../../src/deobfuscator/transformations/expressions/expressionSimplifier';
import { transform } from '../../../util';

describe('ExpressionSimplifier', () => {
    it('folds arithmetic on literals', () => {
        const { code, log, changed } = transform('x = 2 ** 10 - 24\n', ExpressionSimplifier);

        expect(code).toBe('x = 1000\n');
        expect(changed).toBe(true);
        expect(log.results.map(r => [r.pattern, r.summary])).toEqual([
            ['expressionSimplification', 'folded BinOp to a literal'],
            ['expressionSimplification', 'folded BinOp to a literal']
        ]);
    });

    it('drops literal operands of or that cannot decide it', () => {
        const { code, log } = transform('y = 0 or a\n', ExpressionSimplifier);

        expect(code).toBe('y = a\n');
        expect(log.results.map(r => r.summary)).toEqual(['simplified BoolOp']);
    });

    it('cuts and after the operand that decides it', () => {
        expect(transform('y = a and 0 and b\n', ExpressionSimplifier).code).toBe('y = a and 0\n');
    });

    it('folds not and chained comparisons', () => {
        expect(transform('z = not 0\n', ExpressionSimplifier).code).toBe('z = True\n');
        expect(transform('c = 1 < 2 < 3\n', ExpressionSimplifier).code).toBe('c = True\n');
    });

    it('leaves operations that would raise', () => {
        const { code, changed } = transform('x = 1 / 0\n', ExpressionSimplifier);

        expect(code).toBe('x = 1 / 0\n');
        expect(changed).toBe(false);
    });

    it('leaves negative numbers alone', () => {
        const { code, log } = transform('x = -5\n', ExpressionSimplifier);

        expect(code).toBe('x = -5\n');
        expect(log.results).toEqual([]);
    });

    it('leaves operations on names', () => {
        expect(transform('x = a + 1\n', ExpressionSimplifier).changed).toBe(false);
    });
});
