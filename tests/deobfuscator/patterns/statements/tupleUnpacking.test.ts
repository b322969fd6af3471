import { describe, expect, it } from 'vitest';
import { tupleUnpacking } from '../../../../src/deobfuscator/patterns/statements/tupleUnpacking';
import { lines, rewrite } from '../../../util';

describe('tupleUnpacking', () => {
    it('splits an assignment of literals', () => {
        const { code, log } = rewrite("a, b, c = 1, 'x', -2\n", tupleUnpacking);

        expect(code).toBe(lines('a = 1', "b = 'x'", 'c = -2'));
        expect(log.results.map(r => r.summary)).toEqual(['split assignment to a, b, c']);
    });

    it('splits list displays', () => {
        expect(rewrite('[a, b] = [1, 2]\n', tupleUnpacking).code).toBe(lines('a = 1', 'b = 2'));
    });

    it('keeps swaps and other values that depend on order', () => {
        const source = 'a, b = b, a\n';

        expect(rewrite(source, tupleUnpacking).code).toBe(source);
    });

    it('keeps repeated names and mismatched lengths', () => {
        expect(rewrite('a, a = 1, 2\n', tupleUnpacking).code).toBe('a, a = 1, 2\n');
        expect(rewrite('a, b = 1, 2, 3\n', tupleUnpacking).code).toBe('a, b = 1, 2, 3\n');
    });
});
