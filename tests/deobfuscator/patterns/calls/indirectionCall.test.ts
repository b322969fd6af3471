import { describe, expect, it } from 'vitest';
import { indirectionCall } from '../../../../src/deobfuscator/patterns/calls/indirectionCall';
import { unusedIndirectionHelper } from '../../../../src/deobfuscator/patterns/calls/unusedIndirectionHelper';
import { lines, rewrite } from '../../../util';

describe('indirectionCall', () => {
    it('inlines a forwarding helper and the lambda passed to it', () => {
        const source = lines('def f(x):', '    return x()', '', '', 'f(lambda: compute())');
        const { code, log } = rewrite(source, indirectionCall, unusedIndirectionHelper);

        expect(code).toBe('compute()\n');
        expect(log.results.map(r => [r.summary, r.pass])).toEqual([
            ['inlined call to f', 1],
            ['inlined call to lambda', 2],
            ['removed unused helper f', 2]
        ]);
    });

    it('inlines binary operation wrappers', () => {
        const source = lines('def add(a, b):', '    return a + b', '', '', 'print(add(x, 2) * 3)');

        expect(rewrite(source, indirectionCall).code).toBe(
            lines('def add(a, b):', '    return a + b', '', '', 'print((x + 2) * 3)')
        );
    });

    it('keeps helpers used with the wrong number of arguments', () => {
        const source = lines('def add(a, b):', '    return a + b', '', '', 'print(add(1))');
        const { code, log } = rewrite(source, indirectionCall);

        expect(code).toBe(source);
        expect(log.warnings).toMatchObject([
            {
                kind: 'UnsafeRewriteSkipped',
                pattern: 'indirectionCall',
                reason: 'add takes 2 argument(s) but is called with 1'
            }
        ]);
    });

    it('keeps calls whose arguments would run in a different order', () => {
        const source = lines('def call(a, b):', '    return b(a)', '', '', 'call(g(), h)');
        const { code, log } = rewrite(source, indirectionCall);

        expect(code).toBe(source);
        expect(log.warnings).toMatchObject([
            { reason: 'arguments with side effects would be evaluated in a different order' }
        ]);
    });

    it('keeps helpers that use a parameter twice', () => {
        const source = lines('def sq(a):', '    return a * a', '', '', 'print(sq(next(it)))');

        expect(rewrite(source, indirectionCall).code).toBe(source);
    });
});
