import { describe, expect, it } from 'vitest';
import { UnusedVariableRemover } from '../../../../src/deobfuscator/transformations/variables/unusedVariableRemover';
import { lines, transform } from '../../../util';

describe('UnusedVariableRemover', () => {
    it('removes a local that is never read', () => {
        const { code, log } = transform(lines('def f():', '    unused = 42', '    return 1'), UnusedVariableRemover);

        expect(code).toBe(lines('def f():', '    return 1'));
        expect(log.results.map(r => r.summary)).toEqual(['removed unused variable unused']);
    });

    it('only removes module globals with generated names', () => {
        expect(transform('config = 1\n', UnusedVariableRemover).code).toBe('config = 1\n');
        expect(transform(lines("_0x1f = 'abc'", 'print(1)'), UnusedVariableRemover).code).toBe('print(1)\n');
    });

    it('keeps assignments whose value may have effects', () => {
        const source = lines('def f():', '    r = compute()', '    return 1');

        expect(transform(source, UnusedVariableRemover).code).toBe(source);
    });

    it('keeps variables of a scope that reads its locals by name', () => {
        const source = lines('def f():', '    unused = 1', '    return locals()');
        const { code, changed } = transform(source, UnusedVariableRemover);

        expect(code).toBe(source);
        expect(changed).toBe(false);
    });

    it('keeps variables read by a nested function', () => {
        const source = lines('def f():', '    v = 1', '', '    def g():', '        return v', '', '    return g');

        expect(transform(source, UnusedVariableRemover).code).toBe(source);
    });
});
