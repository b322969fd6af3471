import { describe, expect, it } from 'vitest';
import { junkStatement } from '../../../../src/deobfuscator/patterns/statements/junkStatement';
import { lines, rewrite } from '../../../util';

describe('junkStatement', () => {
    it('removes pass and expressions without effects', () => {
        const source = lines('def f():', "    'doc'", '    1 + 2', '    pass', '    return 3');
        const { code, log } = rewrite(source, junkStatement);

        expect(code).toBe(lines('def f():', "    'doc'", '    return 3'));
        expect(log.results.map(r => r.summary)).toEqual([
            'removed expression statement with no effect',
            'removed pass'
        ]);
    });

    it('keeps calls that may have effects', () => {
        expect(rewrite(lines('print(1)', '2', 'None'), junkStatement).code).toBe('print(1)\n');
    });

    it('keeps the last statement of a block', () => {
        const source = lines('if x:', '    pass');

        expect(rewrite(source, junkStatement).code).toBe(source);
    });

    it('does not turn a string into a docstring', () => {
        const source = lines('def f():', '    0', "    'text'", '    return 1');

        expect(rewrite(source, junkStatement).code).toBe(lines('def f():', '    return 1'));
    });
});
