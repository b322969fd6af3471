import { describe, expect, it } from 'vitest';
import { IdentifierRenamer } from '../../../../src/deobfuscator/transformations/variables/identifierRenamer';
import { lines, transform } from '../../../util';

describe('IdentifierRenamer', () => {
    it('renames bindings by kind across nested scopes', () => {
        const source = lines(
            'def _0x1a(_0x2b):',
            '    _0x3c = _0x2b + 1',
            '    def _0x4d():',
            '        return _0x3c',
            '    return _0x4d()'
        );
        const { code, log } = transform(source, IdentifierRenamer);

        expect(code).toBe(
            lines(
                'def func_1(arg_1):',
                '    var_1 = arg_1 + 1',
                '',
                '    def func_2():',
                '        return var_1',
                '',
                '    return func_2()'
            )
        );
        expect(log.renames).toEqual([
            { original: '_0x1a', renamed: 'func_1', kind: 'function' },
            { original: '_0x2b', renamed: 'arg_1', kind: 'parameter' },
            { original: '_0x3c', renamed: 'var_1', kind: 'local' },
            { original: '_0x4d', renamed: 'func_2', kind: 'function' }
        ]);
    });

    it('keeps parameters passed by keyword', () => {
        const source = lines('def _0xa(_0xb):', '    return _0xb', '', '', '_0xa(_0xb=1)');

        expect(transform(source, IdentifierRenamer).code).toBe(
            lines('def func_1(_0xb):', '    return _0xb', '', '', 'func_1(_0xb=1)')
        );
    });

    it('skips names already in use', () => {
        const { code, log } = transform(lines('var_1 = 5', '_0x1 = var_1', 'print(_0x1)'), IdentifierRenamer);

        expect(code).toBe(lines('var_1 = 5', 'var_2 = var_1', 'print(var_2)'));
        expect(log.renames).toEqual([{ original: '_0x1', renamed: 'var_2', kind: 'global' }]);
    });

    it('does not rename around eval', () => {
        const source = lines('def f():', '    _0x1 = 1', "    return eval('_0x1')");
        const { code, changed } = transform(source, IdentifierRenamer);

        expect(code).toBe(source);
        expect(changed).toBe(false);
    });

    it('leaves readable names alone', () => {
        expect(transform('total = 1\n', IdentifierRenamer).changed).toBe(false);
    });
});
