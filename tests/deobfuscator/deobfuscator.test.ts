import { afterEach, describe, expect, it, vi } from 'vitest';
import { parse } from '../../src/deobfuscator/ast/parser';
import { Deobfuscator, SIGNATURE } from '../../src/deobfuscator/deobfuscator';
import { Pattern, expressionPattern } from '../../src/deobfuscator/patterns/pattern';
import { RewriteLog } from '../../src/deobfuscator/rewriter/rewriteLog';
import { Config } from '../../src/deobfuscator/transformations/config';
import { integerSwap, lines, silentConfig } from '../util';

function run(source: string, config: Config = silentConfig, catalog?: Pattern[]): { code: string; log: RewriteLog } {
    const log = new RewriteLog();
    const code = new Deobfuscator(parse(source), config, log, catalog).execute();
    return { code, log };
}

describe('Deobfuscator', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('reduces a decompiled Specter module to the source it executes', () => {
        const source = lines(
            '(__k1__, __k2__) = (',
            "    b'119\\x00121\\x00112\\x00117\\x00123\\x0047\\x0046\\x00111\\x00112\\x0046\\x0048\\x0017',",
            "    b'127\\x0039\\x0068\\x0039\\x0056\\x0017'",
            ')',
            '',
            "__d0__ = lambda b: ''.join(map(lambda n: chr(int(n) - int(b'7')), b.decode().split('\\x00')))",
            '',
            "exec(''.join([",
            '    __d0__(__k2__),',
            '    __d0__(__k1__)',
            ']))'
        );
        const { code, log } = run(source);

        expect(code).toBe(lines('x = 1', "print('hi')"));
        expect(log.hasConverged).toBe(true);
    });

    it('undoes decoder calls and a flattened dispatcher together', () => {
        const source = lines(
            'def _0x10(s, k):',
            "    return ''.join(chr(ord(c) - k) for c in s)",
            '',
            '',
            '_0x20 = 0',
            'while True:',
            '    if _0x20 == 0:',
            '        _0x13 = 6 * 7',
            '        _0x20 = 1',
            '    elif _0x20 == 1:',
            "        print(_0x10('khoor', 3), _0x13)",
            '        break'
        );
        const { code, log } = run(source);

        expect(code).toBe(lines('var_1 = 42', "print('hello', var_1)"));
        expect(log.hasConverged).toBe(true);
        expect(log.renames).toEqual([{ original: '_0x13', renamed: 'var_1', kind: 'global' }]);
    });

    it('reaches a fixed point', () => {
        const once = run(lines('_0x1 = (6 * 7) ^ 0', 'print(_0x1)')).code;
        const { code, log } = run(once);

        expect(once).toBe(lines('var_1 = 42', 'print(var_1)'));
        expect(code).toBe(once);
        expect(log.results).toEqual([]);
    });

    it('leaves clean code unchanged', () => {
        const source = lines(
            'def greet(name):',
            "    message = 'hi ' + name",
            '    return message',
            '',
            '',
            'print(greet(input()))'
        );
        const { code, log } = run(source);

        expect(code).toBe(source);
        expect(log.results).toEqual([]);
        expect(log.renames).toEqual([]);
    });

    it('puts the banner at the top when a signature is requested', () => {
        expect(run('x = 1\n', { ...silentConfig, signature: true }).code).toBe(SIGNATURE + 'x = 1\n');
    });

    it('skips disabled transformations', () => {
        const config: Config = {
            ...silentConfig,
            patternRewriting: { ...silentConfig.patternRewriting, opaqueLiteral: false },
            expressionSimplification: { isEnabled: false }
        };

        expect(run('x = 2 + 3\n', config).code).toBe('x = 2 + 3\n');
    });

    it('skips disabled patterns', () => {
        const config: Config = {
            ...silentConfig,
            patternRewriting: { ...silentConfig.patternRewriting, tupleUnpacking: false }
        };

        expect(run("a, b = 1, 'x'\n", config).code).toBe("a, b = 1, 'x'\n");
    });

    it('reports rewriting that does not converge', () => {
        const catalog = [integerSwap('oneToTwo', 1n, 2n), integerSwap('twoToOne', 2n, 1n)];
        const { code, log } = run('x = 1\n', { ...silentConfig, maxIterations: 4 }, catalog);

        expect(code).toBe('x = 1\n');
        expect(log.hasConverged).toBe(false);
        expect(log.warnings).toMatchObject([{ kind: 'RewriteDidNotConverge', iterations: 4 }]);
        expect(log.unresolved.map(u => u.pattern)).toEqual(['twoToOne']);
    });

    it('carries on when a transformation throws', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const failing = expressionPattern<undefined>({
            key: 'failing',
            description: 'always fails',
            match: () => {
                throw new Error('boom');
            },
            rewrite: (capture, node) => node,
            describe: () => 'never'
        });

        expect(run('x = 2 + 3\n', silentConfig, [failing]).code).toBe('x = 5\n');
        // once in each of the two passes
        expect(error).toHaveBeenCalledTimes(2);
        expect(error).toHaveBeenCalledWith(new Error('boom'));
    });
});
