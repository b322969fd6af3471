import { describe, expect, it } from 'vitest';
import type { Decompiler } from '../src/index';
import {
    PayloadNotFoundError,
    PythonSyntaxError,
    deobfuscate,
    deobfuscateProtected,
    deobfuscateWithReport
} from '../src/index';
import { lines, silentConfig } from './util';

class FakeDecompiler implements Decompiler {
    public readonly received: number[][] = [];

    constructor(private readonly output: string) {}

    public decompile(bytecode: Uint8Array): string {
        this.received.push(Array.from(bytecode));
        return this.output;
    }
}

describe('deobfuscate', () => {
    it('returns the rewritten source', () => {
        expect(deobfuscate(lines('_0x1 = (6 * 7) ^ 0', 'print(_0x1)'), silentConfig)).toBe(
            lines('var_1 = 42', 'print(var_1)')
        );
    });

    it('throws on source that does not parse', () => {
        expect(() => deobfuscate('x = 1 $ 2\n', silentConfig)).toThrow(PythonSyntaxError);
    });
});

describe('deobfuscateWithReport', () => {
    it('records loader warnings with the rewrites', () => {
        const source = lines('try:', '    f()', 'except ValueError, e:', '    g(e)');
        const { code, log } = deobfuscateWithReport(source, silentConfig);

        expect(code).toBe(lines('try:', '    f()', 'except ValueError as e:', '    g(e)'));
        expect(log.warnings).toEqual([
            {
                kind: 'LoaderWarning',
                message: 'legacy except clause loaded as `except ... as ...`',
                loc: { line: 3, column: 0 }
            }
        ]);
    });

    it('serializes the log', () => {
        const { log } = deobfuscateWithReport('_0x1 = 1\nprint(_0x1)\n', silentConfig);

        expect(JSON.parse(JSON.stringify(log))).toEqual({
            results: [],
            warnings: [],
            renames: [{ original: '_0x1', renamed: 'var_1', kind: 'global' }]
        });
    });
});

describe('deobfuscateProtected', () => {
    it('decompiles the payload and deobfuscates the result', () => {
        const decompiler = new FakeDecompiler(lines('_0x1 = 6 * 7', 'print(_0x1)'));
        const { code } = deobfuscateProtected("__x__ = (0, load(0, b'\\x10\\x20'))\n", decompiler, silentConfig);

        expect(code).toBe(lines('var_1 = 42', 'print(var_1)'));
        expect(decompiler.received).toEqual([[0x10, 0x20]]);
    });

    it('fails when the file carries no payload', () => {
        const decompiler = new FakeDecompiler('');

        expect(() => deobfuscateProtected('print(1)\n', decompiler, silentConfig)).toThrow(
            new PayloadNotFoundError('No marshalled code found in the protected file')
        );
        expect(decompiler.received).toEqual([]);
    });
});
