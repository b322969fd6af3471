import { describe, expect, it } from 'vitest';
import { DecompilationFailedError } from '../../src/deobfuscator/errors';
import { PycdcDecompiler, countLines } from '../../src/payload/decompiler';

describe('PycdcDecompiler', () => {
    it('fails when pycdc is missing', () => {
        const decompiler = new PycdcDecompiler({ path: './missing/pycdc' });

        expect(() => decompiler.decompile(new Uint8Array([1, 2]))).toThrow(DecompilationFailedError);
        expect(() => decompiler.decompile(new Uint8Array([1, 2]))).toThrow("Couldn't find pycdc at ./missing/pycdc");
    });
});

describe('countLines', () => {
    it.each([
        ['', 0],
        ['a', 1],
        ['a\n', 1],
        ['a\nb', 2],
        ['a\n\n', 2]
    ])('counts %j as %i line(s)', (text, expected) => {
        expect(countLines(text)).toBe(expected);
    });
});
