import { describe, expect, it } from 'vitest';
import { decoderCall } from '../../../../src/deobfuscator/patterns/calls/decoderCall';
import { unusedIndirectionHelper } from '../../../../src/deobfuscator/patterns/calls/unusedIndirectionHelper';
import { lines, rewrite } from '../../../util';

const DECODER = lines('def decode(s, k):', "    return ''.join(chr(ord(c) - k) for c in s)", '', '');
const BYTES_DECODER = "__d0__ = lambda b: ''.join(map(lambda n: chr(int(n) - int(b'7')), b.decode().split('\\x00')))";
const ENCODED_SOURCE = "b'127\\x0039\\x0068\\x0039\\x0056\\x0017'";

describe('decoderCall', () => {
    it('replaces calls with the value the helper returns', () => {
        const { code, log } = rewrite(DECODER + "print(decode('khoor', 3))\n", decoderCall);

        expect(code).toBe(DECODER + "print('hello')\n");
        expect(log.results.map(r => r.summary)).toEqual(["replaced call to decode with 'hello'"]);
    });

    it('removes the helper once nothing calls it', () => {
        const { code } = rewrite(DECODER + "print(decode('khoor', 3))\n", decoderCall, unusedIndirectionHelper);

        expect(code).toBe("print('hello')\n");
    });

    it('reads arguments from module constants', () => {
        const source = DECODER + lines('KEY = 1', "print(decode('ifmmp', KEY))");

        expect(rewrite(source, decoderCall).code).toBe(DECODER + lines('KEY = 1', "print('hello')"));
    });

    it('decodes with a lambda helper', () => {
        const source = lines('rev = lambda s: s[::-1]', "print(rev('olleh'))");

        expect(rewrite(source, decoderCall).code).toBe(lines('rev = lambda s: s[::-1]', "print('hello')"));
    });

    it('leaves helpers that read mutable state', () => {
        const source = lines('table = []', '', '', 'def lookup(i):', '    return table[i]', '', '', 'print(lookup(0))');

        expect(rewrite(source, decoderCall).code).toBe(source);
    });

    it('leaves arguments that are not constant', () => {
        const source = DECODER + 'print(decode(name, 3))\n';

        expect(rewrite(source, decoderCall).code).toBe(source);
    });

    it('reports calls the helper cannot evaluate', () => {
        const { log } = rewrite(DECODER + 'print(decode(5, 3))\n', decoderCall);

        expect(log.warnings).toMatchObject([
            {
                kind: 'UnsafeRewriteSkipped',
                pattern: 'decoderCall',
                nodeType: 'Call',
                reason: 'decode could not be evaluated for these arguments'
            }
        ]);
    });

    it('decodes the argument of a module-level exec', () => {
        const source = lines(BYTES_DECODER, `exec(__d0__(${ENCODED_SOURCE}))`);
        const { code, log } = rewrite(source, decoderCall, unusedIndirectionHelper);

        expect(code).toBe("exec('x = 1\\n')\n");
        expect(log.results.map(r => r.summary)).toEqual([
            "replaced call to __d0__ with 'x = 1\\n'",
            'removed unused helper __d0__'
        ]);
    });

    it('decodes for exec with a def helper', () => {
        const source = lines(
            'def __d0__(b):',
            "    return ''.join(map(lambda n: chr(int(n) - int(b'7')), b.decode().split('\\x00')))",
            '',
            '',
            `exec(__d0__(${ENCODED_SOURCE}))`
        );

        expect(rewrite(source, decoderCall, unusedIndirectionHelper).code).toBe("exec('x = 1\\n')\n");
    });

    it('leaves helpers that are read after a module-level exec', () => {
        const source = lines(
            BYTES_DECODER,
            `exec(__d0__(${ENCODED_SOURCE}))`,
            `print(__d0__(${ENCODED_SOURCE}))`
        );

        expect(rewrite(source, decoderCall).log.results).toEqual([]);
    });
});
