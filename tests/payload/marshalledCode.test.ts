import { describe, expect, it } from 'vitest';
import { parse } from '../../src/deobfuscator/ast/parser';
import { extractMarshalledCode, findMarshalledPieces } from '../../src/payload/marshalledCode';
import { lines } from '../util';

describe('extractMarshalledCode', () => {
    it('joins the pieces, keeping the last value of each name', () => {
        const source = lines(
            "__x__ = (0, define(0, b'\\x01'))",
            "__y__ = (0, define(0, b'\\x03'))",
            "__x__ = (0, define(0, b'\\x04'))"
        );
        const module = parse(source);

        expect(Array.from(findMarshalledPieces(module).keys())).toEqual(['__x__', '__y__']);
        expect(Array.from(extractMarshalledCode(module) ?? [])).toEqual([4, 3]);
    });

    it('ignores assignments that do not carry bytes', () => {
        const source = lines("name = (0, define(0, b'\\x01'))", "__z__ = (0, define(0, 'text'))", '__w__ = 1');

        expect(extractMarshalledCode(parse(source))).toBeUndefined();
    });

    it('returns undefined for a file without a payload', () => {
        expect(extractMarshalledCode(parse('print(1)\n'))).toBeUndefined();
    });
});
