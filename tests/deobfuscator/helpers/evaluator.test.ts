import { describe, expect, it } from 'vitest';
import { parseExpression } from '../../../src/deobfuscator/ast/parser';
import { Evaluator, PyValue, pyRepr } from '../../../src/deobfuscator/helpers/evaluator';

function evaluate(source: string, evaluator: Evaluator = new Evaluator()): string | undefined {
    const value = evaluator.evaluate(parseExpression(source));
    return value && pyRepr(value);
}

describe('Evaluator', () => {
    it('follows Python integer semantics', () => {
        expect(evaluate('-7 // 2')).toBe('-4');
        expect(evaluate('-7 % 3')).toBe('2');
        expect(evaluate('2 ** 100')).toBe('1267650600228229401496703205376');
        expect(evaluate('~5 ^ 3')).toBe('-7');
        expect(evaluate('7 / 2')).toBe('3.5');
    });

    it('evaluates comparisons and boolean operators', () => {
        expect(evaluate('1 < 2 < 3')).toBe('True');
        expect(evaluate('3 > 2 > 2')).toBe('False');
        expect(evaluate("0 or '' or 'x'")).toBe("'x'");
        expect(evaluate('1 and 0')).toBe('0');
        expect(evaluate('not []')).toBe('True');
    });

    it('works on strings, bytes and sequences', () => {
        expect(evaluate("'abc'[::-1]")).toBe("'cba'");
        expect(evaluate("'ab' * 3")).toBe("'ababab'");
        expect(evaluate("b'hi'.decode()")).toBe("'hi'");
        expect(evaluate("'a-b-c'.split('-')")).toBe("['a', 'b', 'c']");
        expect(evaluate("''.join(chr(c) for c in [104, 105])")).toBe("'hi'");
        expect(evaluate("bytes([72, 105])")).toBe("b'Hi'");
        expect(evaluate('(1, 2) + (3,)')).toBe('(1, 2, 3)');
        expect(evaluate('len((1, 2, 3))')).toBe('3');
    });

    it('calls lambdas and map', () => {
        expect(evaluate('(lambda a, b: a * b)(6, 7)')).toBe('42');
        expect(evaluate("''.join(map(lambda n: chr(n - 1), [105, 106]))")).toBe("'hi'");
        expect(evaluate("int('ff', 16)")).toBe('255');
    });

    it('refuses anything that would raise', () => {
        expect(evaluate('1 // 0')).toBeUndefined();
        expect(evaluate("'a' + 1")).toBeUndefined();
        expect(evaluate('(1, 2)[5]')).toBeUndefined();
        expect(evaluate('chr(-1)')).toBeUndefined();
        expect(evaluate("int('x')")).toBeUndefined();
    });

    it('refuses unknown names and calls', () => {
        expect(evaluate('x + 1')).toBeUndefined();
        expect(evaluate('print(1)')).toBeUndefined();
        expect(evaluate('len(x)')).toBeUndefined();
    });

    it('refuses values past the size bounds', () => {
        expect(evaluate('2 ** 100000')).toBeUndefined();
        expect(evaluate("'a' * 100000")).toBeUndefined();
    });

    it('only calls builtins that are not shadowed', () => {
        const evaluator = new Evaluator({ isBuiltin: name => name != 'chr' });

        expect(evaluate('chr(65)', evaluator)).toBeUndefined();
        expect(evaluate('ord("A")', evaluator)).toBe('65');
    });

    it('resolves helpers and constants through its options', () => {
        const key: PyValue = { kind: 'int', value: 3n };
        const evaluator = new Evaluator({
            resolveFunction: name =>
                name == 'shift' ? { params: ['c'], body: parseExpression('chr(ord(c) + KEY)') } : undefined,
            resolveConstant: name => (name == 'KEY' ? key : undefined)
        });

        expect(evaluate("shift('a')", evaluator)).toBe("'d'");
    });

    it('calls a helper with argument values', () => {
        const evaluator = new Evaluator();
        const twice = { params: ['s'], body: parseExpression('s + s') };
        const upper = { params: ['s'], body: parseExpression('s.upper()') };
        const value: PyValue = { kind: 'str', value: 'ab' };

        expect(evaluator.call(twice, [value])).toEqual({ kind: 'str', value: 'abab' });
        expect(evaluator.call(upper, [value])).toBeUndefined();
        expect(evaluator.call(twice, [])).toBeUndefined();
    });
});
