import { describe, expect, it } from 'vitest';
import { parse, parseExpression } from '../../../src/deobfuscator/ast/parser';
import { SourceLocation } from '../../../src/deobfuscator/ast/nodes';
import { PythonSyntaxError } from '../../../src/deobfuscator/errors';

function parseWithWarnings(source: string): { message: string; loc: SourceLocation }[] {
    const warnings: { message: string; loc: SourceLocation }[] = [];
    parse(source, { onWarning: (message, loc) => warnings.push({ message, loc }) });
    return warnings;
}

function syntaxErrorOf(source: string): PythonSyntaxError {
    try {
        parse(source);
    } catch (err) {
        if (err instanceof PythonSyntaxError) {
            return err;
        }
        throw err;
    }
    throw new Error('expected a syntax error');
}

describe('parse', () => {
    it('records statement locations', () => {
        const module = parse('x = 1\n\nif x:\n    y = 2\n');

        expect(module.body.map(s => s.type)).toEqual(['Assign', 'If']);
        expect(module.body[1].loc).toEqual({ line: 3, column: 0 });
    });

    it('loads True, False and None as constants', () => {
        const expression = parseExpression('(True, False, None)');

        expect(expression.type).toBe('Tuple');
        if (expression.type == 'Tuple') {
            expect(expression.elts.map(e => (e.type == 'Constant' ? e.value.kind : e.type))).toEqual([
                'bool',
                'bool',
                'none'
            ]);
        }
    });

    it('decodes string and bytes escapes', () => {
        const text = parseExpression("'a\\x41\\n'");
        const bytes = parseExpression("b'\\x01\\xff'");

        expect(text).toMatchObject({ type: 'Constant', value: { kind: 'str', value: 'aA\n' } });
        expect(bytes.type == 'Constant' && bytes.value.kind == 'bytes' && Array.from(bytes.value.value)).toEqual([
            1, 255
        ]);
    });

    it('loads chained comparisons with two-word operators', () => {
        const expression = parseExpression('a not in b is not c');

        expect(expression).toMatchObject({
            type: 'Compare',
            left: { type: 'Name', id: 'a' },
            ops: ['not in', 'is not'],
            comparators: [
                { type: 'Name', id: 'b' },
                { type: 'Name', id: 'c' }
            ]
        });
    });

    it('flattens chains of the same boolean operator', () => {
        const expression = parseExpression('a and b and c or d');

        expect(expression).toMatchObject({
            type: 'BoolOp',
            op: 'or',
            values: [
                { type: 'BoolOp', op: 'and', values: [{ id: 'a' }, { id: 'b' }, { id: 'c' }] },
                { type: 'Name', id: 'd' }
            ]
        });
    });

    it('loads chained assignments, slices and lambdas', () => {
        const [statement] = parse('a = b = f[1:2, ::3](lambda x, *r, k=1, **kw: x)\n').body;

        expect(statement).toMatchObject({
            type: 'Assign',
            targets: [
                { type: 'Name', id: 'a', ctx: 'store' },
                { type: 'Name', id: 'b', ctx: 'store' }
            ],
            value: {
                type: 'Call',
                func: {
                    type: 'Subscript',
                    slice: {
                        type: 'Tuple',
                        elts: [
                            { type: 'Slice', lower: { type: 'Constant' }, upper: { type: 'Constant' } },
                            { type: 'Slice', step: { type: 'Constant' } }
                        ]
                    }
                },
                args: [
                    {
                        type: 'Lambda',
                        args: {
                            args: [{ name: 'x' }],
                            vararg: { name: 'r' },
                            kwonly: [{ name: 'k' }],
                            kwarg: { name: 'kw' }
                        }
                    }
                ]
            }
        });
    });

    it('ignores comments', () => {
        const module = parse('# header\nx = 1  # trailing\n\ndef f():\n    # inside\n    return x\n');

        expect(module.body.map(s => s.type)).toEqual(['Assign', 'FunctionDef']);
    });

    it('loads relative imports with their level', () => {
        const [statement] = parse('from ..pkg import a as b, c\n').body;

        expect(statement).toMatchObject({
            type: 'ImportFrom',
            module: 'pkg',
            level: 2,
            names: [{ name: 'a', asname: 'b' }, { name: 'c' }]
        });
    });

    it('loads f-string replacement fields', () => {
        const expression = parseExpression("f'{x!r:>{width}} done'");

        expect(expression).toMatchObject({
            type: 'JoinedStr',
            values: [
                {
                    type: 'FormattedValue',
                    value: { type: 'Name', id: 'x' },
                    conversion: 'r',
                    formatSpec: {
                        type: 'JoinedStr',
                        values: [
                            { type: 'Constant', value: { kind: 'str', value: '>' } },
                            { type: 'FormattedValue', value: { type: 'Name', id: 'width' } }
                        ]
                    }
                },
                { type: 'Constant', value: { kind: 'str', value: ' done' } }
            ]
        });
    });

    it('marks assignment targets as stores', () => {
        const [statement] = parse('a, b = c\n').body;

        expect(statement).toMatchObject({
            type: 'Assign',
            targets: [
                {
                    type: 'Tuple',
                    elts: [
                        { type: 'Name', id: 'a', ctx: 'store' },
                        { type: 'Name', id: 'b', ctx: 'store' }
                    ]
                }
            ],
            value: { type: 'Name', id: 'c', ctx: 'load' }
        });
    });
});

describe('syntax errors', () => {
    it('reports source the grammar cannot place', () => {
        const err = syntaxErrorOf('x = 1\ny = 1 $ 2\n');

        expect(err.code).toBe('SYNTAX_ERROR');
        expect(err.reason).toBe('invalid syntax');
        expect(err.line).toBe(2);
        expect(err.message).toBe(`invalid syntax (line 2, column ${err.column})`);
    });

    it('rejects an unterminated string', () => {
        const err = syntaxErrorOf("x = 1\ny = 'abc\n");

        expect(err.code).toBe('SYNTAX_ERROR');
        expect(err.line).toBeGreaterThanOrEqual(2);
    });

    it('rejects an unexpected indent', () => {
        const err = syntaxErrorOf('x = 1\n    y = 2\n');

        expect(err.reason).toBe('unexpected indent');
        expect(err.line).toBe(2);
        expect(err.column).toBe(4);
    });

    it('rejects an unindent that matches no outer level', () => {
        const err = syntaxErrorOf('if x:\n        y = 1\n    z = 2\n');

        expect(err.line).toBe(3);
    });

    it('rejects Python 2 print statements', () => {
        const err = syntaxErrorOf('print "hello"\n');

        expect(err.line).toBe(1);
    });
});

describe('loader warnings', () => {
    it('loads the legacy except clause as except ... as', () => {
        const source = 'try:\n    f()\nexcept ValueError, e:\n    g(e)\n';
        const [statement] = parse(source).body;

        expect(parseWithWarnings(source)).toEqual([
            { message: 'legacy except clause loaded as `except ... as ...`', loc: { line: 3, column: 0 } }
        ]);
        expect(statement).toMatchObject({ type: 'Try', handlers: [{ name: 'e' }] });
    });

    it('loads a header with no suite as pass', () => {
        const source = 'if x:\nprint(1)\n';
        const [statement] = parse(source).body;

        expect(parseWithWarnings(source)).toEqual([
            { message: 'empty block loaded as `pass`', loc: { line: 2, column: 0 } }
        ]);
        expect(statement).toMatchObject({ type: 'If', body: [{ type: 'Pass' }] });
    });

    it('reports nothing for well-formed source', () => {
        expect(parseWithWarnings('def f():\n    return 1\n')).toEqual([]);
    });
});
