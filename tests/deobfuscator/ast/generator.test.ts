import { describe, expect, it } from 'vitest';
import generate from '../../../src/deobfuscator/ast/generator';
import { Module } from '../../../src/deobfuscator/ast/nodes';
import { parse } from '../../../src/deobfuscator/ast/parser';

function roundTrip(source: string): string {
    return generate(parse(source));
}

describe('generate', () => {
    it('reproduces canonical source', () => {
        const source = [
            'import os',
            '',
            '',
            'class Reader(object):',
            '    mode = "rb"',
            '',
            '    def read(self, path, *args, **kwargs):',
            '        with open(path, self.mode) as handle:',
            '            return handle.read(*args, **kwargs)',
            '',
            '',
            'def main():',
            '    try:',
            '        data = Reader().read(os.sep)',
            '    except (IOError, OSError) as err:',
            '        print(err)',
            '    else:',
            '        print(len(data))',
            '    finally:',
            '        print("done")',
            ''
        ].join('\n');

        expect(roundTrip(source)).toBe(source);
    });

    it('puts one blank line around definitions inside a function', () => {
        const source = 'def outer():\n    x = 1\n    def inner():\n        return x\n    return inner\n';

        expect(roundTrip(source)).toBe(
            'def outer():\n    x = 1\n\n    def inner():\n        return x\n\n    return inner\n'
        );
    });

    it('keeps only the parentheses precedence needs', () => {
        expect(roundTrip('x = ((1 + 2)) * (3)\n')).toBe('x = (1 + 2) * 3\n');
        expect(roundTrip('y = (a if b else c) or (not d)\n')).toBe('y = (a if b else c) or not d\n');
        expect(roundTrip('z = -(2 ** 2)\n')).toBe('z = -2 ** 2\n');
    });

    it('writes elif chains and comprehensions', () => {
        const source = [
            'if a:',
            '    pass',
            'elif b:',
            '    d = {k: v for k, v in items if k}',
            'else:',
            '    s = f"hello {name}!"',
            ''
        ].join('\n');

        expect(roundTrip(source)).toBe(source.replace('f"hello {name}!"', "f'hello {name}!'"));
    });

    it('parenthesizes a negative constant used as the base of a power', () => {
        const module: Module = {
            type: 'Module',
            body: [
                {
                    type: 'Expr',
                    value: {
                        type: 'BinOp',
                        op: '**',
                        left: { type: 'Constant', value: { kind: 'int', value: -2n } },
                        right: { type: 'Constant', value: { kind: 'int', value: 2n } }
                    }
                }
            ]
        };

        expect(generate(module)).toBe('(-2) ** 2\n');
    });

    it('writes constants that carry no source text', () => {
        const module: Module = {
            type: 'Module',
            body: [
                {
                    type: 'Assign',
                    targets: [{ type: 'Name', id: 'x', ctx: 'store' }],
                    value: {
                        type: 'Tuple',
                        ctx: 'load',
                        elts: [
                            { type: 'Constant', value: { kind: 'str', value: "it's" } },
                            { type: 'Constant', value: { kind: 'bytes', value: Uint8Array.from([104, 10, 0]) } },
                            { type: 'Constant', value: { kind: 'float', value: 2 } }
                        ]
                    }
                }
            ]
        };

        expect(generate(module)).toBe('x = "it\'s", b\'h\\n\\x00\', 2.0\n');
    });

    it('prepends the header and writes nothing for an empty module', () => {
        expect(generate(parse('x = 1\n'), { header: '# header\n' })).toBe('# header\nx = 1\n');
        expect(generate(parse(''))).toBe('');
    });
});
