import { describe, expect, it } from 'vitest';
import { execLiteralSource } from '../../../../src/deobfuscator/patterns/statements/execLiteralSource';
import { UnsafeRewriteSkipped } from '../../../../src/deobfuscator/rewriter/rewriteLog';
import { lines, rewrite } from '../../../util';

function unsafeReasons(warnings: readonly { kind: string }[]): string[] {
    return warnings
        .filter((w): w is UnsafeRewriteSkipped => w.kind == 'UnsafeRewriteSkipped')
        .map(w => w.reason);
}

describe('execLiteralSource', () => {
    it('inlines module-level exec of a string literal', () => {
        const { code, log } = rewrite("exec('x = 1\\nprint(x)')\n", execLiteralSource);

        expect(code).toBe(lines('x = 1', 'print(x)'));
        expect(log.results.map(r => r.summary)).toEqual(['inlined 2 statement(s) from exec']);
    });

    it('inlines nested exec calls over several passes', () => {
        const { code, log } = rewrite('exec("exec(\'y = 2\')")\n', execLiteralSource);

        expect(code).toBe('y = 2\n');
        expect(log.results.map(r => r.pass)).toEqual([1, 2]);
    });

    it('leaves exec inside a function', () => {
        const source = lines('def f():', "    exec('y = 2')");

        expect(rewrite(source, execLiteralSource).code).toBe(source);
    });

    it('leaves exec when the name is rebound', () => {
        const source = lines('exec = print', "exec('y = 2')");

        expect(rewrite(source, execLiteralSource).code).toBe(source);
    });

    it('reports source that would behave differently inline', () => {
        const { code, log } = rewrite("exec('return 1')\n", execLiteralSource);

        expect(code).toBe("exec('return 1')\n");
        expect(unsafeReasons(log.warnings)).toEqual([
            'source passed to exec uses return, yield or await outside a function'
        ]);
    });

    it('reports source that does not parse', () => {
        const { log } = rewrite("exec('x = $')\n", execLiteralSource);

        const reasons = unsafeReasons(log.warnings);
        expect(reasons).toHaveLength(1);
        expect(reasons[0]).toMatch(/^source passed to exec does not parse: invalid syntax \(line 1, column \d+\)$/);
    });
});
