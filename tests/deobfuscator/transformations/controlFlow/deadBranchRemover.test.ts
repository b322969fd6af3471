import { describe, expect, it } from 'vitest';
import { DeadBranchRemover } from '../../../../src/deobfuscator/transformations/controlFlow/deadBranchRemover';
import { lines, transform, unsafeReasons } from '../../../util';

describe('DeadBranchRemover', () => {
    it('keeps the else branch of an if that never runs', () => {
        const { code, log } = transform(lines('if 0:', '    a()', 'else:', '    b()'), DeadBranchRemover);

        expect(code).toBe('b()\n');
        expect(log.results.map(r => [r.nodeType, r.summary])).toEqual([['If', 'kept the else branch of if']]);
    });

    it('keeps the body of an if that always runs', () => {
        expect(transform(lines('if True:', '    a()'), DeadBranchRemover).code).toBe('a()\n');
    });

    it('removes a loop that never runs', () => {
        const { code, log } = transform(lines('while 0:', '    a()'), DeadBranchRemover);

        expect(code).toBe('pass\n');
        expect(log.results.map(r => r.summary)).toEqual(['removed loop that never runs']);
    });

    it('keeps code that is the only place a name is bound', () => {
        const source = lines('def f():', '    if False:', '        x = 1', '    return x');
        const { code, log } = transform(source, DeadBranchRemover);

        expect(code).toBe(source);
        expect(log.warnings).toMatchObject([
            {
                kind: 'UnsafeRewriteSkipped',
                pattern: 'deadBranchRemoval',
                nodeType: 'If',
                reason: 'the unreachable code is the only place x is bound'
            }
        ]);
    });

    it('keeps a yield that makes its function a generator', () => {
        const source = lines('def g():', '    if 0:', '        yield 1', '    return 2');
        const { code, log } = transform(source, DeadBranchRemover);

        expect(code).toBe(source);
        expect(unsafeReasons(log)).toEqual(['the unreachable code makes its function a generator']);
    });

    it('simplifies conditional expressions', () => {
        const { code, log } = transform('v = a if 1 else b\n', DeadBranchRemover);

        expect(code).toBe('v = a\n');
        expect(log.results.map(r => r.summary)).toEqual(['kept the first branch']);
    });

    it('removes an else that only passes', () => {
        const { code, log } = transform(lines('for i in x:', '    f(i)', 'else:', '    pass'), DeadBranchRemover);

        expect(code).toBe(lines('for i in x:', '    f(i)'));
        expect(log.results.map(r => r.summary)).toEqual(['removed empty else of For']);
    });
});
