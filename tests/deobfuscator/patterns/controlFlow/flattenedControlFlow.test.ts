import { describe, expect, it } from 'vitest';
import { flattenedControlFlow } from '../../../../src/deobfuscator/patterns/controlFlow/flattenedControlFlow';
import { lines, rewrite } from '../../../util';

describe('flattenedControlFlow', () => {
    it('lays out the states in the order they run', () => {
        const source = lines(
            'state = 0',
            'while True:',
            '    if state == 0:',
            '        print(1)',
            '        state = 2',
            '    elif state == 1:',
            '        print(3)',
            '        break',
            '    elif state == 2:',
            '        print(2)',
            '        state = 1'
        );
        const { code, log } = rewrite(source, flattenedControlFlow);

        expect(code).toBe(lines('print(1)', 'print(2)', 'print(3)'));
        expect(log.results.map(r => r.summary)).toEqual(['flattened dispatcher on state through states 0, 2, 1']);
    });

    it('keeps the final state when it is read after the loop', () => {
        const source = lines(
            'state = 0',
            'while state != 2:',
            '    if state == 0:',
            '        a()',
            '        state = 1',
            '    elif state == 1:',
            '        b()',
            '        state = 2',
            'print(state)'
        );

        expect(rewrite(source, flattenedControlFlow).code).toBe(lines('a()', 'b()', 'state = 2', 'print(state)'));
    });

    it('keeps a return that leaves the loop', () => {
        const source = lines(
            'def f():',
            '    s = 5',
            '    while True:',
            '        if s == 5:',
            '            x = g()',
            '            s = 6',
            '        elif s == 6:',
            '            return x'
        );

        expect(rewrite(source, flattenedControlFlow).code).toBe(lines('def f():', '    x = g()', '    return x'));
    });

    it('leaves loops that revisit a state', () => {
        const source = lines(
            'state = 0',
            'while True:',
            '    if state == 0:',
            '        tick()',
            '        state = 1',
            '    elif state == 1:',
            '        tock()',
            '        state = 0'
        );

        expect(rewrite(source, flattenedControlFlow).code).toBe(source);
    });

    it('leaves branches that compute the next state', () => {
        const source = lines(
            'state = 0',
            'while True:',
            '    if state == 0:',
            '        state = state + 1',
            '    elif state == 1:',
            '        break'
        );

        expect(rewrite(source, flattenedControlFlow).code).toBe(source);
    });
});
