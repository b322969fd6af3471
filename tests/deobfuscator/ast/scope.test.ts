import { describe, expect, it } from 'vitest';
import { FunctionDef, Statement } from '../../../src/deobfuscator/ast/nodes';
import { parse } from '../../../src/deobfuscator/ast/parser';
import { Binding, Scope, analyzeScopes } from '../../../src/deobfuscator/ast/scope';

function bindingNamed(scope: Scope, name: string): Binding {
    const binding = scope.bindings.get(name);
    if (!binding) {
        throw new Error(`expected a binding for ${name}`);
    }
    return binding;
}

function asFunction(statement: Statement | undefined): FunctionDef {
    if (!statement || statement.type != 'FunctionDef') {
        throw new Error('expected a function definition');
    }
    return statement;
}

describe('analyzeScopes', () => {
    const module = parse(
        [
            'x = 1',
            'def f(a):',
            '    global x',
            '    x = a',
            '    def g():',
            '        return a',
            '    return g',
            ''
        ].join('\n')
    );
    const scopes = analyzeScopes(module);
    const f = asFunction(module.body[1]);
    const g = asFunction(f.body[2]);

    it('binds module names in the module scope', () => {
        expect(Array.from(scopes.root.bindings.keys())).toEqual(['x', 'f']);
        expect(scopes.root.bindings.get('f')?.kind).toBe('function');
    });

    it('binds stores under a global declaration in the module scope', () => {
        const x = scopes.root.bindings.get('x');
        const fScope = scopes.scopeOf(f);

        expect(x?.kind).toBe('global');
        expect(x?.storeCount).toBe(2);
        expect(x?.sites.map(s => s.kind)).toEqual(['name', 'declaration', 'name']);
        expect(fScope?.bindings.has('x')).toBe(false);
        expect(fScope && x?.capturedBy.has(fScope)).toBe(true);
    });

    it('tracks parameters read by nested functions', () => {
        const a = scopes.scopeOf(f)?.bindings.get('a');
        const gScope = scopes.scopeOf(g);

        expect(a?.kind).toBe('parameter');
        expect(a?.references).toHaveLength(2);
        expect(gScope && a?.capturedBy.has(gScope)).toBe(true);
    });

    it('resolves reads to their bindings', () => {
        const [returned] = f.body.slice(-1);
        const value = returned.type == 'Return' ? returned.value : undefined;

        expect(value?.type == 'Name' && scopes.bindingOf(value)?.kind).toBe('function');
    });

    it('hides class attributes from nested functions', () => {
        const tree = analyzeScopes(parse('class C:\n    y = 1\n\n    def m(self):\n        return y\n'));

        expect(tree.unresolved.map(n => n.id)).toEqual(['y']);
    });

    it('binds nonlocal stores in the enclosing function', () => {
        const tree = analyzeScopes(
            parse('def outer():\n    n = 0\n    def inc():\n        nonlocal n\n        n += 1\n    return inc\n')
        );
        const outer = tree.root.children[0];
        const n = outer.bindings.get('n');

        expect(outer.children[0].bindings.has('n')).toBe(false);
        expect(n?.storeCount).toBe(2);
        expect(n?.references).toHaveLength(1);
    });

    it('marks scopes that access variables by name', () => {
        const tree = analyzeScopes(parse('def f():\n    return locals()\n\n\ndef g():\n    return globals()\n'));
        const [fScope, gScope] = tree.root.children;

        expect(fScope.isDynamic).toBe(true);
        expect(gScope.isDynamic).toBe(false);
        expect(tree.root.isDynamic).toBe(true);
    });

    it('opens the module scope from the first module-level exec statement', () => {
        const tree = analyzeScopes(parse('a = 1\nb = 2\nexec(code)\nc = a\n'));
        const root = tree.root;

        expect(root.dynamicFrom).toBe(2);
        expect(root.isSettledBeforeDynamicAccess(bindingNamed(root, 'b'))).toBe(true);
        expect(root.isSettledBeforeDynamicAccess(bindingNamed(root, 'a'))).toBe(false);
        expect(root.isSettledBeforeDynamicAccess(bindingNamed(root, 'c'))).toBe(false);
    });

    it('opens the module scope from the start for exec inside a loop', () => {
        const tree = analyzeScopes(parse('a = 1\nfor part in parts:\n    exec(part)\n'));

        expect(tree.root.dynamicFrom).toBe(0);
        expect(tree.root.isSettledBeforeDynamicAccess(bindingNamed(tree.root, 'a'))).toBe(false);
    });

    it('ignores a shadowed dynamic builtin', () => {
        const tree = analyzeScopes(parse('def locals():\n    return {}\n\n\ndef f():\n    return locals()\n'));

        expect(tree.allScopes().some(s => s.isDynamic)).toBe(false);
    });
});
