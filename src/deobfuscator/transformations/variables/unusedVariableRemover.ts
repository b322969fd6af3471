import { Assign, Expression, Name, Statement } from '../../ast/nodes';
import { Binding, ScopeTree, analyzeScopes } from '../../ast/scope';
import { walk } from '../../ast/traverse';
import { Evaluator } from '../../helpers/evaluator';
import { keepNonEmpty, transformTree } from '../../helpers/misc';
import { isObfuscatedName } from '../../helpers/naming';
import { LogFunction, Transformation, TransformationProperties } from '../transformation';

export class UnusedVariableRemover extends Transformation {
    public static readonly properties: TransformationProperties = {
        key: 'unusedVariableRemoval'
    };

    /**
     * Executes the transformation.
     * @param log The log function.
     */
    public execute(log: LogFunction): boolean {
        const scopes = analyzeScopes(this.module);
        const assignments = this.getSimpleAssignments();
        const boundNames = new Set(scopes.allBindings().map(b => b.name));
        const evaluator = new Evaluator({ isBuiltin: name => !boundNames.has(name) });
        const hasDynamicScope = scopes.allScopes().some(s => s.isDynamic);

        const unused = new Set<Statement>();
        for (const binding of scopes.allBindings()) {
            if (!this.isCandidate(binding, scopes, hasDynamicScope)) {
                continue;
            }

            const statements: Assign[] = [];
            for (const site of binding.sites) {
                const assignment = site.kind == 'name' ? assignments.get(site.node) : undefined;
                if (!assignment || !this.isRemovableValue(assignment.value, evaluator)) {
                    break;
                }
                statements.push(assignment);
            }

            if (statements.length == binding.sites.length) {
                statements.forEach(s => unused.add(s));
                this.context.log.recordRewrite(
                    UnusedVariableRemover.properties.key,
                    statements[0],
                    `removed unused variable ${binding.name}`,
                    this.context.pass
                );
            }
        }

        if (unused.size > 0) {
            transformTree(this.module, {
                block: body => keepNonEmpty(body, body.filter(statement => !unused.has(statement)))
            });
            this.setChanged();
        }

        return this.hasChanged();
    }

    /**
     * Returns whether a binding is never read and may be removed. Module globals
     * are only removed when they carry an obfuscator-generated name.
     * @param binding The binding.
     * @param scopes The scope tree.
     * @param hasDynamicScope Whether any scope accesses variables by name.
     * @returns Whether.
     */
    private isCandidate(binding: Binding, scopes: ScopeTree, hasDynamicScope: boolean): boolean {
        const scope = binding.scope;
        const isLocal = scope.kind == 'function' && binding.kind == 'local';
        const isObfuscatedGlobal =
            scope == scopes.root && binding.kind == 'global' && !hasDynamicScope && isObfuscatedName(binding.name);

        return (
            (isLocal || isObfuscatedGlobal) &&
            binding.sites.length > 0 &&
            binding.references.length == 0 &&
            binding.deletions.length == 0 &&
            binding.capturedBy.size == 0 &&
            !scope.globalNames.has(binding.name) &&
            !scope.nonlocalNames.has(binding.name) &&
            !scope.isDynamic
        );
    }

    /**
     * Returns whether evaluating a value can have no effect, so that dropping
     * its assignment changes nothing.
     */
    private isRemovableValue(value: Expression, evaluator: Evaluator): boolean {
        if (value.type == 'Constant') {
            return true;
        } else if (value.type == 'Lambda') {
            const args = value.args;
            return [...args.posonly, ...args.args, ...args.kwonly].every(p => p.default == undefined);
        }
        return evaluator.evaluate(value) != undefined;
    }

    /**
     * Maps the target of every `name = value` statement to the statement.
     */
    private getSimpleAssignments(): Map<Name, Assign> {
        const assignments = new Map<Name, Assign>();
        walk(this.module, node => {
            if (node.type == 'Assign' && node.targets.length == 1) {
                const [target] = node.targets;
                if (target.type == 'Name') {
                    assignments.set(target, node);
                }
            }
        });
        return assignments;
    }
}
