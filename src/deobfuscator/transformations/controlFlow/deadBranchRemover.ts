import { Module, Statement, SyntaxNode } from '../../ast/nodes';
import { ScopeTree, allParameters, analyzeScopes } from '../../ast/scope';
import { containsNode, isScopeNode, walk } from '../../ast/traverse';
import { getLiteralTruthiness } from '../../helpers/expression';
import { keepNonEmpty, transformTree } from '../../helpers/misc';
import { LogFunction, Transformation, TransformationProperties } from '../transformation';

export class DeadBranchRemover extends Transformation {
    public static readonly properties: TransformationProperties = {
        key: 'deadBranchRemoval'
    };

    /**
     * Executes the transformation.
     * @param log The log function.
     */
    public execute(log: LogFunction): boolean {
        const guard = new RemovalGuard(this.module);

        transformTree(this.module, {
            expression: node => {
                if (node.type != 'IfExp') {
                    return node;
                }
                const truthiness = getLiteralTruthiness(node.test);
                if (truthiness == undefined) {
                    return node;
                }
                const [kept, dropped] = truthiness ? [node.body, node.orelse] : [node.orelse, node.body];
                return this.remove(guard, node, [dropped], `kept the ${truthiness ? 'first' : 'second'} branch`)
                    ? kept
                    : node;
            },
            block: body => {
                const result = body.flatMap(statement => this.simplifyStatement(guard, statement));
                return keepNonEmpty(body, result);
            }
        });

        return this.hasChanged();
    }

    /**
     * Replaces a conditional statement whose test is a literal with the code that runs.
     * @param guard The removal guard.
     * @param statement The statement.
     * @returns The replacement statements.
     */
    private simplifyStatement(guard: RemovalGuard, statement: Statement): Statement[] {
        if (statement.type == 'If') {
            const truthiness = getLiteralTruthiness(statement.test);
            if (truthiness != undefined) {
                const [kept, dropped] = truthiness
                    ? [statement.body, statement.orelse]
                    : [statement.orelse, statement.body];
                const summary = truthiness ? 'kept the body of if' : 'kept the else branch of if';
                if (this.remove(guard, statement, dropped, summary)) {
                    return kept;
                }
            }
        } else if (statement.type == 'While' && getLiteralTruthiness(statement.test) == false) {
            if (this.remove(guard, statement, statement.body, 'removed loop that never runs')) {
                return statement.orelse;
            }
        }

        if (
            (statement.type == 'If' || statement.type == 'While' || statement.type == 'For' || statement.type == 'Try') &&
            statement.orelse.length == 1 &&
            statement.orelse[0].type == 'Pass'
        ) {
            statement.orelse = [];
            this.record(statement, `removed empty else of ${statement.type}`);
        }
        return [statement];
    }

    /**
     * Drops code if the guard allows it, recording the outcome.
     * @param guard The removal guard.
     * @param node The node being simplified.
     * @param dropped The code that is dropped.
     * @param summary What the simplification does.
     * @returns Whether the code may be dropped.
     */
    private remove(guard: RemovalGuard, node: SyntaxNode, dropped: SyntaxNode[], summary: string): boolean {
        const reason = guard.remove(dropped);
        if (reason) {
            this.context.log.recordUnsafe(DeadBranchRemover.properties.key, node, reason);
            return false;
        }
        this.record(node, summary);
        return true;
    }

    private record(node: SyntaxNode, summary: string): void {
        this.context.log.recordRewrite(DeadBranchRemover.properties.key, node, summary, this.context.pass);
        this.setChanged();
    }
}

/**
 * Decides whether code that never runs can be deleted without changing how
 * the code around it behaves.
 */
class RemovalGuard {
    private readonly scopes: ScopeTree;
    private readonly removed = new Set<object>();

    /**
     * Creates a new removal guard.
     * @param module The module, as it is before any removal.
     */
    constructor(module: Module) {
        this.scopes = analyzeScopes(module);
    }

    /**
     * Marks code as removed if that is safe.
     * @param nodes The code to remove.
     * @returns Undefined when removed, otherwise the reason it must stay.
     */
    public remove(nodes: SyntaxNode[]): string | undefined {
        const inOwnScope = (test: (node: SyntaxNode) => boolean): boolean =>
            nodes.some(node => !isScopeNode(node) && containsNode(node, test, false));

        if (inOwnScope(n => n.type == 'Yield' || n.type == 'YieldFrom')) {
            return 'the unreachable code makes its function a generator';
        } else if (inOwnScope(n => n.type == 'Global' || n.type == 'Nonlocal')) {
            return 'the unreachable code declares a global or nonlocal name';
        }

        const dropped = collectNodes(nodes);
        const isGone = (node: object): boolean => dropped.has(node) || this.removed.has(node);
        for (const binding of this.scopes.allBindings()) {
            const stores = binding.sites.filter(s => s.kind != 'declaration');
            if (
                stores.some(s => dropped.has(s.node)) &&
                stores.every(s => isGone(s.node)) &&
                binding.references.some(r => !isGone(r))
            ) {
                return `the unreachable code is the only place ${binding.name} is bound`;
            }
        }

        dropped.forEach(node => this.removed.add(node));
        return undefined;
    }
}

/**
 * Returns every node in the given code, including parameters, aliases and
 * exception handlers, which can be binding sites.
 */
function collectNodes(nodes: SyntaxNode[]): Set<object> {
    const found = new Set<object>();
    for (const node of nodes) {
        walk(node, child => {
            found.add(child);
            if (child.type == 'FunctionDef' || child.type == 'Lambda') {
                allParameters(child.args).forEach(p => found.add(p));
            } else if (child.type == 'Import' || child.type == 'ImportFrom') {
                child.names.forEach(alias => found.add(alias));
            } else if (child.type == 'Try') {
                child.handlers.forEach(handler => found.add(handler));
            }
        });
    }
    return found;
}
