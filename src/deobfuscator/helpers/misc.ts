import { Expression, Pass, SourceLocation, Statement, SyntaxNode } from '../ast/nodes';
import { ChildMapper, updateChildren } from '../ast/traverse';

export interface TreeVisitor {
    expression?(node: Expression): Expression;
    block?(body: Statement[]): Statement[];
}

/**
 * Rewrites a tree bottom-up. Each expression and each block is passed to the
 * visitor after everything inside it has been visited.
 * @param root The root node.
 * @param visitor The visitor.
 */
export function transformTree(root: SyntaxNode, visitor: TreeVisitor): void {
    const mapper: ChildMapper = {
        expression(node) {
            updateChildren(node, mapper);
            return visitor.expression ? visitor.expression(node) : node;
        },
        statements(body) {
            for (const statement of body) {
                updateChildren(statement, mapper);
            }
            return visitor.block ? visitor.block(body) : body;
        }
    };
    updateChildren(root, mapper);
}

/**
 * Creates a `pass` statement.
 * @param loc The source location.
 * @returns The statement.
 */
export function createPass(loc?: SourceLocation): Pass {
    return { type: 'Pass', loc };
}

/**
 * Keeps a block that had statements from becoming empty.
 * @param original The block before it was rewritten.
 * @param result The rewritten block.
 * @returns The rewritten block, or a lone `pass` in place of an empty one.
 */
export function keepNonEmpty(original: Statement[], result: Statement[]): Statement[] {
    return result.length == 0 && original.length > 0 ? [createPass(original[0].loc)] : result;
}
