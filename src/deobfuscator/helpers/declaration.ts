import { Assign, Expression, Name, Statement, SyntaxNode } from '../ast/nodes';

export type NodeTest<T extends SyntaxNode> = (node: SyntaxNode) => node is T;

export type SimpleAssignment<V extends Expression = Expression> = Assign & {
    targets: [Name];
    value: V;
};

/**
 * Checks whether a statement assigns a value satisfying the provided constraint to
 * a single plain name, i.e. `name = value`.
 * @param node The statement.
 * @param isValue The function that determines whether the assigned value matches.
 * @param name The required target name (optional).
 * @returns Whether.
 */
export function isSimpleAssignment<V extends Expression>(
    node: Statement,
    isValue: NodeTest<V> | ((node: Expression) => boolean),
    name?: string
): node is SimpleAssignment<V> {
    if (node.type != 'Assign' || node.targets.length != 1) {
        return false;
    }
    const target = node.targets[0];
    return target.type == 'Name' && (name == undefined || target.id == name) && isValue(node.value);
}
