import { Constant, Expression, Name, SyntaxNode, UnaryOp } from '../ast/nodes';

/**
 * Returns whether a node is a unary expression that represents a signed number,
 * such as `-5` or `+2.0`.
 * @param node The node.
 * @returns Whether.
 */
export function isSignedNumericLiteral(
    node: SyntaxNode
): node is UnaryOp & { op: '-' | '+'; operand: Constant } {
    return (
        node.type == 'UnaryOp' &&
        (node.op == '-' || node.op == '+') &&
        node.operand.type == 'Constant' &&
        (node.operand.value.kind == 'int' ||
            node.operand.value.kind == 'float' ||
            node.operand.value.kind == 'imaginary')
    );
}

/**
 * Returns whether a node is a literal: a constant or a signed number.
 * @param node The node.
 * @returns Whether.
 */
export function isLiteral(node: SyntaxNode): node is Constant | UnaryOp {
    return node.type == 'Constant' || isSignedNumericLiteral(node);
}

/**
 * Returns the value of an integer literal, including negative ones.
 * @param node The node.
 * @returns The value, or undefined if the node is not an integer literal.
 */
export function getIntegerValue(node: SyntaxNode): bigint | undefined {
    if (node.type == 'Constant' && node.value.kind == 'int') {
        return node.value.value;
    } else if (isSignedNumericLiteral(node) && node.operand.value.kind == 'int') {
        return node.op == '-' ? -node.operand.value.value : node.operand.value.value;
    }
    return undefined;
}

/**
 * Returns whether a node is a name, optionally with the given identifier.
 * @param node The node.
 * @param id The identifier.
 * @returns Whether.
 */
export function isName(node: SyntaxNode | undefined, id?: string): node is Name {
    return node != undefined && node.type == 'Name' && (id == undefined || node.id == id);
}

/**
 * Returns whether a statement expression is a string constant, the form a docstring takes.
 * @param node The node.
 * @returns Whether.
 */
export function isStringConstant(node: SyntaxNode): node is Constant {
    return node.type == 'Constant' && node.value.kind == 'str';
}

/**
 * Returns the truth value of a test that is a literal, or a display with no items.
 * @param node The test expression.
 * @returns The truth value, or undefined if it is not statically known.
 */
export function getLiteralTruthiness(node: Expression): boolean | undefined {
    if (node.type == 'Constant') {
        const value = node.value;
        switch (value.kind) {
            case 'int':
                return value.value != 0n;
            case 'float':
            case 'imaginary':
                return value.value != 0;
            case 'str':
            case 'bytes':
                return value.value.length > 0;
            case 'bool':
                return value.value;
            case 'none':
                return false;
            case 'ellipsis':
                return true;
        }
    } else if (isSignedNumericLiteral(node)) {
        return getLiteralTruthiness(node.operand);
    } else if ((node.type == 'Tuple' || node.type == 'List' || node.type == 'Dict') && isEmptyDisplay(node)) {
        return false;
    }
    return undefined;
}

function isEmptyDisplay(node: Expression): boolean {
    return (node.type == 'Tuple' || node.type == 'List') ? node.elts.length == 0 : node.type == 'Dict' && node.keys.length == 0;
}

