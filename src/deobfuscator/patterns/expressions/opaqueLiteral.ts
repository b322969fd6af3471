import { Expression, SyntaxNode } from '../../ast/nodes';
import { walk } from '../../ast/traverse';
import { PyValue, isSupportedBuiltin, pyRepr, toExpression } from '../../helpers/evaluator';
import { isSignedNumericLiteral } from '../../helpers/expression';
import { expressionPattern, matched } from '../pattern';

const MAX_REPR_LENGTH = 4096;
const FOLDABLE_TYPES = new Set<SyntaxNode['type']>([
    'BinOp',
    'UnaryOp',
    'Compare',
    'BoolOp',
    'Call',
    'Subscript',
    'IfExp'
]);

interface FoldedLiteral {
    value: PyValue;
    replacement: Expression;
    repr: string;
}

/**
 * Folds an operation tree whose leaves are all constants, e.g.
 * `(6 * 7) ^ 0` or `bytes([104, 105]).decode()`.
 */
export const opaqueLiteral = expressionPattern<FoldedLiteral>({
    key: 'opaqueLiteral',
    description: 'fold an operation tree over constants into the literal it computes',
    match(node, context) {
        if (!FOLDABLE_TYPES.has(node.type) || isSignedNumericLiteral(node) || hasFreeNames(node)) {
            return undefined;
        }

        const value = context.createEvaluator(false).evaluate(node);
        const replacement = value && toExpression(value);
        const repr = value && pyRepr(value);
        if (!value || !replacement || repr == undefined || repr.length > MAX_REPR_LENGTH) {
            return undefined;
        }
        return matched({ value, replacement, repr });
    },
    rewrite: capture => ({ ...capture.replacement }),
    describe: (capture, node) => `folded ${node.type} to ${capture.repr}`
});

/**
 * Returns whether an expression reads any name besides the builtins the
 * evaluator supports and the names its own lambdas and comprehensions bind.
 * @param node The expression.
 * @returns Whether.
 */
function hasFreeNames(node: Expression): boolean {
    const bound = new Set<string>();
    const loads: string[] = [];
    walk(node, child => {
        if (child.type == 'Name') {
            if (child.ctx == 'load') {
                loads.push(child.id);
            } else {
                bound.add(child.id);
            }
        } else if (child.type == 'Lambda') {
            child.args.args.forEach(p => bound.add(p.name));
        }
    });
    return loads.some(id => !bound.has(id) && !isSupportedBuiltin(id));
}
