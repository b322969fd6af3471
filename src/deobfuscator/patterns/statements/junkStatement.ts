import { Statement } from '../../ast/nodes';
import { isStringConstant } from '../../helpers/expression';
import { matched, statementPattern } from '../pattern';
import { PatternContext } from '../context';

/**
 * Removes statements that compute a value nobody uses and cannot raise:
 * `pass`, and expression statements the evaluator can compute without helpers.
 * Docstrings stay, and a block always keeps at least one statement.
 */
export const junkStatement = statementPattern<Statement>({
    key: 'junkStatement',
    description: 'remove a statement with no effect',
    match({ node, site }, context) {
        const { body, index } = site;
        if (!isRemovable(node, index, context)) {
            return undefined;
        }

        // a string moved to the top of the block would become its docstring
        const next = body[index + 1];
        if (index == 0 && next && next.type == 'Expr' && isStringConstant(next.value)) {
            return undefined;
        }

        const isLast = index == body.length - 1;
        const hasKeptStatement = body.some((s, i) => i != index && !isRemovable(s, i, context));
        return hasKeptStatement || !isLast ? matched(node) : undefined;
    },
    rewrite: () => [],
    describe: node => (node.type == 'Pass' ? 'removed pass' : 'removed expression statement with no effect')
});

function isRemovable(statement: Statement, index: number, context: PatternContext): boolean {
    if (statement.type == 'Pass') {
        return true;
    } else if (statement.type != 'Expr') {
        return false;
    }

    const value = statement.value;
    if (isStringConstant(value)) {
        return index != 0;
    }
    return value.type == 'Constant' || context.createEvaluator(false).evaluate(value) != undefined;
}
