import { Expression } from '../../ast/nodes';
import { PyValue, literalValue, pyRepr, toExpression } from '../../helpers/evaluator';
import { MatchResult, expressionPattern, matched, unsafe } from '../pattern';
import { PatternContext } from '../context';

const MAX_REPR_LENGTH = 4096;

interface DecodedCall {
    name: string;
    replacement: Expression;
    repr: string;
}

/**
 * Replaces a call to a pure module-level helper whose arguments are all constants
 * with the value the helper returns, e.g. `decode('104\x00105', 3)`.
 */
export const decoderCall = expressionPattern<DecodedCall>({
    key: 'decoderCall',
    description: 'replace a call to a pure decoding helper with the value it returns',
    match(node, context): MatchResult<DecodedCall> {
        if (node.type != 'Call' || node.func.type != 'Name' || node.keywords.length > 0) {
            return undefined;
        }
        const name = node.func.id;
        const helper = context.helpers.get(name);
        if (
            !helper ||
            context.scopes.bindingOf(node.func) != helper.binding ||
            helper.params.length != node.args.length ||
            !context.isPureHelper(name)
        ) {
            return undefined;
        }

        const values: PyValue[] = [];
        for (const arg of node.args) {
            const value = argumentValue(arg, context);
            if (!value) {
                return undefined;
            }
            values.push(value);
        }

        const result = context.createEvaluator(true).call(helper.functionValue, values);
        const replacement = result && toExpression(result);
        const repr = result && pyRepr(result);
        if (!replacement || repr == undefined) {
            return unsafe(`${name} could not be evaluated for these arguments`);
        } else if (repr.length > MAX_REPR_LENGTH) {
            return unsafe(`the value ${name} returns is too large to inline`);
        }
        return matched({ name, replacement, repr });
    },
    rewrite: ({ replacement }) => ({ ...replacement }),
    describe: ({ name, repr }) => `replaced call to ${name} with ${repr}`
});

function argumentValue(arg: Expression, context: PatternContext): PyValue | undefined {
    if (arg.type == 'Name') {
        return context.constantValue(arg);
    } else if (arg.type == 'Tuple' || arg.type == 'List') {
        return context.createEvaluator(false).evaluate(arg);
    }
    return literalValue(arg);
}
