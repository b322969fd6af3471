import { BoolOp, Expression } from '../../ast/nodes';
import { Evaluator, PyValue, literalValue, pyRepr, toExpression } from '../../helpers/evaluator';
import { getLiteralTruthiness, isSignedNumericLiteral } from '../../helpers/expression';
import { transformTree } from '../../helpers/misc';
import { LogFunction, Transformation, TransformationProperties } from '../transformation';

export class ExpressionSimplifier extends Transformation {
    public static readonly properties: TransformationProperties = {
        key: 'expressionSimplification'
    };
    private static readonly MAX_REPR_LENGTH = 4096;
    private readonly evaluator = new Evaluator();

    /**
     * Executes the transformation.
     * @param log The log function.
     */
    public execute(log: LogFunction): boolean {
        transformTree(this.module, {
            expression: node => {
                const replacement = this.simplifyExpression(node);
                if (replacement) {
                    this.record(node, replacement);
                    return replacement;
                }
                return node;
            }
        });

        return this.hasChanged();
    }

    /**
     * Attempts to simplify an expression whose operands are already simplified.
     * @param expression The expression.
     * @returns The replacement or undefined.
     */
    private simplifyExpression(expression: Expression): Expression | undefined {
        switch (expression.type) {
            case 'BinOp':
                return this.fold(expression, [expression.left, expression.right]);
            case 'UnaryOp':
                // avoid trying to simplify negative numbers
                return isSignedNumericLiteral(expression) ? undefined : this.fold(expression, [expression.operand]);
            case 'Compare':
                return this.fold(expression, [expression.left, ...expression.comparators]);
            case 'IfExp':
                return this.fold(expression, [expression.test, expression.body, expression.orelse]);
            case 'BoolOp':
                return this.simplifyBooleanOperation(expression);
            default:
                return undefined;
        }
    }

    /**
     * Evaluates an operation whose operands are all literals.
     * @param expression The operation.
     * @param operands The operands.
     * @returns The literal result, or undefined if it cannot be computed without raising.
     */
    private fold(expression: Expression, operands: Expression[]): Expression | undefined {
        if (!operands.every(o => literalValue(o) != undefined)) {
            return undefined;
        }
        const value = this.evaluator.evaluate(expression);
        return value && this.toLiteral(value);
    }

    /**
     * Removes the literal operands of an `and`/`or` that cannot change its result,
     * and the operands after one that decides it.
     * @param expression The boolean operation.
     * @returns The simplified expression or undefined.
     */
    private simplifyBooleanOperation(expression: BoolOp): Expression | undefined {
        const decides = (truthiness: boolean): boolean => (expression.op == 'and' ? !truthiness : truthiness);

        let values = expression.values;
        while (values.length > 1) {
            const truthiness = getLiteralTruthiness(values[0]);
            if (truthiness == undefined) {
                break;
            } else if (decides(truthiness)) {
                return values[0];
            }
            values = values.slice(1);
        }

        const decisive = values.findIndex(v => {
            const truthiness = getLiteralTruthiness(v);
            return truthiness != undefined && decides(truthiness);
        });
        if (decisive != -1) {
            values = values.slice(0, decisive + 1);
        }

        if (values.length == expression.values.length) {
            return undefined;
        } else if (values.length == 1) {
            return values[0];
        }
        return { type: 'BoolOp', op: expression.op, values, loc: expression.loc };
    }

    private toLiteral(value: PyValue): Expression | undefined {
        const repr = pyRepr(value);
        if (repr == undefined || repr.length > ExpressionSimplifier.MAX_REPR_LENGTH) {
            return undefined;
        }
        return toExpression(value);
    }

    private record(node: Expression, replacement: Expression): void {
        const summary =
            replacement.type == 'Constant' || replacement.type == 'Tuple' || replacement.type == 'List'
                ? `folded ${node.type} to a literal`
                : `simplified ${node.type}`;
        this.context.log.recordRewrite(ExpressionSimplifier.properties.key, node, summary, this.context.pass);
        this.setChanged();
    }
}
