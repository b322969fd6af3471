import { Expression, SyntaxNode } from '../../ast/nodes';
import { cloneNode, containsNode, updateChildren, walk } from '../../ast/traverse';
import { isLiteral } from '../../helpers/expression';
import { HelperFunction } from '../../helpers/variable';
import { PatternContext } from '../context';

const NESTED_SCOPE_TYPES = new Set<SyntaxNode['type']>([
    'Lambda',
    'ListComp',
    'SetComp',
    'DictComp',
    'GeneratorExp',
    'NamedExpr',
    'Yield',
    'YieldFrom',
    'Await'
]);

/** Node types whose operands are always evaluated, in source order. */
const STRAIGHT_TYPES = new Set<SyntaxNode['type']>([
    'Name',
    'Constant',
    'Call',
    'Attribute',
    'Subscript',
    'BinOp',
    'UnaryOp',
    'Compare',
    'Tuple',
    'List'
]);

/**
 * Returns whether a body can be substituted into a call site: it opens no
 * scope of its own and uses each parameter at most once.
 * @param params The parameter names.
 * @param body The returned expression.
 * @returns Whether.
 */
export function isProxyBody(params: string[], body: Expression): boolean {
    if (containsNode(body, n => NESTED_SCOPE_TYPES.has(n.type))) {
        return false;
    }
    const uses = countParameterUses(params, body);
    return params.every(p => (uses.get(p) ?? 0) <= 1) && new Set(params).size == params.length;
}

/**
 * Returns whether a module-level helper only forwards to its arguments, constants,
 * builtins and pure helpers, so that its calls can be replaced with its body.
 * @param helper The helper.
 * @param context The pattern context.
 * @returns Whether.
 */
export function isProxyFunction(helper: HelperFunction, context: PatternContext): boolean {
    if (!isProxyBody(helper.params, helper.body)) {
        return false;
    }

    const params = new Set(helper.params);
    let isValid = true;
    walk(helper.body, node => {
        if (node.type == 'Name' && !params.has(node.id)) {
            const isFreeNameSafe =
                node.id != helper.name &&
                !context.localNames.has(node.id) &&
                (context.isBuiltin(node.id) || context.isPureHelper(node.id));
            isValid = isValid && isFreeNameSafe;
        }
    });
    return isValid;
}

/**
 * Returns whether substituting the arguments keeps every side effect and the order
 * they happen in. Arguments without effects may go anywhere; otherwise each parameter
 * must be used once, in parameter order, before the body does anything observable.
 * @param params The parameter names.
 * @param body The returned expression.
 * @param args The call arguments.
 * @param context The pattern context.
 * @returns Undefined when safe, otherwise the reason it is not.
 */
export function checkEvaluationOrder(
    params: string[],
    body: Expression,
    args: Expression[],
    context: PatternContext
): string | undefined {
    const isPure = (arg: Expression): boolean =>
        isLiteral(arg) ||
        arg.type == 'Lambda' ||
        (arg.type == 'Name' && context.scopes.bindingOf(arg) != undefined);
    if (args.every(isPure)) {
        return undefined;
    }

    if (containsNode(body, n => !STRAIGHT_TYPES.has(n.type) || (n.type == 'Compare' && n.ops.length > 1))) {
        return 'arguments with side effects would be evaluated conditionally';
    }

    const events: string[] = [];
    recordEvents(body, new Set(params), events);
    const firstOperation = events.indexOf('');
    const paramEvents = firstOperation == -1 ? events : events.slice(0, firstOperation);
    const isInOrder = paramEvents.length == params.length && params.every((p, i) => paramEvents[i] == p);
    const isUsedOnce = events.filter(e => e != '').length == params.length;
    return isInOrder && isUsedOnce ? undefined : 'arguments with side effects would be evaluated in a different order';
}

/**
 * Appends, in evaluation order, a parameter name for each parameter read and
 * an empty string for each operation that could run user code.
 */
function recordEvents(node: Expression, params: Set<string>, events: string[]): void {
    switch (node.type) {
        case 'Name':
            if (params.has(node.id)) {
                events.push(node.id);
            }
            return;
        case 'Constant':
            return;
        case 'Tuple':
        case 'List':
            node.elts.forEach(e => recordEvents(e, params, events));
            return;
        case 'Call':
            recordEvents(node.func, params, events);
            node.args.forEach(a => recordEvents(a, params, events));
            node.keywords.forEach(k => recordEvents(k.value, params, events));
            break;
        case 'Attribute':
            recordEvents(node.value, params, events);
            break;
        case 'Subscript':
            recordEvents(node.value, params, events);
            recordEvents(node.slice, params, events);
            break;
        case 'BinOp':
            recordEvents(node.left, params, events);
            recordEvents(node.right, params, events);
            break;
        case 'UnaryOp':
            recordEvents(node.operand, params, events);
            break;
        case 'Compare':
            recordEvents(node.left, params, events);
            node.comparators.forEach(c => recordEvents(c, params, events));
            break;
        default:
            events.push('');
            return;
    }
    events.push('');
}

function countParameterUses(params: string[], body: Expression): Map<string, number> {
    const names = new Set(params);
    const uses = new Map<string, number>();
    walk(body, node => {
        if (node.type == 'Name' && names.has(node.id)) {
            uses.set(node.id, (uses.get(node.id) ?? 0) + 1);
        }
    });
    return uses;
}

export class ProxyFunction {
    private readonly params: string[];
    private readonly body: Expression;

    /**
     * Creates a new proxy function.
     * @param params The parameter names.
     * @param body The returned expression.
     */
    constructor(params: string[], body: Expression) {
        this.params = params;
        this.body = body;
    }

    /**
     * Returns the replacement for a call of the proxy function.
     * @param args The arguments of the call.
     * @returns The replacement expression.
     */
    public getReplacement(args: Expression[]): Expression {
        return this.replaceParameters(cloneNode(this.body), args);
    }

    /**
     * Replaces usages of the proxy function's parameters with the concrete arguments for a given call.
     * @param expression The expression.
     * @param args The arguments of the call.
     * @returns The expression with the arguments in place.
     */
    private replaceParameters(expression: Expression, args: Expression[]): Expression {
        const paramMap = new Map<string, Expression>(this.params.map((param, index) => [param, args[index]]));

        const replace = (node: Expression): Expression => {
            const replacement = node.type == 'Name' ? paramMap.get(node.id) : undefined;
            if (replacement) {
                return replacement;
            }
            updateChildren(node, { expression: replace, statements: body => body });
            return node;
        };
        return replace(expression);
    }
}
