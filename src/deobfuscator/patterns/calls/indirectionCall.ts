import { Call, Expression, Lambda } from '../../ast/nodes';
import { MatchResult, expressionPattern, matched, unsafe } from '../pattern';
import { PatternContext } from '../context';
import { ProxyFunction, checkEvaluationOrder, isProxyBody, isProxyFunction } from './proxyFunction';

interface Indirection {
    name: string;
    proxy: ProxyFunction;
    args: Expression[];
}

/**
 * Replaces a call to a forwarding helper, or to a lambda defined in place,
 * with the helper's body applied to the call's arguments, e.g.
 * `f(lambda: compute())` where `def f(x): return x()`.
 */
export const indirectionCall = expressionPattern<Indirection>({
    key: 'indirectionCall',
    description: 'inline a call to a helper that only forwards to its arguments',
    match(node, context): MatchResult<Indirection> {
        if (node.type != 'Call' || !hasPlainArguments(node)) {
            return undefined;
        }
        const func = node.func;

        if (func.type == 'Lambda') {
            return matchLambdaCall(node, func, context);
        } else if (func.type != 'Name') {
            return undefined;
        }

        const helper = context.helpers.get(func.id);
        if (!helper || context.scopes.bindingOf(func) != helper.binding || !isProxyFunction(helper, context)) {
            return undefined;
        } else if (helper.params.length != node.args.length) {
            return unsafe(`${func.id} takes ${helper.params.length} argument(s) but is called with ${node.args.length}`);
        }

        const reason = checkEvaluationOrder(helper.params, helper.body, node.args, context);
        return reason
            ? unsafe(reason)
            : matched({ name: func.id, proxy: new ProxyFunction(helper.params, helper.body), args: node.args });
    },
    rewrite: ({ proxy, args }) => proxy.getReplacement(args),
    describe: ({ name }) => `inlined call to ${name}`
});

function matchLambdaCall(node: Call, func: Lambda, context: PatternContext): MatchResult<Indirection> {
    const args = func.args;
    if (args.posonly.length > 0 || args.vararg || args.kwarg || args.kwonly.length > 0 || args.args.some(p => p.default)) {
        return undefined;
    }
    const params = args.args.map(p => p.name);
    if (params.length != node.args.length || !isProxyBody(params, func.body)) {
        return undefined;
    }

    // a lambda in a class body does not see the class's names, but its inlined body would
    const scope = context.scopes.scopeOf(func);
    if (!scope || !scope.parent || scope.parent.kind == 'class') {
        return undefined;
    }

    const reason = checkEvaluationOrder(params, func.body, node.args, context);
    return reason
        ? unsafe(reason)
        : matched({ name: 'lambda', proxy: new ProxyFunction(params, func.body), args: node.args });
}

function hasPlainArguments(node: Call): boolean {
    return node.keywords.length == 0 && node.args.every(a => a.type != 'Starred');
}
