import { Statement } from '../../ast/nodes';
import { parse } from '../../ast/parser';
import { containsNode } from '../../ast/traverse';
import { PythonSyntaxError } from '../../errors';
import { MatchResult, matched, statementPattern, unsafe } from '../pattern';

/**
 * Replaces a module-level `exec('<source>')` with the statements it runs.
 * At module level exec runs in the module namespace, so the statements behave
 * the same when written out in its place.
 */
export const execLiteralSource = statementPattern<Statement[]>({
    key: 'execLiteralSource',
    description: 'inline source text passed to exec',
    match({ node, site }, context): MatchResult<Statement[]> {
        if (!site.isModuleLevel || node.type != 'Expr' || node.value.type != 'Call') {
            return undefined;
        }
        const call = node.value;
        const [source] = call.args;
        if (
            call.func.type != 'Name' ||
            call.func.id != 'exec' ||
            call.args.length != 1 ||
            call.keywords.length != 0 ||
            source.type != 'Constant' ||
            source.value.kind != 'str' ||
            !context.isBuiltin('exec')
        ) {
            return undefined;
        }

        const warnings: string[] = [];
        let statements: Statement[];
        try {
            statements = parse(source.value.value, { onWarning: message => warnings.push(message) }).body;
        } catch (err) {
            if (err instanceof PythonSyntaxError) {
                return unsafe(`source passed to exec does not parse: ${err.message}`);
            }
            throw err;
        }

        if (warnings.length > 0) {
            return unsafe(`source passed to exec is not valid Python: ${warnings[0]}`);
        }
        const isOutsideFunction = statements.some(s =>
            containsNode(
                s,
                n => n.type == 'Return' || n.type == 'Yield' || n.type == 'YieldFrom' || n.type == 'Await',
                false
            )
        );
        if (isOutsideFunction) {
            return unsafe('source passed to exec uses return, yield or await outside a function');
        }
        return matched(statements);
    },
    rewrite: statements => statements,
    describe: statements => `inlined ${statements.length} statement(s) from exec`
});
