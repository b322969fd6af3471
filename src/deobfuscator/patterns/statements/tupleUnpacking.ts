import { Assign, Expression, Name, Statement } from '../../ast/nodes';
import { isLiteral } from '../../helpers/expression';
import { every, shape } from '../../helpers/matcher';
import { matched, statementPattern } from '../pattern';

interface Unpacking {
    names: Name[];
    values: Expression[];
}

const isNameTarget = shape<'Name'>('Name', { ctx: ctx => ctx == 'store' });
const isTargetList = (node: Expression): node is Expression & { elts: Expression[] } =>
    (node.type == 'Tuple' || node.type == 'List') && node.elts.every(isNameTarget);
const isLiteralDisplay = (node: Expression): node is Expression & { elts: Expression[] } =>
    (node.type == 'Tuple' || node.type == 'List') && every(isLiteral)(node.elts);

/**
 * Splits `a, b = 1, 2` into one assignment per name. Only literal values are
 * accepted, so the order the assignments happen in cannot be observed.
 */
export const tupleUnpacking = statementPattern<Unpacking>({
    key: 'tupleUnpacking',
    description: 'split a tuple assignment of literals into single assignments',
    match({ node }) {
        if (node.type != 'Assign' || node.targets.length != 1) {
            return undefined;
        }
        const [target] = node.targets;
        if (!isTargetList(target) || !isLiteralDisplay(node.value) || target.elts.length != node.value.elts.length) {
            return undefined;
        }

        const names = target.elts.filter(isNameTarget);
        const isDistinct = new Set(names.map(n => n.id)).size == names.length;
        return names.length > 1 && isDistinct ? matched({ names, values: node.value.elts }) : undefined;
    },
    rewrite({ names, values }, { node }): Statement[] {
        return names.map(
            (name, i): Assign => ({
                type: 'Assign',
                targets: [{ type: 'Name', id: name.id, ctx: 'store', loc: name.loc }],
                value: values[i],
                loc: node.loc
            })
        );
    },
    describe: ({ names }) => `split assignment to ${names.map(n => n.id).join(', ')}`
});
