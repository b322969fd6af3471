import { Assign, Expression, If, Name, Statement, SyntaxNode, While } from '../../ast/nodes';
import { containsNode, walk } from '../../ast/traverse';
import { getIntegerValue, getLiteralTruthiness, isName } from '../../helpers/expression';
import { shape } from '../../helpers/matcher';
import { PatternContext } from '../context';
import { matched, sequencePattern } from '../pattern';

interface Branch {
    statements: Statement[];
    transition: { kind: 'state'; next: bigint } | { kind: 'break' } | { kind: 'return'; statement: Statement };
}

type LoopTest = { kind: 'always' } | { kind: 'notEqual' | 'lessThan'; end: bigint };

interface Dispatcher {
    state: string;
    order: bigint[];
    statements: Statement[];
}

const isStateAssignment = shape<'Assign'>('Assign', {
    targets: targets => targets.length == 1 && isName(targets[0])
});
const isEqualityTest = shape<'Compare'>('Compare', {
    ops: ops => ops.length == 1 && ops[0] == '=='
});

/**
 * Recovers straight-line code from a dispatcher loop:
 *
 *     state = 0
 *     while True:
 *         if state == 0:
 *             print(1)
 *             state = 1
 *         elif state == 1:
 *             print(2)
 *             break
 *
 * Fires only when the states run in one fixed order that never repeats.
 */
export const flattenedControlFlow = sequencePattern<Dispatcher>({
    key: 'flattenedControlFlow',
    description: 'replace a state-machine dispatcher loop with its states in execution order',
    match({ body, index }, context) {
        const initial = body[index];
        const loop = body[index + 1];
        if (!initial || !loop || !isStateAssignment(initial) || loop.type != 'While' || loop.orelse.length > 0) {
            return undefined;
        }
        const target = initial.targets[0];
        const start = getIntegerValue(initial.value);
        if (!isName(target) || start == undefined) {
            return undefined;
        }

        const state = target.id;
        const test = getLoopTest(loop.test, state);
        const branches = test && getBranches(loop, state);
        if (!test || !branches) {
            return undefined;
        }

        const order: bigint[] = [];
        const statements: Statement[] = [];
        let current = start;
        let exit: Branch['transition'] | undefined;
        while (isLoopRunning(test, current)) {
            const branch = branches.get(current);
            if (!branch || order.includes(current)) {
                return undefined;
            }
            order.push(current);
            statements.push(...branch.statements);

            if (branch.transition.kind == 'state') {
                current = branch.transition.next;
            } else {
                exit = branch.transition;
                break;
            }
        }

        if (isStateReadElsewhere(state, loop, context)) {
            statements.push(createStateAssignment(target, current, initial));
        }
        if (exit && exit.kind == 'return') {
            statements.push(exit.statement);
        }
        if (statements.length == 0) {
            statements.push({ type: 'Pass', loc: loop.loc });
        }
        return matched({ state, order, statements });
    },
    rewrite: ({ statements }) => ({ count: 2, statements }),
    describe: ({ state, order }) => `flattened dispatcher on ${state} through states ${order.join(', ')}`
});

function getLoopTest(test: Expression, state: string): LoopTest | undefined {
    if (getLiteralTruthiness(test) == true) {
        return { kind: 'always' };
    } else if (test.type == 'Compare' && test.ops.length == 1 && isName(test.left, state)) {
        const end = getIntegerValue(test.comparators[0]);
        if (end != undefined && test.ops[0] == '!=') {
            return { kind: 'notEqual', end };
        } else if (end != undefined && test.ops[0] == '<') {
            return { kind: 'lessThan', end };
        }
    }
    return undefined;
}

function isLoopRunning(test: LoopTest, current: bigint): boolean {
    switch (test.kind) {
        case 'always':
            return true;
        case 'notEqual':
            return current != test.end;
        case 'lessThan':
            return current < test.end;
    }
}

/**
 * Reads the `if state == N: ... elif ...` chain that forms the loop body.
 * @returns The branches by state, or undefined if the body has any other shape.
 */
function getBranches(loop: While, state: string): Map<bigint, Branch> | undefined {
    const [first] = loop.body;
    if (loop.body.length != 1 || first.type != 'If') {
        return undefined;
    }

    const branches = new Map<bigint, Branch>();
    let node: If | undefined = first;
    while (node) {
        const value = getCaseValue(node.test, state);
        const branch = value != undefined ? getBranch(node.body, state) : undefined;
        if (value == undefined || !branch || branches.has(value)) {
            return undefined;
        }
        branches.set(value, branch);

        const [next]: Statement[] = node.orelse;
        if (node.orelse.length == 0) {
            node = undefined;
        } else if (node.orelse.length == 1 && next.type == 'If') {
            node = next;
        } else {
            return undefined;
        }
    }
    return branches;
}

function getCaseValue(test: Expression, state: string): bigint | undefined {
    if (!isEqualityTest(test)) {
        return undefined;
    }
    const comparator: Expression = test.comparators[0];
    if (isName(test.left, state)) {
        return getIntegerValue(comparator);
    } else if (isName(comparator, state)) {
        return getIntegerValue(test.left);
    }
    return undefined;
}

function getBranch(body: Statement[], state: string): Branch | undefined {
    let end = body.length;
    if (end > 0 && body[end - 1].type == 'Continue') {
        end--;
    }
    const last = body[end - 1];
    if (!last) {
        return undefined;
    }

    let transition: Branch['transition'];
    if (last.type == 'Break' && end == body.length) {
        transition = { kind: 'break' };
    } else if (last.type == 'Return' && end == body.length) {
        transition = { kind: 'return', statement: last };
    } else if (isStateAssignment(last) && isName(last.targets[0], state)) {
        const next = getIntegerValue(last.value);
        if (next == undefined) {
            return undefined;
        }
        transition = { kind: 'state', next };
    } else {
        return undefined;
    }

    const statements = body.slice(0, end - 1);
    if (statements.some(s => mentionsName(s, state) || exitsLoop(s))) {
        return undefined;
    }
    return { statements, transition };
}

/**
 * Returns whether a statement reads, writes or declares a name anywhere inside it.
 */
function mentionsName(statement: Statement, name: string): boolean {
    return containsNode(statement, node => {
        switch (node.type) {
            case 'Name':
                return node.id == name;
            case 'FunctionDef':
            case 'ClassDef':
                return node.name == name;
            case 'Global':
            case 'Nonlocal':
                return node.names.includes(name);
            case 'Import':
            case 'ImportFrom':
                return node.names.some(alias => (alias.asname ?? alias.name.split('.')[0]) == name);
            default:
                return false;
        }
    });
}

/**
 * Returns whether a statement contains a `break` or `continue` that applies to the enclosing loop.
 */
function exitsLoop(statement: Statement): boolean {
    switch (statement.type) {
        case 'Break':
        case 'Continue':
            return true;
        case 'For':
        case 'While':
            return statement.orelse.some(exitsLoop);
        case 'If':
            return statement.body.some(exitsLoop) || statement.orelse.some(exitsLoop);
        case 'With':
            return statement.body.some(exitsLoop);
        case 'Try':
            return [
                ...statement.body,
                ...statement.handlers.flatMap(h => h.body),
                ...statement.orelse,
                ...statement.finalbody
            ].some(exitsLoop);
        default:
            return false;
    }
}

/**
 * Returns whether the state variable is read anywhere besides the dispatcher loop.
 */
function isStateReadElsewhere(state: string, loop: While, context: PatternContext): boolean {
    let loadsInLoop = 0;
    walk(loop, (node: SyntaxNode) => {
        if (node.type == 'Name' && node.ctx == 'load' && node.id == state) {
            loadsInLoop++;
        }
    });
    return (context.loadCounts.get(state) ?? 0) > loadsInLoop;
}

function createStateAssignment(target: Name, value: bigint, initial: Assign): Statement {
    return {
        type: 'Assign',
        targets: [{ type: 'Name', id: target.id, ctx: 'store' }],
        value: value < 0n
            ? { type: 'UnaryOp', op: '-', operand: { type: 'Constant', value: { kind: 'int', value: -value } } }
            : { type: 'Constant', value: { kind: 'int', value } },
        loc: initial.loc
    };
}
