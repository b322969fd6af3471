import { Expression, Comprehension, PyConstant, BinaryOperator, ComparisonOperator } from '../ast/nodes';
import { reprBytes, reprFloat, reprString } from '../ast/literals';

/**
 * A value the evaluator can compute. Generators and functions only exist
 * while a call such as `''.join(...)` consumes them and never become literals.
 */
export type PyValue =
    | Exclude<PyConstant, { kind: 'imaginary' } | { kind: 'ellipsis' }>
    | { kind: 'tuple'; items: PyValue[] }
    | { kind: 'list'; items: PyValue[] }
    | { kind: 'generator'; items: PyValue[] }
    | { kind: 'function'; fn: FunctionValue; closure: Environment };

type IntValue = { kind: 'int'; value: bigint };
type FloatValue = { kind: 'float'; value: number };
type Numeric = IntValue | FloatValue;

/**
 * A helper function the evaluator may call: positional parameters and a
 * single returned expression.
 */
export interface FunctionValue {
    params: string[];
    body: Expression;
}

export interface EvaluatorOptions {
    /** Returns whether a free name refers to the builtin of the same name. */
    isBuiltin?: (name: string) => boolean;
    /** Resolves a free name to a pure helper the evaluator may call. */
    resolveFunction?: (name: string) => FunctionValue | undefined;
    /** Resolves a free name to the value of a module-level constant. */
    resolveConstant?: (name: string) => PyValue | undefined;
}

export type Environment = ReadonlyMap<string, PyValue>;

const MAX_STEPS = 100_000;
const MAX_LENGTH = 65_536;
const MAX_INT_BITS = 4096;
const MAX_CALL_DEPTH = 16;
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

const BUILTINS = new Set(['int', 'chr', 'ord', 'str', 'len', 'bytes', 'abs', 'map', 'list', 'tuple']);
const METHODS = new Set(['encode', 'decode', 'join', 'split', 'replace']);
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?:^|[^\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Evaluates expressions over constants with Python semantics. Anything that
 * would raise, depends on unknown state, or grows past the size bounds
 * evaluates to undefined.
 */
export class Evaluator {
    private readonly options: EvaluatorOptions;
    private steps = 0;
    private depth = 0;

    /**
     * Creates a new evaluator.
     * @param options The evaluator options.
     */
    constructor(options: EvaluatorOptions = {}) {
        this.options = options;
    }

    /**
     * Evaluates an expression.
     * @param expression The expression.
     * @param environment The values of local names.
     * @returns The value, or undefined if it cannot be computed safely.
     */
    public evaluate(expression: Expression, environment: Environment = new Map()): PyValue | undefined {
        this.steps = 0;
        this.depth = 0;
        return this.eval(expression, environment);
    }

    /**
     * Calls a helper function with argument values.
     * @param fn The helper.
     * @param args The argument values.
     * @returns The return value, or undefined.
     */
    public call(fn: FunctionValue, args: PyValue[]): PyValue | undefined {
        this.steps = 0;
        this.depth = 0;
        return this.invoke(fn, args, new Map());
    }

    private eval(node: Expression, env: Environment): PyValue | undefined {
        if (++this.steps > MAX_STEPS) {
            return undefined;
        }

        switch (node.type) {
            case 'Constant':
                return fromConstant(node.value);
            case 'Name':
                return env.has(node.id) ? env.get(node.id) : this.options.resolveConstant?.(node.id);
            case 'UnaryOp': {
                const operand = this.eval(node.operand, env);
                return operand && unaryOperation(node.op, operand);
            }
            case 'BinOp': {
                const left = this.eval(node.left, env);
                const right = left && this.eval(node.right, env);
                return left && right && binaryOperation(node.op, left, right);
            }
            case 'Compare': {
                let left = this.eval(node.left, env);
                for (let i = 0; i < node.ops.length; i++) {
                    const right = left && this.eval(node.comparators[i], env);
                    const result = left && right && compareValues(node.ops[i], left, right);
                    if (result == undefined) {
                        return undefined;
                    } else if (!result) {
                        return { kind: 'bool', value: false };
                    }
                    left = right;
                }
                return { kind: 'bool', value: true };
            }
            case 'BoolOp': {
                let value: PyValue | undefined;
                for (const operand of node.values) {
                    value = this.eval(operand, env);
                    if (!value || truthy(value) == (node.op == 'or')) {
                        return value;
                    }
                }
                return value;
            }
            case 'IfExp': {
                const test = this.eval(node.test, env);
                if (!test) {
                    return undefined;
                }
                return this.eval(truthy(test) ? node.body : node.orelse, env);
            }
            case 'Tuple':
            case 'List': {
                const items = this.evalAll(node.elts, env);
                return items && sized({ kind: node.type == 'Tuple' ? 'tuple' : 'list', items });
            }
            case 'Subscript': {
                const value = this.eval(node.value, env);
                if (!value) {
                    return undefined;
                }
                if (node.slice.type == 'Slice') {
                    const bounds = [node.slice.lower, node.slice.upper, node.slice.step].map(b =>
                        b ? this.eval(b, env) : { kind: 'none' as const }
                    );
                    return sliceValue(value, bounds);
                }
                const index = this.eval(node.slice, env);
                return index && indexValue(value, index);
            }
            case 'ListComp':
            case 'GeneratorExp': {
                const elt = node.elt;
                const items: PyValue[] = [];
                const isComplete = this.comprehension(node.generators, 0, env, scope => {
                    const item = this.eval(elt, scope);
                    if (item) {
                        items.push(item);
                    }
                    return item != undefined && items.length <= MAX_LENGTH;
                });
                return isComplete ? { kind: node.type == 'ListComp' ? 'list' : 'generator', items } : undefined;
            }
            case 'Lambda': {
                const args = node.args;
                const isSimple =
                    args.posonly.length == 0 &&
                    !args.vararg &&
                    !args.kwarg &&
                    args.kwonly.length == 0 &&
                    args.args.every(p => !p.default);
                return isSimple
                    ? { kind: 'function', fn: { params: args.args.map(p => p.name), body: node.body }, closure: env }
                    : undefined;
            }
            case 'Call':
                return this.evalCall(node.func, node.args, node.keywords.length > 0, env);
            default:
                return undefined;
        }
    }

    private evalAll(nodes: Expression[], env: Environment): PyValue[] | undefined {
        const values: PyValue[] = [];
        for (const node of nodes) {
            const value = node.type == 'Starred' ? undefined : this.eval(node, env);
            if (!value) {
                return undefined;
            }
            values.push(value);
        }
        return values;
    }

    private evalCall(
        func: Expression,
        argNodes: Expression[],
        hasKeywords: boolean,
        env: Environment
    ): PyValue | undefined {
        if (hasKeywords) {
            return undefined;
        }

        if (func.type == 'Attribute') {
            const receiver = this.eval(func.value, env);
            const args = receiver && this.evalAll(argNodes, env);
            return receiver && args && callMethod(receiver, func.attr, args);
        } else if (func.type != 'Name' || env.has(func.id)) {
            const callee = this.eval(func, env);
            const args = callee && this.evalAll(argNodes, env);
            return callee && args && this.callValue(callee, args);
        }

        const helper = this.options.resolveFunction?.(func.id);
        if (helper) {
            const args = this.evalAll(argNodes, env);
            return args && this.invoke(helper, args, new Map());
        }

        const isBuiltin = this.options.isBuiltin ?? (() => true);
        if (BUILTINS.has(func.id) && isBuiltin(func.id)) {
            const args = this.evalAll(argNodes, env);
            if (!args) {
                return undefined;
            }
            return func.id == 'map' ? this.map(args) : callBuiltin(func.id, args);
        }
        return undefined;
    }

    private callValue(callee: PyValue, args: PyValue[]): PyValue | undefined {
        return callee.kind == 'function' ? this.invoke(callee.fn, args, callee.closure) : undefined;
    }

    private map(args: PyValue[]): PyValue | undefined {
        const [fn, ...iterables] = args;
        const sources = iterables.map(iterate);
        if (!fn || sources.length == 0) {
            return undefined;
        }

        const items: PyValue[] = [];
        const length = Math.min(...sources.map(source => source?.length ?? 0));
        for (let i = 0; i < length; i++) {
            const callArgs: PyValue[] = [];
            for (const source of sources) {
                if (!source) {
                    return undefined;
                }
                callArgs.push(source[i]);
            }
            const item = this.callValue(fn, callArgs);
            if (!item) {
                return undefined;
            }
            items.push(item);
        }
        return sources.every(source => source != undefined) ? { kind: 'generator', items } : undefined;
    }

    private invoke(fn: FunctionValue, args: PyValue[], closure: Environment): PyValue | undefined {
        if (fn.params.length != args.length || this.depth >= MAX_CALL_DEPTH) {
            return undefined;
        }

        const scope = new Map(closure);
        fn.params.forEach((param, i) => scope.set(param, args[i]));
        this.depth++;
        const result = this.eval(fn.body, scope);
        this.depth--;
        return result;
    }

    /**
     * Runs the loops of a comprehension, calling the consumer for every
     * combination that passes the conditions.
     * @returns Whether every step could be evaluated.
     */
    private comprehension(
        generators: Comprehension[],
        index: number,
        env: Environment,
        consume: (env: Environment) => boolean
    ): boolean {
        if (index == generators.length) {
            return consume(env);
        }

        const generator = generators[index];
        const iterable = this.eval(generator.iter, env);
        const items = iterable && iterate(iterable);
        if (!items || generator.isAsync) {
            return false;
        }

        for (const item of items) {
            const scope = new Map(env);
            if (!bindTarget(generator.target, item, scope)) {
                return false;
            }

            let isIncluded = true;
            for (const condition of generator.ifs) {
                const test = this.eval(condition, scope);
                if (!test) {
                    return false;
                }
                isIncluded = isIncluded && truthy(test);
            }
            if (isIncluded && !this.comprehension(generators, index + 1, scope, consume)) {
                return false;
            }
        }
        return true;
    }
}

function bindTarget(target: Expression, value: PyValue, scope: Map<string, PyValue>): boolean {
    if (target.type == 'Name') {
        scope.set(target.id, value);
        return true;
    } else if (target.type == 'Tuple' || target.type == 'List') {
        const items = iterate(value);
        return (
            items != undefined &&
            items.length == target.elts.length &&
            target.elts.every((elt, i) => bindTarget(elt, items[i], scope))
        );
    }
    return false;
}

/**
 * Returns whether the evaluator can call a builtin function of the given name.
 * @param name The name.
 * @returns Whether.
 */
export function isSupportedBuiltin(name: string): boolean {
    return BUILTINS.has(name);
}

/**
 * Returns whether the evaluator can call a str or bytes method of the given name.
 * @param name The method name.
 * @returns Whether.
 */
export function isSupportedMethod(name: string): boolean {
    return METHODS.has(name);
}

/**
 * Converts a literal constant into a value.
 * @param constant The constant.
 * @returns The value, or undefined for constants the evaluator does not model.
 */
export function fromConstant(constant: PyConstant): PyValue | undefined {
    if (constant.kind == 'imaginary' || constant.kind == 'ellipsis') {
        return undefined;
    }
    return constant;
}

/**
 * Converts a value into a literal expression.
 * @param value The value.
 * @returns The expression, or undefined when the value has no literal form.
 */
export function toExpression(value: PyValue): Expression | undefined {
    switch (value.kind) {
        case 'tuple':
        case 'list': {
            const elts: Expression[] = [];
            for (const item of value.items) {
                const elt = toExpression(item);
                if (!elt) {
                    return undefined;
                }
                elts.push(elt);
            }
            return { type: value.kind == 'tuple' ? 'Tuple' : 'List', elts, ctx: 'load' };
        }
        case 'generator':
        case 'function':
            return undefined;
        case 'float':
            return Number.isFinite(value.value) ? { type: 'Constant', value } : undefined;
        default:
            return { type: 'Constant', value };
    }
}

/**
 * Returns the value of a literal: a constant, or a signed numeric constant.
 * @param expression The expression.
 * @returns The value, or undefined if the expression is not a literal.
 */
export function literalValue(expression: Expression): PyValue | undefined {
    if (expression.type == 'Constant') {
        return fromConstant(expression.value);
    } else if (
        expression.type == 'UnaryOp' &&
        (expression.op == '-' || expression.op == '+') &&
        expression.operand.type == 'Constant'
    ) {
        const operand = fromConstant(expression.operand.value);
        return operand && isNumber(operand) ? unaryOperation(expression.op, operand) : undefined;
    }
    return undefined;
}

/**
 * Returns the truth value of a value.
 * @param value The value.
 * @returns Whether the value is truthy.
 */
export function truthy(value: PyValue): boolean {
    switch (value.kind) {
        case 'int':
            return value.value != 0n;
        case 'float':
        case 'bool':
            return !!value.value;
        case 'str':
        case 'bytes':
            return value.value.length > 0;
        case 'tuple':
        case 'list':
            return value.items.length > 0;
        case 'none':
            return false;
        case 'generator':
        case 'function':
            return true;
    }
}

// numbers

function isNumber(value: PyValue): value is IntValue | FloatValue | { kind: 'bool'; value: boolean } {
    return value.kind == 'int' || value.kind == 'float' || value.kind == 'bool';
}

function asNumeric(value: PyValue): Numeric | undefined {
    if (value.kind == 'bool') {
        return { kind: 'int', value: value.value ? 1n : 0n };
    }
    return value.kind == 'int' || value.kind == 'float' ? value : undefined;
}

function int(value: bigint): IntValue | undefined {
    return bitLength(value) <= MAX_INT_BITS ? { kind: 'int', value } : undefined;
}

function float(value: number): FloatValue | undefined {
    return Number.isFinite(value) ? { kind: 'float', value } : undefined;
}

function bitLength(value: bigint): number {
    return (value < 0n ? -value : value).toString(2).length;
}

function toFloat(value: Numeric): number | undefined {
    if (value.kind == 'float') {
        return value.value;
    }
    const result = Number(value.value);
    return Number.isFinite(result) ? result : undefined;
}

function floorDiv(a: bigint, b: bigint): bigint {
    const quotient = a / b;
    return a % b != 0n && (a < 0n) != (b < 0n) ? quotient - 1n : quotient;
}

function floorMod(a: bigint, b: bigint): bigint {
    const remainder = a % b;
    return remainder != 0n && (remainder < 0n) != (b < 0n) ? remainder + b : remainder;
}

function unaryOperation(op: string, operand: PyValue): PyValue | undefined {
    if (op == 'not') {
        return { kind: 'bool', value: !truthy(operand) };
    }

    const number = asNumeric(operand);
    if (!number) {
        return undefined;
    }
    switch (op) {
        case '-':
            return number.kind == 'int' ? { kind: 'int', value: -number.value } : { kind: 'float', value: -number.value };
        case '+':
            return number;
        case '~':
            return number.kind == 'int' ? { kind: 'int', value: -number.value - 1n } : undefined;
        default:
            return undefined;
    }
}

function binaryOperation(op: BinaryOperator, left: PyValue, right: PyValue): PyValue | undefined {
    const a = asNumeric(left);
    const b = asNumeric(right);
    if (a && b) {
        return a.kind == 'int' && b.kind == 'int' ? intOperation(op, a.value, b.value) : floatOperation(op, a, b);
    }
    return sequenceOperation(op, left, right);
}

function intOperation(op: BinaryOperator, a: bigint, b: bigint): PyValue | undefined {
    switch (op) {
        case '+':
            return int(a + b);
        case '-':
            return int(a - b);
        case '*':
            return bitLength(a) + bitLength(b) > MAX_INT_BITS ? undefined : int(a * b);
        case '//':
            return b == 0n ? undefined : int(floorDiv(a, b));
        case '%':
            return b == 0n ? undefined : int(floorMod(a, b));
        case '/':
            if (b == 0n || a > MAX_SAFE || a < -MAX_SAFE || b > MAX_SAFE || b < -MAX_SAFE) {
                return undefined;
            }
            return float(Number(a) / Number(b));
        case '**':
            if (b < 0n || bitLength(a) * Number(b) > MAX_INT_BITS * 2) {
                return undefined;
            }
            return int(a ** b);
        case '<<':
            return b < 0n || b > BigInt(MAX_INT_BITS) ? undefined : int(a << b);
        case '>>':
            if (b < 0n) {
                return undefined;
            }
            return { kind: 'int', value: b > BigInt(MAX_INT_BITS) ? (a < 0n ? -1n : 0n) : a >> b };
        case '|':
            return { kind: 'int', value: a | b };
        case '^':
            return { kind: 'int', value: a ^ b };
        case '&':
            return { kind: 'int', value: a & b };
        default:
            return undefined;
    }
}

function floatOperation(op: BinaryOperator, left: Numeric, right: Numeric): PyValue | undefined {
    const a = toFloat(left);
    const b = toFloat(right);
    if (a == undefined || b == undefined) {
        return undefined;
    }

    switch (op) {
        case '+':
            return float(a + b);
        case '-':
            return float(a - b);
        case '*':
            return float(a * b);
        case '/':
            return b == 0 ? undefined : float(a / b);
        case '//':
            return b == 0 ? undefined : float(Math.floor(a / b));
        case '%': {
            if (b == 0) {
                return undefined;
            }
            const remainder = a % b;
            return float(remainder != 0 && (remainder < 0) != (b < 0) ? remainder + b : remainder);
        }
        case '**':
            // negative bases with fractional exponents give complex results
            return a < 0 && !Number.isInteger(b) ? undefined : a == 0 && b < 0 ? undefined : float(a ** b);
        default:
            return undefined;
    }
}

// sequences

function sequenceOperation(op: BinaryOperator, left: PyValue, right: PyValue): PyValue | undefined {
    if (op == '+') {
        if (left.kind == 'str' && right.kind == 'str') {
            return sized({ kind: 'str', value: left.value + right.value });
        } else if (left.kind == 'bytes' && right.kind == 'bytes') {
            return sized({ kind: 'bytes', value: concatBytes([left.value, right.value]) });
        } else if ((left.kind == 'tuple' || left.kind == 'list') && left.kind == right.kind) {
            return sized({ kind: left.kind, items: [...left.items, ...right.items] });
        }
        return undefined;
    }

    if (op == '*') {
        const count = asNumeric(right);
        if (count && count.kind == 'int') {
            return repeat(left, count.value);
        }
        const reversed = asNumeric(left);
        if (reversed && reversed.kind == 'int') {
            return repeat(right, reversed.value);
        }
    }
    return undefined;
}

function repeat(value: PyValue, count: bigint): PyValue | undefined {
    const length = sequenceLength(value);
    if (length == undefined || BigInt(length) * count > BigInt(MAX_LENGTH)) {
        return undefined;
    }

    const times = count < 0n ? 0 : Number(count);
    switch (value.kind) {
        case 'str':
            return { kind: 'str', value: value.value.repeat(times) };
        case 'bytes':
            return { kind: 'bytes', value: concatBytes(new Array<Uint8Array>(times).fill(value.value)) };
        case 'tuple':
        case 'list':
            return { kind: value.kind, items: new Array<PyValue[]>(times).fill(value.items).flat() };
        default:
            return undefined;
    }
}

function sequenceLength(value: PyValue): number | undefined {
    switch (value.kind) {
        case 'str':
        case 'bytes':
            return value.value.length;
        case 'tuple':
        case 'list':
            return value.items.length;
        default:
            return undefined;
    }
}

function sized(value: PyValue): PyValue | undefined {
    const length = sequenceLength(value);
    return length != undefined && length > MAX_LENGTH ? undefined : value;
}

function concatBytes(parts: Uint8Array[]): Uint8Array {
    const output = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
    let offset = 0;
    for (const part of parts) {
        output.set(part, offset);
        offset += part.length;
    }
    return output;
}

/**
 * Returns the items produced by iterating a value.
 * @param value The value.
 * @returns The items, or undefined if the value is not iterable.
 */
export function iterate(value: PyValue): PyValue[] | undefined {
    switch (value.kind) {
        case 'str':
            return Array.from(value.value, char => ({ kind: 'str', value: char }));
        case 'bytes':
            return Array.from(value.value, byte => ({ kind: 'int', value: BigInt(byte) }));
        case 'tuple':
        case 'list':
        case 'generator':
            return value.items;
        default:
            return undefined;
    }
}

function toIndex(value: PyValue | undefined): number | undefined {
    const number = value && asNumeric(value);
    if (!number || number.kind != 'int') {
        return undefined;
    }
    const clamped = number.value > MAX_SAFE ? MAX_SAFE : number.value < -MAX_SAFE ? -MAX_SAFE : number.value;
    return Number(clamped);
}

function elementsOf(value: PyValue): PyValue[] | undefined {
    return value.kind == 'generator' ? undefined : iterate(value);
}

function rebuild(value: PyValue, items: PyValue[]): PyValue | undefined {
    switch (value.kind) {
        case 'str':
            return { kind: 'str', value: items.map(i => (i.kind == 'str' ? i.value : '')).join('') };
        case 'bytes':
            return { kind: 'bytes', value: Uint8Array.from(items, i => (i.kind == 'int' ? Number(i.value) : 0)) };
        case 'tuple':
        case 'list':
            return { kind: value.kind, items };
        default:
            return undefined;
    }
}

function indexValue(value: PyValue, index: PyValue): PyValue | undefined {
    const items = elementsOf(value);
    let position = toIndex(index);
    if (!items || position == undefined) {
        return undefined;
    }
    if (position < 0) {
        position += items.length;
    }
    return position >= 0 && position < items.length ? items[position] : undefined;
}

function sliceValue(value: PyValue, bounds: (PyValue | undefined)[]): PyValue | undefined {
    const items = elementsOf(value);
    if (!items || bounds.some(b => b == undefined)) {
        return undefined;
    }

    const [lower, upper, stepValue] = bounds.map(b => (b && b.kind != 'none' ? toIndex(b) ?? NaN : undefined));
    const step = stepValue ?? 1;
    if (step == 0 || Number.isNaN(step) || Number.isNaN(lower) || Number.isNaN(upper)) {
        return undefined;
    }

    const length = items.length;
    const clamp = (index: number | undefined, fallback: number, low: number, high: number): number => {
        if (index == undefined) {
            return fallback;
        }
        const adjusted = index < 0 ? index + length : index;
        return Math.min(Math.max(adjusted, low), high);
    };

    const selected: PyValue[] = [];
    if (step > 0) {
        const start = clamp(lower, 0, 0, length);
        const stop = clamp(upper, length, 0, length);
        for (let i = start; i < stop; i += step) {
            selected.push(items[i]);
        }
    } else {
        const start = clamp(lower, length - 1, -1, length - 1);
        const stop = clamp(upper, -1, -1, length - 1);
        for (let i = start; i > stop; i += step) {
            selected.push(items[i]);
        }
    }
    return rebuild(value, selected);
}

// comparisons

function equalValues(left: PyValue, right: PyValue): boolean | undefined {
    const a = asNumeric(left);
    const b = asNumeric(right);
    if (a && b) {
        return a.kind == 'int' && b.kind == 'int' ? a.value == b.value : toFloat(a) == toFloat(b);
    }
    if (left.kind == 'generator' || right.kind == 'generator' || left.kind == 'function' || right.kind == 'function') {
        return undefined;
    }
    if (left.kind != right.kind) {
        return false;
    }

    if (left.kind == 'str' && right.kind == 'str') {
        return left.value == right.value;
    } else if (left.kind == 'bytes' && right.kind == 'bytes') {
        return left.value.length == right.value.length && left.value.every((byte, i) => byte == right.value[i]);
    } else if ((left.kind == 'tuple' || left.kind == 'list') && (right.kind == 'tuple' || right.kind == 'list')) {
        if (left.items.length != right.items.length) {
            return false;
        }
        for (let i = 0; i < left.items.length; i++) {
            const equal = equalValues(left.items[i], right.items[i]);
            if (equal !== true) {
                return equal;
            }
        }
        return true;
    }
    return left.kind == 'none';
}

function orderValues(left: PyValue, right: PyValue): number | undefined {
    const a = asNumeric(left);
    const b = asNumeric(right);
    if (a && b) {
        if (a.kind == 'int' && b.kind == 'int') {
            return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
        }
        const x = toFloat(a);
        const y = toFloat(b);
        return x == undefined || y == undefined || Number.isNaN(x) || Number.isNaN(y) ? undefined : Math.sign(x - y);
    }

    if ((left.kind == 'str' && right.kind == 'str') || (left.kind == 'bytes' && right.kind == 'bytes')) {
        const x = left.kind == 'str' ? Array.from(left.value, c => c.codePointAt(0) ?? 0) : Array.from(left.value);
        const y = right.kind == 'str' ? Array.from(right.value, c => c.codePointAt(0) ?? 0) : Array.from(right.value);
        for (let i = 0; i < Math.min(x.length, y.length); i++) {
            if (x[i] != y[i]) {
                return x[i] < y[i] ? -1 : 1;
            }
        }
        return Math.sign(x.length - y.length);
    }

    if ((left.kind == 'tuple' || left.kind == 'list') && left.kind == right.kind) {
        const rightItems = iterate(right) ?? [];
        for (let i = 0; i < Math.min(left.items.length, rightItems.length); i++) {
            const equal = equalValues(left.items[i], rightItems[i]);
            if (equal == undefined) {
                return undefined;
            } else if (!equal) {
                return orderValues(left.items[i], rightItems[i]);
            }
        }
        return Math.sign(left.items.length - rightItems.length);
    }
    return undefined;
}

function containsValue(container: PyValue, item: PyValue): boolean | undefined {
    if (container.kind == 'str') {
        return item.kind == 'str' ? container.value.includes(item.value) : undefined;
    } else if (container.kind == 'bytes') {
        if (item.kind == 'bytes') {
            return latin1(container.value).includes(latin1(item.value));
        }
        const byte = asNumeric(item);
        if (!byte || byte.kind != 'int' || byte.value < 0n || byte.value > 255n) {
            return undefined;
        }
        return container.value.includes(Number(byte.value));
    } else if (container.kind == 'tuple' || container.kind == 'list') {
        let isUnknown = false;
        for (const element of container.items) {
            const equal = equalValues(element, item);
            if (equal) {
                return true;
            }
            isUnknown = isUnknown || equal == undefined;
        }
        return isUnknown ? undefined : false;
    }
    return undefined;
}

function compareValues(op: ComparisonOperator, left: PyValue, right: PyValue): boolean | undefined {
    switch (op) {
        case '==':
            return equalValues(left, right);
        case '!=': {
            const equal = equalValues(left, right);
            return equal == undefined ? undefined : !equal;
        }
        case 'in':
        case 'not in': {
            const contained = containsValue(right, left);
            return contained == undefined ? undefined : contained == (op == 'in');
        }
        case 'is':
        case 'is not': {
            let identical: boolean | undefined;
            if (left.kind == 'none' || right.kind == 'none') {
                identical = left.kind == right.kind;
            } else if (left.kind == 'bool' && right.kind == 'bool') {
                identical = left.value == right.value;
            }
            return identical == undefined ? undefined : identical == (op == 'is');
        }
        default: {
            const order = orderValues(left, right);
            if (order == undefined) {
                return undefined;
            }
            return op == '<' ? order < 0 : op == '<=' ? order <= 0 : op == '>' ? order > 0 : order >= 0;
        }
    }
}

// builtins and methods

function latin1(bytes: Uint8Array): string {
    let output = '';
    for (const byte of bytes) {
        output += String.fromCharCode(byte);
    }
    return output;
}

function encode(text: string, encoding: string): Uint8Array | undefined {
    switch (normalizeEncoding(encoding)) {
        case 'utf-8':
            return LONE_SURROGATE.test(text) ? undefined : new TextEncoder().encode(text);
        case 'ascii':
        case 'latin-1': {
            const limit = normalizeEncoding(encoding) == 'ascii' ? 0x7f : 0xff;
            const codes = Array.from(text, c => c.codePointAt(0) ?? 0);
            return codes.every(c => c <= limit) ? Uint8Array.from(codes) : undefined;
        }
        default:
            return undefined;
    }
}

function decode(bytes: Uint8Array, encoding: string): string | undefined {
    switch (normalizeEncoding(encoding)) {
        case 'utf-8':
            try {
                return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
            } catch {
                return undefined;
            }
        case 'ascii':
            return bytes.every(b => b <= 0x7f) ? latin1(bytes) : undefined;
        case 'latin-1':
            return latin1(bytes);
        default:
            return undefined;
    }
}

function normalizeEncoding(encoding: string): string {
    const name = encoding.toLowerCase().replace(/_/g, '-');
    if (name == 'utf8' || name == 'utf-8') {
        return 'utf-8';
    } else if (name == 'latin1' || name == 'latin-1' || name == 'iso-8859-1' || name == 'l1') {
        return 'latin-1';
    } else if (name == 'ascii' || name == 'us-ascii') {
        return 'ascii';
    }
    return name;
}

function parseInteger(text: string, base: number): bigint | undefined {
    const match = /^\s*([+-]?)(.*?)\s*$/s.exec(text);
    if (!match) {
        return undefined;
    }
    let body = match[2].toLowerCase();
    const prefixes: Record<string, number> = { '0x': 16, '0o': 8, '0b': 2 };
    const prefixBase = prefixes[body.slice(0, 2)];

    if (base == 0) {
        base = prefixBase ?? 10;
        if (prefixBase) {
            body = body.slice(2).replace(/^_/, '');
        } else if (/^0+[1-9]/.test(body)) {
            return undefined;
        }
    } else if (prefixBase == base) {
        body = body.slice(2).replace(/^_/, '');
    }

    if (base < 2 || base > 36 || !/^[0-9a-z]+(?:_[0-9a-z]+)*$/.test(body)) {
        return undefined;
    }

    let result = 0n;
    for (const char of body.replace(/_/g, '')) {
        const digit = parseInt(char, 36);
        if (digit >= base) {
            return undefined;
        }
        result = result * BigInt(base) + BigInt(digit);
    }
    return match[1] == '-' ? -result : result;
}

/**
 * Returns the text `str()` gives for a value.
 * @param value The value.
 * @returns The text, or undefined.
 */
export function pyStr(value: PyValue): string | undefined {
    return value.kind == 'str' ? value.value : pyRepr(value);
}

/**
 * Returns the text `repr()` gives for a value.
 * @param value The value.
 * @returns The text, or undefined.
 */
export function pyRepr(value: PyValue): string | undefined {
    switch (value.kind) {
        case 'int':
            return value.value.toString();
        case 'float':
            return Number.isFinite(value.value) ? reprFloat(value.value) : undefined;
        case 'str':
            return reprString(value.value);
        case 'bytes':
            return reprBytes(value.value);
        case 'bool':
            return value.value ? 'True' : 'False';
        case 'none':
            return 'None';
        case 'tuple':
        case 'list': {
            const items: string[] = [];
            for (const item of value.items) {
                const text = pyRepr(item);
                if (text == undefined) {
                    return undefined;
                }
                items.push(text);
            }
            if (value.kind == 'list') {
                return `[${items.join(', ')}]`;
            }
            return items.length == 1 ? `(${items[0]},)` : `(${items.join(', ')})`;
        }
        case 'generator':
        case 'function':
            return undefined;
    }
}

function callBuiltin(name: string, args: PyValue[]): PyValue | undefined {
    const [first, second] = args;
    if (args.length > 2) {
        return undefined;
    }

    switch (name) {
        case 'int': {
            if (!first) {
                return { kind: 'int', value: 0n };
            }
            const base = second && asNumeric(second);
            if (second && (!base || base.kind != 'int')) {
                return undefined;
            }
            const text = first.kind == 'str' ? first.value : first.kind == 'bytes' ? latin1(first.value) : undefined;
            if (text != undefined) {
                const value = parseInteger(text, base ? Number(base.value) : 10);
                return value == undefined ? undefined : int(value);
            }
            const number = !second ? asNumeric(first) : undefined;
            if (number && number.kind == 'float') {
                return Number.isFinite(number.value) ? { kind: 'int', value: BigInt(Math.trunc(number.value)) } : undefined;
            }
            return number;
        }
        case 'chr': {
            const code = args.length == 1 ? toIndex(first) : undefined;
            return code != undefined && code >= 0 && code <= 0x10ffff
                ? { kind: 'str', value: String.fromCodePoint(code) }
                : undefined;
        }
        case 'ord': {
            if (args.length != 1) {
                return undefined;
            } else if (first.kind == 'str') {
                const chars = Array.from(first.value);
                return chars.length == 1 ? { kind: 'int', value: BigInt(chars[0].codePointAt(0) ?? 0) } : undefined;
            } else if (first.kind == 'bytes') {
                return first.value.length == 1 ? { kind: 'int', value: BigInt(first.value[0]) } : undefined;
            }
            return undefined;
        }
        case 'str': {
            if (!first) {
                return { kind: 'str', value: '' };
            } else if (second) {
                const text =
                    first.kind == 'bytes' && second.kind == 'str' ? decode(first.value, second.value) : undefined;
                return text == undefined ? undefined : { kind: 'str', value: text };
            }
            const text = pyStr(first);
            return text == undefined ? undefined : sized({ kind: 'str', value: text });
        }
        case 'len': {
            if (args.length != 1) {
                return undefined;
            }
            const length = first.kind == 'str' ? Array.from(first.value).length : sequenceLength(first);
            return length == undefined ? undefined : { kind: 'int', value: BigInt(length) };
        }
        case 'bytes':
            return bytesOf(first, second);
        case 'list':
        case 'tuple': {
            if (!first) {
                return { kind: name, items: [] };
            }
            const items = args.length == 1 ? iterate(first) : undefined;
            return items && sized({ kind: name, items: [...items] });
        }
        case 'abs': {
            const number = args.length == 1 ? asNumeric(first) : undefined;
            if (!number) {
                return undefined;
            }
            return number.kind == 'int'
                ? { kind: 'int', value: number.value < 0n ? -number.value : number.value }
                : { kind: 'float', value: Math.abs(number.value) };
        }
        default:
            return undefined;
    }
}

function bytesOf(source: PyValue | undefined, encoding: PyValue | undefined): PyValue | undefined {
    if (!source) {
        return { kind: 'bytes', value: new Uint8Array(0) };
    } else if (encoding) {
        const bytes = source.kind == 'str' && encoding.kind == 'str' ? encode(source.value, encoding.value) : undefined;
        return bytes && { kind: 'bytes', value: bytes };
    }

    switch (source.kind) {
        case 'bytes':
            return source;
        case 'int':
        case 'bool': {
            const count = toIndex(source);
            return count != undefined && count >= 0 && count <= MAX_LENGTH
                ? { kind: 'bytes', value: new Uint8Array(count) }
                : undefined;
        }
        case 'tuple':
        case 'list':
        case 'generator': {
            const values: number[] = [];
            for (const item of source.items) {
                const byte = toIndex(item);
                if (byte == undefined || byte < 0 || byte > 255) {
                    return undefined;
                }
                values.push(byte);
            }
            return { kind: 'bytes', value: Uint8Array.from(values) };
        }
        default:
            return undefined;
    }
}

function callMethod(receiver: PyValue, method: string, args: PyValue[]): PyValue | undefined {
    const [first, second] = args;

    if (receiver.kind == 'str') {
        switch (method) {
            case 'encode': {
                const encoding = first ? (first.kind == 'str' ? first.value : undefined) : 'utf-8';
                const bytes = encoding != undefined && args.length <= 1 ? encode(receiver.value, encoding) : undefined;
                return bytes && { kind: 'bytes', value: bytes };
            }
            case 'join': {
                const items = args.length == 1 ? iterate(first) : undefined;
                if (!items || !items.every(i => i.kind == 'str')) {
                    return undefined;
                }
                return sized({ kind: 'str', value: items.map(i => pyStr(i)).join(receiver.value) });
            }
            case 'split': {
                const parts = splitText(receiver.value, args);
                return parts && { kind: 'list', items: parts.map(p => ({ kind: 'str', value: p })) };
            }
            case 'replace': {
                if (args.length != 2 || first.kind != 'str' || second.kind != 'str' || first.value == '') {
                    return undefined;
                }
                return sized({ kind: 'str', value: receiver.value.split(first.value).join(second.value) });
            }
            default:
                return undefined;
        }
    }

    if (receiver.kind == 'bytes') {
        switch (method) {
            case 'decode': {
                const encoding = first ? (first.kind == 'str' ? first.value : undefined) : 'utf-8';
                const text = encoding != undefined && args.length <= 1 ? decode(receiver.value, encoding) : undefined;
                return text == undefined ? undefined : { kind: 'str', value: text };
            }
            case 'join': {
                const items = args.length == 1 ? iterate(first) : undefined;
                if (!items) {
                    return undefined;
                }
                const parts: Uint8Array[] = [];
                items.forEach((item, i) => {
                    if (i > 0) {
                        parts.push(receiver.value);
                    }
                    parts.push(item.kind == 'bytes' ? item.value : new Uint8Array(0));
                });
                return items.every(i => i.kind == 'bytes')
                    ? sized({ kind: 'bytes', value: concatBytes(parts) })
                    : undefined;
            }
            case 'split': {
                const textArgs = args.map(a => (a.kind == 'bytes' ? { kind: 'str' as const, value: latin1(a.value) } : a));
                const parts = splitText(latin1(receiver.value), textArgs);
                return (
                    parts && {
                        kind: 'list',
                        items: parts.map(p => ({ kind: 'bytes', value: Uint8Array.from(p, c => c.charCodeAt(0)) }))
                    }
                );
            }
            default:
                return undefined;
        }
    }
    return undefined;
}

function splitText(text: string, args: PyValue[]): string[] | undefined {
    const [separator] = args;
    if (args.length > 1) {
        return undefined;
    } else if (!separator || separator.kind == 'none') {
        return text.split(/[\s\x1c-\x1f\x85]+/).filter(part => part.length > 0);
    } else if (separator.kind != 'str' || separator.value == '') {
        return undefined;
    }
    return text.split(separator.value);
}
