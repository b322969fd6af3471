import { Assign, Expression, FunctionDef, Lambda, Statement, SyntaxNode } from '../ast/nodes';
import { Binding, ScopeTree } from '../ast/scope';
import { NodeTest, isSimpleAssignment } from './declaration';
import { FunctionValue } from './evaluator';

export class ConstantVariable<T extends Expression> {
    public readonly name: string;
    public readonly binding: Binding;
    public readonly expression: T;
    public readonly statement: Assign;

    /**
     * Creates a new constant variable.
     * @param statement The assignment that initialises the variable.
     * @param name The name of the variable.
     * @param binding The binding.
     * @param expression The value the variable holds.
     */
    constructor(statement: Assign, name: string, binding: Binding, expression: T) {
        this.statement = statement;
        this.name = name;
        this.binding = binding;
        this.expression = expression;
    }
}

/**
 * A module-level function whose whole body is one returned expression, declared
 * either with `def` or as `name = lambda ...`.
 */
export class HelperFunction {
    public readonly name: string;
    public readonly binding: Binding;
    public readonly params: string[];
    public readonly body: Expression;
    public readonly statement: FunctionDef | Assign;

    /**
     * Creates a new helper function.
     * @param statement The declaring statement.
     * @param name The name of the helper.
     * @param binding The binding.
     * @param params The parameter names.
     * @param body The returned expression.
     */
    constructor(
        statement: FunctionDef | Assign,
        name: string,
        binding: Binding,
        params: string[],
        body: Expression
    ) {
        this.statement = statement;
        this.name = name;
        this.binding = binding;
        this.params = params;
        this.body = body;
    }

    /**
     * Returns the helper as a function the evaluator can call.
     */
    public get functionValue(): FunctionValue {
        return { params: this.params, body: this.body };
    }
}

/**
 * Checks whether a statement initialises a 'constant' variable and returns the variable if so.
 * @param statement The statement.
 * @param scopes The scope tree of the module.
 * @param isType The function that determines whether the value is of the desired type.
 * @returns The constant variable or undefined.
 */
export function findConstantVariable<T extends Expression>(
    statement: Statement,
    scopes: ScopeTree,
    isType: NodeTest<T>
): ConstantVariable<T> | undefined {
    if (isSimpleAssignment(statement, isType)) {
        const target = statement.targets[0];
        const binding = scopes.bindingOf(target);
        return binding && isConstantBinding(binding)
            ? new ConstantVariable<T>(statement, target.id, binding, statement.value)
            : undefined;
    }
    return undefined;
}

/**
 * Checks whether a module-level statement declares a helper function and returns it if so.
 * @param statement The statement.
 * @param scopes The scope tree of the module.
 * @returns The helper or undefined.
 */
export function findHelperFunction(statement: Statement, scopes: ScopeTree): HelperFunction | undefined {
    if (statement.type == 'FunctionDef') {
        const binding = scopes.root.bindings.get(statement.name);
        const [first] = statement.body;
        if (
            binding &&
            isConstantBinding(binding) &&
            !statement.isAsync &&
            statement.decorators.length == 0 &&
            statement.body.length == 1 &&
            first.type == 'Return'
        ) {
            const params = getPositionalParameters(statement);
            const body: Expression = first.value ?? { type: 'Constant', value: { kind: 'none' } };
            return params && new HelperFunction(statement, statement.name, binding, params, body);
        }
    } else {
        const variable = findConstantVariable(statement, scopes, isLambda);
        const params = variable && getPositionalParameters(variable.expression);
        return variable && params
            ? new HelperFunction(variable.statement, variable.name, variable.binding, params, variable.expression.body)
            : undefined;
    }
    return undefined;
}

const isLambda = (node: SyntaxNode): node is Lambda => node.type == 'Lambda';

/**
 * Returns the parameter names of a function that only takes plain positional
 * parameters without defaults.
 * @param node The function.
 * @returns The names, or undefined if the function takes any other kind of parameter.
 */
function getPositionalParameters(node: FunctionDef | Lambda): string[] | undefined {
    const args = node.args;
    if (args.vararg || args.kwarg || args.kwonly.length > 0) {
        return undefined;
    }
    const params = [...args.posonly, ...args.args];
    return params.every(p => p.default == undefined) ? params.map(p => p.name) : undefined;
}

/**
 * Returns whether a binding is constant for our purposes: stored exactly once,
 * never deleted, and settled before its scope's variables can be accessed by
 * name. A module that runs `exec` on a value built from the binding still
 * leaves the binding constant up to and including that statement.
 * @param binding The binding.
 * @returns Whether.
 */
function isConstantBinding(binding: Binding): boolean {
    return (
        binding.storeCount == 1 &&
        binding.deletions.length == 0 &&
        binding.scope.isSettledBeforeDynamicAccess(binding)
    );
}
