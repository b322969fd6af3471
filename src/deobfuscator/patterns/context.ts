import { Expression, Module, Name, Statement, SyntaxNode } from '../ast/nodes';
import { parse, parseExpression } from '../ast/parser';
import { ScopeTree, analyzeScopes, Binding } from '../ast/scope';
import { walk, isScopeNode } from '../ast/traverse';
import { PythonSyntaxError } from '../errors';
import { Evaluator, PyValue, isSupportedBuiltin, isSupportedMethod, literalValue } from '../helpers/evaluator';
import { isLiteral } from '../helpers/expression';
import { HelperFunction, findConstantVariable, findHelperFunction } from '../helpers/variable';

/**
 * Read-only facts about a module, gathered once before each rewrite pass.
 * Patterns consult it instead of searching the tree themselves.
 */
export interface PatternContext {
    readonly scopes: ScopeTree;
    /** Module-level helper functions by name. */
    readonly helpers: ReadonlyMap<string, HelperFunction>;
    /** The number of loads of each name anywhere in the module. */
    readonly loadCounts: ReadonlyMap<string, number>;
    /** Names bound in any function, lambda, class or comprehension scope. */
    readonly localNames: ReadonlySet<string>;
    /** Whether the module reaches variables through code the analysis cannot see. */
    readonly hasDynamicAccess: boolean;
    isBuiltin(name: string): boolean;
    isPureHelper(name: string): boolean;
    constantValue(name: Name): PyValue | undefined;
    createEvaluator(withHelpers: boolean): Evaluator;
}

const DYNAMIC_ACCESS = new Set(['locals', 'vars', 'globals']);
const PURE_NODE_TYPES = new Set<SyntaxNode['type']>([
    'Constant',
    'Name',
    'BinOp',
    'UnaryOp',
    'BoolOp',
    'Compare',
    'IfExp',
    'Tuple',
    'List',
    'Subscript',
    'Slice',
    'Call',
    'Attribute',
    'ListComp',
    'GeneratorExp',
    'Lambda'
]);

class ModuleContext implements PatternContext {
    public readonly scopes: ScopeTree;
    public readonly helpers = new Map<string, HelperFunction>();
    public readonly loadCounts = new Map<string, number>();
    public readonly localNames = new Set<string>();
    public hasDynamicAccess = false;
    private readonly boundNames = new Set<string>();
    private readonly constants = new Map<Binding, PyValue>();
    private readonly purity = new Map<string, boolean>();
    private hasStarImport = false;

    /**
     * Creates a new module context.
     * @param module The module.
     */
    constructor(module: Module) {
        this.scopes = analyzeScopes(module);

        for (const scope of this.scopes.allScopes()) {
            for (const name of scope.bindings.keys()) {
                this.boundNames.add(name);
                if (scope != this.scopes.root) {
                    this.localNames.add(name);
                }
            }
        }

        this.countLoads(module);
        this.findDefinitions(module.body);
    }

    public isBuiltin(name: string): boolean {
        return !this.hasStarImport && !this.boundNames.has(name);
    }

    /**
     * Returns whether a helper only computes a value from its arguments, module
     * constants, builtins the evaluator supports and other pure helpers.
     * @param name The helper name.
     * @returns Whether.
     */
    public isPureHelper(name: string): boolean {
        const known = this.purity.get(name);
        if (known != undefined) {
            return known;
        }
        const helper = this.helpers.get(name);
        if (!helper) {
            return false;
        }

        // recursive helpers are not pure for our purposes
        this.purity.set(name, false);
        const isPure = this.isPureExpression(helper.body, new Set(helper.params));
        this.purity.set(name, isPure);
        return isPure;
    }

    public constantValue(name: Name): PyValue | undefined {
        const binding = this.scopes.bindingOf(name);
        return binding && this.constants.get(binding);
    }

    public createEvaluator(withHelpers: boolean): Evaluator {
        const root = this.scopes.root;
        return new Evaluator({
            isBuiltin: name => this.isBuiltin(name),
            resolveFunction: withHelpers
                ? name => (this.isPureHelper(name) ? this.helpers.get(name)?.functionValue : undefined)
                : undefined,
            resolveConstant: withHelpers
                ? name => {
                      const binding = root.bindings.get(name);
                      return binding && this.constants.get(binding);
                  }
                : undefined
        });
    }

    private isPureExpression(body: Expression, locals: Set<string>): boolean {
        let isPure = true;
        walk(body, (node, parent) => {
            if (!isPure) {
                return false;
            }
            if (!PURE_NODE_TYPES.has(node.type)) {
                isPure = false;
            } else if (node.type == 'Attribute') {
                // only as the callee of a supported method call
                isPure = parent != undefined && parent.type == 'Call' && parent.func == node;
            } else if (node.type == 'Lambda') {
                const args = node.args;
                if (args.vararg || args.kwarg || args.kwonly.length > 0 || args.posonly.length > 0) {
                    isPure = false;
                }
                args.args.forEach(p => locals.add(p.name));
            } else if (node.type == 'ListComp' || node.type == 'GeneratorExp') {
                for (const generator of node.generators) {
                    walk(generator.target, target => {
                        if (target.type == 'Name') {
                            locals.add(target.id);
                        }
                    });
                }
            } else if (node.type == 'Call') {
                isPure = node.keywords.length == 0 && this.isPureCallee(node.func, locals);
            } else if (node.type == 'Name') {
                // stores are only the targets of the comprehensions seen above
                isPure = node.ctx == 'load' ? this.isPureName(node.id, locals) : locals.has(node.id);
            }
        });
        return isPure;
    }

    private isPureCallee(func: Expression, locals: Set<string>): boolean {
        if (func.type == 'Attribute') {
            return isSupportedMethod(func.attr);
        } else if (func.type == 'Name') {
            return !locals.has(func.id) && this.isPureName(func.id, locals);
        }
        return false;
    }

    private isPureName(name: string, locals: Set<string>): boolean {
        if (locals.has(name)) {
            return true;
        } else if (this.localNames.has(name)) {
            return false;
        } else if (isSupportedBuiltin(name) && this.isBuiltin(name)) {
            return true;
        }
        const binding = this.scopes.root.bindings.get(name);
        return (binding != undefined && this.constants.has(binding)) || this.isPureHelper(name);
    }

    private countLoads(root: SyntaxNode): void {
        walk(root, node => {
            if (node.type == 'Name' && node.ctx == 'load') {
                this.loadCounts.set(node.id, (this.loadCounts.get(node.id) ?? 0) + 1);
            } else if (node.type == 'ImportFrom' && node.names.some(alias => alias.name == '*')) {
                this.hasStarImport = true;
            } else if (node.type == 'Call' && node.func.type == 'Name' && this.isBuiltin(node.func.id)) {
                const id = node.func.id;
                if (DYNAMIC_ACCESS.has(id)) {
                    this.hasDynamicAccess = true;
                } else if (id == 'exec' || id == 'eval') {
                    this.countLiteralSource(node.args, node.keywords.length == 0, id == 'exec');
                }
            }
        });
    }

    /**
     * Accounts for the names used by source text passed to `exec` or `eval`.
     */
    private countLiteralSource(args: Expression[], isPositional: boolean, isStatements: boolean): void {
        const [source] = args;
        if (!isPositional || args.length != 1 || source.type != 'Constant' || source.value.kind != 'str') {
            this.hasDynamicAccess = true;
            return;
        }

        let tree: SyntaxNode;
        try {
            tree = isStatements ? parse(source.value.value) : parseExpression(source.value.value);
        } catch (err) {
            if (err instanceof PythonSyntaxError) {
                this.hasDynamicAccess = true;
                return;
            }
            throw err;
        }

        walk(tree, node => {
            if (isScopeNode(node) || node.type == 'Global' || node.type == 'Import' || node.type == 'ImportFrom') {
                // names bound by the executed source are not worth tracking precisely
                this.hasDynamicAccess = true;
            }
            if (node.type == 'Name') {
                if (node.ctx == 'load') {
                    this.loadCounts.set(node.id, (this.loadCounts.get(node.id) ?? 0) + 1);
                } else {
                    this.boundNames.add(node.id);
                }
            }
        });
    }

    private findDefinitions(body: Statement[]): void {
        const firstLoads = getFirstLoads(body);
        const isDefinedInTime = (name: string, index: number): boolean => {
            const first = firstLoads.get(name);
            return first == undefined || first > index;
        };

        body.forEach((statement, index) => {
            const helper = findHelperFunction(statement, this.scopes);
            if (helper && isDefinedInTime(helper.name, index)) {
                this.helpers.set(helper.name, helper);
                return;
            }

            const variable = findConstantVariable(statement, this.scopes, isLiteralExpression);
            const value = variable && literalValue(variable.expression);
            if (variable && value && isDefinedInTime(variable.name, index)) {
                this.constants.set(variable.binding, value);
            }
        });
    }
}

const isLiteralExpression = (node: SyntaxNode): node is Expression => isLiteral(node);

/**
 * Returns, for every name, the index of the first module statement that reads
 * it while the module is being executed, i.e. outside function bodies.
 * @param body The module body.
 * @returns The indices.
 */
function getFirstLoads(body: Statement[]): Map<string, number> {
    const firstLoads = new Map<string, number>();
    body.forEach((statement, index) => {
        walk(statement, node => {
            if (node.type == 'FunctionDef' || node.type == 'Lambda') {
                return false;
            }
            if (node.type == 'Name' && node.ctx == 'load' && !firstLoads.has(node.id)) {
                firstLoads.set(node.id, index);
            }
        });
    });
    return firstLoads;
}

/**
 * Gathers the facts patterns need about a module.
 * @param module The module.
 * @returns The context.
 */
export function buildPatternContext(module: Module): PatternContext {
    return new ModuleContext(module);
}
