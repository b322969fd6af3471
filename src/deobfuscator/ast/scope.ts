import {
    Alias,
    ClassDef,
    Comprehension,
    ExceptHandler,
    Expression,
    FunctionDef,
    Global,
    Module,
    Name,
    Nonlocal,
    Parameter,
    Arguments,
    SyntaxNode
} from './nodes';
import { getChildren } from './traverse';

export type ScopeKind = 'module' | 'function' | 'class' | 'lambda' | 'comprehension';
export type BindingKind = 'local' | 'parameter' | 'import' | 'global' | 'function' | 'class';

/**
 * A place in the tree where a binding's name is written.
 */
export type BindingSite =
    | { kind: 'name'; node: Name }
    | { kind: 'definition'; node: FunctionDef | ClassDef }
    | { kind: 'parameter'; node: Parameter }
    | { kind: 'handler'; node: ExceptHandler }
    | { kind: 'alias'; node: Alias }
    | { kind: 'declaration'; node: Global | Nonlocal; index: number };

type ScopeOwner = Module | FunctionDef | ClassDef | Expression;

/** Builtins whose call lets code read or write local variables by name. */
const DYNAMIC_BUILTINS = new Set(['locals', 'vars', 'eval', 'exec', 'globals']);
/** Builtins that only reach the namespace while their own call runs. */
const SOURCE_BUILTINS = new Set(['eval', 'exec']);

export class Binding {
    public readonly name: string;
    public readonly scope: Scope;
    public kind: BindingKind;
    public readonly sites: BindingSite[] = [];
    public readonly references: Name[] = [];
    public readonly deletions: Name[] = [];
    /** Scopes other than the owner that read or write the binding. */
    public readonly capturedBy = new Set<Scope>();
    /** Index of the last module statement that writes the binding. */
    public lastStoreStatement = -1;
    /** Index of the last module statement that reads or deletes the binding. */
    public lastReferenceStatement = -1;

    /**
     * Creates a new binding.
     * @param name The name.
     * @param scope The scope that owns the binding.
     * @param kind The binding kind.
     */
    constructor(name: string, scope: Scope, kind: BindingKind) {
        this.name = name;
        this.scope = scope;
        this.kind = kind;
    }

    /**
     * Returns the number of stores to the binding, not counting global or
     * nonlocal declarations.
     */
    public get storeCount(): number {
        return this.sites.filter(s => s.kind != 'declaration').length;
    }

    public get isReferenced(): boolean {
        return this.references.length > 0;
    }
}

export class Scope {
    public readonly kind: ScopeKind;
    public readonly node: ScopeOwner;
    public readonly parent?: Scope;
    public readonly children: Scope[] = [];
    public readonly bindings = new Map<string, Binding>();
    public readonly globalNames = new Set<string>();
    public readonly nonlocalNames = new Set<string>();
    /**
     * Index of the first module statement from which the scope's variables
     * may be accessed by name. A module whose only such access is `exec` or
     * `eval` run at module level is open from the first of those statements
     * on; any other access opens the scope from the start.
     */
    public dynamicFrom?: number;

    /**
     * Creates a new scope.
     * @param kind The scope kind.
     * @param node The node that opens the scope.
     * @param parent The enclosing scope.
     */
    constructor(kind: ScopeKind, node: ScopeOwner, parent?: Scope) {
        this.kind = kind;
        this.node = node;
        this.parent = parent;
        parent?.children.push(this);
    }

    /**
     * Finds the binding a name refers to when read from this scope.
     * @param name The name.
     * @returns The binding, or undefined for builtins and undefined names.
     */
    public lookup(name: string): Binding | undefined {
        if (this.globalNames.has(name)) {
            return this.root().bindings.get(name);
        }

        const local = this.bindings.get(name);
        if (local) {
            return local;
        }

        // class bodies are not visible to the scopes nested in them
        let scope = this.parent;
        while (scope) {
            if (scope.kind != 'class') {
                const binding = scope.bindings.get(name);
                if (binding) {
                    return binding;
                }
            }
            scope = scope.parent;
        }
        return undefined;
    }

    /** Whether the scope calls a builtin that accesses variables by name. */
    public get isDynamic(): boolean {
        return this.dynamicFrom != undefined;
    }

    /**
     * Returns whether the value a binding holds is settled before the scope
     * becomes dynamic: every write comes before the first dynamic statement
     * and no read comes after it.
     * @param binding The binding.
     * @returns Whether.
     */
    public isSettledBeforeDynamicAccess(binding: Binding): boolean {
        if (this.dynamicFrom == undefined) {
            return true;
        }
        return (
            binding.capturedBy.size == 0 &&
            binding.lastStoreStatement < this.dynamicFrom &&
            binding.lastReferenceStatement <= this.dynamicFrom
        );
    }

    public root(): Scope {
        return this.parent ? this.parent.root() : this;
    }

    /**
     * Returns the scope itself and every scope nested in it.
     */
    public descendants(): Scope[] {
        return [this, ...this.children.flatMap(c => c.descendants())];
    }
}

interface PendingStore {
    scope: Scope;
    name: string;
    site: BindingSite;
    kind: BindingKind;
    statement: number;
}

interface DynamicCall {
    scope: Scope;
    node: Name;
    statement: number;
}

interface PendingLoad {
    scope: Scope;
    node: Name;
    isDeletion: boolean;
    statement: number;
}

/**
 * The result of scope analysis over a module.
 */
export class ScopeTree {
    public readonly root: Scope;
    /** Names that resolve to no binding, i.e. builtins or undefined names. */
    public readonly unresolved: Name[] = [];
    private readonly scopesByNode = new Map<SyntaxNode, Scope>();
    private readonly bindingsByName = new Map<Name, Binding>();

    /**
     * Creates a new scope tree.
     * @param root The module scope.
     */
    constructor(root: Scope) {
        this.root = root;
    }

    /**
     * Returns the scope opened by a module, function, class, lambda or comprehension.
     * @param node The node.
     * @returns The scope.
     */
    public scopeOf(node: SyntaxNode): Scope | undefined {
        return this.scopesByNode.get(node);
    }

    /**
     * Returns the binding a name node reads, writes or deletes.
     * @param node The name node.
     * @returns The binding, or undefined when unresolved.
     */
    public bindingOf(node: Name): Binding | undefined {
        return this.bindingsByName.get(node);
    }

    public allScopes(): Scope[] {
        return this.root.descendants();
    }

    public allBindings(): Binding[] {
        return this.allScopes().flatMap(s => Array.from(s.bindings.values()));
    }

    /** @internal */
    public registerScope(node: SyntaxNode, scope: Scope): void {
        this.scopesByNode.set(node, scope);
    }

    /** @internal */
    public registerName(node: Name, binding: Binding): void {
        this.bindingsByName.set(node, binding);
    }
}

/**
 * Builds the scopes and bindings of a module. Python decides whether a name
 * is local from every store in a block, so stores are collected over the
 * whole tree before any load is resolved.
 */
class ScopeAnalyzer {
    private readonly tree: ScopeTree;
    private readonly stores: PendingStore[] = [];
    private readonly loads: PendingLoad[] = [];
    private readonly dynamicCalls: DynamicCall[] = [];
    private statement = 0;

    /**
     * Creates a new scope analyzer.
     * @param module The module.
     */
    constructor(private readonly module: Module) {
        const root = new Scope('module', module);
        this.tree = new ScopeTree(root);
        this.tree.registerScope(module, root);
    }

    public analyze(): ScopeTree {
        this.module.body.forEach((statement, index) => {
            this.statement = index;
            this.visit(statement, this.tree.root);
        });
        this.bindStores();
        this.resolveLoads();

        for (const call of this.dynamicCalls) {
            if (!this.tree.bindingOf(call.node)) {
                // globals() exposes the module namespace from anywhere
                const scope = call.node.id == 'globals' ? this.tree.root : call.scope;
                const from = this.isSourceStatement(call) ? call.statement : 0;
                scope.dynamicFrom = Math.min(scope.dynamicFrom ?? from, from);
            }
        }
        return this.tree;
    }

    /**
     * Returns whether a call is a module statement of its own, such as
     * `exec(code)`, as opposed to a call nested in a loop or an expression.
     */
    private isSourceStatement(call: DynamicCall): boolean {
        const statement = this.module.body[call.statement];
        return (
            call.scope.kind == 'module' &&
            SOURCE_BUILTINS.has(call.node.id) &&
            statement.type == 'Expr' &&
            statement.value.type == 'Call' &&
            statement.value.func == call.node
        );
    }

    private visit(node: SyntaxNode, scope: Scope): void {
        switch (node.type) {
            case 'Name':
                if (node.ctx == 'load') {
                    this.loads.push({ scope, node, isDeletion: false, statement: this.statement });
                } else {
                    this.store(scope, node.id, { kind: 'name', node }, 'local');
                    if (node.ctx == 'del') {
                        this.loads.push({ scope, node, isDeletion: true, statement: this.statement });
                    }
                }
                return;

            case 'AugAssign':
                if (node.target.type == 'Name') {
                    this.loads.push({ scope, node: node.target, isDeletion: false, statement: this.statement });
                }
                this.visitChildren(node, scope);
                return;

            case 'Call':
                if (node.func.type == 'Name' && DYNAMIC_BUILTINS.has(node.func.id)) {
                    this.dynamicCalls.push({ scope, node: node.func, statement: this.statement });
                }
                this.visitChildren(node, scope);
                return;

            case 'FunctionDef': {
                node.decorators.forEach(d => this.visit(d, scope));
                this.visitArgumentExpressions(node.args, scope);
                if (node.returns) {
                    this.visit(node.returns, scope);
                }
                this.store(scope, node.name, { kind: 'definition', node }, 'function');

                const inner = this.openScope('function', node, scope);
                this.storeParameters(node.args, inner);
                node.body.forEach(s => this.visit(s, inner));
                return;
            }

            case 'Lambda': {
                this.visitArgumentExpressions(node.args, scope);
                const inner = this.openScope('lambda', node, scope);
                this.storeParameters(node.args, inner);
                this.visit(node.body, inner);
                return;
            }

            case 'ClassDef': {
                node.decorators.forEach(d => this.visit(d, scope));
                node.bases.forEach(b => this.visit(b, scope));
                node.keywords.forEach(k => this.visit(k.value, scope));
                this.store(scope, node.name, { kind: 'definition', node }, 'class');

                const inner = this.openScope('class', node, scope);
                node.body.forEach(s => this.visit(s, inner));
                return;
            }

            case 'ListComp':
            case 'SetComp':
            case 'GeneratorExp':
                this.visitComprehension(node, node.generators, [node.elt], scope);
                return;
            case 'DictComp':
                this.visitComprehension(node, node.generators, [node.key, node.value], scope);
                return;

            case 'NamedExpr': {
                this.visit(node.value, scope);
                let target = scope;
                while (target.kind == 'comprehension' && target.parent) {
                    target = target.parent;
                }
                this.store(target, node.target.id, { kind: 'name', node: node.target }, 'local');
                return;
            }

            case 'Import':
            case 'ImportFrom':
                for (const alias of node.names) {
                    if (alias.name != '*') {
                        const name = alias.asname ?? alias.name.split('.')[0];
                        this.store(scope, name, { kind: 'alias', node: alias }, 'import');
                    }
                }
                return;

            case 'Global':
            case 'Nonlocal': {
                const names = node.type == 'Global' ? scope.globalNames : scope.nonlocalNames;
                node.names.forEach((name, index) => {
                    names.add(name);
                    this.stores.push({
                        scope,
                        name,
                        site: { kind: 'declaration', node, index },
                        kind: 'global',
                        statement: this.statement
                    });
                });
                return;
            }

            case 'Try':
                node.body.forEach(s => this.visit(s, scope));
                for (const handler of node.handlers) {
                    if (handler.exceptionType) {
                        this.visit(handler.exceptionType, scope);
                    }
                    if (handler.name) {
                        this.store(scope, handler.name, { kind: 'handler', node: handler }, 'local');
                    }
                    handler.body.forEach(s => this.visit(s, scope));
                }
                node.orelse.forEach(s => this.visit(s, scope));
                node.finalbody.forEach(s => this.visit(s, scope));
                return;

            default:
                this.visitChildren(node, scope);
        }
    }

    private visitChildren(node: SyntaxNode, scope: Scope): void {
        for (const child of getChildren(node)) {
            this.visit(child, scope);
        }
    }

    private visitComprehension(
        node: Expression,
        generators: Comprehension[],
        results: Expression[],
        scope: Scope
    ): void {
        // the first iterable is evaluated in the enclosing scope
        this.visit(generators[0].iter, scope);
        const inner = this.openScope('comprehension', node, scope);
        generators.forEach((generator, index) => {
            if (index > 0) {
                this.visit(generator.iter, inner);
            }
            this.visit(generator.target, inner);
            generator.ifs.forEach(i => this.visit(i, inner));
        });
        results.forEach(r => this.visit(r, inner));
    }

    private visitArgumentExpressions(args: Arguments, scope: Scope): void {
        for (const param of allParameters(args)) {
            if (param.default) {
                this.visit(param.default, scope);
            }
            if (param.annotation) {
                this.visit(param.annotation, scope);
            }
        }
    }

    private storeParameters(args: Arguments, scope: Scope): void {
        for (const param of allParameters(args)) {
            this.store(scope, param.name, { kind: 'parameter', node: param }, 'parameter');
        }
    }

    private openScope(kind: ScopeKind, node: ScopeOwner, parent: Scope): Scope {
        const scope = new Scope(kind, node, parent);
        this.tree.registerScope(node, scope);
        return scope;
    }

    private store(scope: Scope, name: string, site: BindingSite, kind: BindingKind): void {
        this.stores.push({ scope, name, site, kind, statement: this.statement });
    }

    /**
     * Creates bindings for every store. Stores under a nonlocal declaration
     * are bound last, once the enclosing function bindings exist.
     */
    private bindStores(): void {
        const deferred: PendingStore[] = [];
        for (const store of this.stores) {
            if (store.scope.nonlocalNames.has(store.name)) {
                deferred.push(store);
                continue;
            }

            const owner = store.scope.globalNames.has(store.name) ? this.tree.root : store.scope;
            this.bind(owner, store);
        }

        for (const store of deferred) {
            let owner = store.scope.parent;
            while (owner && (owner.kind == 'class' || !owner.bindings.has(store.name) || owner.kind == 'module')) {
                owner = owner.parent;
            }
            this.bind(owner ?? store.scope, store);
        }
    }

    private bind(owner: Scope, store: PendingStore): void {
        let binding = owner.bindings.get(store.name);
        if (!binding) {
            const kind = store.kind == 'local' && owner.kind == 'module' ? 'global' : store.kind;
            binding = new Binding(store.name, owner, kind);
            owner.bindings.set(store.name, binding);
        } else if (binding.kind == 'global' && store.site.kind != 'declaration' && store.kind != 'local') {
            binding.kind = store.kind;
        }

        binding.sites.push(store.site);
        if (store.site.kind != 'declaration') {
            binding.lastStoreStatement = Math.max(binding.lastStoreStatement, store.statement);
        }
        if (owner != store.scope) {
            binding.capturedBy.add(store.scope);
        }
        if (store.site.kind == 'name') {
            this.tree.registerName(store.site.node, binding);
        }
    }

    private resolveLoads(): void {
        for (const load of this.loads) {
            const binding = load.scope.lookup(load.node.id);
            if (!binding) {
                this.tree.unresolved.push(load.node);
                continue;
            }

            binding.lastReferenceStatement = Math.max(binding.lastReferenceStatement, load.statement);
            if (load.isDeletion) {
                binding.deletions.push(load.node);
                continue;
            }
            binding.references.push(load.node);
            this.tree.registerName(load.node, binding);
            if (binding.scope != load.scope) {
                binding.capturedBy.add(load.scope);
            }
        }
    }
}

/**
 * Returns every parameter of an argument list in declaration order.
 * @param args The arguments.
 * @returns The parameters.
 */
export function allParameters(args: Arguments): Parameter[] {
    const params = [...args.posonly, ...args.args];
    if (args.vararg) {
        params.push(args.vararg);
    }
    params.push(...args.kwonly);
    if (args.kwarg) {
        params.push(args.kwarg);
    }
    return params;
}

/**
 * Analyzes the scopes of a module.
 * @param module The module.
 * @returns The scope tree.
 */
export function analyzeScopes(module: Module): ScopeTree {
    return new ScopeAnalyzer(module).analyze();
}
