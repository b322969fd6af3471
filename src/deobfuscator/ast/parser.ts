import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { PythonSyntaxError } from '../errors';
import { decodeEscapes, fromCodePoints, parseNumberConstant, parseStringConstant, splitStringToken } from './literals';
import {
    Alias,
    Arguments,
    BinaryOperator,
    BooleanOperator,
    Comprehension,
    ComparisonOperator,
    Constant,
    ExceptHandler,
    Expression,
    ExpressionContext,
    FormattedValue,
    JoinedStr,
    Keyword,
    Module,
    Name,
    Parameter,
    SourceLocation,
    Statement,
    UnaryOperator,
    WithItem
} from './nodes';

type CstNode = Parser.SyntaxNode;

export interface ParseOptions {
    /** Called for decompiler irregularities that are loaded instead of rejected. */
    onWarning?: (message: string, loc: SourceLocation) => void;
}

const KEYWORDS: ReadonlySet<string> = new Set([
    'False',
    'None',
    'True',
    'and',
    'as',
    'assert',
    'async',
    'await',
    'break',
    'class',
    'continue',
    'def',
    'del',
    'elif',
    'else',
    'except',
    'finally',
    'for',
    'from',
    'global',
    'if',
    'import',
    'in',
    'is',
    'lambda',
    'nonlocal',
    'not',
    'or',
    'pass',
    'raise',
    'return',
    'try',
    'while',
    'with',
    'yield'
]);

const AUGMENTED_OPERATORS: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
    ['+=', '+'],
    ['-=', '-'],
    ['*=', '*'],
    ['@=', '@'],
    ['/=', '/'],
    ['//=', '//'],
    ['%=', '%'],
    ['**=', '**'],
    ['<<=', '<<'],
    ['>>=', '>>'],
    ['|=', '|'],
    ['^=', '^'],
    ['&=', '&']
]);

const BINARY_OPERATORS: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>(
    Array.from(AUGMENTED_OPERATORS.values(), (op): [string, BinaryOperator] => [op, op])
);

const COMPARISON_OPERATORS: ReadonlyMap<string, ComparisonOperator> = new Map<string, ComparisonOperator>([
    ['==', '=='],
    ['!=', '!='],
    ['<>', '!='],
    ['<', '<'],
    ['<=', '<='],
    ['>', '>'],
    ['>=', '>='],
    ['in', 'in'],
    ['not in', 'not in'],
    ['is', 'is'],
    ['is not', 'is not']
]);

const UNARY_OPERATORS: ReadonlyMap<string, UnaryOperator> = new Map<string, UnaryOperator>([
    ['-', '-'],
    ['+', '+'],
    ['~', '~']
]);

/** Grammar nodes that have no counterpart in the loaded tree. */
const UNSUPPORTED_NODES: ReadonlyMap<string, string> = new Map([
    ['print_statement', 'print statement'],
    ['exec_statement', 'exec statement'],
    ['match_statement', 'match statement'],
    ['type_alias_statement', 'type alias'],
    ['type_parameter', 'type parameters'],
    ['except_group_clause', 'except* clause']
]);

/** Extras the grammar allows anywhere; they carry nothing for the tree. */
const IGNORED_NODES: ReadonlySet<string> = new Set(['comment', 'line_continuation']);

/**
 * Returns whether a string is a reserved Python keyword.
 * @param name The string.
 * @returns Whether.
 */
export function isKeyword(name: string): boolean {
    return KEYWORDS.has(name);
}

let sharedParser: Parser | undefined;

function getParser(): Parser {
    if (!sharedParser) {
        sharedParser = new Parser();
        // the grammar package declares its own language type
        sharedParser.setLanguage(Python as unknown as Parser.Language);
    }
    return sharedParser;
}

function locOf(node: CstNode): SourceLocation {
    return { line: node.startPosition.row + 1, column: node.startPosition.column };
}

function errorAt(message: string, node: CstNode): PythonSyntaxError {
    return new PythonSyntaxError(message, node.startPosition.row + 1, node.startPosition.column);
}

function namedChildrenOf(node: CstNode): CstNode[] {
    return node.namedChildren.filter(child => !IGNORED_NODES.has(child.type));
}

function childrenOf(node: CstNode): CstNode[] {
    return node.children.filter(child => !IGNORED_NODES.has(child.type));
}

function requireField(node: CstNode, field: string): CstNode {
    const child = node.childForFieldName(field);
    if (!child) {
        throw errorAt('invalid syntax', node);
    }
    return child;
}

function isSameNode(a: CstNode, b: CstNode | null): boolean {
    return b != null && a.type == b.type && a.startIndex == b.startIndex && a.endIndex == b.endIndex;
}

function isAsyncNode(node: CstNode): boolean {
    return node.children.length > 0 && node.children[0].type == 'async';
}

/**
 * Finds the first node the grammar could not place: an ERROR node, or a
 * token the parser inserted to recover (a zero-width leaf).
 */
function findSyntaxError(node: CstNode): PythonSyntaxError | undefined {
    if (node.type == 'ERROR') {
        const unexpected = node.children.find(child => child.type != 'ERROR') ?? node;
        return errorAt('invalid syntax', unexpected);
    }
    if (
        node.childCount == 0 &&
        node.startIndex == node.endIndex &&
        node.type != 'module' &&
        node.type != 'block'
    ) {
        return errorAt('invalid syntax', node);
    }
    const unsupported = UNSUPPORTED_NODES.get(node.type);
    if (unsupported) {
        return errorAt(`${unsupported} is not supported`, node);
    }
    for (const child of node.children) {
        const error = findSyntaxError(child);
        if (error) {
            return error;
        }
    }
    return undefined;
}

/**
 * Converts the concrete syntax tree of tree-sitter-python into a module tree.
 */
export class SyntaxTreeLoader {
    private readonly options: ParseOptions;

    /**
     * Creates a new loader.
     * @param options The parse options.
     */
    constructor(options: ParseOptions = {}) {
        this.options = options;
    }

    /**
     * Parses source text into its concrete syntax tree, rejecting any
     * source the grammar had to recover from.
     * @param source The source code.
     * @returns The root node.
     */
    public static parseTree(source: string): CstNode {
        const tree = getParser().parse(source, undefined, { bufferSize: Math.max(source.length * 2, 32 * 1024) });
        const error = findSyntaxError(tree.rootNode);
        if (error) {
            throw error;
        }
        return tree.rootNode;
    }

    /**
     * Loads a module node.
     * @param root The root node.
     * @returns The module.
     */
    public loadModule(root: CstNode): Module {
        return { type: 'Module', body: this.loadStatements(namedChildrenOf(root), 0), loc: { line: 1, column: 0 } };
    }

    // statements

    private loadStatements(nodes: CstNode[], indent: number | undefined): Statement[] {
        const body: Statement[] = [];
        let previous: CstNode | undefined;
        for (const node of nodes) {
            const startsLine = !previous || node.startPosition.row > previous.endPosition.row;
            if (startsLine) {
                const column = node.startPosition.column;
                if (indent == undefined) {
                    indent = column;
                } else if (column > indent) {
                    throw errorAt('unexpected indent', node);
                } else if (column < indent) {
                    throw errorAt('unindent does not match any outer indentation level', node);
                }
            }
            body.push(this.loadStatement(node));
            previous = node;
        }
        return body;
    }

    private loadBlock(node: CstNode | null, header: CstNode): Statement[] {
        const statements = node ? namedChildrenOf(node) : [];
        if (statements.length == 0) {
            // the suite of a header with no indented lines is the line after its ':'
            const colon = node?.previousSibling ?? header;
            const loc = { line: colon.endPosition.row + 2, column: 0 };
            this.warn('empty block loaded as `pass`', loc);
            return [{ type: 'Pass', loc }];
        }
        return this.loadStatements(statements, undefined);
    }

    private loadStatement(node: CstNode): Statement {
        const loc = locOf(node);
        switch (node.type) {
            case 'expression_statement':
                return this.loadExpressionStatement(node);
            case 'pass_statement':
                return { type: 'Pass', loc };
            case 'break_statement':
                return { type: 'Break', loc };
            case 'continue_statement':
                return { type: 'Continue', loc };
            case 'return_statement': {
                const [value] = namedChildrenOf(node);
                return { type: 'Return', value: value ? this.loadExpression(value) : undefined, loc };
            }
            case 'raise_statement': {
                const cause = node.childForFieldName('cause');
                const exc = namedChildrenOf(node).find(child => !isSameNode(child, cause));
                return {
                    type: 'Raise',
                    exc: exc ? this.loadExpression(exc) : undefined,
                    cause: cause ? this.loadExpression(cause) : undefined,
                    loc
                };
            }
            case 'global_statement':
                return { type: 'Global', names: namedChildrenOf(node).map(child => child.text), loc };
            case 'nonlocal_statement':
                return { type: 'Nonlocal', names: namedChildrenOf(node).map(child => child.text), loc };
            case 'delete_statement': {
                const [target] = namedChildrenOf(node);
                const targets =
                    target.type == 'expression_list' ? namedChildrenOf(target) : [target];
                return {
                    type: 'Delete',
                    targets: targets.map(t => this.setContext(this.loadExpression(t), 'del')),
                    loc
                };
            }
            case 'assert_statement': {
                const [test, msg] = namedChildrenOf(node);
                return {
                    type: 'Assert',
                    test: this.loadExpression(test),
                    msg: msg ? this.loadExpression(msg) : undefined,
                    loc
                };
            }
            case 'import_statement':
                return { type: 'Import', names: namedChildrenOf(node).map(child => this.loadAlias(child)), loc };
            case 'import_from_statement':
            case 'future_import_statement':
                return this.loadImportFrom(node);
            case 'if_statement':
                return this.loadIf(node);
            case 'while_statement':
                return {
                    type: 'While',
                    test: this.loadExpression(requireField(node, 'condition')),
                    body: this.loadBlock(node.childForFieldName('body'), node),
                    orelse: this.loadElse(node.childForFieldName('alternative')),
                    loc
                };
            case 'for_statement':
                return {
                    type: 'For',
                    target: this.setContext(this.loadExpression(requireField(node, 'left')), 'store'),
                    iter: this.loadExpression(requireField(node, 'right')),
                    body: this.loadBlock(node.childForFieldName('body'), node),
                    orelse: this.loadElse(node.childForFieldName('alternative')),
                    isAsync: isAsyncNode(node),
                    loc
                };
            case 'try_statement':
                return this.loadTry(node);
            case 'with_statement':
                return this.loadWith(node);
            case 'function_definition':
                return this.loadFunctionDef(node, []);
            case 'class_definition':
                return this.loadClassDef(node, []);
            case 'decorated_definition': {
                const decorators = namedChildrenOf(node)
                    .filter(child => child.type == 'decorator')
                    .map(child => this.loadExpression(namedChildrenOf(child)[0]));
                const definition = requireField(node, 'definition');
                const statement =
                    definition.type == 'class_definition'
                        ? this.loadClassDef(definition, decorators)
                        : this.loadFunctionDef(definition, decorators);
                statement.loc = loc;
                return statement;
            }
        }
        throw errorAt(`unexpected ${node.type.replace(/_/g, ' ')}`, node);
    }

    private loadExpressionStatement(node: CstNode): Statement {
        const loc = locOf(node);
        const children = namedChildrenOf(node);
        if (children.length > 1) {
            return { type: 'Expr', value: this.loadTuple(children, node), loc };
        }

        const [child] = children;
        if (child.type == 'augmented_assignment') {
            const operator = requireField(child, 'operator').type;
            const op = AUGMENTED_OPERATORS.get(operator);
            if (!op) {
                throw errorAt(`unknown operator '${operator}'`, child);
            }
            return {
                type: 'AugAssign',
                target: this.setContext(this.loadExpression(requireField(child, 'left')), 'store'),
                op,
                value: this.loadExpression(requireField(child, 'right')),
                loc
            };
        }

        if (child.type == 'assignment') {
            const annotation = child.childForFieldName('type');
            if (annotation) {
                const value = child.childForFieldName('right');
                return {
                    type: 'AnnAssign',
                    target: this.setContext(this.loadExpression(requireField(child, 'left')), 'store'),
                    annotation: this.loadExpression(annotation),
                    value: value ? this.loadExpression(value) : undefined,
                    loc
                };
            }

            // `a = b = 1` nests the second assignment as the right side of the first
            const targets: Expression[] = [];
            let current = child;
            for (;;) {
                targets.push(this.setContext(this.loadExpression(requireField(current, 'left')), 'store'));
                const right = requireField(current, 'right');
                if (right.type != 'assignment') {
                    return { type: 'Assign', targets, value: this.loadExpression(right), loc };
                }
                current = right;
            }
        }

        return { type: 'Expr', value: this.loadExpression(child), loc };
    }

    private loadAlias(node: CstNode): Alias {
        if (node.type == 'aliased_import') {
            return {
                name: requireField(node, 'name').text,
                asname: requireField(node, 'alias').text,
                loc: locOf(node)
            };
        }
        return { name: node.text, loc: locOf(node) };
    }

    private loadImportFrom(node: CstNode): Statement {
        const loc = locOf(node);
        if (node.type == 'future_import_statement') {
            const names = namedChildrenOf(node).map(child => this.loadAlias(child));
            return { type: 'ImportFrom', module: '__future__', names, level: 0, loc };
        }

        const moduleName = requireField(node, 'module_name');
        let module: string | undefined;
        let level = 0;
        if (moduleName.type == 'relative_import') {
            for (const child of namedChildrenOf(moduleName)) {
                if (child.type == 'import_prefix') {
                    level = child.text.length;
                } else {
                    module = child.text;
                }
            }
        } else {
            module = moduleName.text;
        }

        const names: Alias[] = [];
        const children = childrenOf(node);
        const importIndex = children.findIndex(child => child.type == 'import');
        for (const child of children.slice(importIndex + 1)) {
            if (child.type == 'wildcard_import') {
                names.push({ name: '*', loc: locOf(child) });
            } else if (child.isNamed) {
                names.push(this.loadAlias(child));
            }
        }
        return { type: 'ImportFrom', module, names, level, loc };
    }

    private loadIf(node: CstNode): Statement {
        const alternatives = namedChildrenOf(node).filter(
            child => child.type == 'elif_clause' || child.type == 'else_clause'
        );
        return this.loadIfChain(node, alternatives);
    }

    private loadIfChain(node: CstNode, alternatives: CstNode[]): Statement {
        const [next, ...rest] = alternatives;
        let orelse: Statement[] = [];
        if (next && next.type == 'elif_clause') {
            orelse = [this.loadIfChain(next, rest)];
        } else if (next) {
            orelse = this.loadElse(next);
        }
        return {
            type: 'If',
            test: this.loadExpression(requireField(node, 'condition')),
            body: this.loadBlock(node.childForFieldName('consequence'), node),
            orelse,
            loc: locOf(node)
        };
    }

    private loadElse(node: CstNode | null): Statement[] {
        return node ? this.loadBlock(node.childForFieldName('body'), node) : [];
    }

    private loadTry(node: CstNode): Statement {
        const handlers: ExceptHandler[] = [];
        let orelse: Statement[] = [];
        let finalbody: Statement[] = [];

        for (const child of namedChildrenOf(node)) {
            if (child.type == 'except_clause') {
                handlers.push(this.loadExceptHandler(child));
            } else if (child.type == 'else_clause') {
                orelse = this.loadElse(child);
            } else if (child.type == 'finally_clause') {
                finalbody = this.loadBlock(namedChildrenOf(child).find(c => c.type == 'block') ?? null, child);
            }
        }

        return {
            type: 'Try',
            body: this.loadBlock(node.childForFieldName('body'), node),
            handlers,
            orelse,
            finalbody,
            loc: locOf(node)
        };
    }

    private loadExceptHandler(node: CstNode): ExceptHandler {
        const loc = locOf(node);
        const children = namedChildrenOf(node);
        const block = children.find(child => child.type == 'block') ?? null;
        let expressions = children.filter(child => child.type != 'block');

        if (expressions.length == 1 && expressions[0].type == 'as_pattern') {
            const pattern = expressions[0];
            expressions = [namedChildrenOf(pattern)[0], requireField(pattern, 'alias')];
        }

        const [exceptionType, target] = expressions;
        let name: string | undefined;
        if (target) {
            const nameNode = target.type == 'as_pattern_target' ? namedChildrenOf(target)[0] : target;
            if (nameNode.type != 'identifier') {
                throw errorAt('invalid syntax', nameNode);
            }
            name = nameNode.text;
            if (node.children.some(child => child.type == ',')) {
                // decompilers occasionally emit the legacy `except A, e` form
                this.warn('legacy except clause loaded as `except ... as ...`', loc);
            }
        }

        return {
            exceptionType: exceptionType ? this.loadExpression(exceptionType) : undefined,
            name,
            body: this.loadBlock(block, node),
            loc
        };
    }

    private loadWith(node: CstNode): Statement {
        const clause = namedChildrenOf(node).find(child => child.type == 'with_clause');
        const items: WithItem[] = (clause ? namedChildrenOf(clause) : [])
            .filter(child => child.type == 'with_item')
            .map(item => {
                const value = requireField(item, 'value');
                const alias = item.childForFieldName('alias');
                if (alias) {
                    return {
                        contextExpr: this.loadExpression(value),
                        optionalVars: this.loadTarget(alias)
                    };
                }
                if (value.type == 'as_pattern') {
                    return {
                        contextExpr: this.loadExpression(namedChildrenOf(value)[0]),
                        optionalVars: this.loadTarget(requireField(value, 'alias'))
                    };
                }
                return { contextExpr: this.loadExpression(value) };
            });

        return {
            type: 'With',
            items,
            body: this.loadBlock(node.childForFieldName('body'), node),
            isAsync: isAsyncNode(node),
            loc: locOf(node)
        };
    }

    private loadTarget(node: CstNode): Expression {
        const target = node.type == 'as_pattern_target' ? namedChildrenOf(node)[0] : node;
        return this.setContext(this.loadExpression(target), 'store');
    }

    private loadFunctionDef(node: CstNode, decorators: Expression[]): Statement {
        if (node.childForFieldName('type_parameters')) {
            throw errorAt('type parameters are not supported', node);
        }
        const parameters = node.childForFieldName('parameters');
        const returns = node.childForFieldName('return_type');
        return {
            type: 'FunctionDef',
            name: requireField(node, 'name').text,
            args: this.loadParameters(parameters),
            body: this.loadBlock(node.childForFieldName('body'), node),
            decorators,
            returns: returns ? this.loadExpression(returns) : undefined,
            isAsync: isAsyncNode(node),
            loc: locOf(node)
        };
    }

    private loadClassDef(node: CstNode, decorators: Expression[]): Statement {
        const superclasses = node.childForFieldName('superclasses');
        const [bases, keywords] = superclasses ? this.loadCallArguments(superclasses) : [[], []];
        return {
            type: 'ClassDef',
            name: requireField(node, 'name').text,
            bases,
            keywords,
            body: this.loadBlock(node.childForFieldName('body'), node),
            decorators,
            loc: locOf(node)
        };
    }

    /**
     * Loads a `parameters` or `lambda_parameters` node.
     * @param node The node, absent for a lambda with no parameters.
     * @returns The arguments.
     */
    private loadParameters(node: CstNode | null): Arguments {
        const args: Arguments = { posonly: [], args: [], kwonly: [] };
        let afterStar = false;

        for (const child of node ? namedChildrenOf(node) : []) {
            switch (child.type) {
                case 'positional_separator':
                    args.posonly = args.args;
                    args.args = [];
                    break;
                case 'keyword_separator':
                    afterStar = true;
                    break;
                case 'list_splat_pattern':
                    afterStar = true;
                    args.vararg = this.loadParameter(child);
                    break;
                case 'dictionary_splat_pattern':
                    args.kwarg = this.loadParameter(child);
                    break;
                case 'typed_parameter': {
                    const [inner] = namedChildrenOf(child);
                    if (inner.type == 'list_splat_pattern') {
                        afterStar = true;
                        args.vararg = this.loadParameter(child);
                    } else if (inner.type == 'dictionary_splat_pattern') {
                        args.kwarg = this.loadParameter(child);
                    } else {
                        (afterStar ? args.kwonly : args.args).push(this.loadParameter(child));
                    }
                    break;
                }
                default:
                    (afterStar ? args.kwonly : args.args).push(this.loadParameter(child));
            }
        }

        return args;
    }

    private loadParameter(node: CstNode): Parameter {
        const loc = locOf(node);
        switch (node.type) {
            case 'identifier':
                return { name: node.text, loc };
            case 'list_splat_pattern':
            case 'dictionary_splat_pattern':
                return { name: this.parameterName(namedChildrenOf(node)[0], node), loc };
            case 'typed_parameter': {
                const [inner] = namedChildrenOf(node);
                const type = requireField(node, 'type');
                const name =
                    inner.type == 'identifier' ? inner.text : this.parameterName(namedChildrenOf(inner)[0], inner);
                return { name, annotation: this.loadExpression(type), loc };
            }
            case 'default_parameter':
            case 'typed_default_parameter': {
                const type = node.childForFieldName('type');
                return {
                    name: this.parameterName(requireField(node, 'name'), node),
                    annotation: type ? this.loadExpression(type) : undefined,
                    default: this.loadExpression(requireField(node, 'value')),
                    loc
                };
            }
        }
        throw errorAt('invalid parameter', node);
    }

    private parameterName(node: CstNode | undefined, parameter: CstNode): string {
        if (!node || node.type != 'identifier') {
            throw errorAt('invalid parameter', node ?? parameter);
        }
        return node.text;
    }

    // expressions

    /**
     * Loads an expression node.
     * @param node The node.
     * @returns The expression.
     */
    public loadExpression(node: CstNode): Expression {
        const loc = locOf(node);
        switch (node.type) {
            case 'identifier':
            case 'keyword_identifier':
                return { type: 'Name', id: node.text, ctx: 'load', loc };
            case 'integer':
            case 'float':
                return this.loadNumber(node);
            case 'true':
                return { type: 'Constant', value: { kind: 'bool', value: true }, raw: 'True', loc };
            case 'false':
                return { type: 'Constant', value: { kind: 'bool', value: false }, raw: 'False', loc };
            case 'none':
                return { type: 'Constant', value: { kind: 'none' }, raw: 'None', loc };
            case 'ellipsis':
                return { type: 'Constant', value: { kind: 'ellipsis' }, raw: '...', loc };
            case 'string':
                return this.loadStrings([node], node);
            case 'concatenated_string':
                return this.loadStrings(namedChildrenOf(node), node);
            case 'type':
            case 'parenthesized_expression':
                return this.loadExpression(namedChildrenOf(node)[0]);
            case 'tuple':
            case 'expression_list':
            case 'pattern_list':
            case 'tuple_pattern':
                return this.loadTuple(namedChildrenOf(node), node);
            case 'list':
            case 'list_pattern':
                return {
                    type: 'List',
                    elts: namedChildrenOf(node).map(child => this.loadExpression(child)),
                    ctx: 'load',
                    loc
                };
            case 'set':
                return { type: 'Set', elts: namedChildrenOf(node).map(child => this.loadExpression(child)), loc };
            case 'dictionary':
                return this.loadDict(node);
            case 'list_splat':
            case 'list_splat_pattern':
            case 'parenthesized_list_splat':
                return { type: 'Starred', value: this.loadExpression(namedChildrenOf(node)[0]), ctx: 'load', loc };
            case 'list_comprehension':
            case 'set_comprehension':
            case 'generator_expression': {
                const elt = this.loadExpression(requireField(node, 'body'));
                const generators = this.loadComprehensions(node);
                const type =
                    node.type == 'list_comprehension'
                        ? 'ListComp'
                        : node.type == 'set_comprehension'
                          ? 'SetComp'
                          : 'GeneratorExp';
                return { type, elt, generators, loc };
            }
            case 'dictionary_comprehension': {
                const pair = requireField(node, 'body');
                return {
                    type: 'DictComp',
                    key: this.loadExpression(requireField(pair, 'key')),
                    value: this.loadExpression(requireField(pair, 'value')),
                    generators: this.loadComprehensions(node),
                    loc
                };
            }
            case 'binary_operator': {
                const operator = requireField(node, 'operator').type;
                const op = BINARY_OPERATORS.get(operator);
                if (!op) {
                    throw errorAt(`unknown operator '${operator}'`, node);
                }
                return {
                    type: 'BinOp',
                    left: this.loadExpression(requireField(node, 'left')),
                    op,
                    right: this.loadExpression(requireField(node, 'right')),
                    loc
                };
            }
            case 'unary_operator': {
                const operator = requireField(node, 'operator').type;
                const op = UNARY_OPERATORS.get(operator);
                if (!op) {
                    throw errorAt(`unknown operator '${operator}'`, node);
                }
                return { type: 'UnaryOp', op, operand: this.loadExpression(requireField(node, 'argument')), loc };
            }
            case 'not_operator':
                return {
                    type: 'UnaryOp',
                    op: 'not',
                    operand: this.loadExpression(requireField(node, 'argument')),
                    loc
                };
            case 'boolean_operator':
                return this.loadBoolean(node);
            case 'comparison_operator':
                return this.loadComparison(node);
            case 'conditional_expression': {
                const [body, test, orelse] = namedChildrenOf(node);
                return {
                    type: 'IfExp',
                    test: this.loadExpression(test),
                    body: this.loadExpression(body),
                    orelse: this.loadExpression(orelse),
                    loc
                };
            }
            case 'lambda':
                return {
                    type: 'Lambda',
                    args: this.loadParameters(node.childForFieldName('parameters')),
                    body: this.loadExpression(requireField(node, 'body')),
                    loc
                };
            case 'call': {
                const func = this.loadExpression(requireField(node, 'function'));
                const argumentsNode = requireField(node, 'arguments');
                if (argumentsNode.type == 'generator_expression') {
                    return { type: 'Call', func, args: [this.loadExpression(argumentsNode)], keywords: [], loc };
                }
                const [args, keywords] = this.loadCallArguments(argumentsNode);
                return { type: 'Call', func, args, keywords, loc };
            }
            case 'attribute':
                return {
                    type: 'Attribute',
                    value: this.loadExpression(requireField(node, 'object')),
                    attr: requireField(node, 'attribute').text,
                    ctx: 'load',
                    loc
                };
            case 'subscript':
                return this.loadSubscript(node);
            case 'slice':
                return this.loadSlice(node);
            case 'await':
                return { type: 'Await', value: this.loadExpression(namedChildrenOf(node)[0]), loc };
            case 'yield': {
                const [value] = namedChildrenOf(node);
                if (node.children.some(child => child.type == 'from')) {
                    return { type: 'YieldFrom', value: this.loadExpression(value), loc };
                }
                return { type: 'Yield', value: value ? this.loadExpression(value) : undefined, loc };
            }
            case 'named_expression': {
                const name = requireField(node, 'name');
                const target: Name = { type: 'Name', id: name.text, ctx: 'store', loc: locOf(name) };
                return { type: 'NamedExpr', target, value: this.loadExpression(requireField(node, 'value')), loc };
            }
        }
        throw errorAt(`unexpected ${node.type.replace(/_/g, ' ')}`, node);
    }

    private loadTuple(elements: CstNode[], node: CstNode): Expression {
        return { type: 'Tuple', elts: elements.map(child => this.loadExpression(child)), ctx: 'load', loc: locOf(node) };
    }

    private loadNumber(node: CstNode): Expression {
        try {
            return { type: 'Constant', value: parseNumberConstant(node.text), raw: node.text, loc: locOf(node) };
        } catch (err) {
            if (err instanceof SyntaxError) {
                throw errorAt('invalid number literal', node);
            }
            throw err;
        }
    }

    private loadDict(node: CstNode): Expression {
        const keys: (Expression | undefined)[] = [];
        const values: Expression[] = [];
        for (const child of namedChildrenOf(node)) {
            if (child.type == 'pair') {
                keys.push(this.loadExpression(requireField(child, 'key')));
                values.push(this.loadExpression(requireField(child, 'value')));
            } else if (child.type == 'dictionary_splat') {
                keys.push(undefined);
                values.push(this.loadExpression(namedChildrenOf(child)[0]));
            } else {
                throw errorAt('invalid syntax', child);
            }
        }
        return { type: 'Dict', keys, values, loc: locOf(node) };
    }

    private loadComprehensions(node: CstNode): Comprehension[] {
        const generators: Comprehension[] = [];
        for (const child of namedChildrenOf(node).slice(1)) {
            if (child.type == 'for_in_clause') {
                const children = childrenOf(child);
                const inIndex = children.findIndex(c => c.type == 'in');
                const iterables = children.slice(inIndex + 1).filter(c => c.isNamed);
                const hasTrailingComma = children.slice(inIndex + 1).some(c => c.type == ',');
                generators.push({
                    target: this.setContext(this.loadExpression(requireField(child, 'left')), 'store'),
                    iter:
                        iterables.length == 1 && !hasTrailingComma
                            ? this.loadExpression(iterables[0])
                            : this.loadTuple(iterables, child),
                    ifs: [],
                    isAsync: isAsyncNode(child)
                });
            } else if (child.type == 'if_clause' && generators.length > 0) {
                generators[generators.length - 1].ifs.push(this.loadExpression(namedChildrenOf(child)[0]));
            }
        }
        return generators;
    }

    private loadBoolean(node: CstNode): Expression {
        const op: BooleanOperator = requireField(node, 'operator').type == 'and' ? 'and' : 'or';
        const values: Expression[] = [];
        const collect = (operand: CstNode): void => {
            // `a and b and c` is one operation over three values
            if (operand.type == 'boolean_operator' && requireField(operand, 'operator').type == op) {
                collect(requireField(operand, 'left'));
                collect(requireField(operand, 'right'));
            } else {
                values.push(this.loadExpression(operand));
            }
        };
        collect(requireField(node, 'left'));
        collect(requireField(node, 'right'));
        return { type: 'BoolOp', op, values, loc: locOf(node) };
    }

    private loadComparison(node: CstNode): Expression {
        const operands: Expression[] = [];
        const ops: ComparisonOperator[] = [];
        let pending: string | undefined;

        for (const child of childrenOf(node)) {
            if (child.isNamed) {
                if (pending) {
                    ops.push(this.comparisonOperator(pending, child));
                    pending = undefined;
                }
                operands.push(this.loadExpression(child));
            } else {
                // `not in` and `is not` may arrive as two tokens
                pending = pending ? `${pending} ${child.type}` : child.type;
            }
        }

        const [left, ...comparators] = operands;
        if (!left || comparators.length != ops.length) {
            throw errorAt('invalid syntax', node);
        }
        return { type: 'Compare', left, ops, comparators, loc: locOf(node) };
    }

    private comparisonOperator(text: string, node: CstNode): ComparisonOperator {
        const op = COMPARISON_OPERATORS.get(text);
        if (!op) {
            throw errorAt(`unknown operator '${text}'`, node);
        }
        return op;
    }

    private loadCallArguments(node: CstNode): [Expression[], Keyword[]] {
        const args: Expression[] = [];
        const keywords: Keyword[] = [];
        for (const child of namedChildrenOf(node)) {
            if (child.type == 'keyword_argument') {
                keywords.push({
                    arg: requireField(child, 'name').text,
                    value: this.loadExpression(requireField(child, 'value')),
                    loc: locOf(child)
                });
            } else if (child.type == 'dictionary_splat') {
                keywords.push({ value: this.loadExpression(namedChildrenOf(child)[0]), loc: locOf(child) });
            } else {
                args.push(this.loadExpression(child));
            }
        }
        return [args, keywords];
    }

    private loadSubscript(node: CstNode): Expression {
        const value = requireField(node, 'value');
        const children = childrenOf(node);
        const valueIndex = children.findIndex(child => isSameNode(child, value));
        const rest = children.slice(valueIndex + 1);
        const indices = rest.filter(child => child.isNamed);
        const slice =
            indices.length == 1 && !rest.some(child => child.type == ',')
                ? this.loadExpression(indices[0])
                : this.loadTuple(indices, node);
        return { type: 'Subscript', value: this.loadExpression(value), slice, ctx: 'load', loc: locOf(node) };
    }

    private loadSlice(node: CstNode): Expression {
        const parts: (Expression | undefined)[] = [undefined, undefined, undefined];
        let segment = 0;
        for (const child of childrenOf(node)) {
            if (child.type == ':') {
                segment++;
            } else if (child.isNamed && segment < 3) {
                parts[segment] = this.loadExpression(child);
            }
        }
        const [lower, upper, step] = parts;
        return { type: 'Slice', lower, upper, step, loc: locOf(node) };
    }

    private loadStrings(nodes: CstNode[], node: CstNode): Expression {
        const loc = locOf(node);
        const raws = nodes.map(child => child.text);
        const tokens = raws.map(splitStringToken);
        const raw = raws.join(' ');
        if (tokens.some(t => t.isBytes) && !tokens.every(t => t.isBytes)) {
            throw errorAt('cannot mix bytes and nonbytes literals', node);
        }

        if (!tokens.some(t => t.isFormat)) {
            const constants = raws.map(parseStringConstant);
            if (tokens[0].isBytes) {
                const parts = constants.map(c => (c.kind == 'bytes' ? c.value : new Uint8Array()));
                const bytes = new Uint8Array(parts.reduce((length, part) => length + part.length, 0));
                let offset = 0;
                for (const part of parts) {
                    bytes.set(part, offset);
                    offset += part.length;
                }
                return { type: 'Constant', value: { kind: 'bytes', value: bytes }, raw, loc };
            }
            const value = constants.map(c => (c.kind == 'str' ? c.value : '')).join('');
            return { type: 'Constant', value: { kind: 'str', value }, raw, loc };
        }

        const values: (Constant | FormattedValue)[] = [];
        for (let i = 0; i < tokens.length; i++) {
            const token = tokens[i];
            if (token.isFormat) {
                values.push(...this.loadFormatString(token.body, token.isRaw, nodes[i]).values);
            } else {
                const constant = parseStringConstant(raws[i]);
                if (constant.kind == 'str') {
                    values.push({ type: 'Constant', value: constant });
                }
            }
        }
        return { type: 'JoinedStr', values: mergeStringParts(values), loc };
    }

    /**
     * Splits the body of an f-string into literal and replacement field parts.
     * @param body The text between the quotes.
     * @param isRaw Whether the f-string is raw.
     * @param node The string node, for error positions.
     * @returns The joined string.
     */
    private loadFormatString(body: string, isRaw: boolean, node: CstNode): JoinedStr {
        const values: (Constant | FormattedValue)[] = [];
        let literal = '';
        let i = 0;

        const flushLiteral = (): void => {
            if (literal.length > 0) {
                const value = isRaw ? literal : fromCodePoints(decodeEscapes(literal, false));
                values.push({ type: 'Constant', value: { kind: 'str', value } });
                literal = '';
            }
        };

        while (i < body.length) {
            const char = body[i];
            if (char == '{' && body[i + 1] == '{') {
                literal += '{';
                i += 2;
            } else if (char == '}' && body[i + 1] == '}') {
                literal += '}';
                i += 2;
            } else if (char == '{') {
                flushLiteral();
                const [field, end] = this.loadReplacementField(body, i + 1, isRaw, node);
                values.push(...field);
                i = end;
            } else if (char == '}') {
                throw errorAt("f-string: single '}' is not allowed", node);
            } else {
                literal += char;
                i++;
            }
        }
        flushLiteral();

        return { type: 'JoinedStr', values };
    }

    private loadReplacementField(
        body: string,
        start: number,
        isRaw: boolean,
        node: CstNode
    ): [(Constant | FormattedValue)[], number] {
        let depth = 0;
        let quote: string | undefined;
        let i = start;

        for (; i < body.length; i++) {
            const char = body[i];
            if (quote) {
                if (char == quote) {
                    quote = undefined;
                }
            } else if (char == "'" || char == '"') {
                quote = char;
            } else if (char == '(' || char == '[' || char == '{') {
                depth++;
            } else if (char == ')' || char == ']' || char == '}') {
                if (depth == 0) {
                    break;
                }
                depth--;
            } else if (depth == 0 && char == '!' && body[i + 1] != '=') {
                break;
            } else if (depth == 0 && char == ':') {
                break;
            }
        }

        let expressionText = body.slice(start, i);
        const parts: (Constant | FormattedValue)[] = [];
        let conversion: FormattedValue['conversion'];
        let formatSpec: JoinedStr | undefined;

        const debugMatch = /^(.*[^=!<>])=(\s*)$/s.exec(expressionText);
        if (debugMatch) {
            parts.push({ type: 'Constant', value: { kind: 'str', value: expressionText } });
            expressionText = debugMatch[1];
        }

        if (body[i] == '!') {
            const letter = body[i + 1];
            if (letter != 's' && letter != 'r' && letter != 'a') {
                throw errorAt('f-string: invalid conversion character', node);
            }
            conversion = letter;
            i += 2;
        }

        if (body[i] == ':') {
            let specDepth = 0;
            const specStart = i + 1;
            for (i = specStart; i < body.length; i++) {
                if (body[i] == '{') {
                    specDepth++;
                } else if (body[i] == '}') {
                    if (specDepth == 0) {
                        break;
                    }
                    specDepth--;
                }
            }
            formatSpec = this.loadFormatString(body.slice(specStart, i), isRaw, node);
        }

        if (body[i] != '}') {
            throw errorAt("f-string: expecting '}'", node);
        }

        if (debugMatch && !conversion && !formatSpec) {
            conversion = 'r';
        }

        let value: Expression;
        try {
            value = parseExpression(expressionText);
        } catch (err) {
            if (err instanceof PythonSyntaxError) {
                throw errorAt(`f-string: ${err.reason}`, node);
            }
            throw err;
        }
        parts.push({ type: 'FormattedValue', value, conversion, formatSpec });
        return [parts, i + 1];
    }

    // helpers

    private setContext(expression: Expression, ctx: ExpressionContext): Expression {
        switch (expression.type) {
            case 'Name':
            case 'Attribute':
            case 'Subscript':
                expression.ctx = ctx;
                return expression;
            case 'Starred':
                expression.ctx = ctx;
                this.setContext(expression.value, ctx);
                return expression;
            case 'Tuple':
            case 'List':
                expression.ctx = ctx;
                expression.elts.forEach(e => this.setContext(e, ctx));
                return expression;
        }
        const loc = expression.loc ?? { line: 0, column: 0 };
        throw new PythonSyntaxError(
            `cannot ${ctx == 'del' ? 'delete' : 'assign to'} ${describeExpression(expression)}`,
            loc.line,
            loc.column
        );
    }

    private warn(message: string, loc: SourceLocation): void {
        if (this.options.onWarning) {
            this.options.onWarning(message, loc);
        }
    }
}

/**
 * Joins adjacent literal parts of an f-string.
 * @param values The parts.
 * @returns The merged parts.
 */
function mergeStringParts(values: (Constant | FormattedValue)[]): (Constant | FormattedValue)[] {
    const merged: (Constant | FormattedValue)[] = [];
    for (const value of values) {
        const last = merged[merged.length - 1];
        if (
            last &&
            last.type == 'Constant' &&
            last.value.kind == 'str' &&
            value.type == 'Constant' &&
            value.value.kind == 'str'
        ) {
            merged[merged.length - 1] = {
                type: 'Constant',
                value: { kind: 'str', value: last.value.value + value.value.value }
            };
        } else {
            merged.push(value);
        }
    }
    return merged;
}

function describeExpression(expression: Expression): string {
    switch (expression.type) {
        case 'Constant':
            return 'literal';
        case 'Call':
            return 'function call';
        case 'Lambda':
            return 'lambda';
        default:
            return 'expression';
    }
}

/**
 * Parses Python source into a module tree.
 * @param source The source code.
 * @param options The parse options.
 * @returns The module.
 */
export function parse(source: string, options: ParseOptions = {}): Module {
    const root = SyntaxTreeLoader.parseTree(source);
    return new SyntaxTreeLoader(options).loadModule(root);
}

/**
 * Parses a single Python expression.
 * @param source The expression source.
 * @returns The expression.
 */
export function parseExpression(source: string): Expression {
    if (source.trim() == '') {
        throw new PythonSyntaxError('invalid syntax', 1, 0);
    }
    const root = SyntaxTreeLoader.parseTree(`(${source}\n)\n`);
    const [statement] = namedChildrenOf(root);
    const wrapped = statement?.type == 'expression_statement' ? namedChildrenOf(statement) : [];
    if (namedChildrenOf(root).length != 1 || wrapped.length != 1) {
        throw new PythonSyntaxError('invalid syntax', 1, 0);
    }

    const loader = new SyntaxTreeLoader();
    const [expression] = wrapped;
    // the wrapping parentheses make `a, b` a tuple and `x for x in y` a generator
    const inner = expression.type == 'parenthesized_expression' ? namedChildrenOf(expression)[0] : expression;
    return loader.loadExpression(inner);
}
