import { Arguments, Comprehension, Expression, Keyword, Statement, SyntaxNode } from './nodes';

/**
 * Receives each child slot of a node and returns what should occupy it.
 */
export interface ChildMapper {
    expression(node: Expression): Expression;
    statements(body: Statement[]): Statement[];
}

/**
 * Replaces every child of a node, in source order, with the result of the mapper.
 * @param node The node.
 * @param mapper The child mapper.
 */
export function updateChildren(node: SyntaxNode, mapper: ChildMapper): void {
    const e = (expression: Expression): Expression => mapper.expression(expression);
    const opt = (expression: Expression | undefined): Expression | undefined =>
        expression ? mapper.expression(expression) : undefined;
    const list = (expressions: Expression[]): Expression[] => expressions.map(e);

    switch (node.type) {
        case 'Module':
            node.body = mapper.statements(node.body);
            break;
        case 'Expr':
            node.value = e(node.value);
            break;
        case 'Assign':
            node.targets = list(node.targets);
            node.value = e(node.value);
            break;
        case 'AugAssign':
            node.target = e(node.target);
            node.value = e(node.value);
            break;
        case 'AnnAssign':
            node.target = e(node.target);
            node.annotation = e(node.annotation);
            node.value = opt(node.value);
            break;
        case 'If':
        case 'While':
            node.test = e(node.test);
            node.body = mapper.statements(node.body);
            node.orelse = mapper.statements(node.orelse);
            break;
        case 'For':
            node.target = e(node.target);
            node.iter = e(node.iter);
            node.body = mapper.statements(node.body);
            node.orelse = mapper.statements(node.orelse);
            break;
        case 'Return':
            node.value = opt(node.value);
            break;
        case 'FunctionDef':
            node.decorators = list(node.decorators);
            updateArguments(node.args, mapper);
            node.returns = opt(node.returns);
            node.body = mapper.statements(node.body);
            break;
        case 'ClassDef':
            node.decorators = list(node.decorators);
            node.bases = list(node.bases);
            updateKeywords(node.keywords, mapper);
            node.body = mapper.statements(node.body);
            break;
        case 'Try':
            node.body = mapper.statements(node.body);
            for (const handler of node.handlers) {
                handler.exceptionType = opt(handler.exceptionType);
                handler.body = mapper.statements(handler.body);
            }
            node.orelse = mapper.statements(node.orelse);
            node.finalbody = mapper.statements(node.finalbody);
            break;
        case 'Raise':
            node.exc = opt(node.exc);
            node.cause = opt(node.cause);
            break;
        case 'With':
            for (const item of node.items) {
                item.contextExpr = e(item.contextExpr);
                item.optionalVars = opt(item.optionalVars);
            }
            node.body = mapper.statements(node.body);
            break;
        case 'Delete':
            node.targets = list(node.targets);
            break;
        case 'Assert':
            node.test = e(node.test);
            node.msg = opt(node.msg);
            break;
        case 'JoinedStr':
            for (const part of node.values) {
                if (part.type == 'FormattedValue') {
                    updateChildren(part, mapper);
                }
            }
            break;
        case 'FormattedValue':
            node.value = e(node.value);
            if (node.formatSpec) {
                updateChildren(node.formatSpec, mapper);
            }
            break;
        case 'BinOp':
            node.left = e(node.left);
            node.right = e(node.right);
            break;
        case 'UnaryOp':
            node.operand = e(node.operand);
            break;
        case 'BoolOp':
            node.values = list(node.values);
            break;
        case 'Compare':
            node.left = e(node.left);
            node.comparators = list(node.comparators);
            break;
        case 'Call':
            node.func = e(node.func);
            node.args = list(node.args);
            updateKeywords(node.keywords, mapper);
            break;
        case 'Attribute':
        case 'Starred':
        case 'YieldFrom':
        case 'Await':
            node.value = e(node.value);
            break;
        case 'Yield':
            node.value = opt(node.value);
            break;
        case 'Subscript':
            node.value = e(node.value);
            node.slice = e(node.slice);
            break;
        case 'Slice':
            node.lower = opt(node.lower);
            node.upper = opt(node.upper);
            node.step = opt(node.step);
            break;
        case 'Lambda':
            updateArguments(node.args, mapper);
            node.body = e(node.body);
            break;
        case 'IfExp':
            node.test = e(node.test);
            node.body = e(node.body);
            node.orelse = e(node.orelse);
            break;
        case 'Tuple':
        case 'List':
        case 'Set':
            node.elts = list(node.elts);
            break;
        case 'Dict':
            node.keys = node.keys.map(opt);
            node.values = list(node.values);
            break;
        case 'ListComp':
        case 'SetComp':
        case 'GeneratorExp':
            updateComprehensions(node.generators, mapper);
            node.elt = e(node.elt);
            break;
        case 'DictComp':
            updateComprehensions(node.generators, mapper);
            node.key = e(node.key);
            node.value = e(node.value);
            break;
        case 'NamedExpr':
            node.value = e(node.value);
            break;
        case 'Name':
        case 'Constant':
        case 'Break':
        case 'Continue':
        case 'Pass':
        case 'Import':
        case 'ImportFrom':
        case 'Global':
        case 'Nonlocal':
            break;
    }
}

function updateArguments(args: Arguments, mapper: ChildMapper): void {
    for (const param of [...args.posonly, ...args.args, args.vararg, ...args.kwonly, args.kwarg]) {
        if (param && param.default) {
            param.default = mapper.expression(param.default);
        }
        if (param && param.annotation) {
            param.annotation = mapper.expression(param.annotation);
        }
    }
}

function updateKeywords(keywords: Keyword[], mapper: ChildMapper): void {
    for (const keyword of keywords) {
        keyword.value = mapper.expression(keyword.value);
    }
}

function updateComprehensions(generators: Comprehension[], mapper: ChildMapper): void {
    for (const generator of generators) {
        generator.iter = mapper.expression(generator.iter);
        generator.target = mapper.expression(generator.target);
        generator.ifs = generator.ifs.map(i => mapper.expression(i));
    }
}

/**
 * Returns the direct children of a node in source order.
 * @param node The node.
 * @returns The children.
 */
export function getChildren(node: SyntaxNode): SyntaxNode[] {
    const children: SyntaxNode[] = [];
    updateChildren(node, {
        expression(child) {
            children.push(child);
            return child;
        },
        statements(body) {
            children.push(...body);
            return body;
        }
    });
    return children;
}

/**
 * Walks a tree depth first, calling the visitor on each node before its children.
 * Returning false from the visitor skips the children of that node.
 * @param node The root node.
 * @param visitor The visitor.
 * @param parent The parent of the root node, if any.
 */
export function walk(
    node: SyntaxNode,
    visitor: (node: SyntaxNode, parent: SyntaxNode | undefined) => boolean | void,
    parent?: SyntaxNode
): void {
    if (visitor(node, parent) === false) {
        return;
    }
    for (const child of getChildren(node)) {
        walk(child, visitor, node);
    }
}

/**
 * Returns whether any node in the tree satisfies the predicate.
 * @param node The root node.
 * @param predicate The predicate.
 * @param enterScopes Whether to look inside nested functions, lambdas and classes.
 * @returns Whether.
 */
export function containsNode(
    node: SyntaxNode,
    predicate: (node: SyntaxNode) => boolean,
    enterScopes: boolean = true
): boolean {
    let found = false;
    walk(node, child => {
        if (found) {
            return false;
        }
        if (predicate(child)) {
            found = true;
            return false;
        }
        if (!enterScopes && child != node && isScopeNode(child)) {
            return false;
        }
    });
    return found;
}

/**
 * Returns whether a node opens a new scope.
 * @param node The node.
 * @returns Whether.
 */
export function isScopeNode(node: SyntaxNode): boolean {
    return (
        node.type == 'FunctionDef' ||
        node.type == 'ClassDef' ||
        node.type == 'Lambda' ||
        node.type == 'ListComp' ||
        node.type == 'SetComp' ||
        node.type == 'DictComp' ||
        node.type == 'GeneratorExp'
    );
}

/**
 * Deep copies a node.
 * @param node The node.
 * @returns The copy.
 */
export function cloneNode<T extends SyntaxNode>(node: T): T {
    return structuredClone(node);
}
