export interface SourceLocation {
    line: number;
    column: number;
}

interface BaseNode {
    loc?: SourceLocation;
}

export type ExpressionContext = 'load' | 'store' | 'del';

export type PyConstant =
    | { kind: 'int'; value: bigint }
    | { kind: 'float'; value: number }
    | { kind: 'imaginary'; value: number }
    | { kind: 'str'; value: string }
    | { kind: 'bytes'; value: Uint8Array }
    | { kind: 'bool'; value: boolean }
    | { kind: 'none' }
    | { kind: 'ellipsis' };

export type BinaryOperator = '+' | '-' | '*' | '@' | '/' | '//' | '%' | '**' | '<<' | '>>' | '|' | '^' | '&';
export type UnaryOperator = 'not' | '-' | '+' | '~';
export type BooleanOperator = 'and' | 'or';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'is' | 'is not' | 'in' | 'not in';

// expressions

export interface Name extends BaseNode {
    type: 'Name';
    id: string;
    ctx: ExpressionContext;
}

export interface Constant extends BaseNode {
    type: 'Constant';
    value: PyConstant;
    /** The source text the literal was loaded from, if it has not changed since. */
    raw?: string;
}

export interface FormattedValue extends BaseNode {
    type: 'FormattedValue';
    value: Expression;
    conversion?: 's' | 'r' | 'a';
    formatSpec?: JoinedStr;
}

export interface JoinedStr extends BaseNode {
    type: 'JoinedStr';
    values: (Constant | FormattedValue)[];
}

export interface BinOp extends BaseNode {
    type: 'BinOp';
    left: Expression;
    op: BinaryOperator;
    right: Expression;
}

export interface UnaryOp extends BaseNode {
    type: 'UnaryOp';
    op: UnaryOperator;
    operand: Expression;
}

export interface BoolOp extends BaseNode {
    type: 'BoolOp';
    op: BooleanOperator;
    values: Expression[];
}

export interface Compare extends BaseNode {
    type: 'Compare';
    left: Expression;
    ops: ComparisonOperator[];
    comparators: Expression[];
}

export interface Keyword extends BaseNode {
    /** Undefined for `**kwargs` unpacking. */
    arg?: string;
    value: Expression;
}

export interface Call extends BaseNode {
    type: 'Call';
    func: Expression;
    args: Expression[];
    keywords: Keyword[];
}

export interface Attribute extends BaseNode {
    type: 'Attribute';
    value: Expression;
    attr: string;
    ctx: ExpressionContext;
}

export interface Subscript extends BaseNode {
    type: 'Subscript';
    value: Expression;
    slice: Expression;
    ctx: ExpressionContext;
}

export interface Slice extends BaseNode {
    type: 'Slice';
    lower?: Expression;
    upper?: Expression;
    step?: Expression;
}

export interface Parameter extends BaseNode {
    name: string;
    annotation?: Expression;
    default?: Expression;
}

export interface Arguments {
    posonly: Parameter[];
    args: Parameter[];
    vararg?: Parameter;
    kwonly: Parameter[];
    kwarg?: Parameter;
}

export interface Lambda extends BaseNode {
    type: 'Lambda';
    args: Arguments;
    body: Expression;
}

export interface IfExp extends BaseNode {
    type: 'IfExp';
    test: Expression;
    body: Expression;
    orelse: Expression;
}

export interface Tuple extends BaseNode {
    type: 'Tuple';
    elts: Expression[];
    ctx: ExpressionContext;
}

export interface List extends BaseNode {
    type: 'List';
    elts: Expression[];
    ctx: ExpressionContext;
}

export interface SetDisplay extends BaseNode {
    type: 'Set';
    elts: Expression[];
}

export interface Dict extends BaseNode {
    type: 'Dict';
    /** An undefined key marks `**mapping` unpacking. */
    keys: (Expression | undefined)[];
    values: Expression[];
}

export interface Comprehension {
    target: Expression;
    iter: Expression;
    ifs: Expression[];
    isAsync: boolean;
}

export interface ListComp extends BaseNode {
    type: 'ListComp';
    elt: Expression;
    generators: Comprehension[];
}

export interface SetComp extends BaseNode {
    type: 'SetComp';
    elt: Expression;
    generators: Comprehension[];
}

export interface GeneratorExp extends BaseNode {
    type: 'GeneratorExp';
    elt: Expression;
    generators: Comprehension[];
}

export interface DictComp extends BaseNode {
    type: 'DictComp';
    key: Expression;
    value: Expression;
    generators: Comprehension[];
}

export interface Starred extends BaseNode {
    type: 'Starred';
    value: Expression;
    ctx: ExpressionContext;
}

export interface Yield extends BaseNode {
    type: 'Yield';
    value?: Expression;
}

export interface YieldFrom extends BaseNode {
    type: 'YieldFrom';
    value: Expression;
}

export interface Await extends BaseNode {
    type: 'Await';
    value: Expression;
}

export interface NamedExpr extends BaseNode {
    type: 'NamedExpr';
    target: Name;
    value: Expression;
}

export type Expression =
    | Name
    | Constant
    | JoinedStr
    | FormattedValue
    | BinOp
    | UnaryOp
    | BoolOp
    | Compare
    | Call
    | Attribute
    | Subscript
    | Slice
    | Lambda
    | IfExp
    | Tuple
    | List
    | SetDisplay
    | Dict
    | ListComp
    | SetComp
    | GeneratorExp
    | DictComp
    | Starred
    | Yield
    | YieldFrom
    | Await
    | NamedExpr;

// statements

export interface Expr extends BaseNode {
    type: 'Expr';
    value: Expression;
}

export interface Assign extends BaseNode {
    type: 'Assign';
    targets: Expression[];
    value: Expression;
}

export interface AugAssign extends BaseNode {
    type: 'AugAssign';
    target: Expression;
    op: BinaryOperator;
    value: Expression;
}

export interface AnnAssign extends BaseNode {
    type: 'AnnAssign';
    target: Expression;
    annotation: Expression;
    value?: Expression;
}

export interface If extends BaseNode {
    type: 'If';
    test: Expression;
    body: Statement[];
    orelse: Statement[];
}

export interface While extends BaseNode {
    type: 'While';
    test: Expression;
    body: Statement[];
    orelse: Statement[];
}

export interface For extends BaseNode {
    type: 'For';
    target: Expression;
    iter: Expression;
    body: Statement[];
    orelse: Statement[];
    isAsync: boolean;
}

export interface Break extends BaseNode {
    type: 'Break';
}

export interface Continue extends BaseNode {
    type: 'Continue';
}

export interface Pass extends BaseNode {
    type: 'Pass';
}

export interface Return extends BaseNode {
    type: 'Return';
    value?: Expression;
}

export interface FunctionDef extends BaseNode {
    type: 'FunctionDef';
    name: string;
    args: Arguments;
    body: Statement[];
    decorators: Expression[];
    returns?: Expression;
    isAsync: boolean;
}

export interface ClassDef extends BaseNode {
    type: 'ClassDef';
    name: string;
    bases: Expression[];
    keywords: Keyword[];
    body: Statement[];
    decorators: Expression[];
}

export interface Alias extends BaseNode {
    name: string;
    asname?: string;
}

export interface Import extends BaseNode {
    type: 'Import';
    names: Alias[];
}

export interface ImportFrom extends BaseNode {
    type: 'ImportFrom';
    module?: string;
    names: Alias[];
    level: number;
}

export interface Global extends BaseNode {
    type: 'Global';
    names: string[];
}

export interface Nonlocal extends BaseNode {
    type: 'Nonlocal';
    names: string[];
}

export interface ExceptHandler extends BaseNode {
    exceptionType?: Expression;
    name?: string;
    body: Statement[];
}

export interface Try extends BaseNode {
    type: 'Try';
    body: Statement[];
    handlers: ExceptHandler[];
    orelse: Statement[];
    finalbody: Statement[];
}

export interface Raise extends BaseNode {
    type: 'Raise';
    exc?: Expression;
    cause?: Expression;
}

export interface WithItem {
    contextExpr: Expression;
    optionalVars?: Expression;
}

export interface With extends BaseNode {
    type: 'With';
    items: WithItem[];
    body: Statement[];
    isAsync: boolean;
}

export interface Delete extends BaseNode {
    type: 'Delete';
    targets: Expression[];
}

export interface Assert extends BaseNode {
    type: 'Assert';
    test: Expression;
    msg?: Expression;
}

export type Statement =
    | Expr
    | Assign
    | AugAssign
    | AnnAssign
    | If
    | While
    | For
    | Break
    | Continue
    | Pass
    | Return
    | FunctionDef
    | ClassDef
    | Import
    | ImportFrom
    | Global
    | Nonlocal
    | Try
    | Raise
    | With
    | Delete
    | Assert;

export interface Module extends BaseNode {
    type: 'Module';
    body: Statement[];
}

export type SyntaxNode = Module | Statement | Expression;

export type NodeType = SyntaxNode['type'];

export type NodeOfType<K extends NodeType> = Extract<SyntaxNode, { type: K }>;

/**
 * Returns whether a node is of the given type.
 * @param node The node.
 * @param type The node type.
 * @returns Whether.
 */
export function isType<K extends NodeType>(node: SyntaxNode | undefined, type: K): node is NodeOfType<K> {
    return node != undefined && node.type == type;
}
