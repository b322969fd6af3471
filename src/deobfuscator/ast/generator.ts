import { escapeStringBody, reprConstant } from './literals';
import {
    Arguments,
    Comprehension,
    Constant,
    Expression,
    FormattedValue,
    JoinedStr,
    Keyword,
    Module,
    Parameter,
    Statement
} from './nodes';

export interface GeneratorOptions {
    /** Text placed verbatim before the generated source. */
    header?: string;
}

type BlockKind = 'module' | 'class' | 'function' | 'other';

const INDENT = '    ';

const BINARY_PRECEDENCE: Record<string, number> = {
    '|': 7,
    '^': 8,
    '&': 9,
    '<<': 10,
    '>>': 10,
    '+': 11,
    '-': 11,
    '*': 12,
    '@': 12,
    '/': 12,
    '//': 12,
    '%': 12,
    '**': 14
};

enum Precedence {
    NamedExpr = 0,
    Lambda = 1,
    IfExp = 2,
    Or = 3,
    And = 4,
    Not = 5,
    Compare = 6,
    BitOr = 7,
    Unary = 13,
    Power = 14,
    Await = 15,
    Primary = 16,
    Atom = 17
}

/**
 * Serializes a module tree to Python source.
 */
export class Generator {
    private readonly lines: string[] = [];

    /**
     * Generates the source for a module.
     * @param module The module.
     * @param options The generator options.
     * @returns The source code.
     */
    public generate(module: Module, options: GeneratorOptions = {}): string {
        this.lines.length = 0;
        this.block(module.body, 0, 'module');
        const code = this.lines.join('\n') + (this.lines.length > 0 ? '\n' : '');
        return (options.header ?? '') + code;
    }

    // statements

    private block(body: Statement[], depth: number, kind: BlockKind): void {
        if (body.length == 0) {
            if (kind != 'module') {
                this.line(depth, 'pass');
            }
            return;
        }

        const spacing = kind == 'module' ? 2 : kind == 'class' || kind == 'function' ? 1 : 0;
        body.forEach((statement, index) => {
            const isDefinition = statement.type == 'FunctionDef' || statement.type == 'ClassDef';
            const previous = body[index - 1];
            const followsDefinition = previous && (previous.type == 'FunctionDef' || previous.type == 'ClassDef');
            if (index > 0 && spacing > 0 && (isDefinition || followsDefinition)) {
                for (let i = 0; i < spacing; i++) {
                    this.lines.push('');
                }
            }
            this.statement(statement, depth);
        });
    }

    private statement(node: Statement, depth: number): void {
        switch (node.type) {
            case 'Expr':
                this.line(depth, this.topLevel(node.value, Precedence.Lambda));
                break;
            case 'Assign': {
                const targets = node.targets.map(t => this.topLevel(t) + ' = ').join('');
                this.line(depth, targets + this.topLevel(node.value));
                break;
            }
            case 'AugAssign':
                this.line(depth, `${this.topLevel(node.target)} ${node.op}= ${this.topLevel(node.value)}`);
                break;
            case 'AnnAssign': {
                const value = node.value ? ` = ${this.topLevel(node.value)}` : '';
                this.line(depth, `${this.expression(node.target)}: ${this.expression(node.annotation)}${value}`);
                break;
            }
            case 'If':
                this.ifStatement(node.test, node.body, node.orelse, depth, 'if');
                break;
            case 'While':
                this.line(depth, `while ${this.expression(node.test)}:`);
                this.block(node.body, depth + 1, 'other');
                this.elseBlock(node.orelse, depth);
                break;
            case 'For':
                this.line(
                    depth,
                    `${node.isAsync ? 'async ' : ''}for ${this.topLevel(node.target)} in ${this.topLevel(node.iter)}:`
                );
                this.block(node.body, depth + 1, 'other');
                this.elseBlock(node.orelse, depth);
                break;
            case 'Break':
                this.line(depth, 'break');
                break;
            case 'Continue':
                this.line(depth, 'continue');
                break;
            case 'Pass':
                this.line(depth, 'pass');
                break;
            case 'Return':
                this.line(depth, node.value ? `return ${this.topLevel(node.value)}` : 'return');
                break;
            case 'FunctionDef': {
                for (const decorator of node.decorators) {
                    this.line(depth, '@' + this.expression(decorator, Precedence.Lambda));
                }
                const returns = node.returns ? ` -> ${this.expression(node.returns)}` : '';
                this.line(
                    depth,
                    `${node.isAsync ? 'async ' : ''}def ${node.name}(${this.arguments(node.args, true)})${returns}:`
                );
                this.block(node.body, depth + 1, 'function');
                break;
            }
            case 'ClassDef': {
                for (const decorator of node.decorators) {
                    this.line(depth, '@' + this.expression(decorator, Precedence.Lambda));
                }
                const bases = [
                    ...node.bases.map(b => this.expression(b, Precedence.Lambda)),
                    ...node.keywords.map(k => this.keyword(k))
                ];
                this.line(depth, `class ${node.name}${bases.length > 0 ? `(${bases.join(', ')})` : ''}:`);
                this.block(node.body, depth + 1, 'class');
                break;
            }
            case 'Import':
                this.line(depth, 'import ' + node.names.map(a => (a.asname ? `${a.name} as ${a.asname}` : a.name)).join(', '));
                break;
            case 'ImportFrom': {
                const names = node.names.map(a => (a.asname ? `${a.name} as ${a.asname}` : a.name)).join(', ');
                this.line(depth, `from ${'.'.repeat(node.level)}${node.module ?? ''} import ${names}`);
                break;
            }
            case 'Global':
                this.line(depth, 'global ' + node.names.join(', '));
                break;
            case 'Nonlocal':
                this.line(depth, 'nonlocal ' + node.names.join(', '));
                break;
            case 'Try':
                this.line(depth, 'try:');
                this.block(node.body, depth + 1, 'other');
                for (const handler of node.handlers) {
                    let header = 'except';
                    if (handler.exceptionType) {
                        header += ' ' + this.expression(handler.exceptionType);
                        if (handler.name) {
                            header += ' as ' + handler.name;
                        }
                    }
                    this.line(depth, header + ':');
                    this.block(handler.body, depth + 1, 'other');
                }
                this.elseBlock(node.orelse, depth);
                if (node.finalbody.length > 0) {
                    this.line(depth, 'finally:');
                    this.block(node.finalbody, depth + 1, 'other');
                }
                break;
            case 'Raise': {
                let text = 'raise';
                if (node.exc) {
                    text += ' ' + this.expression(node.exc);
                    if (node.cause) {
                        text += ' from ' + this.expression(node.cause);
                    }
                }
                this.line(depth, text);
                break;
            }
            case 'With': {
                const items = node.items.map(item =>
                    item.optionalVars
                        ? `${this.expression(item.contextExpr)} as ${this.expression(item.optionalVars, Precedence.BitOr)}`
                        : this.expression(item.contextExpr)
                );
                this.line(depth, `${node.isAsync ? 'async ' : ''}with ${items.join(', ')}:`);
                this.block(node.body, depth + 1, 'other');
                break;
            }
            case 'Delete':
                this.line(depth, 'del ' + node.targets.map(t => this.expression(t, Precedence.BitOr)).join(', '));
                break;
            case 'Assert':
                this.line(
                    depth,
                    `assert ${this.expression(node.test)}${node.msg ? ', ' + this.expression(node.msg) : ''}`
                );
                break;
        }
    }

    private ifStatement(test: Expression, body: Statement[], orelse: Statement[], depth: number, keyword: string): void {
        this.line(depth, `${keyword} ${this.expression(test)}:`);
        this.block(body, depth + 1, 'other');

        const elif = orelse.length == 1 ? orelse[0] : undefined;
        if (elif && elif.type == 'If') {
            this.ifStatement(elif.test, elif.body, elif.orelse, depth, 'elif');
        } else {
            this.elseBlock(orelse, depth);
        }
    }

    private elseBlock(orelse: Statement[], depth: number): void {
        if (orelse.length > 0) {
            this.line(depth, 'else:');
            this.block(orelse, depth + 1, 'other');
        }
    }

    private line(depth: number, text: string): void {
        this.lines.push(INDENT.repeat(depth) + text);
    }

    // expressions

    /**
     * Generates an expression in a position where a tuple or yield needs no parentheses.
     * @param node The expression.
     * @param minPrecedence The minimum precedence for anything else.
     * @returns The source.
     */
    private topLevel(node: Expression, minPrecedence: number = Precedence.NamedExpr + 1): string {
        if (node.type == 'Tuple' && node.elts.length > 0) {
            return this.bareTuple(node.elts);
        } else if (node.type == 'Yield' || node.type == 'YieldFrom') {
            return this.expression(node, Precedence.NamedExpr);
        }
        return this.expression(node, minPrecedence);
    }

    private bareTuple(elts: Expression[]): string {
        const items = elts.map(e => this.expression(e, Precedence.Lambda));
        return items.length == 1 ? items[0] + ',' : items.join(', ');
    }

    /**
     * Generates an expression, parenthesizing it if it binds looser than required.
     * @param node The expression.
     * @param minPrecedence The minimum precedence the context accepts.
     * @returns The source.
     */
    public expression(node: Expression, minPrecedence: number = Precedence.NamedExpr): string {
        const text = this.unparenthesized(node);
        return this.precedence(node) < minPrecedence ? `(${text})` : text;
    }

    private precedence(node: Expression): number {
        switch (node.type) {
            case 'NamedExpr':
            case 'Yield':
            case 'YieldFrom':
                return Precedence.NamedExpr;
            case 'Lambda':
                return Precedence.Lambda;
            case 'IfExp':
                return Precedence.IfExp;
            case 'BoolOp':
                return node.op == 'or' ? Precedence.Or : Precedence.And;
            case 'UnaryOp':
                return node.op == 'not' ? Precedence.Not : Precedence.Unary;
            case 'Compare':
                return Precedence.Compare;
            case 'BinOp':
                return BINARY_PRECEDENCE[node.op];
            case 'Await':
                return Precedence.Await;
            case 'Call':
            case 'Attribute':
            case 'Subscript':
                return Precedence.Primary;
            case 'Starred':
                return Precedence.BitOr;
            case 'Constant':
                return isNegativeNumber(node) ? Precedence.Unary : Precedence.Atom;
            default:
                return Precedence.Atom;
        }
    }

    private unparenthesized(node: Expression): string {
        switch (node.type) {
            case 'Name':
                return node.id;
            case 'Constant':
                return node.raw ?? reprConstant(node.value);
            case 'JoinedStr':
                return this.joinedString(node);
            case 'FormattedValue':
                return this.joinedString({ type: 'JoinedStr', values: [node] });
            case 'BinOp': {
                const precedence = BINARY_PRECEDENCE[node.op];
                const isPower = node.op == '**';
                const left = this.expression(node.left, isPower ? Precedence.Await : precedence);
                const right = this.expression(node.right, isPower ? Precedence.Unary : precedence + 1);
                return `${left} ${node.op} ${right}`;
            }
            case 'UnaryOp':
                return node.op == 'not'
                    ? `not ${this.expression(node.operand, Precedence.Not)}`
                    : `${node.op}${this.expression(node.operand, Precedence.Unary)}`;
            case 'BoolOp': {
                const operandPrecedence = (node.op == 'or' ? Precedence.Or : Precedence.And) + 1;
                return node.values.map(v => this.expression(v, operandPrecedence)).join(` ${node.op} `);
            }
            case 'Compare': {
                let text = this.expression(node.left, Precedence.BitOr);
                node.ops.forEach((op, i) => {
                    text += ` ${op} ${this.expression(node.comparators[i], Precedence.BitOr)}`;
                });
                return text;
            }
            case 'Call': {
                const first = node.args[0];
                const args =
                    node.args.length == 1 && node.keywords.length == 0 && first.type == 'GeneratorExp'
                        ? [this.generatorBody(first.elt, first.generators)]
                        : [
                              ...node.args.map(a => this.expression(a, Precedence.Lambda)),
                              ...node.keywords.map(k => this.keyword(k))
                          ];
                return `${this.expression(node.func, Precedence.Primary)}(${args.join(', ')})`;
            }
            case 'Attribute': {
                const value =
                    node.value.type == 'Constant' && (node.value.value.kind == 'int' || node.value.value.kind == 'float')
                        ? `(${this.unparenthesized(node.value)})`
                        : this.expression(node.value, Precedence.Primary);
                return `${value}.${node.attr}`;
            }
            case 'Subscript': {
                const slice =
                    node.slice.type == 'Tuple' && node.slice.elts.length > 0
                        ? node.slice.elts.map(e => this.subscriptItem(e)).join(', ') + (node.slice.elts.length == 1 ? ',' : '')
                        : this.subscriptItem(node.slice);
                return `${this.expression(node.value, Precedence.Primary)}[${slice}]`;
            }
            case 'Slice':
                return this.subscriptItem(node);
            case 'Lambda': {
                const args = this.arguments(node.args, false);
                return `lambda${args ? ' ' + args : ''}: ${this.expression(node.body, Precedence.Lambda)}`;
            }
            case 'IfExp':
                return `${this.expression(node.body, Precedence.Or)} if ${this.expression(node.test, Precedence.Or)} else ${this.expression(node.orelse, Precedence.Lambda)}`;
            case 'Tuple':
                return node.elts.length == 0 ? '()' : `(${this.bareTuple(node.elts)})`;
            case 'List':
                return `[${node.elts.map(e => this.expression(e, Precedence.Lambda)).join(', ')}]`;
            case 'Set':
                return node.elts.length == 0 ? 'set()' : `{${node.elts.map(e => this.expression(e, Precedence.Lambda)).join(', ')}}`;
            case 'Dict': {
                const items = node.values.map((value, i) => {
                    const key = node.keys[i];
                    return key
                        ? `${this.expression(key, Precedence.Lambda)}: ${this.expression(value, Precedence.Lambda)}`
                        : `**${this.expression(value, Precedence.BitOr)}`;
                });
                return `{${items.join(', ')}}`;
            }
            case 'ListComp':
                return `[${this.expression(node.elt, Precedence.Lambda)}${this.comprehensions(node.generators)}]`;
            case 'SetComp':
                return `{${this.expression(node.elt, Precedence.Lambda)}${this.comprehensions(node.generators)}}`;
            case 'GeneratorExp':
                return `(${this.generatorBody(node.elt, node.generators)})`;
            case 'DictComp':
                return `{${this.expression(node.key, Precedence.Lambda)}: ${this.expression(node.value, Precedence.Lambda)}${this.comprehensions(node.generators)}}`;
            case 'Starred':
                return `*${this.expression(node.value, Precedence.BitOr)}`;
            case 'Yield':
                return node.value ? `yield ${this.topLevel(node.value)}` : 'yield';
            case 'YieldFrom':
                return `yield from ${this.expression(node.value, Precedence.Lambda)}`;
            case 'Await':
                return `await ${this.expression(node.value, Precedence.Primary)}`;
            case 'NamedExpr':
                return `${node.target.id} := ${this.expression(node.value, Precedence.Lambda)}`;
        }
    }

    private subscriptItem(node: Expression): string {
        if (node.type != 'Slice') {
            return this.expression(node, Precedence.Lambda);
        }
        const lower = node.lower ? this.expression(node.lower, Precedence.Lambda) : '';
        const upper = node.upper ? this.expression(node.upper, Precedence.Lambda) : '';
        const step = node.step ? ':' + this.expression(node.step, Precedence.Lambda) : '';
        return `${lower}:${upper}${step}`;
    }

    private generatorBody(elt: Expression, generators: Comprehension[]): string {
        return this.expression(elt, Precedence.Lambda) + this.comprehensions(generators);
    }

    private comprehensions(generators: Comprehension[]): string {
        return generators
            .map(g => {
                const ifs = g.ifs.map(i => ` if ${this.expression(i, Precedence.Or)}`).join('');
                return ` ${g.isAsync ? 'async ' : ''}for ${this.topLevel(g.target)} in ${this.expression(g.iter, Precedence.Or)}${ifs}`;
            })
            .join('');
    }

    private keyword(keyword: Keyword): string {
        return keyword.arg
            ? `${keyword.arg}=${this.expression(keyword.value, Precedence.Lambda)}`
            : `**${this.expression(keyword.value, Precedence.BitOr)}`;
    }

    private arguments(args: Arguments, allowAnnotations: boolean): string {
        const parameter = (param: Parameter): string => {
            const annotation =
                allowAnnotations && param.annotation ? `: ${this.expression(param.annotation, Precedence.Lambda)}` : '';
            if (!param.default) {
                return param.name + annotation;
            }
            const value = this.expression(param.default, Precedence.Lambda);
            return annotation ? `${param.name}${annotation} = ${value}` : `${param.name}=${value}`;
        };

        const parts = args.posonly.map(parameter);
        if (args.posonly.length > 0) {
            parts.push('/');
        }
        parts.push(...args.args.map(parameter));
        if (args.vararg) {
            parts.push('*' + parameter(args.vararg));
        } else if (args.kwonly.length > 0) {
            parts.push('*');
        }
        parts.push(...args.kwonly.map(parameter));
        if (args.kwarg) {
            parts.push('**' + parameter(args.kwarg));
        }
        return parts.join(', ');
    }

    private joinedString(node: JoinedStr): string {
        const fields: string[] = [];
        const body = this.joinedStringBody(node, fields);
        const quote = ["'", '"', "'''", '"""'].find(q => fields.every(f => !f.includes(q[0]))) ?? "'";
        const escaped = body.split(quote[0]).join('\\' + quote[0]);
        return `f${quote}${escaped}${quote}`;
    }

    private joinedStringBody(node: JoinedStr, fields: string[]): string {
        return node.values
            .map(part => {
                if (part.type == 'Constant') {
                    return this.formatLiteral(part);
                }
                return this.formattedValue(part, fields);
            })
            .join('');
    }

    private formatLiteral(part: Constant): string {
        if (part.value.kind != 'str') {
            return '';
        }
        return escapeStringBody(part.value.value).replace(/\{/g, '{{').replace(/\}/g, '}}');
    }

    private formattedValue(part: FormattedValue, fields: string[]): string {
        let text = this.expression(part.value, Precedence.IfExp);
        if (text.startsWith('{')) {
            text = ' ' + text;
        }
        fields.push(text);
        const conversion = part.conversion ? '!' + part.conversion : '';
        const spec = part.formatSpec ? ':' + this.joinedStringBody(part.formatSpec, fields) : '';
        return `{${text}${conversion}${spec}}`;
    }
}

/**
 * Returns whether a constant is a negative number, which prints with a leading minus.
 * @param node The constant.
 * @returns Whether.
 */
function isNegativeNumber(node: Constant): boolean {
    const value = node.value;
    return (
        (value.kind == 'int' && value.value < 0n) ||
        ((value.kind == 'float' || value.kind == 'imaginary') && (value.value < 0 || Object.is(value.value, -0)))
    );
}

/**
 * Generates Python source for a module.
 * @param module The module.
 * @param options The generator options.
 * @returns The source code.
 */
export default function generate(module: Module, options: GeneratorOptions = {}): string {
    return new Generator().generate(module, options);
}
