import { Expression, Statement } from '../ast/nodes';
import { PatternContext } from './context';

export type PatternKind = 'expression' | 'statement' | 'sequence';

/**
 * What a matcher reports: the captured parts of a match, a reason the match
 * could not be proven safe, or nothing when the shape does not fit.
 */
export type MatchResult<C> = { capture: C } | { unsafe: string } | undefined;

/**
 * A match that has been checked but not yet committed.
 */
export type Attempt<R> =
    | { status: 'matched'; summary: string; apply(): R }
    | { status: 'unsafe'; reason: string }
    | undefined;

/**
 * Where a statement sits: its block, its index and whether the block is the module body.
 */
export interface BlockSite {
    body: readonly Statement[];
    index: number;
    isModuleLevel: boolean;
}

export interface SequenceReplacement {
    /** The number of statements from the site's index that are replaced. */
    count: number;
    statements: Statement[];
}

interface PatternBase {
    readonly key: string;
    readonly description: string;
}

export interface ExpressionPattern extends PatternBase {
    readonly kind: 'expression';
    attempt(node: Expression, context: PatternContext): Attempt<Expression>;
}

export interface StatementPattern extends PatternBase {
    readonly kind: 'statement';
    attempt(node: Statement, site: BlockSite, context: PatternContext): Attempt<Statement[]>;
}

export interface SequencePattern extends PatternBase {
    readonly kind: 'sequence';
    attempt(site: BlockSite, context: PatternContext): Attempt<SequenceReplacement>;
}

export type Pattern = ExpressionPattern | StatementPattern | SequencePattern;

interface Definition<C, N, R> {
    key: string;
    description: string;
    match(node: N, context: PatternContext): MatchResult<C>;
    rewrite(capture: C, node: N, context: PatternContext): R;
    describe(capture: C, node: N): string;
}

/**
 * Defines a pattern that replaces an expression.
 * @param definition The matcher, rewrite and description.
 * @returns The frozen pattern.
 */
export function expressionPattern<C>(definition: Definition<C, Expression, Expression>): ExpressionPattern {
    const pattern: ExpressionPattern = {
        kind: 'expression',
        key: definition.key,
        description: definition.description,
        attempt: (node, context) => toAttempt(definition, node, context)
    };
    return Object.freeze(pattern);
}

/**
 * Defines a pattern that replaces one statement with any number of statements.
 * @param definition The matcher, rewrite and description.
 * @returns The frozen pattern.
 */
export function statementPattern<C>(
    definition: Definition<C, { node: Statement; site: BlockSite }, Statement[]>
): StatementPattern {
    const pattern: StatementPattern = {
        kind: 'statement',
        key: definition.key,
        description: definition.description,
        attempt: (node, site, context) => toAttempt(definition, { node, site }, context)
    };
    return Object.freeze(pattern);
}

/**
 * Defines a pattern that replaces a run of statements starting at a block index.
 * @param definition The matcher, rewrite and description.
 * @returns The frozen pattern.
 */
export function sequencePattern<C>(definition: Definition<C, BlockSite, SequenceReplacement>): SequencePattern {
    const pattern: SequencePattern = {
        kind: 'sequence',
        key: definition.key,
        description: definition.description,
        attempt: (site, context) => toAttempt(definition, site, context)
    };
    return Object.freeze(pattern);
}

function toAttempt<C, N, R>(definition: Definition<C, N, R>, node: N, context: PatternContext): Attempt<R> {
    const result = definition.match(node, context);
    if (result == undefined) {
        return undefined;
    } else if ('unsafe' in result) {
        return { status: 'unsafe', reason: result.unsafe };
    }

    const capture = result.capture;
    return {
        status: 'matched',
        summary: definition.describe(capture, node),
        apply: () => definition.rewrite(capture, node, context)
    };
}

/**
 * Wraps a capture as a successful match.
 * @param capture The capture.
 * @returns The match result.
 */
export function matched<C>(capture: C): MatchResult<C> {
    return { capture };
}

/**
 * Reports that a shape matched but the rewrite could not be proven safe.
 * @param reason Why.
 * @returns The match result.
 */
export function unsafe<C>(reason: string): MatchResult<C> {
    return { unsafe: reason };
}
