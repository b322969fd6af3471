import { Expression, Module, Statement } from '../ast/nodes';
import { ChildMapper, updateChildren } from '../ast/traverse';
import { patternCatalog } from '../patterns/catalog';
import { PatternContext, buildPatternContext } from '../patterns/context';
import {
    BlockSite,
    ExpressionPattern,
    Pattern,
    SequencePattern,
    SequenceReplacement,
    StatementPattern
} from '../patterns/pattern';
import { RewriteLog } from './rewriteLog';

export interface RewriteEngineOptions {
    /** The maximum number of passes of {@link RewriteEngine.rewrite}. */
    maxIterations?: number;
    /** Decides whether a pattern is used, by key. */
    isEnabled?: (key: string) => boolean;
}

const DEFAULT_MAX_ITERATIONS = 50;

/**
 * Applies a pattern catalog to a module, bottom-up, until nothing matches.
 */
export class RewriteEngine {
    private readonly expressionPatterns: ExpressionPattern[];
    private readonly blockPatterns: (StatementPattern | SequencePattern)[];
    private readonly maxIterations: number;

    /**
     * Creates a new rewrite engine.
     * @param catalog The patterns, in the order they are tried.
     * @param options The engine options.
     */
    constructor(catalog: readonly Pattern[] = patternCatalog, options: RewriteEngineOptions = {}) {
        const isEnabled = options.isEnabled ?? (() => true);
        const patterns = catalog.filter(p => isEnabled(p.key));
        this.expressionPatterns = patterns.filter((p): p is ExpressionPattern => p.kind == 'expression');
        this.blockPatterns = patterns.filter(
            (p): p is StatementPattern | SequencePattern => p.kind == 'statement' || p.kind == 'sequence'
        );
        this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    }

    /**
     * Runs passes until one rewrites nothing or the iteration cap is reached.
     * @param module The module, rewritten in place.
     * @param log The log to record into.
     * @returns The log.
     */
    public rewrite(module: Module, log: RewriteLog = new RewriteLog()): RewriteLog {
        for (let pass = 1; pass <= this.maxIterations; pass++) {
            if (this.runPass(module, pass, log) == 0) {
                return log;
            }
        }
        log.recordNonConvergence(this.maxIterations);
        return log;
    }

    /**
     * Runs a single bottom-up pass. Each node is rewritten at most once, and
     * replacements are not matched again until the next pass.
     * @param module The module, rewritten in place.
     * @param pass The pass number, starting at 1.
     * @param log The log to record into.
     * @returns The number of rewrites applied.
     */
    public runPass(module: Module, pass: number, log: RewriteLog): number {
        const walker = new PassWalker(this.expressionPatterns, this.blockPatterns, buildPatternContext(module), log, pass);
        module.body = walker.block(module.body, true);
        return walker.count;
    }
}

class PassWalker implements ChildMapper {
    public count = 0;

    /**
     * Creates a walker for one pass.
     * @param expressionPatterns The patterns tried on expressions.
     * @param blockPatterns The patterns tried on statements.
     * @param context The pattern context for this pass.
     * @param log The log.
     * @param pass The pass number.
     */
    constructor(
        private readonly expressionPatterns: ExpressionPattern[],
        private readonly blockPatterns: (StatementPattern | SequencePattern)[],
        private readonly context: PatternContext,
        private readonly log: RewriteLog,
        private readonly pass: number
    ) {}

    public expression(node: Expression): Expression {
        updateChildren(node, this);

        for (const pattern of this.expressionPatterns) {
            const attempt = pattern.attempt(node, this.context);
            if (attempt && attempt.status == 'unsafe') {
                this.log.recordUnsafe(pattern.key, node, attempt.reason);
            } else if (attempt) {
                const replacement = attempt.apply();
                this.record(pattern, node, attempt.summary);
                return replacement;
            }
        }
        return node;
    }

    public statements(body: Statement[]): Statement[] {
        return this.block(body, false);
    }

    /**
     * Rewrites the statements of a block, children first.
     * @param body The statements.
     * @param isModuleLevel Whether the block is the module body.
     * @returns The new statements.
     */
    public block(body: Statement[], isModuleLevel: boolean): Statement[] {
        for (const statement of body) {
            updateChildren(statement, this);
        }

        const result = [...body];
        let index = 0;
        while (index < result.length) {
            const replacement = this.rewriteAt({ body: result, index, isModuleLevel });
            if (replacement) {
                result.splice(index, replacement.count, ...replacement.statements);
                index += replacement.statements.length;
            } else {
                index++;
            }
        }
        return result;
    }

    private rewriteAt(site: BlockSite): SequenceReplacement | undefined {
        const node = site.body[site.index];
        for (const pattern of this.blockPatterns) {
            const attempt =
                pattern.kind == 'sequence'
                    ? pattern.attempt(site, this.context)
                    : pattern.attempt(node, site, this.context);
            if (attempt && attempt.status == 'unsafe') {
                this.log.recordUnsafe(pattern.key, node, attempt.reason);
            } else if (attempt) {
                const applied = attempt.apply();
                this.record(pattern, node, attempt.summary);
                return Array.isArray(applied) ? { count: 1, statements: applied } : applied;
            }
        }
        return undefined;
    }

    private record(pattern: Pattern, node: Statement | Expression, summary: string): void {
        this.count++;
        this.log.recordRewrite(pattern.key, node, summary, this.pass);
    }
}
