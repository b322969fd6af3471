import { SourceLocation, SyntaxNode } from '../ast/nodes';
import { BindingKind } from '../ast/scope';

/**
 * One applied rewrite.
 */
export interface RewriteResult {
    pattern: string;
    nodeType: string;
    loc?: SourceLocation;
    summary: string;
    pass: number;
}

export interface UnresolvedNode {
    pattern: string;
    nodeType: string;
    loc?: SourceLocation;
}

export interface RewriteDidNotConverge {
    kind: 'RewriteDidNotConverge';
    iterations: number;
    /** The nodes still being rewritten when the iteration cap was reached. */
    unresolved: UnresolvedNode[];
}

export interface UnsafeRewriteSkipped {
    kind: 'UnsafeRewriteSkipped';
    pattern: string;
    nodeType: string;
    loc?: SourceLocation;
    reason: string;
}

export interface LoaderWarning {
    kind: 'LoaderWarning';
    message: string;
    loc: SourceLocation;
}

export type RewriteWarning = RewriteDidNotConverge | UnsafeRewriteSkipped | LoaderWarning;

export interface RenameEntry {
    original: string;
    renamed: string;
    kind: BindingKind;
}

/**
 * The audit trail of a deobfuscation run: every applied rewrite, every
 * non-fatal condition and every renamed binding.
 */
export class RewriteLog {
    public readonly results: RewriteResult[] = [];
    public readonly warnings: RewriteWarning[] = [];
    public readonly renames: RenameEntry[] = [];
    private readonly skipped = new Map<string, WeakSet<SyntaxNode>>();

    /**
     * Records an applied rewrite.
     * @param pattern The pattern key.
     * @param node The node that was rewritten.
     * @param summary What the rewrite did.
     * @param pass The pass number, starting at 1.
     */
    public recordRewrite(pattern: string, node: SyntaxNode, summary: string, pass: number): void {
        this.results.push({ pattern, nodeType: node.type, loc: node.loc, summary, pass });
    }

    /**
     * Records that a pattern matched a node but could not prove the rewrite safe.
     * A node is only recorded once per pattern, however many passes see it.
     * @param pattern The pattern key.
     * @param node The node.
     * @param reason Why the rewrite was skipped.
     */
    public recordUnsafe(pattern: string, node: SyntaxNode, reason: string): void {
        let nodes = this.skipped.get(pattern);
        if (!nodes) {
            nodes = new WeakSet();
            this.skipped.set(pattern, nodes);
        }
        if (nodes.has(node)) {
            return;
        }
        nodes.add(node);
        this.warnings.push({ kind: 'UnsafeRewriteSkipped', pattern, nodeType: node.type, loc: node.loc, reason });
    }

    /**
     * Records that rewriting stopped at the iteration cap, flagging the rewrites
     * of the final pass as unresolved.
     * @param iterations The number of passes run.
     */
    public recordNonConvergence(iterations: number): void {
        const unresolved = this.results
            .filter(r => r.pass == iterations)
            .map(({ pattern, nodeType, loc }) => ({ pattern, nodeType, loc }));
        this.warnings.push({ kind: 'RewriteDidNotConverge', iterations, unresolved });
    }

    public recordLoaderWarning(message: string, loc: SourceLocation): void {
        this.warnings.push({ kind: 'LoaderWarning', message, loc });
    }

    public recordRename(original: string, renamed: string, kind: BindingKind): void {
        this.renames.push({ original, renamed, kind });
    }

    /**
     * Returns whether the run stopped before reaching a fixed point.
     */
    public get hasConverged(): boolean {
        return !this.warnings.some(w => w.kind == 'RewriteDidNotConverge');
    }

    /**
     * Returns the nodes flagged as unresolved by a non-convergence warning.
     */
    public get unresolved(): UnresolvedNode[] {
        return this.warnings.flatMap(w => (w.kind == 'RewriteDidNotConverge' ? w.unresolved : []));
    }

    /**
     * Returns a plain object suitable for writing out as JSON.
     */
    public toJSON(): { results: RewriteResult[]; warnings: RewriteWarning[]; renames: RenameEntry[] } {
        return { results: this.results, warnings: this.warnings, renames: this.renames };
    }
}
