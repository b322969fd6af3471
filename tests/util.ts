import generate from '../src/deobfuscator/ast/generator';
import { Expression } from '../src/deobfuscator/ast/nodes';
import { parse } from '../src/deobfuscator/ast/parser';
import { ExpressionPattern, Pattern, expressionPattern, matched } from '../src/deobfuscator/patterns/pattern';
import { RewriteEngine } from '../src/deobfuscator/rewriter/engine';
import { RewriteLog } from '../src/deobfuscator/rewriter/rewriteLog';
import { patternCatalog } from '../src/deobfuscator/patterns/catalog';
import { Config, defaultConfig } from '../src/deobfuscator/transformations/config';
import { TransformationType } from '../src/deobfuscator/transformations/transformation';

export const silentConfig: Config = { ...defaultConfig, silent: true };

/**
 * Runs the rewrite engine with only the given patterns.
 * @param source The source code.
 * @param catalog The patterns.
 * @returns The rewritten code and the log.
 */
export function rewrite(source: string, ...catalog: Pattern[]): { code: string; log: RewriteLog } {
    const module = parse(source);
    const log = new RewriteEngine(catalog).rewrite(module);
    return { code: generate(module), log };
}

/**
 * Runs a single transformation once over the given source.
 * @param source The source code.
 * @param type The transformation type.
 * @returns The resulting code, the log and whether the transformation reported a change.
 */
export function transform(
    source: string,
    type: TransformationType
): { code: string; log: RewriteLog; changed: boolean } {
    const module = parse(source);
    const log = new RewriteLog();
    const transformation = new type(module, { isEnabled: true }, { log, pass: 1, catalog: patternCatalog });
    const changed = transformation.execute(() => undefined);
    return { code: generate(module), log, changed };
}

/**
 * Returns the reasons of the unsafe rewrites skipped in a run.
 */
export function unsafeReasons(log: RewriteLog): string[] {
    return log.warnings.flatMap(w => (w.kind == 'UnsafeRewriteSkipped' ? [w.reason] : []));
}

export function lines(...text: string[]): string {
    return text.join('\n') + '\n';
}

/**
 * Creates a pattern that replaces one integer constant with another.
 */
export function integerSwap(key: string, from: bigint, to: bigint): ExpressionPattern {
    return expressionPattern<bigint>({
        key,
        description: `replace ${from} with ${to}`,
        match(node) {
            const isMatch = node.type == 'Constant' && node.value.kind == 'int' && node.value.value == from;
            return isMatch ? matched(to) : undefined;
        },
        rewrite: (value): Expression => ({ type: 'Constant', value: { kind: 'int', value } }),
        describe: value => `replaced ${from} with ${value}`
    });
}
