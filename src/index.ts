import { parse } from './deobfuscator/ast/parser';
import { Deobfuscator } from './deobfuscator/deobfuscator';
import { PayloadNotFoundError } from './deobfuscator/errors';
import { patternCatalog } from './deobfuscator/patterns/catalog';
import { Pattern } from './deobfuscator/patterns/pattern';
import { RewriteLog } from './deobfuscator/rewriter/rewriteLog';
import { Config, defaultConfig } from './deobfuscator/transformations/config';
import { Decompiler } from './payload/decompiler';
import { extractMarshalledCode } from './payload/marshalledCode';

export type { Config } from './deobfuscator/transformations/config';
export { defaultConfig } from './deobfuscator/transformations/config';
export { RewriteLog } from './deobfuscator/rewriter/rewriteLog';
export { DecompilationFailedError, PayloadNotFoundError, PythonSyntaxError } from './deobfuscator/errors';
export type { Decompiler } from './payload/decompiler';
export { PycdcDecompiler } from './payload/decompiler';
export { extractMarshalledCode } from './payload/marshalledCode';

export interface DeobfuscationResult {
    code: string;
    log: RewriteLog;
}

/**
 * Deobfuscates decompiled Python source.
 * @param source The source code.
 * @param config The deobfuscator configuration.
 * @returns The deobfuscated code.
 */
export function deobfuscate(source: string, config: Config = defaultConfig): string {
    return deobfuscateWithReport(source, config).code;
}

/**
 * Deobfuscates decompiled Python source, returning the rewrite log with the code.
 * @param source The source code.
 * @param config The deobfuscator configuration.
 * @param catalog The patterns to apply.
 * @returns The deobfuscated code and the log.
 */
export function deobfuscateWithReport(
    source: string,
    config: Config = defaultConfig,
    catalog: readonly Pattern[] = patternCatalog
): DeobfuscationResult {
    const log = new RewriteLog();
    const module = parse(source, {
        onWarning: (message, loc) => log.recordLoaderWarning(message, loc)
    });

    const deobfuscator = new Deobfuscator(module, config, log, catalog);
    const code = deobfuscator.execute();

    return { code, log };
}

/**
 * Deobfuscates a protected file: extracts its marshalled code, decompiles it
 * and deobfuscates the result.
 * @param source The source of the protected file.
 * @param decompiler The decompiler.
 * @param config The deobfuscator configuration.
 * @returns The deobfuscated code and the log.
 */
export function deobfuscateProtected(
    source: string,
    decompiler: Decompiler,
    config: Config = defaultConfig
): DeobfuscationResult {
    const bytecode = extractMarshalledCode(parse(source));
    if (!bytecode) {
        throw new PayloadNotFoundError('No marshalled code found in the protected file');
    }
    if (!config.silent) {
        console.log(`Derived ${bytecode.length} bytes of marshalled code`);
    }

    const decompiled = decompiler.decompile(bytecode);
    return deobfuscateWithReport(decompiled, config);
}
