#!/usr/bin/env node
import { InvalidArgumentError, program } from 'commander';
import fs from 'fs';
import pkg from '../package.json';
import { DeobfuscationError } from './deobfuscator/errors';
import { Config, defaultConfig } from './deobfuscator/transformations/config';
import { DeobfuscationResult, deobfuscateProtected, deobfuscateWithReport } from './index';
import { PycdcDecompiler } from './payload/decompiler';

interface CliOptions {
    output: string;
    silent?: boolean;
    decompiled?: boolean;
    pycdc: string;
    log?: string;
    rename: boolean;
    maxIterations: number;
    signature: boolean;
}

program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .usage('<input_path> -o [output_path]')
    .argument('<input_path>', 'file to deobfuscate')
    .option('-o, --output [output_path]', 'output file path', 'deobfuscated.py')
    .option('-s, --silent', 'emit nothing to stdout')
    .option('--decompiled', 'treat the input as decompiled source rather than a protected file')
    .option('--pycdc <path>', 'path of the pycdc executable', PycdcDecompiler.DEFAULT_PATH)
    .option('--log <log_path>', 'write the rewrite log to a JSON file')
    .option('--no-rename', 'keep obfuscated identifiers')
    .option('--max-iterations <n>', 'maximum number of passes', parseCount, defaultConfig.maxIterations ?? 50)
    .option('--no-signature', 'omit the warning banner')
    .action((input: string, options: CliOptions) => {
        const source = fs.readFileSync(input).toString();
        const config: Config = {
            ...defaultConfig,
            silent: !!options.silent,
            maxIterations: options.maxIterations,
            signature: options.signature,
            identifierRenaming: { ...defaultConfig.identifierRenaming, isEnabled: options.rename }
        };

        let result: DeobfuscationResult;
        try {
            result = options.decompiled
                ? deobfuscateWithReport(source, config)
                : deobfuscateProtected(source, new PycdcDecompiler({ path: options.pycdc }), config);
        } catch (err) {
            if (err instanceof DeobfuscationError) {
                console.error(`[${err.code}]: ${err.message}`);
                process.exitCode = 1;
                return;
            }
            throw err;
        }

        fs.writeFileSync(options.output, result.code);
        if (options.log) {
            fs.writeFileSync(options.log, JSON.stringify(result.log, undefined, 2));
        }
        if (!options.silent) {
            const warnings = result.log.warnings.length;
            console.log(`Wrote deobfuscated file to ${options.output} (${warnings} warning(s))`);
        }
    });

program.parse();

function parseCount(value: string): number {
    const count = Number.parseInt(value, 10);
    if (!Number.isInteger(count) || count < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return count;
}
