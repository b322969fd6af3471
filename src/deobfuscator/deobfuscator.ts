import { Module } from './ast/nodes';
import generate from './ast/generator';
import { patternCatalog } from './patterns/catalog';
import { Pattern } from './patterns/pattern';
import { RewriteLog } from './rewriter/rewriteLog';
import { Config, defaultConfig } from './transformations/config';
import { TransformationContext, TransformationType } from './transformations/transformation';
import { PatternRewriter } from './transformations/patterns/patternRewriter';
import { ExpressionSimplifier } from './transformations/expressions/expressionSimplifier';
import { DeadBranchRemover } from './transformations/controlFlow/deadBranchRemover';
import { UnusedVariableRemover } from './transformations/variables/unusedVariableRemover';
import { IdentifierRenamer } from './transformations/variables/identifierRenamer';

/** The banner put at the top of the output when a signature is requested. */
export const SIGNATURE = [
    '################# WARNING ##################',
    '#   THIS FILE WAS PREVIOUSLY OBFUSCATED!   #',
    '# DO NOT RUN IT UNLESS YOU TRUST THE CODE. #',
    '############################################',
    '',
    ''
].join('\n');

export class Deobfuscator {
    private readonly module: Module;
    private readonly config: Config;
    private readonly log: RewriteLog;
    private readonly catalog: readonly Pattern[];
    private readonly transformationTypes: TransformationType[] = [
        PatternRewriter,
        ExpressionSimplifier,
        DeadBranchRemover,
        UnusedVariableRemover
    ];
    private static readonly MAX_ITERATIONS = 50;

    /**
     * Creates a new deobfuscator.
     * @param module The module tree, rewritten in place.
     * @param config The config (optional).
     * @param log The log to record into (optional).
     * @param catalog The patterns to apply (optional).
     */
    constructor(
        module: Module,
        config: Config = defaultConfig,
        log: RewriteLog = new RewriteLog(),
        catalog: readonly Pattern[] = patternCatalog
    ) {
        this.module = module;
        this.config = config;
        this.log = log;
        this.catalog = catalog;
    }

    /**
     * Executes the deobfuscator.
     * @returns The simplified code.
     */
    public execute(): string {
        const types = this.transformationTypes.filter(t => this.config[t.properties.key].isEnabled);
        const maxIterations = this.config.maxIterations ?? Deobfuscator.MAX_ITERATIONS;
        let i = 0;
        let isModified = false;

        while (i < maxIterations) {
            isModified = false;

            if (!this.config.silent) {
                console.log(`\n[${new Date().toISOString()}]: Starting pass ${i + 1}`);
            }
            for (const type of types) {
                if (this.runTransformation(type, i + 1)) {
                    isModified = true;
                }
            }

            i++;
            if (!isModified) {
                break;
            }
        }

        if (isModified) {
            this.log.recordNonConvergence(i);
        }
        if (this.config.identifierRenaming.isEnabled) {
            this.runTransformation(IdentifierRenamer, i + 1);
        }

        return generate(this.module, { header: this.config.signature ? SIGNATURE : undefined });
    }

    /**
     * Runs one transformation, logging its progress unless silent.
     * @param type The transformation type.
     * @param pass The pass number.
     * @returns Whether the transformation modified the tree.
     */
    private runTransformation(type: TransformationType, pass: number): boolean {
        const context: TransformationContext = { log: this.log, pass, catalog: this.catalog };
        const transformation = new type(this.module, this.config[type.properties.key], context);
        const name = transformation.constructor.name;

        if (!this.config.silent) {
            console.log(`[${new Date().toISOString()}]: Executing ${name}`);
        }

        let modified = false;
        try {
            modified = transformation.execute(
                this.config.silent ? () => undefined : console.log.bind(console, `[${name}]:`)
            );
        } catch (err) {
            console.error(err);
        }

        if (!this.config.silent) {
            console.log(`[${new Date().toISOString()}]: Executed ${name}, modified ${modified}`);
        }
        return modified;
    }
}
