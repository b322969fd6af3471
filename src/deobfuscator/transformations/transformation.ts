import { Module } from '../ast/nodes';
import { Pattern } from '../patterns/pattern';
import { RewriteLog } from '../rewriter/rewriteLog';
import { TransformationKey } from './config';

export abstract class Transformation {
    protected readonly module: Module;
    protected readonly config: TransformationConfig;
    protected readonly context: TransformationContext;
    private changed: boolean = false;

    /**
     * Creates a new transformation.
     * @param module The module.
     * @param config The transformation config.
     * @param context The state shared by the transformations of a run.
     */
    constructor(module: Module, config: TransformationConfig, context: TransformationContext) {
        this.module = module;
        this.config = config;
        this.context = context;
    }

    /**
     * Executes the transformation.
     * @param log The log function.
     * @returns Whether changes were made.
     */
    public abstract execute(log: LogFunction): boolean;

    /**
     * Returns whether the script has been modified.
     * @returns Whether the script has been modified.
     */
    protected hasChanged(): boolean {
        return this.changed;
    }

    /**
     * Marks that the script has been modified.
     */
    protected setChanged(): void {
        this.changed = true;
    }
}

export type LogFunction = (...args: string[]) => void;

export interface TransformationConfig {
    isEnabled: boolean;
    [key: string]: boolean | undefined;
}

/**
 * State shared by the transformations of one run.
 */
export interface TransformationContext {
    log: RewriteLog;
    /** The current pass of the pipeline loop, starting at 1. */
    pass: number;
    catalog: readonly Pattern[];
}

/**
 * Static properties all transformations must have.
 */
export interface TransformationProperties {
    key: TransformationKey;
}

/**
 * Represents the transformation class type.
 */
export interface TransformationType {
    new (module: Module, config: TransformationConfig, context: TransformationContext): Transformation;
    properties: TransformationProperties;
}
