import { TransformationConfig } from './transformation';

export type TransformationKey =
    | 'patternRewriting'
    | 'expressionSimplification'
    | 'deadBranchRemoval'
    | 'unusedVariableRemoval'
    | 'identifierRenaming';

export type Config = { [key in TransformationKey]: TransformationConfig } & {
    silent?: boolean;
    /** The maximum number of passes before rewriting is reported as not converging. */
    maxIterations?: number;
    /** Whether to put a warning banner at the top of the output. */
    signature?: boolean;
};

export const defaultConfig: Config = {
    silent: false,
    maxIterations: 50,
    signature: false,
    patternRewriting: {
        isEnabled: true,
        flattenedControlFlow: true,
        tupleUnpacking: true,
        execLiteralSource: true,
        decoderCall: true,
        indirectionCall: true,
        unusedIndirectionHelper: true,
        opaqueLiteral: true,
        junkStatement: true
    },
    expressionSimplification: {
        isEnabled: true
    },
    deadBranchRemoval: {
        isEnabled: true
    },
    unusedVariableRemoval: {
        isEnabled: true
    },
    identifierRenaming: {
        isEnabled: true
    }
};
