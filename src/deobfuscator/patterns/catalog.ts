import { Pattern } from './pattern';
import { flattenedControlFlow } from './controlFlow/flattenedControlFlow';
import { tupleUnpacking } from './statements/tupleUnpacking';
import { execLiteralSource } from './statements/execLiteralSource';
import { decoderCall } from './calls/decoderCall';
import { indirectionCall } from './calls/indirectionCall';
import { unusedIndirectionHelper } from './calls/unusedIndirectionHelper';
import { opaqueLiteral } from './expressions/opaqueLiteral';
import { junkStatement } from './statements/junkStatement';

/**
 * Every pattern, most specific first. A node is rewritten by the first pattern
 * in this order that matches it.
 */
export const patternCatalog: readonly Pattern[] = Object.freeze([
    flattenedControlFlow,
    tupleUnpacking,
    execLiteralSource,
    decoderCall,
    indirectionCall,
    unusedIndirectionHelper,
    opaqueLiteral,
    junkStatement
]);

