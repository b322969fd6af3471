import { RewriteEngine } from '../../rewriter/engine';
import { LogFunction, Transformation, TransformationProperties } from '../transformation';

export class PatternRewriter extends Transformation {
    public static readonly properties: TransformationProperties = {
        key: 'patternRewriting'
    };

    /**
     * Executes the transformation.
     * @param log The log function.
     */
    public execute(log: LogFunction): boolean {
        const engine = new RewriteEngine(this.context.catalog, {
            isEnabled: key => this.config[key] != false
        });

        const before = this.context.log.results.length;
        const count = engine.runPass(this.module, this.context.pass, this.context.log);
        if (count > 0) {
            const tally = new Map<string, number>();
            for (const result of this.context.log.results.slice(before)) {
                tally.set(result.pattern, (tally.get(result.pattern) ?? 0) + 1);
            }
            for (const [pattern, n] of tally) {
                log(`Applied ${pattern} ${n} time(s)`);
            }
            this.setChanged();
        }

        return this.hasChanged();
    }
}
