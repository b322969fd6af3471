import { HelperFunction } from '../../helpers/variable';
import { matched, statementPattern } from '../pattern';
import { isProxyFunction } from './proxyFunction';

/**
 * Removes a module-level forwarding or decoding helper once nothing reads it.
 */
export const unusedIndirectionHelper = statementPattern<HelperFunction>({
    key: 'unusedIndirectionHelper',
    description: 'remove a helper that is no longer called',
    match({ node, site }, context) {
        if (!site.isModuleLevel || context.hasDynamicAccess) {
            return undefined;
        }

        const helper = Array.from(context.helpers.values()).find(h => h.statement == node);
        if (
            !helper ||
            (context.loadCounts.get(helper.name) ?? 0) > 0 ||
            !(isProxyFunction(helper, context) || context.isPureHelper(helper.name))
        ) {
            return undefined;
        }
        return matched(helper);
    },
    rewrite: () => [],
    describe: helper => `removed unused helper ${helper.name}`
});
