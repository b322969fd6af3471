import knownDunders from './data/knownDunders.json';

const KNOWN_DUNDERS: ReadonlySet<string> = new Set(knownDunders);

const HEX_NAME = /^_0x[0-9a-f]+$/i;
const UNDERSCORES = /^_{2,}$/;
const NUMBERED = /^_+[a-zA-Z]?\d+$/;
const DUNDER = /^__\w+__$/;
const CONFUSABLE_RUNS = [/^[Il1]+$/, /^[O0o]+$/];

/**
 * Returns whether an identifier looks like one generated by an obfuscator.
 * @param name The identifier.
 * @returns Whether.
 */
export function isObfuscatedName(name: string): boolean {
    if (HEX_NAME.test(name) || UNDERSCORES.test(name) || NUMBERED.test(name)) {
        return true;
    }

    if (DUNDER.test(name)) {
        if (KNOWN_DUNDERS.has(name)) {
            return false;
        }
        const inner = name.slice(2, -2);
        return /\d/.test(inner) || (/[a-z]/.test(inner) && /[A-Z]/.test(inner));
    }

    const letters = name.replace(/_/g, '');
    return letters.length >= 4 && CONFUSABLE_RUNS.some(run => run.test(letters));
}
