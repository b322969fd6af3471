import { PyConstant } from './nodes';

export interface StringToken {
    isBytes: boolean;
    isRaw: boolean;
    isFormat: boolean;
    /** The text between the quotes. */
    body: string;
}

const SIMPLE_ESCAPES: Record<string, number> = {
    '\\': 0x5c,
    "'": 0x27,
    '"': 0x22,
    a: 0x07,
    b: 0x08,
    f: 0x0c,
    n: 0x0a,
    r: 0x0d,
    t: 0x09,
    v: 0x0b
};

/**
 * Splits the raw text of a string token into its prefix flags and body.
 * @param raw The raw token text, including prefix and quotes.
 * @returns The string token.
 */
export function splitStringToken(raw: string): StringToken {
    const quoteIndex = raw.search(/['"]/);
    const prefix = raw.slice(0, quoteIndex).toLowerCase();
    const quote = raw[quoteIndex];
    const delimiterLength = raw.startsWith(quote.repeat(3), quoteIndex) && raw.length - quoteIndex >= 6 ? 3 : 1;

    return {
        isBytes: prefix.includes('b'),
        isRaw: prefix.includes('r'),
        isFormat: prefix.includes('f'),
        body: raw.slice(quoteIndex + delimiterLength, raw.length - delimiterLength)
    };
}

/**
 * Resolves backslash escapes in a string or bytes literal body.
 * @param body The literal body.
 * @param isBytes Whether the literal is a bytes literal.
 * @returns The code points (for strings) or byte values (for bytes).
 */
export function decodeEscapes(body: string, isBytes: boolean): number[] {
    const output: number[] = [];
    let i = 0;

    while (i < body.length) {
        const char = body[i];
        if (char != '\\') {
            const codePoint = body.codePointAt(i) ?? 0;
            output.push(codePoint);
            i += codePoint > 0xffff ? 2 : 1;
            continue;
        }

        const next = body[i + 1];
        if (next == undefined) {
            output.push(0x5c);
            break;
        } else if (next == '\n') {
            i += 2;
        } else if (next in SIMPLE_ESCAPES) {
            output.push(SIMPLE_ESCAPES[next]);
            i += 2;
        } else if (/[0-7]/.test(next)) {
            const digits = /^[0-7]{1,3}/.exec(body.slice(i + 1))?.[0] ?? next;
            output.push(parseInt(digits, 8) & (isBytes ? 0xff : 0x1fffff));
            i += 1 + digits.length;
        } else if (next == 'x' && /^[0-9a-fA-F]{2}$/.test(body.slice(i + 2, i + 4))) {
            output.push(parseInt(body.slice(i + 2, i + 4), 16));
            i += 4;
        } else if (!isBytes && next == 'u' && /^[0-9a-fA-F]{4}$/.test(body.slice(i + 2, i + 6))) {
            output.push(parseInt(body.slice(i + 2, i + 6), 16));
            i += 6;
        } else if (!isBytes && next == 'U' && /^[0-9a-fA-F]{8}$/.test(body.slice(i + 2, i + 10))) {
            output.push(parseInt(body.slice(i + 2, i + 10), 16));
            i += 10;
        } else {
            // unknown escapes keep their backslash
            output.push(0x5c);
            i++;
        }
    }

    return output;
}

/**
 * Builds a string from code points without spreading large arrays into one call.
 * @param codePoints The code points.
 * @returns The string.
 */
export function fromCodePoints(codePoints: number[]): string {
    let output = '';
    for (let i = 0; i < codePoints.length; i += 4096) {
        output += String.fromCodePoint(...codePoints.slice(i, i + 4096));
    }
    return output;
}

/**
 * Converts the raw text of a plain string or bytes token into a constant.
 * @param raw The raw token text.
 * @returns The constant.
 */
export function parseStringConstant(raw: string): PyConstant {
    const token = splitStringToken(raw);
    if (token.isBytes) {
        const values = token.isRaw
            ? Array.from(token.body, c => c.charCodeAt(0) & 0xff)
            : decodeEscapes(token.body, true);
        return { kind: 'bytes', value: Uint8Array.from(values) };
    }
    const value = token.isRaw ? token.body : fromCodePoints(decodeEscapes(token.body, false));
    return { kind: 'str', value };
}

/**
 * Converts the raw text of a number token into a constant.
 * @param raw The raw token text.
 * @returns The constant.
 */
export function parseNumberConstant(raw: string): PyConstant {
    const text = raw.replace(/_/g, '');
    if (/[jJ]$/.test(text)) {
        return { kind: 'imaginary', value: Number(text.slice(0, -1)) };
    } else if (/^0[xXoObB]/.test(text)) {
        return { kind: 'int', value: BigInt(text.slice(0, 2).toLowerCase() + text.slice(2)) };
    } else if (/[.eE]/.test(text)) {
        return { kind: 'float', value: Number(text) };
    } else {
        return { kind: 'int', value: BigInt(text) };
    }
}

/**
 * Returns the Python representation of a string.
 * @param value The string.
 * @param preferredQuote The quote to use when the string allows either.
 * @returns The quoted literal.
 */
export function reprString(value: string, preferredQuote: "'" | '"' = "'"): string {
    const other = preferredQuote == "'" ? '"' : "'";
    const quote = value.includes(preferredQuote) && !value.includes(other) ? other : preferredQuote;
    return quote + escapeStringBody(value, quote) + quote;
}

/**
 * Escapes a string for use between quotes.
 * @param value The string.
 * @param quote The quote character to escape, if any.
 * @returns The escaped text.
 */
export function escapeStringBody(value: string, quote?: string): string {
    let output = '';

    for (const char of value) {
        const code = char.codePointAt(0) ?? 0;
        if (char == quote || char == '\\') {
            output += '\\' + char;
        } else if (char == '\n') {
            output += '\\n';
        } else if (char == '\r') {
            output += '\\r';
        } else if (char == '\t') {
            output += '\\t';
        } else if (code < 0x20 || (code >= 0x7f && code <= 0xa0) || code == 0xad) {
            output += '\\x' + code.toString(16).padStart(2, '0');
        } else if ((code >= 0xd800 && code <= 0xdfff) || code == 0x2028 || code == 0x2029) {
            output += '\\u' + code.toString(16).padStart(4, '0');
        } else {
            output += char;
        }
    }

    return output;
}

/**
 * Returns the Python representation of a bytes value.
 * @param value The bytes.
 * @returns The quoted literal.
 */
export function reprBytes(value: Uint8Array): string {
    const hasSingle = value.includes(0x27);
    const quote = hasSingle && !value.includes(0x22) ? '"' : "'";
    let output = 'b' + quote;

    for (const byte of value) {
        const char = String.fromCharCode(byte);
        if (char == quote || char == '\\') {
            output += '\\' + char;
        } else if (char == '\n') {
            output += '\\n';
        } else if (char == '\r') {
            output += '\\r';
        } else if (char == '\t') {
            output += '\\t';
        } else if (byte < 0x20 || byte >= 0x7f) {
            output += '\\x' + byte.toString(16).padStart(2, '0');
        } else {
            output += char;
        }
    }

    return output + quote;
}

/**
 * Returns the Python representation of a finite float.
 * @param value The float.
 * @returns The literal text.
 */
export function reprFloat(value: number): string {
    if (value == 0) {
        return Object.is(value, -0) ? '-0.0' : '0.0';
    }

    const magnitude = Math.abs(value);
    if (magnitude >= 1e16 || magnitude < 1e-4) {
        return value
            .toExponential()
            .replace(/e([+-])(\d)$/, (_, sign: string, digit: string) => `e${sign}0${digit}`);
    }

    const text = String(value);
    return text.includes('.') ? text : text + '.0';
}

/**
 * Returns the Python source for a constant.
 * @param constant The constant.
 * @returns The literal text.
 */
export function reprConstant(constant: PyConstant): string {
    switch (constant.kind) {
        case 'int':
            return constant.value.toString();
        case 'float':
            return reprFloat(constant.value);
        case 'imaginary':
            return (Number.isInteger(constant.value) ? constant.value.toString() : reprFloat(constant.value)) + 'j';
        case 'str':
            return reprString(constant.value);
        case 'bytes':
            return reprBytes(constant.value);
        case 'bool':
            return constant.value ? 'True' : 'False';
        case 'none':
            return 'None';
        case 'ellipsis':
            return '...';
    }
}
