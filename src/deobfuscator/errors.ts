/**
 * Base class for the fatal errors that abort deobfuscation.
 */
export abstract class DeobfuscationError extends Error {
    public abstract readonly code: string;

    /**
     * Creates a new deobfuscation error.
     * @param message The message.
     */
    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Thrown when source text cannot be parsed.
 */
export class PythonSyntaxError extends DeobfuscationError {
    public readonly code = 'SYNTAX_ERROR';
    /** The description of the problem, without its position. */
    public readonly reason: string;
    public readonly line: number;
    public readonly column: number;

    /**
     * Creates a new syntax error.
     * @param message The description of the problem.
     * @param line The 1-based line.
     * @param column The 0-based column.
     */
    constructor(message: string, line: number, column: number) {
        super(`${message} (line ${line}, column ${column})`);
        this.reason = message;
        this.line = line;
        this.column = column;
    }
}

/**
 * Thrown when the external decompiler fails or produces unusable output.
 */
export class DecompilationFailedError extends DeobfuscationError {
    public readonly code = 'DECOMPILATION_FAILED';
}

/**
 * Thrown when a protected file carries no marshalled payload.
 */
export class PayloadNotFoundError extends DeobfuscationError {
    public readonly code = 'PAYLOAD_NOT_FOUND';
}
