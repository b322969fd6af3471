import { spawnSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DecompilationFailedError } from '../deobfuscator/errors';

/**
 * Turns marshalled bytecode back into source text.
 */
export interface Decompiler {
    /**
     * Decompiles marshalled bytecode.
     * @param bytecode The marshalled code object.
     * @returns The source text.
     * @throws DecompilationFailedError when no usable source is produced.
     */
    decompile(bytecode: Uint8Array): string;
}

export interface PycdcOptions {
    /** The path of the pycdc executable. */
    path?: string;
    /** The Python version the bytecode was compiled by. */
    version?: string;
}

/** Output of this many lines or fewer is an error report rather than source. */
const MIN_OUTPUT_LINES = 6;

/**
 * Runs Decompyle++ (`pycdc`) on bytecode written to a temporary file.
 */
export class PycdcDecompiler implements Decompiler {
    public static readonly DEFAULT_PATH = './decompylepp/pycdc';
    private readonly path: string;
    private readonly version: string;

    /**
     * Creates a new pycdc decompiler.
     * @param options The executable path and bytecode version (optional).
     */
    constructor(options: PycdcOptions = {}) {
        this.path = options.path ?? PycdcDecompiler.DEFAULT_PATH;
        this.version = options.version ?? '3.9';
    }

    public decompile(bytecode: Uint8Array): string {
        if (!fs.existsSync(this.path)) {
            throw new DecompilationFailedError(`Couldn't find pycdc at ${this.path}`);
        }

        const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'specter-'));
        try {
            const file = path.join(directory, 'marshalled.pym');
            fs.writeFileSync(file, bytecode);

            const result = spawnSync(this.path, [file, '-c', '-v', this.version], { encoding: 'utf-8' });
            if (result.error) {
                throw new DecompilationFailedError(`Couldn't run pycdc: ${result.error.message}`);
            } else if (result.status != 0) {
                throw new DecompilationFailedError(`pycdc exited with status ${result.status}`);
            }

            const output = result.stdout;
            if (countLines(output) < MIN_OUTPUT_LINES) {
                throw new DecompilationFailedError('pycdc produced no usable source');
            }
            return output;
        } finally {
            fs.rmSync(directory, { recursive: true, force: true });
        }
    }
}

/**
 * Counts lines the way a line-by-line reader would, so that a final line
 * without a newline still counts.
 * @param text The text.
 * @returns The number of lines.
 */
export function countLines(text: string): number {
    if (text.length == 0) {
        return 0;
    }
    const lines = text.split('\n');
    return text.endsWith('\n') ? lines.length - 1 : lines.length;
}
