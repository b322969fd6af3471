import { Module } from '../deobfuscator/ast/nodes';
import { walk } from '../deobfuscator/ast/traverse';

const DUNDER = /^__.*__$/;

/**
 * Finds the pieces of marshalled code carried by a protected file. Each piece
 * is the bytes literal passed as the last of two arguments to the call in a
 * `__name__ = (..., define(..., b'...'))` assignment. When a name is assigned
 * more than once its last piece is kept, at the position of its first assignment.
 * @param module The parsed protected file.
 * @returns The pieces by variable name, in order of occurrence.
 */
export function findMarshalledPieces(module: Module): Map<string, Uint8Array> {
    const pieces = new Map<string, Uint8Array>();

    walk(module, node => {
        if (node.type != 'Assign' || node.targets.length != 1) {
            return;
        }
        const [target] = node.targets;
        if (target.type != 'Name' || !DUNDER.test(target.id) || node.value.type != 'Tuple') {
            return;
        }

        const elts = node.value.elts;
        const call = elts.length == 2 ? elts[1] : undefined;
        if (!call || call.type != 'Call' || call.args.length != 2) {
            return;
        }
        const data = call.args[1];
        if (data.type == 'Constant' && data.value.kind == 'bytes') {
            pieces.set(target.id, data.value.value);
        }
    });

    return pieces;
}

/**
 * Joins the pieces of marshalled code carried by a protected file.
 * @param module The parsed protected file.
 * @returns The marshalled code, or undefined if the file carries none.
 */
export function extractMarshalledCode(module: Module): Uint8Array | undefined {
    const pieces = Array.from(findMarshalledPieces(module).values());
    if (pieces.length == 0) {
        return undefined;
    }

    const code = new Uint8Array(pieces.reduce((sum, piece) => sum + piece.length, 0));
    let offset = 0;
    for (const piece of pieces) {
        code.set(piece, offset);
        offset += piece.length;
    }
    return code;
}
