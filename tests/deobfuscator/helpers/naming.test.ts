import { describe, expect, it } from 'vitest';
import { isObfuscatedName } from '../../../src/deobfuscator/helpers/naming';

describe('isObfuscatedName', () => {
    it.each(['_0x1a2b', '_0XFF', '__', '____', '_123', '__a7', 'IlIl', 'I_l_1_I', 'O0O0o', '__a1__', '__xY__'])(
        'flags %s',
        name => {
            expect(isObfuscatedName(name)).toBe(true);
        }
    );

    it.each(['value', 'data_1', '_private', 'Il', 'x', '__init__', '__name__', '__main__', '__version__', 'OK'])(
        'keeps %s',
        name => {
            expect(isObfuscatedName(name)).toBe(false);
        }
    );
});
