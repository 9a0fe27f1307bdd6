import { Revert } from './Revert.js';

export const U256_MAX: bigint = (1n << 256n) - 1n;

function checked(value: bigint, op: string): bigint {
    if (value < 0n) throw new Revert(`SafeMath: ${op} underflow`, 'arithmetic');
    if (value > U256_MAX) throw new Revert(`SafeMath: ${op} overflow`, 'arithmetic');
    return value;
}

/** Rejects a caller-supplied amount that is not a u256. */
export function requireU256(value: bigint, label: string): bigint {
    if (value < 0n || value > U256_MAX) {
        throw new Revert(`${label} out of range`, 'validation');
    }
    return value;
}

/**
 * u256 arithmetic on bigint. Every result is range-checked, so a wrapped or
 * negative value can never reach storage.
 */
export const SafeMath = {
    add(a: bigint, b: bigint): bigint {
        return checked(a + b, 'addition');
    },

    sub(a: bigint, b: bigint): bigint {
        return checked(a - b, 'subtraction');
    },

    mul(a: bigint, b: bigint): bigint {
        return checked(a * b, 'multiplication');
    },

    div(a: bigint, b: bigint): bigint {
        if (b === 0n) throw new Revert('SafeMath: division by zero', 'arithmetic');
        return checked(a / b, 'division');
    },

    min(a: bigint, b: bigint): bigint {
        return a < b ? a : b;
    },

    max(a: bigint, b: bigint): bigint {
        return a > b ? a : b;
    },

    /** Integer square root (floor), Babylonian method. */
    sqrt(y: bigint): bigint {
        checked(y, 'sqrt');
        if (y < 4n) return y === 0n ? 0n : 1n;
        let z = y;
        let x = y / 2n + 1n;
        while (x < z) {
            z = x;
            x = (y / x + x) / 2n;
        }
        return z;
    },
} as const;
