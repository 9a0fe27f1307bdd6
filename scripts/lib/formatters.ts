import { formatUnits, type Address } from 'viem';

import { DECIMALS } from '../../contract/src/index.js';

/**
 * Raw 18-decimal amount as a grouped decimal string, cut (not rounded) to
 * `maxFractionDigits` with trailing zeros dropped.
 */
export function formatToken(raw: bigint, maxFractionDigits = 4): string {
    const negative = raw < 0n;
    const [whole = '0', fraction = ''] = formatUnits(negative ? -raw : raw, DECIMALS).split('.');
    const grouped = BigInt(whole).toLocaleString('en-US');
    const shown = fraction.slice(0, maxFractionDigits).replace(/0+$/, '');
    const text = shown === '' ? grouped : `${grouped}.${shown}`;
    return negative && text !== '0' ? `-${text}` : text;
}

export function formatNative(raw: bigint, maxFractionDigits = 4): string {
    return `${formatToken(raw, maxFractionDigits)} ETH`;
}

/** Stored rates are whole percentages. */
export function formatRate(rate: bigint): string {
    return `${rate}%`;
}

export function shortAddress(address: Address): string {
    return `${address.slice(0, 6)}...${address.slice(-4)}`;
}
