import type { Address } from 'viem';

import type { CallContext, Contract } from '../runtime/index.js';

export interface IPairFactory {
    /** Creates the pool for the two assets and returns its address. */
    createPair(ctx: CallContext, tokenA: Address, tokenB: Address): Address;
    /** Pool address for the two assets, or the zero address. */
    getPair(tokenA: Address, tokenB: Address): Address;
}

export function isPairFactory(contract: Contract): contract is Contract & IPairFactory {
    return (
        'createPair' in contract &&
        typeof contract.createPair === 'function' &&
        'getPair' in contract &&
        typeof contract.getPair === 'function'
    );
}
