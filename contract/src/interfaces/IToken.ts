import type { Address } from 'viem';

import type { CallContext, Contract } from '../runtime/index.js';

/** The slice of a fungible token the router and pair depend on. */
export interface IToken {
    balanceOf(owner: Address): bigint;
    transfer(ctx: CallContext, to: Address, amount: bigint): boolean;
    transferFrom(ctx: CallContext, from: Address, to: Address, amount: bigint): boolean;
}

export function isToken(contract: Contract): contract is Contract & IToken {
    return (
        'balanceOf' in contract &&
        typeof contract.balanceOf === 'function' &&
        'transfer' in contract &&
        typeof contract.transfer === 'function' &&
        'transferFrom' in contract &&
        typeof contract.transferFrom === 'function'
    );
}
