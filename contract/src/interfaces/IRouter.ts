import type { Address } from 'viem';

import type { CallContext, Contract } from '../runtime/index.js';

export interface AddLiquidityResult {
    readonly amountToken: bigint;
    readonly amountNative: bigint;
    readonly liquidity: bigint;
}

/**
 * Router entry points the token consumes. Results are trusted as returned;
 * any failure inside the router reverts the caller's transaction.
 */
export interface IRouter {
    factory(): Address;
    nativeWrappedAsset(): Address;

    /**
     * Pulls `amountTokenDesired` (or less) of `token` from the caller through
     * its allowance and pairs it with the attached native value. Unused
     * native value is refunded to the caller.
     */
    addLiquidityWithNative(
        ctx: CallContext,
        token: Address,
        amountTokenDesired: bigint,
        amountTokenMin: bigint,
        amountNativeMin: bigint,
        to: Address,
        deadline: bigint,
    ): AddLiquidityResult;

    /** Sells `amountIn` of `token` for native currency, tolerating transfer taxes. */
    swapExactTokensForNativeSupportingFeeOnTransferTokens(
        ctx: CallContext,
        amountIn: bigint,
        amountOutMin: bigint,
        token: Address,
        to: Address,
        deadline: bigint,
    ): void;
}

export function isRouter(contract: Contract): contract is Contract & IRouter {
    return (
        'addLiquidityWithNative' in contract &&
        typeof contract.addLiquidityWithNative === 'function' &&
        'factory' in contract &&
        typeof contract.factory === 'function' &&
        'nativeWrappedAsset' in contract &&
        typeof contract.nativeWrappedAsset === 'function'
    );
}
