import { isAddressEqual, zeroAddress, type Address } from 'viem';

import { isPairFactory, isToken, type AddLiquidityResult, type IRouter } from '../interfaces/index.js';
import { Contract, Revert, SafeMath, type Blockchain, type CallContext } from '../runtime/index.js';
import { isLocalPair, type LocalPair } from './LocalPair.js';

/** Output for `amountIn` against the given reserves, after a 0.3% fee. */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountIn <= 0n) {
        throw new Revert('LocalRouter: INSUFFICIENT_INPUT_AMOUNT', 'validation');
    }
    if (reserveIn === 0n || reserveOut === 0n) {
        throw new Revert('LocalRouter: INSUFFICIENT_LIQUIDITY', 'validation');
    }
    const amountInWithFee = amountIn * 997n;
    return SafeMath.div(amountInWithFee * reserveOut, reserveIn * 1000n + amountInWithFee);
}

/** Amount of the other asset worth `amountA` at the current ratio. */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
    if (reserveA === 0n || reserveB === 0n) {
        throw new Revert('LocalRouter: INSUFFICIENT_LIQUIDITY', 'validation');
    }
    return SafeMath.div(amountA * reserveB, reserveA);
}

/**
 * Router over {@link LocalPairFactory} pools. Stateless: the factory and the
 * wrapped-native key are fixed at construction.
 */
export class LocalRouter extends Contract implements IRouter {
    public constructor(
        address: Address,
        chain: Blockchain,
        private readonly factoryAddress: Address,
        private readonly wrappedNative: Address,
    ) {
        super(address, chain);
    }

    /** Refunds of unused native value land here. */
    public override receive(_ctx: CallContext): void {}

    public factory(): Address {
        return this.factoryAddress;
    }

    public nativeWrappedAsset(): Address {
        return this.wrappedNative;
    }

    public addLiquidityWithNative(
        ctx: CallContext,
        token: Address,
        amountTokenDesired: bigint,
        amountTokenMin: bigint,
        amountNativeMin: bigint,
        to: Address,
        deadline: bigint,
    ): AddLiquidityResult {
        this.ensure(ctx, deadline);

        const pair = this.pairFor(token, true);
        const { reserveToken, reserveNative } = pair.getReserves();

        let amountToken: bigint;
        let amountNative: bigint;
        if (reserveToken === 0n && reserveNative === 0n) {
            amountToken = amountTokenDesired;
            amountNative = ctx.value;
        } else {
            const nativeOptimal = quote(amountTokenDesired, reserveToken, reserveNative);
            if (nativeOptimal <= ctx.value) {
                if (nativeOptimal < amountNativeMin) {
                    throw new Revert('LocalRouter: INSUFFICIENT_NATIVE_AMOUNT', 'validation');
                }
                amountToken = amountTokenDesired;
                amountNative = nativeOptimal;
            } else {
                const tokenOptimal = quote(ctx.value, reserveNative, reserveToken);
                if (tokenOptimal < amountTokenMin) {
                    throw new Revert('LocalRouter: INSUFFICIENT_TOKEN_AMOUNT', 'validation');
                }
                amountToken = tokenOptimal;
                amountNative = ctx.value;
            }
        }

        const tokenContract = this.chain.resolve(token, isToken);
        this.chain.call(this.address, token, 0n, (tokenCtx) =>
            tokenContract.transferFrom(tokenCtx, ctx.sender, pair.address, amountToken),
        );
        this.chain.callNative(this.address, pair.address, amountNative);
        const liquidity = this.chain.call(this.address, pair.address, 0n, (pairCtx) => pair.mint(pairCtx, to));

        if (ctx.value > amountNative) {
            this.chain.callNative(this.address, ctx.sender, ctx.value - amountNative);
        }

        return { amountToken, amountNative, liquidity };
    }

    /**
     * Sell. The pool prices whatever actually arrived, so a transfer tax on
     * the way in only reduces the output.
     */
    public swapExactTokensForNativeSupportingFeeOnTransferTokens(
        ctx: CallContext,
        amountIn: bigint,
        amountOutMin: bigint,
        token: Address,
        to: Address,
        deadline: bigint,
    ): void {
        this.ensure(ctx, deadline);

        const pair = this.pairFor(token, false);
        const tokenContract = this.chain.resolve(token, isToken);
        this.chain.call(this.address, token, 0n, (tokenCtx) =>
            tokenContract.transferFrom(tokenCtx, ctx.sender, pair.address, amountIn),
        );

        const { reserveToken, reserveNative } = pair.getReserves();
        const received = SafeMath.sub(tokenContract.balanceOf(pair.address), reserveToken);
        const amountOut = getAmountOut(received, reserveToken, reserveNative);
        if (amountOut < amountOutMin) {
            throw new Revert('LocalRouter: INSUFFICIENT_OUTPUT_AMOUNT', 'validation');
        }

        this.chain.call(this.address, pair.address, 0n, (pairCtx) => pair.swap(pairCtx, 0n, amountOut, to));
    }

    /**
     * Buy with the attached native value. `amountOutMin` is checked against
     * what `to` actually received, after any transfer tax.
     */
    public swapExactNativeForTokensSupportingFeeOnTransferTokens(
        ctx: CallContext,
        amountOutMin: bigint,
        token: Address,
        to: Address,
        deadline: bigint,
    ): void {
        this.ensure(ctx, deadline);

        const pair = this.pairFor(token, false);
        const tokenContract = this.chain.resolve(token, isToken);
        const { reserveToken, reserveNative } = pair.getReserves();

        this.chain.callNative(this.address, pair.address, ctx.value);
        const received = SafeMath.sub(this.chain.balanceOf(pair.address), reserveNative);
        const amountOut = getAmountOut(received, reserveNative, reserveToken);

        const before = tokenContract.balanceOf(to);
        this.chain.call(this.address, pair.address, 0n, (pairCtx) => pair.swap(pairCtx, amountOut, 0n, to));
        if (SafeMath.sub(tokenContract.balanceOf(to), before) < amountOutMin) {
            throw new Revert('LocalRouter: INSUFFICIENT_OUTPUT_AMOUNT', 'validation');
        }
    }

    private ensure(ctx: CallContext, deadline: bigint): void {
        if (deadline < ctx.timestamp) {
            throw new Revert('LocalRouter: EXPIRED', 'validation');
        }
    }

    private pairFor(token: Address, createIfMissing: boolean): LocalPair {
        const factory = this.chain.resolve(this.factoryAddress, isPairFactory);
        let pairAddress = factory.getPair(token, this.wrappedNative);
        if (isAddressEqual(pairAddress, zeroAddress)) {
            if (!createIfMissing) {
                throw new Revert('LocalRouter: PAIR_NOT_FOUND', 'call');
            }
            pairAddress = this.chain.call(this.address, factory.address, 0n, (factoryCtx) =>
                factory.createPair(factoryCtx, token, this.wrappedNative),
            );
        }
        return this.chain.resolve(pairAddress, isLocalPair);
    }
}
