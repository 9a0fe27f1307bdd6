import { expect } from 'chai';
import { parseEther, type Address } from 'viem';

import {
    LOCAL_WRAPPED_NATIVE,
    U256_MAX,
    getAmountOut,
    quote,
    type LocalMarket,
} from '../src/index.js';
import {
    ALICE,
    BOB,
    DEV,
    LIQUIDITY,
    MARKETING,
    SEED_NATIVE,
    SEED_TOKENS,
    account,
    expectRevert,
    launchedFixture,
} from './fixtures.js';

describe('getAmountOut / quote', () => {
    it('applies the 0.3% pool fee', () => {
        expect(getAmountOut(1_000n, 10_000n, 10_000n)).to.equal(906n);
    });

    it('rejects empty inputs and reserves', () => {
        expectRevert(() => getAmountOut(0n, 1n, 1n), 'validation', 'LocalRouter: INSUFFICIENT_INPUT_AMOUNT');
        expectRevert(() => getAmountOut(1n, 0n, 1n), 'validation', 'LocalRouter: INSUFFICIENT_LIQUIDITY');
    });

    it('quotes at the reserve ratio', () => {
        expect(quote(100n, 1_000n, 2_000n)).to.equal(200n);
    });
});

describe('LocalRouter', () => {
    let market: LocalMarket;

    beforeEach(() => {
        market = launchedFixture();
        market.chain.fund(ALICE, parseEther('10'));
    });

    function buy(value: bigint, amountOutMin = 0n): void {
        const { chain, router, token } = market;
        chain.execute(ALICE, router.address, value, (ctx) =>
            router.swapExactNativeForTokensSupportingFeeOnTransferTokens(ctx, amountOutMin, token.address, ALICE, ctx.timestamp),
        );
    }

    it('holds the seeded liquidity', () => {
        expect(market.pair.getReserves()).to.deep.equal({ reserveToken: SEED_TOKENS, reserveNative: SEED_NATIVE });
    });

    it('taxes tokens bought through the router', () => {
        const gross = getAmountOut(parseEther('1'), SEED_NATIVE, SEED_TOKENS);
        buy(parseEther('1'));

        const tax = (gross * 5n) / 100n;
        const dev = (tax * 2n) / 5n;
        const marketing = (tax - dev) / 2n;
        expect(market.token.balanceOf(ALICE)).to.equal(gross - tax);
        expect(market.token.balanceOf(DEV)).to.equal(dev);
        expect(market.token.balanceOf(MARKETING)).to.equal(marketing);
        expect(market.token.balanceOf(LIQUIDITY)).to.equal(tax - dev - marketing);
        expect(market.chain.balanceOf(ALICE)).to.equal(parseEther('9'));
        expect(market.pair.getReserves()).to.deep.equal({
            reserveToken: SEED_TOKENS - gross,
            reserveNative: SEED_NATIVE + parseEther('1'),
        });
    });

    it('checks the minimum output after tax', () => {
        const gross = getAmountOut(parseEther('1'), SEED_NATIVE, SEED_TOKENS);
        expectRevert(() => buy(parseEther('1'), gross), 'validation', 'LocalRouter: INSUFFICIENT_OUTPUT_AMOUNT');
        expect(market.chain.balanceOf(ALICE)).to.equal(parseEther('10'));
    });

    it('prices a sell on what reached the pool', () => {
        const { chain, router, token, pair } = market;
        buy(parseEther('1'));
        chain.execute(ALICE, token.address, 0n, (ctx) => token.approve(ctx, router.address, U256_MAX));

        const sold = token.balanceOf(ALICE) / 2n;
        const { reserveToken, reserveNative } = pair.getReserves();
        const devBefore = token.balanceOf(DEV);
        const nativeBefore = chain.balanceOf(ALICE);

        chain.execute(ALICE, router.address, 0n, (ctx) =>
            router.swapExactTokensForNativeSupportingFeeOnTransferTokens(ctx, sold, 0n, token.address, ALICE, ctx.timestamp),
        );

        const tax = (sold * 5n) / 100n;
        const expectedOut = getAmountOut(sold - tax, reserveToken, reserveNative);
        expect(chain.balanceOf(ALICE) - nativeBefore).to.equal(expectedOut);
        expect(token.balanceOf(DEV) - devBefore).to.equal((tax * 2n) / 5n);
        expect(pair.getReserves().reserveToken).to.equal(reserveToken + sold - tax);
    });

    it('rejects an expired deadline', () => {
        const { chain, router, token } = market;
        expectRevert(
            () =>
                chain.execute(ALICE, router.address, parseEther('1'), (ctx) =>
                    router.swapExactNativeForTokensSupportingFeeOnTransferTokens(ctx, 0n, token.address, ALICE, 0n),
                ),
            'validation',
            'LocalRouter: EXPIRED',
        );
    });

    it('has no pool for an unknown token', () => {
        const { chain, router } = market;
        expectRevert(
            () =>
                chain.execute(ALICE, router.address, parseEther('1'), (ctx) =>
                    router.swapExactNativeForTokensSupportingFeeOnTransferTokens(ctx, 0n, account(0x77), ALICE, ctx.timestamp),
                ),
            'call',
            'LocalRouter: PAIR_NOT_FOUND',
        );
    });
});

describe('LocalPairFactory', () => {
    it('refuses duplicate, identical and non-native pairs', () => {
        const { chain, factory, token } = launchedFixture();
        const create = (a: Address, b: Address) =>
            chain.execute(BOB, factory.address, 0n, (ctx) => factory.createPair(ctx, a, b));

        expectRevert(() => create(token.address, LOCAL_WRAPPED_NATIVE), 'validation', 'LocalPairFactory: PAIR_EXISTS');
        expectRevert(() => create(token.address, token.address), 'validation', 'LocalPairFactory: IDENTICAL_ADDRESSES');
        expectRevert(
            () => create(token.address, account(0x99)),
            'validation',
            'LocalPairFactory: only native pairs are supported',
        );
    });

    it('registers a new pair under both orderings', () => {
        const { chain, factory } = launchedFixture();
        const other = account(0x42);
        const { result } = chain.execute(BOB, factory.address, 0n, (ctx) =>
            factory.createPair(ctx, LOCAL_WRAPPED_NATIVE, other),
        );
        expect(factory.getPair(other, LOCAL_WRAPPED_NATIVE)).to.equal(result);
        expect(factory.getPair(LOCAL_WRAPPED_NATIVE, other)).to.equal(result);
    });
});
