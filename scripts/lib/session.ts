import { getAddress, numberToHex, parseEther, type Address } from 'viem';

import { U256_MAX, type LocalMarket } from '../../contract/src/index.js';

export type TradeSide = 'buy' | 'sell';

export interface TradeRecord {
    readonly round: number;
    readonly trader: Address;
    readonly side: TradeSide;
    /** Native paid on a buy, tokens sold on a sell. */
    readonly amountIn: bigint;
    /** Tokens received on a buy, native received on a sell. */
    readonly amountOut: bigint;
    readonly devTax: bigint;
    readonly marketingTax: bigint;
    readonly liquidityTax: bigint;
}

export interface SessionResult {
    readonly trades: readonly TradeRecord[];
    readonly traders: readonly Address[];
    /** Σ of every known token balance; equals totalSupply when the ledger is sound. */
    readonly accountedSupply: bigint;
}

export const TRADER_FUNDING: bigint = parseEther('100');
const BUY_STEP: bigint = parseEther('0.1');

export function traderAddress(index: number): Address {
    return getAddress(numberToHex(0x5000n + BigInt(index), { size: 20 }));
}

/**
 * Alternate buys and sells through the router. Round `i` uses trader
 * `i % traderCount`; even rounds buy with `0.1 * (1 + i % 5)` native, odd
 * rounds sell half of the trader's balance.
 */
export function runTradingSession(market: LocalMarket, rounds: number, traderCount = 3): SessionResult {
    const { chain, token, router } = market;

    const traders = Array.from({ length: traderCount }, (_, i) => traderAddress(i));
    for (const trader of traders) {
        chain.fund(trader, TRADER_FUNDING);
        chain.execute(trader, token.address, 0n, (ctx) => token.approve(ctx, router.address, U256_MAX));
    }

    const { devWallet, marketingWallet, liquidityWallet } = token.wallets();
    const trades: TradeRecord[] = [];

    for (let round = 0; round < rounds; round++) {
        const trader = traders[round % traders.length];
        if (trader === undefined) break;

        const before = {
            dev: token.balanceOf(devWallet),
            marketing: token.balanceOf(marketingWallet),
            liquidity: token.balanceOf(liquidityWallet),
            tokens: token.balanceOf(trader),
            native: chain.balanceOf(trader),
        };

        let side: TradeSide;
        let amountIn: bigint;
        if (round % 2 === 0 || before.tokens === 0n) {
            side = 'buy';
            amountIn = BUY_STEP * BigInt(1 + (round % 5));
            chain.execute(trader, router.address, amountIn, (ctx) =>
                router.swapExactNativeForTokensSupportingFeeOnTransferTokens(
                    ctx,
                    0n,
                    token.address,
                    trader,
                    ctx.timestamp + 300n,
                ),
            );
        } else {
            side = 'sell';
            amountIn = before.tokens / 2n;
            chain.execute(trader, router.address, 0n, (ctx) =>
                router.swapExactTokensForNativeSupportingFeeOnTransferTokens(
                    ctx,
                    amountIn,
                    0n,
                    token.address,
                    trader,
                    ctx.timestamp + 300n,
                ),
            );
        }

        trades.push({
            round,
            trader,
            side,
            amountIn,
            amountOut:
                side === 'buy'
                    ? token.balanceOf(trader) - before.tokens
                    : chain.balanceOf(trader) - before.native,
            devTax: token.balanceOf(devWallet) - before.dev,
            marketingTax: token.balanceOf(marketingWallet) - before.marketing,
            liquidityTax: token.balanceOf(liquidityWallet) - before.liquidity,
        });
    }

    const holders = new Set<Address>([
        token.owner(),
        token.address,
        market.pair.address,
        router.address,
        devWallet,
        marketingWallet,
        liquidityWallet,
        ...traders,
    ]);
    let accountedSupply = 0n;
    for (const holder of holders) {
        accountedSupply += token.balanceOf(holder);
    }

    return { trades, traders, accountedSupply };
}
