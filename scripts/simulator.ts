/**
 * MemeCoin Trading Session Simulator
 *
 * Launches the configured token on a local chain, then runs
 * SIMULATION_ROUNDS alternating buys and sells through the router and
 * prints where every taxed token went.
 *
 * Usage: npx tsx scripts/simulator.ts
 */
import 'dotenv/config';

import { loadConfig } from './lib/config.js';
import { banner, fatal, section } from './lib/console.js';
import { formatNative, formatRate, formatToken, shortAddress } from './lib/formatters.js';
import { launchLocalMarket } from './lib/market.js';
import { runTradingSession } from './lib/session.js';

function main(): void {
    banner('MemeCoin Trading Simulator');

    const config = loadConfig();
    const market = launchLocalMarket(config);
    const { token, pair } = market;
    const rates = token.taxRates();

    console.log(`Token:  ${token.name()} (${token.symbol()}) at ${token.address}`);
    console.log(`Taxes:  buy ${formatRate(rates.buyTax)}, sell ${formatRate(rates.sellTax)}, dev ${formatRate(rates.devFee)}`);
    console.log(`Rounds: ${config.simulationRounds}`);

    // -----------------------------------------------------------------------
    // Trades
    // -----------------------------------------------------------------------
    const session = runTradingSession(market, config.simulationRounds);

    section('Trades');
    let totalDev = 0n;
    let totalMarketing = 0n;
    let totalLiquidity = 0n;
    for (const trade of session.trades) {
        const paid = trade.side === 'buy' ? formatNative(trade.amountIn) : formatToken(trade.amountIn);
        const got = trade.side === 'buy' ? formatToken(trade.amountOut) : formatNative(trade.amountOut);
        console.log(
            `  #${String(trade.round + 1).padStart(3)} ${trade.side.padEnd(4)} ${shortAddress(trade.trader)}  ` +
                `${paid} -> ${got}`,
        );
        console.log(
            `        tax: dev ${formatToken(trade.devTax)} | marketing ${formatToken(trade.marketingTax)} | ` +
                `liquidity ${formatToken(trade.liquidityTax)}`,
        );
        totalDev += trade.devTax;
        totalMarketing += trade.marketingTax;
        totalLiquidity += trade.liquidityTax;
    }

    // -----------------------------------------------------------------------
    // Totals
    // -----------------------------------------------------------------------
    section('Tax collected');
    console.log(`  Dev:       ${formatToken(totalDev)}`);
    console.log(`  Marketing: ${formatToken(totalMarketing)}`);
    console.log(`  Liquidity: ${formatToken(totalLiquidity)}`);

    section('Pool');
    const reserves = pair.getReserves();
    console.log(`  Reserves: ${formatToken(reserves.reserveToken)} / ${formatNative(reserves.reserveNative)}`);

    section('Supply check');
    const supply = token.totalSupply();
    console.log(`  totalSupply:       ${formatToken(supply)}`);
    console.log(`  Σ known balances:  ${formatToken(session.accountedSupply)}`);
    if (session.accountedSupply !== supply) {
        throw new Error(`Supply mismatch: ${session.accountedSupply} != ${supply}`);
    }
    console.log('  OK');
    console.log('');
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

try {
    main();
} catch (err) {
    fatal('simulation', err);
}
