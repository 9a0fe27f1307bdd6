/**
 * MemeCoin Local Deployment Script
 *
 * Deploys the token, its pair factory and router onto an in-process chain,
 * seeds liquidity and opens trading, then prints the resulting state.
 *
 * Usage:
 *   1. Copy .env.example to .env and fill in the token and wallet settings
 *   2. Run: npx tsx scripts/deploy.ts
 */

import 'dotenv/config';

import { ONE_TOKEN } from '../contract/src/index.js';
import { loadConfig } from './lib/config.js';
import { banner, fatal, section } from './lib/console.js';
import { formatNative, formatRate, formatToken } from './lib/formatters.js';
import { launchLocalMarket } from './lib/market.js';

function main(): void {
    banner('MemeCoin Deployment -- local chain');

    // -----------------------------------------------------------------------
    // 1. Validate environment
    // -----------------------------------------------------------------------
    const config = loadConfig();
    console.log(`Token:    ${config.token.name} (${config.token.symbol})`);
    console.log(`Supply:   ${formatToken(config.token.totalSupply * ONE_TOKEN, 0)}`);
    console.log(`Deployer: ${config.deployer}`);

    // -----------------------------------------------------------------------
    // 2. Deploy, seed liquidity, enable trading
    // -----------------------------------------------------------------------
    const market = launchLocalMarket(config);
    const { chain, token, pair, router, factory, liquidity } = market;

    // -----------------------------------------------------------------------
    // 3. Summary
    // -----------------------------------------------------------------------
    banner('DEPLOYMENT SUCCESSFUL');

    section('Contracts');
    console.log(`  Token:    ${token.address}`);
    console.log(`  Pair:     ${pair.address}`);
    console.log(`  Router:   ${router.address}`);
    console.log(`  Factory:  ${factory.address}`);

    section('Tax policy');
    const rates = token.taxRates();
    const wallets = token.wallets();
    console.log(`  Buy tax:   ${formatRate(rates.buyTax)}`);
    console.log(`  Sell tax:  ${formatRate(rates.sellTax)}`);
    console.log(`  Dev fee:   ${formatRate(rates.devFee)}`);
    console.log(`  Dev wallet:       ${wallets.devWallet}`);
    console.log(`  Marketing wallet: ${wallets.marketingWallet}`);
    console.log(`  Liquidity wallet: ${wallets.liquidityWallet}`);

    section('Liquidity');
    const reserves = pair.getReserves();
    console.log(`  Tokens paired:  ${formatToken(liquidity.amountToken)}`);
    console.log(`  Native paired:  ${formatNative(liquidity.amountNative)}`);
    console.log(`  LP shares:      ${formatToken(liquidity.liquidity)} (to ${token.owner()})`);
    console.log(`  Reserves:       ${formatToken(reserves.reserveToken)} / ${formatNative(reserves.reserveNative)}`);

    section('State');
    console.log(`  Trading enabled: ${token.tradingEnabled()} (block ${market.tradingEnabledAt})`);
    console.log(`  Chain height:    ${chain.blockNumber}`);
    console.log(`  Deployer balance: ${formatToken(token.balanceOf(config.deployer))}`);

    console.log('\n  NEXT STEPS:');
    console.log('  -----------');
    console.log('  Run a trading session against this configuration:');
    console.log('     npx tsx scripts/simulator.ts');
    console.log('');
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

try {
    main();
} catch (err) {
    fatal('deployment', err);
}
