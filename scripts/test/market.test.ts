import { expect } from 'chai';
import { getAddress, parseEther } from 'viem';

import { ONE_TOKEN } from '../../contract/src/index.js';
import type { AppConfig } from '../lib/config.js';
import { DEPLOYER_GAS_BUFFER, launchLocalMarket } from '../lib/market.js';
import { runTradingSession, traderAddress } from '../lib/session.js';

const CONFIG: AppConfig = {
    token: {
        name: 'Local Meme',
        symbol: 'LMEME',
        totalSupply: 1_000_000n,
        devWallet: getAddress('0x00000000000000000000000000000000000000d1'),
        marketingWallet: getAddress('0x00000000000000000000000000000000000000d2'),
        liquidityWallet: getAddress('0x00000000000000000000000000000000000000d3'),
    },
    deployer: getAddress('0x00000000000000000000000000000000000000a1'),
    liquidityTokens: 500_000n,
    liquidityNative: parseEther('2'),
    simulationRounds: 4,
};

describe('launchLocalMarket', () => {
    it('seeds the pool and opens trading', () => {
        const market = launchLocalMarket(CONFIG);
        const { token, pair } = market;

        expect(token.tradingEnabled()).to.equal(true);
        expect(market.tradingEnabledAt).to.equal(6n);
        expect(pair.getReserves()).to.deep.equal({
            reserveToken: 500_000n * ONE_TOKEN,
            reserveNative: parseEther('2'),
        });
        expect(market.liquidity.liquidity).to.equal(10n ** 21n - 1_000n);
        expect(pair.balanceOf(CONFIG.deployer)).to.equal(10n ** 21n - 1_000n);
    });

    it('leaves the deployer the rest of the supply and the gas buffer', () => {
        const { chain, token } = launchLocalMarket(CONFIG);
        expect(token.balanceOf(CONFIG.deployer)).to.equal(500_000n * ONE_TOKEN);
        expect(token.balanceOf(token.address)).to.equal(0n);
        expect(chain.balanceOf(CONFIG.deployer)).to.equal(DEPLOYER_GAS_BUFFER);
    });
});

describe('runTradingSession', () => {
    it('alternates buys and sells and keeps the ledger balanced', () => {
        const market = launchLocalMarket(CONFIG);
        const session = runTradingSession(market, 4);

        expect(session.trades.map((t) => t.side)).to.deep.equal(['buy', 'buy', 'buy', 'sell']);
        expect(session.trades.map((t) => t.trader)).to.deep.equal([
            traderAddress(0),
            traderAddress(1),
            traderAddress(2),
            traderAddress(0),
        ]);
        expect(session.trades.slice(0, 3).map((t) => t.amountIn)).to.deep.equal([
            parseEther('0.1'),
            parseEther('0.2'),
            parseEther('0.3'),
        ]);
        expect(session.accountedSupply).to.equal(market.token.totalSupply());
    });

    it('records the tax split of a sell', () => {
        const market = launchLocalMarket(CONFIG);
        const sell = runTradingSession(market, 4).trades[3];
        expect(sell?.side).to.equal('sell');
        if (sell === undefined) return;

        const tax = (sell.amountIn * 5n) / 100n;
        const dev = (tax * 2n) / 5n;
        const marketing = (tax - dev) / 2n;
        expect([sell.devTax, sell.marketingTax, sell.liquidityTax]).to.deep.equal([
            dev,
            marketing,
            tax - dev - marketing,
        ]);
        expect(sell.amountOut > 0n).to.equal(true);
    });
});
