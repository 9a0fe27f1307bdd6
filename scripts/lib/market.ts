import { parseEther } from 'viem';

import {
    Blockchain,
    ONE_TOKEN,
    deployLocalMarket,
    type AddLiquidityResult,
    type LocalMarket,
} from '../../contract/src/index.js';
import type { AppConfig } from './config.js';

/** Native currency the deployer holds on top of the liquidity it provides. */
export const DEPLOYER_GAS_BUFFER: bigint = parseEther('1');

export interface LaunchedMarket extends LocalMarket {
    readonly liquidity: AddLiquidityResult;
    readonly tradingEnabledAt: bigint;
}

/**
 * Bring up a tradeable market on a fresh local chain:
 *   1. fund the deployer
 *   2. deploy factory, router and token
 *   3. move the liquidity allocation into the token contract
 *   4. addLiquidity() with the configured native value
 *   5. enableTrading()
 */
export function launchLocalMarket(config: AppConfig, chain: Blockchain = new Blockchain()): LaunchedMarket {
    const { deployer } = config;
    chain.fund(deployer, config.liquidityNative + DEPLOYER_GAS_BUFFER);

    const market = deployLocalMarket(chain, deployer, config.token);
    const { token } = market;

    const liquidityTokens = config.liquidityTokens * ONE_TOKEN;
    chain.execute(deployer, token.address, 0n, (ctx) => token.transfer(ctx, token.address, liquidityTokens));

    const { result: liquidity } = chain.execute(deployer, token.address, config.liquidityNative, (ctx) =>
        token.addLiquidity(ctx, liquidityTokens),
    );

    const { blockNumber } = chain.execute(deployer, token.address, 0n, (ctx) => token.enableTrading(ctx));

    return { ...market, liquidity, tradingEnabledAt: blockNumber };
}
