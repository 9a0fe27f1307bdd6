import { parseEther } from 'viem';

export const DECIMALS = 18;

/** 10^18 raw units per whole token. */
export const ONE_TOKEN: bigint = 10n ** BigInt(DECIMALS);

/** Deployment accepts 1 to 10^15 whole tokens. */
export const MIN_SUPPLY_TOKENS = 1n;
export const MAX_SUPPLY_TOKENS: bigint = 10n ** 15n;

// Percentages
export const MAX_BUY_TAX = 10n;
export const MAX_SELL_TAX = 15n;
export const MAX_DEV_FEE = 5n;

export const DEFAULT_BUY_TAX = 5n;
export const DEFAULT_SELL_TAX = 5n;
export const DEFAULT_DEV_FEE = 2n;

/** Native value that must accompany addLiquidity(). */
export const MIN_LIQUIDITY_VALUE: bigint = parseEther('0.5');
