import { getAddress, isAddress, parseEther, type Address } from 'viem';
import { z } from 'zod';

import { MAX_SUPPLY_TOKENS, MIN_LIQUIDITY_VALUE, MIN_SUPPLY_TOKENS } from '../../contract/src/index.js';

export class ConfigError extends Error {
    public constructor(public readonly issues: readonly string[]) {
        super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
        this.name = 'ConfigError';
    }
}

const address = z
    .string()
    .trim()
    .refine((value) => isAddress(value, { strict: false }), { message: 'must be a 20-byte hex address' })
    .transform((value): Address => getAddress(value));

const wholeTokens = z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a whole number of tokens')
    .transform((value) => BigInt(value));

const supplyRange = `must be between ${MIN_SUPPLY_TOKENS} and ${MAX_SUPPLY_TOKENS}`;
const supply = wholeTokens.pipe(z.bigint().min(MIN_SUPPLY_TOKENS, supplyRange).max(MAX_SUPPLY_TOKENS, supplyRange));

const nativeAmount = z
    .string()
    .trim()
    .regex(/^\d+(\.\d{1,18})?$/, 'must be a decimal amount in ether units')
    .transform((value) => parseEther(value))
    .pipe(z.bigint().min(MIN_LIQUIDITY_VALUE, 'must be at least 0.5'));

const envSchema = z.object({
    TOKEN_NAME: z.string().trim().min(1).max(64),
    TOKEN_SYMBOL: z.string().trim().min(1).max(11),
    TOTAL_SUPPLY: supply,
    DEV_WALLET: address,
    MARKETING_WALLET: address,
    LIQUIDITY_WALLET: address,
    DEPLOYER_ADDRESS: address,
    LIQUIDITY_TOKENS: wholeTokens,
    LIQUIDITY_NATIVE: nativeAmount,
    SIMULATION_ROUNDS: z.coerce.number().int().min(1).max(1_000).default(10),
});

export interface AppConfig {
    readonly token: {
        readonly name: string;
        readonly symbol: string;
        readonly totalSupply: bigint;
        readonly devWallet: Address;
        readonly marketingWallet: Address;
        readonly liquidityWallet: Address;
    };
    readonly deployer: Address;
    /** Whole tokens moved to the contract and paired on deployment. */
    readonly liquidityTokens: bigint;
    /** Wei sent with addLiquidity(). */
    readonly liquidityNative: bigint;
    readonly simulationRounds: number;
}

/**
 * Validate the environment (normally `process.env` after `dotenv/config`).
 * Every problem is reported at once.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
    }

    const cfg = parsed.data;
    if (cfg.LIQUIDITY_TOKENS > cfg.TOTAL_SUPPLY) {
        throw new ConfigError(['LIQUIDITY_TOKENS: cannot exceed TOTAL_SUPPLY']);
    }

    return {
        token: {
            name: cfg.TOKEN_NAME,
            symbol: cfg.TOKEN_SYMBOL,
            totalSupply: cfg.TOTAL_SUPPLY,
            devWallet: cfg.DEV_WALLET,
            marketingWallet: cfg.MARKETING_WALLET,
            liquidityWallet: cfg.LIQUIDITY_WALLET,
        },
        deployer: cfg.DEPLOYER_ADDRESS,
        liquidityTokens: cfg.LIQUIDITY_TOKENS,
        liquidityNative: cfg.LIQUIDITY_NATIVE,
        simulationRounds: cfg.SIMULATION_ROUNDS,
    };
}
