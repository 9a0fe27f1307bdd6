import { expect } from 'chai';
import { getAddress, numberToHex, parseEther, type Address } from 'viem';

import {
    Blockchain,
    ONE_TOKEN,
    Revert,
    deployLocalMarket,
    type LocalMarket,
    type LocalTokenParameters,
    type RevertKind,
} from '../src/index.js';

/** Deterministic checksummed address from a small integer. */
export function account(n: number): Address {
    return getAddress(numberToHex(BigInt(n), { size: 20 }));
}

export const DEPLOYER: Address = account(0xa1);
export const ALICE: Address = account(0xb1);
export const BOB: Address = account(0xb2);
export const DEV: Address = account(0xd1);
export const MARKETING: Address = account(0xd2);
export const LIQUIDITY: Address = account(0xd3);

export const TOKEN_PARAMS: LocalTokenParameters = {
    name: 'Test Meme',
    symbol: 'TMEME',
    totalSupply: 1_000_000n,
    devWallet: DEV,
    marketingWallet: MARKETING,
    liquidityWallet: LIQUIDITY,
};

export const DEPLOYER_FUNDS: bigint = parseEther('100');
export const SEED_TOKENS: bigint = 500_000n * ONE_TOKEN;
export const SEED_NATIVE: bigint = parseEther('10');

/** Factory, router and token deployed; no liquidity, trading disabled. */
export function deployFixture(overrides: Partial<LocalTokenParameters> = {}): LocalMarket {
    const chain = new Blockchain();
    chain.fund(DEPLOYER, DEPLOYER_FUNDS);
    return deployLocalMarket(chain, DEPLOYER, { ...TOKEN_PARAMS, ...overrides });
}

/** {@link deployFixture} plus seeded liquidity and trading enabled. */
export function launchedFixture(): LocalMarket {
    const market = deployFixture();
    const { chain, token } = market;
    chain.execute(DEPLOYER, token.address, 0n, (ctx) => token.transfer(ctx, token.address, SEED_TOKENS));
    chain.execute(DEPLOYER, token.address, SEED_NATIVE, (ctx) => token.addLiquidity(ctx, SEED_TOKENS));
    chain.execute(DEPLOYER, token.address, 0n, (ctx) => token.enableTrading(ctx));
    return market;
}

/** Runs `fn` and asserts it throws a {@link Revert} of the given kind (and message). */
export function expectRevert(fn: () => unknown, kind: RevertKind, message?: string): Revert {
    try {
        fn();
    } catch (err) {
        expect(err).to.be.instanceOf(Revert);
        if (!(err instanceof Revert)) throw err;
        expect(err.kind).to.equal(kind);
        if (message !== undefined) {
            expect(err.message).to.equal(message);
        }
        return err;
    }
    throw new Error('Expected the call to revert');
}
