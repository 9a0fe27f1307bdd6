import type { Address } from 'viem';

import { LocalPairFactory, LocalRouter, isLocalPair, type LocalPair } from './dex/index.js';
import { MemeCoin, type MemeCoinParameters } from './MemeCoin.js';
import type { Blockchain } from './runtime/index.js';

/**
 * Key the local router reports as its wrapped native asset. Nothing is
 * deployed here; pairs hold native currency directly.
 */
export const LOCAL_WRAPPED_NATIVE: Address = '0x4200000000000000000000000000000000000006';

export type LocalTokenParameters = Omit<MemeCoinParameters, 'router'>;

export interface LocalMarket {
    readonly chain: Blockchain;
    readonly factory: LocalPairFactory;
    readonly router: LocalRouter;
    readonly token: MemeCoin;
    readonly pair: LocalPair;
}

/**
 * Deploy factory, router and token from `deployer`, in that order. The token
 * creates its own pair during deployment.
 */
export function deployLocalMarket(chain: Blockchain, deployer: Address, params: LocalTokenParameters): LocalMarket {
    const { result: factory } = chain.deploy(
        deployer,
        (address) => new LocalPairFactory(address, chain, LOCAL_WRAPPED_NATIVE),
    );
    const { result: router } = chain.deploy(
        deployer,
        (address) => new LocalRouter(address, chain, factory.address, LOCAL_WRAPPED_NATIVE),
    );
    const { result: token } = chain.deploy(
        deployer,
        (address) => new MemeCoin(address, chain, { ...params, router: router.address }),
    );
    const pair = chain.resolve(token.pair(), isLocalPair);

    return { chain, factory, router, token, pair };
}
