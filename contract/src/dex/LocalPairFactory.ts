import { getAddress, isAddressEqual, zeroAddress, type Address } from 'viem';

import type { IPairFactory } from '../interfaces/index.js';
import { Contract, KeyedAddressMap, Revert, type Blockchain, type CallContext } from '../runtime/index.js';
import { LocalPair } from './LocalPair.js';

function pairKey(tokenA: Address, tokenB: Address): string {
    const [first, second] = [getAddress(tokenA), getAddress(tokenB)].sort();
    return `${first}/${second}`;
}

/** Deploys one {@link LocalPair} per token, always against the native asset. */
export class LocalPairFactory extends Contract implements IPairFactory {
    private readonly _pairs: KeyedAddressMap = new KeyedAddressMap(this.storage, this.storage.nextPointer);

    public constructor(
        address: Address,
        chain: Blockchain,
        public readonly wrappedNative: Address,
    ) {
        super(address, chain);
    }

    public getPair(tokenA: Address, tokenB: Address): Address {
        return this._pairs.get(pairKey(tokenA, tokenB));
    }

    public createPair(_ctx: CallContext, tokenA: Address, tokenB: Address): Address {
        if (isAddressEqual(tokenA, tokenB)) {
            throw new Revert('LocalPairFactory: IDENTICAL_ADDRESSES', 'validation');
        }
        if (isAddressEqual(tokenA, zeroAddress) || isAddressEqual(tokenB, zeroAddress)) {
            throw new Revert('LocalPairFactory: ZERO_ADDRESS', 'validation');
        }

        let token: Address;
        if (isAddressEqual(tokenB, this.wrappedNative)) {
            token = tokenA;
        } else if (isAddressEqual(tokenA, this.wrappedNative)) {
            token = tokenB;
        } else {
            throw new Revert('LocalPairFactory: only native pairs are supported', 'validation');
        }

        const key = pairKey(tokenA, tokenB);
        if (!isAddressEqual(this._pairs.get(key), zeroAddress)) {
            throw new Revert('LocalPairFactory: PAIR_EXISTS', 'validation');
        }

        const { result: pair } = this.chain.deploy(this.address, (address) => new LocalPair(address, this.chain, token));
        this._pairs.set(key, pair.address);
        return pair.address;
    }
}
