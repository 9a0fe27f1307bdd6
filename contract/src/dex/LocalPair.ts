import { zeroAddress, type Address } from 'viem';

import { isToken } from '../interfaces/index.js';
import {
    AddressMemoryMap,
    Contract,
    Revert,
    SafeMath,
    StoredU256,
    type Blockchain,
    type CallContext,
} from '../runtime/index.js';

/** LP shares burned on the first deposit so the pool can never be emptied. */
export const MINIMUM_LIQUIDITY = 1_000n;

export interface Reserves {
    readonly reserveToken: bigint;
    readonly reserveNative: bigint;
}

export function isLocalPair(contract: Contract): contract is LocalPair {
    return contract instanceof LocalPair;
}

/**
 * Constant-product pool of one token against native currency.
 *
 * Callers push assets in first, then call `mint` or `swap`; the pool reads
 * what arrived from its balances. The native side is held directly instead
 * of through a wrapped-native token.
 */
export class LocalPair extends Contract {
    private readonly _reserveToken: StoredU256 = new StoredU256(this.storage, this.storage.nextPointer);
    private readonly _reserveNative: StoredU256 = new StoredU256(this.storage, this.storage.nextPointer);
    private readonly _totalSupply: StoredU256 = new StoredU256(this.storage, this.storage.nextPointer);
    private readonly _shares: AddressMemoryMap = new AddressMemoryMap(this.storage, this.storage.nextPointer);

    public constructor(
        address: Address,
        chain: Blockchain,
        public readonly token: Address,
    ) {
        super(address, chain);
    }

    public override receive(_ctx: CallContext): void {}

    public getReserves(): Reserves {
        return {
            reserveToken: this._reserveToken.value,
            reserveNative: this._reserveNative.value,
        };
    }

    public totalSupply(): bigint {
        return this._totalSupply.value;
    }

    public balanceOf(owner: Address): bigint {
        return this._shares.get(owner);
    }

    /** Issues LP shares for whatever was deposited since the last update. */
    public mint(_ctx: CallContext, to: Address): bigint {
        const { reserveToken, reserveNative } = this.getReserves();
        const { balanceToken, balanceNative } = this.balances();
        const amountToken = SafeMath.sub(balanceToken, reserveToken);
        const amountNative = SafeMath.sub(balanceNative, reserveNative);

        const supply = this._totalSupply.value;
        let liquidity: bigint;
        if (supply === 0n) {
            liquidity = SafeMath.sqrt(SafeMath.mul(amountToken, amountNative));
            if (liquidity <= MINIMUM_LIQUIDITY) {
                throw new Revert('LocalPair: INSUFFICIENT_LIQUIDITY_MINTED', 'validation');
            }
            liquidity -= MINIMUM_LIQUIDITY;
            this.mintShares(zeroAddress, MINIMUM_LIQUIDITY);
        } else {
            liquidity = SafeMath.min(
                SafeMath.div(SafeMath.mul(amountToken, supply), reserveToken),
                SafeMath.div(SafeMath.mul(amountNative, supply), reserveNative),
            );
            if (liquidity === 0n) {
                throw new Revert('LocalPair: INSUFFICIENT_LIQUIDITY_MINTED', 'validation');
            }
        }

        this.mintShares(to, liquidity);
        this.update(balanceToken, balanceNative);
        return liquidity;
    }

    /**
     * Sends the requested outputs to `to`, then checks that the inputs that
     * arrived keep the product of reserves (after a 0.3% fee) from falling.
     */
    public swap(_ctx: CallContext, tokenOut: bigint, nativeOut: bigint, to: Address): void {
        if (tokenOut === 0n && nativeOut === 0n) {
            throw new Revert('LocalPair: INSUFFICIENT_OUTPUT_AMOUNT', 'validation');
        }
        const { reserveToken, reserveNative } = this.getReserves();
        if (tokenOut >= reserveToken || nativeOut >= reserveNative) {
            throw new Revert('LocalPair: INSUFFICIENT_LIQUIDITY', 'validation');
        }

        if (tokenOut > 0n) {
            const token = this.chain.resolve(this.token, isToken);
            this.chain.call(this.address, this.token, 0n, (ctx) => token.transfer(ctx, to, tokenOut));
        }
        if (nativeOut > 0n) {
            this.chain.callNative(this.address, to, nativeOut);
        }

        const { balanceToken, balanceNative } = this.balances();
        const tokenIn = balanceToken > reserveToken - tokenOut ? balanceToken - (reserveToken - tokenOut) : 0n;
        const nativeIn =
            balanceNative > reserveNative - nativeOut ? balanceNative - (reserveNative - nativeOut) : 0n;
        if (tokenIn === 0n && nativeIn === 0n) {
            throw new Revert('LocalPair: INSUFFICIENT_INPUT_AMOUNT', 'validation');
        }

        const adjustedToken = balanceToken * 1000n - tokenIn * 3n;
        const adjustedNative = balanceNative * 1000n - nativeIn * 3n;
        if (adjustedToken * adjustedNative < reserveToken * reserveNative * 1_000_000n) {
            throw new Revert('LocalPair: K', 'validation');
        }

        this.update(balanceToken, balanceNative);
    }

    private balances(): { balanceToken: bigint; balanceNative: bigint } {
        const token = this.chain.resolve(this.token, isToken);
        return {
            balanceToken: token.balanceOf(this.address),
            balanceNative: this.chain.balanceOf(this.address),
        };
    }

    private update(balanceToken: bigint, balanceNative: bigint): void {
        this._reserveToken.set(balanceToken);
        this._reserveNative.set(balanceNative);
    }

    private mintShares(to: Address, amount: bigint): void {
        this._totalSupply.set(SafeMath.add(this._totalSupply.value, amount));
        this._shares.set(to, SafeMath.add(this._shares.get(to), amount));
    }
}
