import { isAddressEqual, zeroAddress, type Address } from 'viem';

import {
    DECIMALS,
    DEFAULT_BUY_TAX,
    DEFAULT_DEV_FEE,
    DEFAULT_SELL_TAX,
    MAX_BUY_TAX,
    MAX_DEV_FEE,
    MAX_SELL_TAX,
    MAX_SUPPLY_TOKENS,
    MIN_LIQUIDITY_VALUE,
    MIN_SUPPLY_TOKENS,
    ONE_TOKEN,
} from './constants.js';
import {
    ApprovalEvent,
    ExemptionUpdatedEvent,
    LiquidityAddedEvent,
    TaxRatesUpdatedEvent,
    TradingEnabledEvent,
    TransferEvent,
    WalletsUpdatedEvent,
} from './events.js';
import { isPairFactory, isRouter, type AddLiquidityResult } from './interfaces/index.js';
import {
    AddressBooleanMap,
    AddressMemoryMap,
    Contract,
    MapOfMap,
    Revert,
    SafeMath,
    StoredAddress,
    StoredBoolean,
    StoredString,
    StoredU256,
    U256_MAX,
    requireU256,
    type Blockchain,
    type CallContext,
} from './runtime/index.js';
import { computeTaxSplit, rateFor, type TaxRates, type TransferDirection } from './tax.js';

export interface MemeCoinParameters {
    readonly name: string;
    readonly symbol: string;
    /** Whole tokens; the raw supply is `totalSupply * 10^18`. */
    readonly totalSupply: bigint;
    readonly devWallet: Address;
    readonly marketingWallet: Address;
    readonly liquidityWallet: Address;
    readonly router: Address;
}

export interface TaxWallets {
    readonly devWallet: Address;
    readonly marketingWallet: Address;
    readonly liquidityWallet: Address;
}

/**
 * MemeCoin: fungible token with a buy/sell transfer tax and a one-way
 * trading gate, paired against native currency on an AMM.
 *
 * Every movement goes through `_transfer`, which in order:
 *   1. rejects the transfer while trading is disabled, unless the owner,
 *      the contract itself or an exempt account is involved;
 *   2. moves exempt transfers untaxed;
 *   3. classifies the transfer as a buy (from the pair), a sell (to the
 *      pair) or a plain transfer, ignoring router legs;
 *   4. splits the tax across the dev, marketing and liquidity wallets and
 *      credits the remainder to the recipient.
 *
 * The owner (deployer) is the only account that can enable trading, change
 * rates, wallets or exemptions, and seed liquidity.
 */
export class MemeCoin extends Contract {
    // ────────────────────────────────────────────────────────────────────
    //  STORAGE  (pointer allocation order is fixed)
    // ────────────────────────────────────────────────────────────────────

    // --- token metadata ---
    private readonly _name: StoredString = new StoredString(this.storage, this.storage.nextPointer);
    private readonly _symbol: StoredString = new StoredString(this.storage, this.storage.nextPointer);

    // --- ledger ---
    private readonly _totalSupply: StoredU256 = new StoredU256(this.storage, this.storage.nextPointer);
    private readonly _balances: AddressMemoryMap = new AddressMemoryMap(this.storage, this.storage.nextPointer);
    private readonly _allowances: MapOfMap = new MapOfMap(this.storage, this.storage.nextPointer);

    // --- access control & trading ---
    private readonly _owner: StoredAddress = new StoredAddress(this.storage, this.storage.nextPointer);
    private readonly _tradingEnabled: StoredBoolean = new StoredBoolean(this.storage, this.storage.nextPointer);
    private readonly _exempt: AddressBooleanMap = new AddressBooleanMap(this.storage, this.storage.nextPointer);

    // --- tax policy ---
    private readonly _buyTax: StoredU256 = new StoredU256(this.storage, this.storage.nextPointer);
    private readonly _sellTax: StoredU256 = new StoredU256(this.storage, this.storage.nextPointer);
    private readonly _devFee: StoredU256 = new StoredU256(this.storage, this.storage.nextPointer);
    private readonly _devWallet: StoredAddress = new StoredAddress(this.storage, this.storage.nextPointer);
    private readonly _marketingWallet: StoredAddress = new StoredAddress(this.storage, this.storage.nextPointer);
    private readonly _liquidityWallet: StoredAddress = new StoredAddress(this.storage, this.storage.nextPointer);

    // --- market ---
    private readonly _router: StoredAddress = new StoredAddress(this.storage, this.storage.nextPointer);
    private readonly _pair: StoredAddress = new StoredAddress(this.storage, this.storage.nextPointer);

    public constructor(
        address: Address,
        chain: Blockchain,
        private readonly deployment: MemeCoinParameters,
    ) {
        super(address, chain);
    }

    // ────────────────────────────────────────────────────────────────────
    //  LIFECYCLE
    // ────────────────────────────────────────────────────────────────────

    public override onDeployment(ctx: CallContext): void {
        const params = this.deployment;

        if (params.totalSupply < MIN_SUPPLY_TOKENS || params.totalSupply > MAX_SUPPLY_TOKENS) {
            throw new Revert('Supply out of range', 'validation');
        }
        this.requireWallets(params.devWallet, params.marketingWallet, params.liquidityWallet);
        if (isAddressEqual(params.router, zeroAddress)) {
            throw new Revert('Router is the zero address', 'validation');
        }

        this._name.set(params.name);
        this._symbol.set(params.symbol);
        this._owner.set(ctx.sender);

        // Entire supply to the deployer
        const supply = SafeMath.mul(params.totalSupply, ONE_TOKEN);
        this._totalSupply.set(supply);
        this._balances.set(ctx.sender, supply);
        this.emitEvent(new TransferEvent(zeroAddress, ctx.sender, supply));

        // Pool against the router's wrapped native asset
        this._router.set(params.router);
        const router = this.chain.resolve(params.router, isRouter);
        const factory = this.chain.resolve(router.factory(), isPairFactory);
        const wrappedNative = router.nativeWrappedAsset();
        const pair = this.chain.call(this.address, factory.address, 0n, (factoryCtx) =>
            factory.createPair(factoryCtx, this.address, wrappedNative),
        );
        this._pair.set(pair);

        this._buyTax.set(DEFAULT_BUY_TAX);
        this._sellTax.set(DEFAULT_SELL_TAX);
        this._devFee.set(DEFAULT_DEV_FEE);
        this._devWallet.set(params.devWallet);
        this._marketingWallet.set(params.marketingWallet);
        this._liquidityWallet.set(params.liquidityWallet);

        this._exempt.set(ctx.sender, true);
        this._exempt.set(this.address, true);
        this._exempt.set(params.devWallet, true);
        this._exempt.set(params.marketingWallet, true);
        this._exempt.set(params.liquidityWallet, true);
    }

    /** Unsolicited native currency is accepted as is. */
    public override receive(_ctx: CallContext): void {}

    // ════════════════════════════════════════════════════════════════════
    //  READ METHODS
    // ════════════════════════════════════════════════════════════════════

    public name(): string {
        return this._name.value;
    }

    public symbol(): string {
        return this._symbol.value;
    }

    public decimals(): number {
        return DECIMALS;
    }

    public totalSupply(): bigint {
        return this._totalSupply.value;
    }

    public balanceOf(owner: Address): bigint {
        return this._balances.get(owner);
    }

    public allowance(owner: Address, spender: Address): bigint {
        return this._allowances.get(owner, spender);
    }

    public owner(): Address {
        return this._owner.value;
    }

    public pair(): Address {
        return this._pair.value;
    }

    public router(): Address {
        return this._router.value;
    }

    public tradingEnabled(): boolean {
        return this._tradingEnabled.value;
    }

    public isExempt(account: Address): boolean {
        return this._exempt.get(account);
    }

    public taxRates(): TaxRates {
        return {
            buyTax: this._buyTax.value,
            sellTax: this._sellTax.value,
            devFee: this._devFee.value,
        };
    }

    public wallets(): TaxWallets {
        return {
            devWallet: this._devWallet.value,
            marketingWallet: this._marketingWallet.value,
            liquidityWallet: this._liquidityWallet.value,
        };
    }

    // ════════════════════════════════════════════════════════════════════
    //  TOKEN WRITE METHODS
    // ════════════════════════════════════════════════════════════════════

    public transfer(ctx: CallContext, to: Address, amount: bigint): boolean {
        requireU256(amount, 'Amount');
        this._transfer(ctx.sender, to, amount);
        return true;
    }

    public transferFrom(ctx: CallContext, from: Address, to: Address, amount: bigint): boolean {
        requireU256(amount, 'Amount');
        this._spendAllowance(from, ctx.sender, amount);
        this._transfer(from, to, amount);
        return true;
    }

    public approve(ctx: CallContext, spender: Address, amount: bigint): boolean {
        requireU256(amount, 'Amount');
        this._approve(ctx.sender, spender, amount);
        return true;
    }

    public increaseAllowance(ctx: CallContext, spender: Address, addedValue: bigint): boolean {
        requireU256(addedValue, 'Amount');
        const current = this._allowances.get(ctx.sender, spender);
        this._approve(ctx.sender, spender, SafeMath.add(current, addedValue));
        return true;
    }

    public decreaseAllowance(ctx: CallContext, spender: Address, subtractedValue: bigint): boolean {
        requireU256(subtractedValue, 'Amount');
        const current = this._allowances.get(ctx.sender, spender);
        if (current < subtractedValue) {
            throw new Revert('Allowance underflow', 'insufficient-balance');
        }
        this._approve(ctx.sender, spender, current - subtractedValue);
        return true;
    }

    // ════════════════════════════════════════════════════════════════════
    //  ADMIN (owner-only)
    // ════════════════════════════════════════════════════════════════════

    /** One-shot: once enabled, trading can never be disabled again. */
    public enableTrading(ctx: CallContext): void {
        this.onlyOwner(ctx.sender);
        if (this._tradingEnabled.value) {
            throw new Revert('Trading already enabled', 'state');
        }
        this._tradingEnabled.set(true);
        this.emitEvent(new TradingEnabledEvent(ctx.blockNumber, ctx.timestamp));
    }

    public setExempt(ctx: CallContext, account: Address, exempt: boolean): void {
        this.onlyOwner(ctx.sender);
        this._exempt.set(account, exempt);
        this.emitEvent(new ExemptionUpdatedEvent(account, exempt));
    }

    /**
     * Replace all three rates. Caps: buy 10, sell 15, dev 5. The dev fee is
     * not checked against the trade rates; a dev fee above the larger rate
     * makes taxed transfers revert on the split.
     */
    public updateTaxRates(ctx: CallContext, buyTax: bigint, sellTax: bigint, devFee: bigint): void {
        this.onlyOwner(ctx.sender);
        if (buyTax < 0n || sellTax < 0n || devFee < 0n) {
            throw new Revert('Tax rates cannot be negative', 'validation');
        }
        if (buyTax > MAX_BUY_TAX) throw new Revert('Buy tax exceeds 10%', 'validation');
        if (sellTax > MAX_SELL_TAX) throw new Revert('Sell tax exceeds 15%', 'validation');
        if (devFee > MAX_DEV_FEE) throw new Revert('Dev fee exceeds 5%', 'validation');

        this._buyTax.set(buyTax);
        this._sellTax.set(sellTax);
        this._devFee.set(devFee);
        this.emitEvent(new TaxRatesUpdatedEvent(buyTax, sellTax, devFee));
    }

    public updateWallets(
        ctx: CallContext,
        devWallet: Address,
        marketingWallet: Address,
        liquidityWallet: Address,
    ): void {
        this.onlyOwner(ctx.sender);
        this.requireWallets(devWallet, marketingWallet, liquidityWallet);

        this._devWallet.set(devWallet);
        this._marketingWallet.set(marketingWallet);
        this._liquidityWallet.set(liquidityWallet);
        this._exempt.set(devWallet, true);
        this._exempt.set(marketingWallet, true);
        this._exempt.set(liquidityWallet, true);
        this.emitEvent(new WalletsUpdatedEvent(devWallet, marketingWallet, liquidityWallet));
    }

    /**
     * Pair `tokenAmount` of the contract's own balance with the attached
     * native value. Both minimums passed to the router are zero: there is no
     * slippage protection. LP shares go to the owner.
     */
    public addLiquidity(ctx: CallContext, tokenAmount: bigint): AddLiquidityResult {
        this.onlyOwner(ctx.sender);
        requireU256(tokenAmount, 'Amount');
        if (ctx.value < MIN_LIQUIDITY_VALUE) {
            throw new Revert('Insufficient native value', 'validation');
        }

        const router = this.chain.resolve(this._router.value, isRouter);
        this._approve(this.address, router.address, tokenAmount);

        const result = this.chain.call(this.address, router.address, ctx.value, (routerCtx) =>
            router.addLiquidityWithNative(
                routerCtx,
                this.address,
                tokenAmount,
                0n,
                0n,
                this._owner.value,
                ctx.timestamp,
            ),
        );

        this.emitEvent(new LiquidityAddedEvent(result.amountToken, result.amountNative, result.liquidity));
        return result;
    }

    // ════════════════════════════════════════════════════════════════════
    //  INTERNAL: TRANSFER ENGINE
    // ════════════════════════════════════════════════════════════════════

    private _transfer(from: Address, to: Address, amount: bigint): void {
        if (isAddressEqual(from, zeroAddress)) {
            throw new Revert('Transfer from the zero address', 'validation');
        }
        if (isAddressEqual(to, zeroAddress)) {
            throw new Revert('Transfer to the zero address', 'validation');
        }

        const owner = this._owner.value;
        const fromExempt = this._exempt.get(from);
        const toExempt = this._exempt.get(to);

        if (
            !this._tradingEnabled.value &&
            !isAddressEqual(from, owner) &&
            !isAddressEqual(to, owner) &&
            !this.isSelf(from) &&
            !fromExempt &&
            !toExempt
        ) {
            throw new Revert('Trading not active', 'gate');
        }

        if (fromExempt || toExempt) {
            this._move(from, to, amount);
            return;
        }

        const rates = this.taxRates();
        const rate = rateFor(this._direction(from, to), rates);
        if (rate > 0n) {
            const split = computeTaxSplit(amount, rate, rates);
            if (split.tax > 0n) {
                this._move(from, this._devWallet.value, split.dev);
                this._move(from, this._marketingWallet.value, split.marketing);
                this._move(from, this._liquidityWallet.value, split.liquidity);
                this._move(from, to, split.net);
                return;
            }
        }

        this._move(from, to, amount);
    }

    /** Router legs (pair → router, router → pair) are never taxed. */
    private _direction(from: Address, to: Address): TransferDirection {
        const pair = this._pair.value;
        const router = this._router.value;
        if (isAddressEqual(from, pair) && !isAddressEqual(to, router)) return 'buy';
        if (isAddressEqual(to, pair) && !isAddressEqual(from, router)) return 'sell';
        return 'transfer';
    }

    private _move(from: Address, to: Address, amount: bigint): void {
        const fromBalance = this._balances.get(from);
        if (fromBalance < amount) {
            throw new Revert('Insufficient balance', 'insufficient-balance');
        }
        this._balances.set(from, fromBalance - amount);
        this._balances.set(to, SafeMath.add(this._balances.get(to), amount));
        this.emitEvent(new TransferEvent(from, to, amount));
    }

    private _approve(owner: Address, spender: Address, amount: bigint): void {
        if (isAddressEqual(spender, zeroAddress)) {
            throw new Revert('Approve to the zero address', 'validation');
        }
        this._allowances.set(owner, spender, amount);
        this.emitEvent(new ApprovalEvent(owner, spender, amount));
    }

    private _spendAllowance(owner: Address, spender: Address, amount: bigint): void {
        const current = this._allowances.get(owner, spender);
        // U256_MAX = unlimited allowance (skip deduction)
        if (current === U256_MAX) return;
        if (current < amount) {
            throw new Revert('Allowance exceeded', 'insufficient-balance');
        }
        this._allowances.set(owner, spender, current - amount);
    }

    // ════════════════════════════════════════════════════════════════════
    //  INTERNAL: ACCESS & VALIDATION
    // ════════════════════════════════════════════════════════════════════

    private onlyOwner(caller: Address): void {
        if (!isAddressEqual(caller, this._owner.value)) {
            throw new Revert('Caller is not the owner', 'unauthorized');
        }
    }

    private requireWallets(devWallet: Address, marketingWallet: Address, liquidityWallet: Address): void {
        if (
            isAddressEqual(devWallet, zeroAddress) ||
            isAddressEqual(marketingWallet, zeroAddress) ||
            isAddressEqual(liquidityWallet, zeroAddress)
        ) {
            throw new Revert('Wallet is the zero address', 'validation');
        }
    }
}
