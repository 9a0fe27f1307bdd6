import { getAddress, getContractAddress, type Address } from 'viem';

import type { Contract } from './Contract.js';
import type { EventLog, NetEvent } from './NetEvent.js';
import { Revert } from './Revert.js';
import { SafeMath, requireU256 } from './SafeMath.js';
import type { StorageSnapshot } from './storage.js';

/**
 * What a contract method sees about the call it is serving. `sender` is the
 * immediate caller (an account or a contract); `origin` is the account that
 * signed the outer transaction.
 */
export interface CallContext {
    readonly sender: Address;
    readonly origin: Address;
    readonly value: bigint;
    readonly blockNumber: bigint;
    readonly timestamp: bigint;
}

export interface Receipt<T> {
    readonly blockNumber: bigint;
    readonly timestamp: bigint;
    readonly result: T;
    readonly events: readonly EventLog[];
}

export interface BlockchainOptions {
    /** Unix seconds of the first block. */
    readonly genesisTimestamp?: bigint;
    /** Seconds between consecutive blocks. */
    readonly blockTime?: bigint;
}

interface ChainSnapshot {
    readonly contracts: ReadonlyMap<Address, Contract>;
    readonly storage: ReadonlyMap<Address, StorageSnapshot>;
    readonly native: ReadonlyMap<Address, bigint>;
    readonly nonces: ReadonlyMap<Address, bigint>;
}

/**
 * In-process EVM-style host.
 *
 * Every outer transaction mines one block and commits all-or-nothing:
 * contract storage, native balances, deployments and events are restored
 * if anything throws before the outer call returns. Calls are strictly
 * sequential; contracts reach each other through {@link Blockchain.call}.
 */
export class Blockchain {
    private contracts: Map<Address, Contract> = new Map();
    private native: Map<Address, bigint> = new Map();
    private nonces: Map<Address, bigint> = new Map();

    private readonly blockTime: bigint;
    private currentBlock: bigint = 0n;
    private currentTimestamp: bigint;

    private depth: number = 0;
    private pendingEvents: EventLog[] = [];
    private origin: Address | undefined;

    public constructor(options: BlockchainOptions = {}) {
        this.blockTime = options.blockTime ?? 12n;
        this.currentTimestamp = options.genesisTimestamp ?? 1_700_000_000n;
    }

    // ────────────────────────────────────────────────────────────────────
    //  READS
    // ────────────────────────────────────────────────────────────────────

    public get blockNumber(): bigint {
        return this.currentBlock;
    }

    public get timestamp(): bigint {
        return this.currentTimestamp;
    }

    public balanceOf(account: Address): bigint {
        return this.native.get(getAddress(account)) ?? 0n;
    }

    /** True while an outer transaction is running. Storage is writable only then. */
    public get inTransaction(): boolean {
        return this.depth > 0;
    }

    public isContract(account: Address): boolean {
        return this.contracts.has(getAddress(account));
    }

    /**
     * Look up a deployed contract and narrow it to the interface the caller
     * expects. Reverts if nothing is deployed there or the guard rejects it.
     */
    public resolve<T extends Contract>(address: Address, guard: (contract: Contract) => contract is T): T {
        const contract = this.contracts.get(getAddress(address));
        if (contract === undefined) {
            throw new Revert(`No contract at ${address}`, 'call');
        }
        if (!guard(contract)) {
            throw new Revert(`Contract at ${address} does not implement the expected interface`, 'call');
        }
        return contract;
    }

    // ────────────────────────────────────────────────────────────────────
    //  TRANSACTIONS
    // ────────────────────────────────────────────────────────────────────

    /** Credit native currency outside of any transaction (genesis allocation). */
    public fund(account: Address, amount: bigint): void {
        requireU256(amount, 'Value');
        const key = getAddress(account);
        this.native.set(key, SafeMath.add(this.native.get(key) ?? 0n, amount));
    }

    /**
     * Run `fn` as an outer transaction signed by `from`, against `to`,
     * carrying `value` wei.
     */
    public execute<T>(from: Address, to: Address, value: bigint, fn: (ctx: CallContext) => T): Receipt<T> {
        if (this.depth > 0) {
            throw new Revert('execute() cannot be nested; use call()', 'call');
        }
        requireU256(value, 'Value');
        return this.transaction(from, () => this.call(from, to, value, fn));
    }

    /**
     * Cross-contract call inside the current transaction. `value` moves from
     * `from` to `to` before `fn` runs.
     */
    public call<T>(from: Address, to: Address, value: bigint, fn: (ctx: CallContext) => T): T {
        if (this.depth === 0 || this.origin === undefined) {
            throw new Revert('No active transaction', 'call');
        }
        requireU256(value, 'Value');
        this.moveNative(from, to, value);
        const ctx: CallContext = {
            sender: getAddress(from),
            origin: this.origin,
            value,
            blockNumber: this.currentBlock,
            timestamp: this.currentTimestamp,
        };
        this.depth++;
        try {
            return fn(ctx);
        } finally {
            this.depth--;
        }
    }

    /**
     * Send native currency. If the recipient is a contract its `receive`
     * hook runs and may reject the payment.
     */
    public transferNative(from: Address, to: Address, value: bigint): Receipt<void> {
        requireU256(value, 'Value');
        return this.transaction(from, () => this.callNative(from, to, value));
    }

    /** Nested form of {@link transferNative} for use by contracts. */
    public callNative(from: Address, to: Address, value: bigint): void {
        const target = this.contracts.get(getAddress(to));
        this.call(from, to, value, (ctx) => {
            target?.receive(ctx);
        });
    }

    /**
     * Deploy a contract. Its address is the CREATE address of the deployer
     * and the deployer's deployment nonce. Works both as an outer transaction
     * and nested inside one (a factory deploying a pair).
     */
    public deploy<T extends Contract>(
        deployer: Address,
        create: (address: Address) => T,
        init: (contract: T, ctx: CallContext) => void = (contract, ctx) => contract.onDeployment(ctx),
        value: bigint = 0n,
    ): Receipt<T> {
        requireU256(value, 'Value');
        const run = (): T => {
            const key = getAddress(deployer);
            const nonce = this.nonces.get(key) ?? 0n;
            this.nonces.set(key, nonce + 1n);

            const address = getContractAddress({ from: key, nonce });
            const contract = create(address);
            this.contracts.set(address, contract);
            this.call(deployer, address, value, (ctx) => init(contract, ctx));
            return contract;
        };

        if (this.depth > 0) {
            const result = run();
            return {
                blockNumber: this.currentBlock,
                timestamp: this.currentTimestamp,
                result,
                events: [],
            };
        }
        return this.transaction(deployer, run);
    }

    /** Called by {@link Contract.emitEvent}. */
    public emit(address: Address, event: NetEvent): void {
        if (this.depth === 0) {
            throw new Revert('Events can only be emitted inside a transaction', 'call');
        }
        this.pendingEvents.push({ address: getAddress(address), event });
    }

    // ────────────────────────────────────────────────────────────────────
    //  INTERNAL
    // ────────────────────────────────────────────────────────────────────

    private transaction<T>(origin: Address, body: () => T): Receipt<T> {
        this.currentBlock += 1n;
        this.currentTimestamp += this.blockTime;

        const snapshot = this.snapshot();
        this.origin = getAddress(origin);
        this.pendingEvents = [];
        this.depth = 1;

        try {
            const result = body();
            return {
                blockNumber: this.currentBlock,
                timestamp: this.currentTimestamp,
                result,
                events: this.pendingEvents,
            };
        } catch (err) {
            this.restore(snapshot);
            throw err;
        } finally {
            this.depth = 0;
            this.origin = undefined;
            this.pendingEvents = [];
        }
    }

    private moveNative(from: Address, to: Address, value: bigint): void {
        if (value === 0n) return;
        const source = getAddress(from);
        const target = getAddress(to);
        const balance = this.native.get(source) ?? 0n;
        if (balance < value) {
            throw new Revert('Insufficient native balance', 'insufficient-balance');
        }
        this.native.set(source, balance - value);
        this.native.set(target, SafeMath.add(this.native.get(target) ?? 0n, value));
    }

    private snapshot(): ChainSnapshot {
        const storage = new Map<Address, StorageSnapshot>();
        for (const [address, contract] of this.contracts) {
            storage.set(address, contract.storage.snapshot());
        }
        return {
            contracts: new Map(this.contracts),
            storage,
            native: new Map(this.native),
            nonces: new Map(this.nonces),
        };
    }

    private restore(snapshot: ChainSnapshot): void {
        this.contracts = new Map(snapshot.contracts);
        for (const [address, contract] of this.contracts) {
            const saved = snapshot.storage.get(address);
            if (saved !== undefined) {
                contract.storage.restore(saved);
            }
        }
        this.native = new Map(snapshot.native);
        this.nonces = new Map(snapshot.nonces);
    }
}
