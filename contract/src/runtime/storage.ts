import { getAddress, isAddress, zeroAddress, type Address } from 'viem';

import { Revert } from './Revert.js';

type StorageValue = bigint | boolean | string;

export type StorageSnapshot = ReadonlyMap<string, StorageValue>;

/**
 * Sparse key/value storage of a single contract.
 *
 * Slots are addressed by a pointer (allocated in field declaration order
 * through `nextPointer`) plus an optional sub-key. An absent slot reads as
 * zero / false / the zero address. Writes are refused unless `writable`
 * reports an open transaction.
 */
export class Storage {
    private slots: Map<string, StorageValue> = new Map();
    private pointerCounter: number = 0;

    public constructor(private readonly writable: () => boolean) {}

    public get nextPointer(): number {
        return this.pointerCounter++;
    }

    public load(key: string): StorageValue | undefined {
        return this.slots.get(key);
    }

    public store(key: string, value: StorageValue): void {
        if (!this.writable()) {
            throw new Revert('Storage writes require an active transaction', 'call');
        }
        this.slots.set(key, value);
    }

    public snapshot(): StorageSnapshot {
        return new Map(this.slots);
    }

    public restore(snapshot: StorageSnapshot): void {
        this.slots = new Map(snapshot);
    }
}

function slotKey(pointer: number, subKey?: string): string {
    return subKey === undefined ? `${pointer}` : `${pointer}:${subKey}`;
}

function readU256(storage: Storage, key: string): bigint {
    const raw = storage.load(key);
    return typeof raw === 'bigint' ? raw : 0n;
}

export class StoredU256 {
    public constructor(
        private readonly storage: Storage,
        private readonly pointer: number,
    ) {}

    public get value(): bigint {
        return readU256(this.storage, slotKey(this.pointer));
    }

    public set(value: bigint): void {
        this.storage.store(slotKey(this.pointer), value);
    }
}

export class StoredBoolean {
    public constructor(
        private readonly storage: Storage,
        private readonly pointer: number,
    ) {}

    public get value(): boolean {
        return this.storage.load(slotKey(this.pointer)) === true;
    }

    public set(value: boolean): void {
        this.storage.store(slotKey(this.pointer), value);
    }
}

export class StoredString {
    public constructor(
        private readonly storage: Storage,
        private readonly pointer: number,
    ) {}

    public get value(): string {
        const raw = this.storage.load(slotKey(this.pointer));
        return typeof raw === 'string' ? raw : '';
    }

    public set(value: string): void {
        this.storage.store(slotKey(this.pointer), value);
    }
}

export class StoredAddress {
    public constructor(
        private readonly storage: Storage,
        private readonly pointer: number,
    ) {}

    public get value(): Address {
        const raw = this.storage.load(slotKey(this.pointer));
        return typeof raw === 'string' && isAddress(raw) ? raw : zeroAddress;
    }

    public set(value: Address): void {
        this.storage.store(slotKey(this.pointer), getAddress(value));
    }
}

/** address → u256 */
export class AddressMemoryMap {
    public constructor(
        private readonly storage: Storage,
        private readonly pointer: number,
    ) {}

    public get(owner: Address): bigint {
        return readU256(this.storage, slotKey(this.pointer, getAddress(owner)));
    }

    public set(owner: Address, value: bigint): void {
        this.storage.store(slotKey(this.pointer, getAddress(owner)), value);
    }
}

/** address → bool */
export class AddressBooleanMap {
    public constructor(
        private readonly storage: Storage,
        private readonly pointer: number,
    ) {}

    public get(owner: Address): boolean {
        return this.storage.load(slotKey(this.pointer, getAddress(owner))) === true;
    }

    public set(owner: Address, value: boolean): void {
        this.storage.store(slotKey(this.pointer, getAddress(owner)), value);
    }
}

/** string key → address, e.g. a factory's pair registry. */
export class KeyedAddressMap {
    public constructor(
        private readonly storage: Storage,
        private readonly pointer: number,
    ) {}

    public get(key: string): Address {
        const raw = this.storage.load(slotKey(this.pointer, key));
        return typeof raw === 'string' && isAddress(raw) ? raw : zeroAddress;
    }

    public set(key: string, value: Address): void {
        this.storage.store(slotKey(this.pointer, key), getAddress(value));
    }
}

/** (address, address) → u256, e.g. allowances. */
export class MapOfMap {
    public constructor(
        private readonly storage: Storage,
        private readonly pointer: number,
    ) {}

    public get(outer: Address, inner: Address): bigint {
        return readU256(this.storage, this.key(outer, inner));
    }

    public set(outer: Address, inner: Address, value: bigint): void {
        this.storage.store(this.key(outer, inner), value);
    }

    private key(outer: Address, inner: Address): string {
        return slotKey(this.pointer, `${getAddress(outer)}/${getAddress(inner)}`);
    }
}
