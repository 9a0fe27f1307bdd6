import { isAddressEqual, type Address } from 'viem';

import type { Blockchain, CallContext } from './Blockchain.js';
import type { NetEvent } from './NetEvent.js';
import { Revert } from './Revert.js';
import { Storage } from './storage.js';

/**
 * Base class for every contract hosted by a {@link Blockchain}.
 *
 * Storage fields are declared by subclasses against `this.storage`; the host
 * snapshots that storage at the start of each outer transaction and restores
 * it if the transaction reverts.
 */
export abstract class Contract {
    public readonly storage: Storage = new Storage(() => this.chain.inTransaction);

    protected constructor(
        public readonly address: Address,
        protected readonly chain: Blockchain,
    ) {}

    /** Runs once, inside the deployment transaction. */
    public onDeployment(_ctx: CallContext): void {}

    /** Plain native-currency transfer with no calldata. */
    public receive(_ctx: CallContext): void {
        throw new Revert('Contract does not accept native currency', 'call');
    }

    protected emitEvent(event: NetEvent): void {
        this.chain.emit(this.address, event);
    }

    protected isSelf(account: Address): boolean {
        return isAddressEqual(account, this.address);
    }
}
