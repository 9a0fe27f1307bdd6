import type { Address } from 'viem';

export type EventValue = bigint | boolean | string;

export type EventData = Readonly<Record<string, EventValue>>;

/**
 * A notification emitted by a contract. Subclasses fix the name and the
 * shape of the data.
 */
export class NetEvent<TName extends string = string, TData extends EventData = EventData> {
    public constructor(
        public readonly name: TName,
        public readonly data: TData,
    ) {}
}

/** An event together with the contract that emitted it. */
export interface EventLog {
    readonly address: Address;
    readonly event: NetEvent;
}
