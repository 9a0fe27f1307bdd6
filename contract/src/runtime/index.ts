export { Blockchain } from './Blockchain.js';
export type { BlockchainOptions, CallContext, Receipt } from './Blockchain.js';
export { Contract } from './Contract.js';
export { NetEvent } from './NetEvent.js';
export type { EventData, EventLog, EventValue } from './NetEvent.js';
export { Revert, describeRevert } from './Revert.js';
export type { RevertKind } from './Revert.js';
export { SafeMath, U256_MAX, requireU256 } from './SafeMath.js';
export {
    AddressBooleanMap,
    AddressMemoryMap,
    KeyedAddressMap,
    MapOfMap,
    Storage,
    StoredAddress,
    StoredBoolean,
    StoredString,
    StoredU256,
} from './storage.js';
export type { StorageSnapshot } from './storage.js';
