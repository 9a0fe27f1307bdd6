export { MemeCoin } from './MemeCoin.js';
export type { MemeCoinParameters, TaxWallets } from './MemeCoin.js';
export * from './constants.js';
export * from './events.js';
export { computeTaxSplit, rateFor } from './tax.js';
export type { TaxRates, TaxSplit, TransferDirection } from './tax.js';
export { deployLocalMarket, LOCAL_WRAPPED_NATIVE } from './deployment.js';
export type { LocalMarket, LocalTokenParameters } from './deployment.js';
export * from './dex/index.js';
export * from './interfaces/index.js';
export * from './runtime/index.js';
