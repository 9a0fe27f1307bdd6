export { LocalPair, MINIMUM_LIQUIDITY, isLocalPair } from './LocalPair.js';
export type { Reserves } from './LocalPair.js';
export { LocalPairFactory } from './LocalPairFactory.js';
export { LocalRouter, getAmountOut, quote } from './LocalRouter.js';
