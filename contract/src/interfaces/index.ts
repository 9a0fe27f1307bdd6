export { isPairFactory } from './IPairFactory.js';
export type { IPairFactory } from './IPairFactory.js';
export { isRouter } from './IRouter.js';
export type { AddLiquidityResult, IRouter } from './IRouter.js';
export { isToken } from './IToken.js';
export type { IToken } from './IToken.js';
