import { SafeMath } from './runtime/index.js';

export interface TaxRates {
    readonly buyTax: bigint;
    readonly sellTax: bigint;
    readonly devFee: bigint;
}

/** How a single taxed transfer is divided. `tax = dev + marketing + liquidity`. */
export interface TaxSplit {
    readonly tax: bigint;
    readonly dev: bigint;
    readonly marketing: bigint;
    readonly liquidity: bigint;
    readonly net: bigint;
}

export type TransferDirection = 'buy' | 'sell' | 'transfer';

/**
 * Divide `amount` taxed at `rate` percent.
 *
 * The dev share is scaled by the larger of the two configured rates, not by
 * the rate applied to this transfer, so buys and sells yield different dev
 * shares when the rates differ. Marketing takes the lower half of what
 * remains and liquidity absorbs the rounding remainder.
 */
export function computeTaxSplit(amount: bigint, rate: bigint, rates: TaxRates): TaxSplit {
    const tax = SafeMath.div(SafeMath.mul(amount, rate), 100n);
    if (tax === 0n) {
        return { tax: 0n, dev: 0n, marketing: 0n, liquidity: 0n, net: amount };
    }

    const devDenominator = SafeMath.max(rates.buyTax, rates.sellTax);
    const dev = SafeMath.div(SafeMath.mul(tax, rates.devFee), devDenominator);
    const remaining = SafeMath.sub(tax, dev);
    const marketing = SafeMath.div(remaining, 2n);
    const liquidity = SafeMath.sub(remaining, marketing);

    return {
        tax,
        dev,
        marketing,
        liquidity,
        net: SafeMath.sub(amount, tax),
    };
}

export function rateFor(direction: TransferDirection, rates: TaxRates): bigint {
    switch (direction) {
        case 'buy':
            return rates.buyTax;
        case 'sell':
            return rates.sellTax;
        case 'transfer':
            return 0n;
    }
}
