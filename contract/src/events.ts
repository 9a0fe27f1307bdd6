import type { Address } from 'viem';

import { NetEvent } from './runtime/index.js';

export class TransferEvent extends NetEvent<'Transfer', { from: Address; to: Address; value: bigint }> {
    public constructor(from: Address, to: Address, value: bigint) {
        super('Transfer', { from, to, value });
    }
}

export class ApprovalEvent extends NetEvent<'Approval', { owner: Address; spender: Address; value: bigint }> {
    public constructor(owner: Address, spender: Address, value: bigint) {
        super('Approval', { owner, spender, value });
    }
}

export class TradingEnabledEvent extends NetEvent<'TradingEnabled', { blockNumber: bigint; timestamp: bigint }> {
    public constructor(blockNumber: bigint, timestamp: bigint) {
        super('TradingEnabled', { blockNumber, timestamp });
    }
}

export class ExemptionUpdatedEvent extends NetEvent<'ExemptionUpdated', { account: Address; exempt: boolean }> {
    public constructor(account: Address, exempt: boolean) {
        super('ExemptionUpdated', { account, exempt });
    }
}

export class TaxRatesUpdatedEvent extends NetEvent<
    'TaxRatesUpdated',
    { buyTax: bigint; sellTax: bigint; devFee: bigint }
> {
    public constructor(buyTax: bigint, sellTax: bigint, devFee: bigint) {
        super('TaxRatesUpdated', { buyTax, sellTax, devFee });
    }
}

export class WalletsUpdatedEvent extends NetEvent<
    'WalletsUpdated',
    { devWallet: Address; marketingWallet: Address; liquidityWallet: Address }
> {
    public constructor(devWallet: Address, marketingWallet: Address, liquidityWallet: Address) {
        super('WalletsUpdated', { devWallet, marketingWallet, liquidityWallet });
    }
}

export class LiquidityAddedEvent extends NetEvent<
    'LiquidityAdded',
    { tokenAmount: bigint; nativeAmount: bigint; liquidity: bigint }
> {
    public constructor(tokenAmount: bigint, nativeAmount: bigint, liquidity: bigint) {
        super('LiquidityAdded', { tokenAmount, nativeAmount, liquidity });
    }
}
