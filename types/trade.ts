import type { Address } from "viem";

export interface TradeRecord {
    timestamp: bigint;
    amount: bigint;
    isBuy: boolean;
    price: bigint;
}

export interface Limits {
    maxTransactionAmount: bigint;
    maxWalletAmount: bigint;
    maxSellAmount: bigint;
    maxDailySells: bigint;
}

export interface Tokenomics {
    maxSupply: bigint;
    totalSupply: bigint;
    buyFee: bigint;
    sellFee: bigint;
    dynamicFeeMultiplier: bigint;
    rewardPoolBalance: bigint;
    totalBurned: bigint;
    holderCount: number;
    treasuryWallet: Address;
    tradingEnabled: boolean;
    paused: boolean;
}

export interface LiquidityLock {
    amount: bigint;
    unlockTime: bigint;
    claimed: boolean;
}
