import type { Address, Hex } from "viem";
import type { OperationType } from "./operation";

export type TokenEvent =
    | { name: "Transfer"; args: { from: Address; to: Address; value: bigint } }
    | { name: "TradingEnabled"; args: { timestamp: bigint } }
    | { name: "TradingDisabled"; args: { timestamp: bigint } }
    | { name: "TokensBurned"; args: { from: Address; amount: bigint } }
    | { name: "RewardsDistributed"; args: { amount: bigint } }
    | { name: "RewardsClaimed"; args: { account: Address; amount: bigint } }
    | { name: "PairUpdated"; args: { pair: Address; value: boolean } }
    | { name: "FeesUpdated"; args: { buyFee: bigint; sellFee: bigint } }
    | {
          name: "LimitsUpdated";
          args: { maxTransaction: bigint; maxWallet: bigint; maxSell: bigint; maxDailySells: bigint };
      }
    | { name: "VolumeUpdated"; args: { day: bigint; volume: bigint } }
    | { name: "MultiplierUpdated"; args: { multiplier: bigint } }
    | { name: "LiquidityLocked"; args: { account: Address; amount: bigint; unlockTime: bigint } }
    | { name: "LiquidityUnlocked"; args: { account: Address; amount: bigint } }
    | { name: "TradeExecuted"; args: { trader: Address; amount: bigint; isBuy: boolean; price: bigint } }
    | { name: "HighPriceImpact"; args: { trader: Address; impact: bigint } }
    | { name: "PriceOracleUpdated"; args: { enabled: boolean } }
    | { name: "MaxPriceImpactUpdated"; args: { maxPriceImpact: bigint } }
    | { name: "OperationCreated"; args: { id: Hex; kind: OperationType; creator: Address } }
    | { name: "OperationSigned"; args: { id: Hex; signer: Address } }
    | { name: "OperationExecuted"; args: { id: Hex; kind: OperationType } }
    | { name: "OperationCancelled"; args: { id: Hex } }
    | { name: "BlacklistUpdated"; args: { account: Address; value: boolean } }
    | { name: "WhitelistUpdated"; args: { account: Address; value: boolean } }
    | { name: "SignerAdded"; args: { signer: Address } }
    | { name: "SignerRemoved"; args: { signer: Address } }
    | { name: "EmergencyPause"; args: { paused: boolean } }
    | { name: "TreasuryUpdated"; args: { account: Address } };

export type TokenEventName = TokenEvent["name"];

export type EventOf<N extends TokenEventName> = Extract<TokenEvent, { name: N }>;
