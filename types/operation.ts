import type { Address, Hex } from "viem";

export type Operation =
    | { type: "SetTreasury"; treasury: Address }
    | { type: "SetFees"; buyFee: bigint; sellFee: bigint }
    | { type: "SetLimits"; maxTransaction: bigint; maxWallet: bigint; maxSell: bigint }
    | { type: "PermanentTradingEnable" }
    | { type: "EmergencyPause" }
    | { type: "EmergencyUnpause" };

export type OperationType = Operation["type"];

export interface EncodedOperation {
    kind: Hex;
    data: Hex;
}

export interface OperationInfo {
    id: Hex;
    kind: Hex;
    data: Hex;
    createdAt: bigint;
    signatures: number;
    signers: Address[];
    executed: boolean;
}
