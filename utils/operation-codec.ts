import {
    type Hex,
    decodeAbiParameters,
    encodeAbiParameters,
    getAddress,
    keccak256,
    parseAbiParameters,
} from "viem";
import {
    OP_EMERGENCY_PAUSE,
    OP_EMERGENCY_UNPAUSE,
    OP_ENABLE_TRADING,
    OP_SET_FEES,
    OP_SET_LIMITS,
    OP_SET_TREASURY,
} from "../constants/governance";
import { TokenError } from "../contracts/errors";
import type { EncodedOperation, Operation } from "../types/operation";

const TREASURY_PARAMS = parseAbiParameters("address");
const FEES_PARAMS = parseAbiParameters("uint256, uint256");
const LIMITS_PARAMS = parseAbiParameters("uint256, uint256, uint256");
const ID_PARAMS = parseAbiParameters("bytes32, bytes, uint256");

export const encodeOperation = (operation: Operation): EncodedOperation => {
    switch (operation.type) {
        case "SetTreasury":
            return { kind: OP_SET_TREASURY, data: encodeAbiParameters(TREASURY_PARAMS, [operation.treasury]) };
        case "SetFees":
            return { kind: OP_SET_FEES, data: encodeAbiParameters(FEES_PARAMS, [operation.buyFee, operation.sellFee]) };
        case "SetLimits":
            return {
                kind: OP_SET_LIMITS,
                data: encodeAbiParameters(LIMITS_PARAMS, [operation.maxTransaction, operation.maxWallet, operation.maxSell]),
            };
        case "PermanentTradingEnable":
            return { kind: OP_ENABLE_TRADING, data: "0x" };
        case "EmergencyPause":
            return { kind: OP_EMERGENCY_PAUSE, data: "0x" };
        case "EmergencyUnpause":
            return { kind: OP_EMERGENCY_UNPAUSE, data: "0x" };
    }
};

const decodePayload = (kind: Hex, data: Hex): Operation | null => {
    switch (kind) {
        case OP_SET_TREASURY: {
            const [treasury] = decodeAbiParameters(TREASURY_PARAMS, data);
            return { type: "SetTreasury", treasury: getAddress(treasury) };
        }
        case OP_SET_FEES: {
            const [buyFee, sellFee] = decodeAbiParameters(FEES_PARAMS, data);
            return { type: "SetFees", buyFee, sellFee };
        }
        case OP_SET_LIMITS: {
            const [maxTransaction, maxWallet, maxSell] = decodeAbiParameters(LIMITS_PARAMS, data);
            return { type: "SetLimits", maxTransaction, maxWallet, maxSell };
        }
        case OP_ENABLE_TRADING:
            return data === "0x" ? { type: "PermanentTradingEnable" } : null;
        case OP_EMERGENCY_PAUSE:
            return data === "0x" ? { type: "EmergencyPause" } : null;
        case OP_EMERGENCY_UNPAUSE:
            return data === "0x" ? { type: "EmergencyUnpause" } : null;
        default:
            return null;
    }
};

/** Turns a stored (kind, payload) pair back into an operation. */
export const decodeOperation = (kind: Hex, data: Hex): Operation => {
    let operation: Operation | null;
    try {
        operation = decodePayload(kind, data);
    } catch (error) {
        throw new TokenError("UnknownOperation", { cause: error });
    }
    if (!operation) throw new TokenError("UnknownOperation");
    return operation;
};

export const getOperationId = (kind: Hex, data: Hex, createdAt: bigint): Hex =>
    keccak256(encodeAbiParameters(ID_PARAMS, [kind, data, createdAt]));
