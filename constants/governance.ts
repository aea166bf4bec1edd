import { keccak256, stringToHex } from "viem";
import { DAY } from "./contracts";

export const QUORUM = 2;
export const MAX_SIGNERS = 10;

export const TIMELOCK = DAY;
export const OPERATION_EXPIRY = 7n * DAY;

export const OP_SET_TREASURY = keccak256(stringToHex("SET_TREASURY"));
export const OP_SET_FEES = keccak256(stringToHex("SET_FEES"));
export const OP_SET_LIMITS = keccak256(stringToHex("SET_LIMITS"));
export const OP_ENABLE_TRADING = keccak256(stringToHex("ENABLE_TRADING"));
export const OP_EMERGENCY_PAUSE = keccak256(stringToHex("EMERGENCY_PAUSE"));
export const OP_EMERGENCY_UNPAUSE = keccak256(stringToHex("EMERGENCY_UNPAUSE"));
