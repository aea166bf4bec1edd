export { FeeToken, type FeeTokenConfig } from "./FeeToken";
export { type BalanceLedger, InMemoryLedger } from "./BalanceLedger";
export { type LiquidityToken } from "./LiquidityLocker";
export { type PriceOracle } from "./PriceImpactGuard";
export { TokenError, type TokenErrorReason, isTokenError } from "./errors";
export { splitFee, type FeeShares, type FeeQuote } from "./FeeEngine";
export { encodeOperation, decodeOperation, getOperationId } from "../utils/operation-codec";
export { ManualClock, SystemClock, type Clock } from "../utils/clock";
export type { Operation, OperationInfo } from "../types/operation";
export type { TokenEvent, TokenEventName } from "../types/events";
export type { Limits, LiquidityLock, TradeRecord, Tokenomics } from "../types/trade";
