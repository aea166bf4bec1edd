export type TokenErrorReason =
    // access
    | "NotOwner"
    | "NotSigner"
    // input
    | "ZeroAddress"
    | "ZeroAmount"
    | "NegativeAmount"
    | "FeeTooHigh"
    | "LimitOutOfRange"
    | "InvalidDuration"
    | "UnknownOperation"
    | "CannotBlacklist"
    | "MaxSignersReached"
    | "BelowQuorum"
    | "SignerExists"
    | "SignerNotFound"
    // state
    | "NotFound"
    | "AlreadyExists"
    | "AlreadyExecuted"
    | "AlreadySigned"
    | "Expired"
    | "InsufficientSignatures"
    | "TimelockActive"
    | "TradingAlreadyEnabled"
    | "TradingNotEnabled"
    | "TradingPermanentlyEnabled"
    | "Paused"
    | "AlreadyPaused"
    | "NotPaused"
    | "LockNotFound"
    | "AlreadyClaimed"
    | "LockActive"
    | "ReentrantCall"
    // economic guards
    | "InsufficientBalance"
    | "Blacklisted"
    | "TradingDisabled"
    | "AntiBotRestricted"
    | "CooldownActive"
    | "ExceedsMaxTransaction"
    | "ExceedsMaxWallet"
    | "ExceedsMaxSell"
    | "DailySellLimitExceeded"
    | "PriceImpactTooHigh"
    | "NoPoints"
    | "EmptyPool"
    | "RewardTooSmall";

export class TokenError extends Error {
    readonly reason: TokenErrorReason;

    constructor(reason: TokenErrorReason, options?: ErrorOptions) {
        super(reason, options);
        this.name = "TokenError";
        this.reason = reason;
    }
}

export function revert(reason: TokenErrorReason): never {
    throw new TokenError(reason);
}

/** Fails with `ZeroAmount` or `NegativeAmount` unless `amount` is positive. */
export function requirePositive(amount: bigint) {
    if (amount === 0n) revert("ZeroAmount");
    if (amount < 0n) revert("NegativeAmount");
}

export const isTokenError = (error: unknown, reason?: TokenErrorReason): error is TokenError =>
    error instanceof TokenError && (reason === undefined || error.reason === reason);
