import dotenv from "dotenv";
dotenv.config();

export const DECIMALS = 18n;
export const UNIT = 10n ** DECIMALS;

// Token
export const INITIAL_SUPPLY = BigInt(process.env.INITIAL_SUPPLY || "10000000") * UNIT; // 10M
export const TREASURY_WALLET_ADDRESS = process.env.TREASURY_WALLET_ADDRESS || "";
export const OWNER_ADDRESS = process.env.OWNER_ADDRESS || "";

// Fees, in parts per FEE_DENOMINATOR
export const FEE_DENOMINATOR = 1000n;
export const BUY_FEE = 3n; // 0.3%
export const SELL_FEE = 8n; // 0.8%
export const MAX_FEE = 50n; // 5%

// Fee split, in percent of the collected fee
export const BURN_SHARE = 40n;
export const TREASURY_SHARE = 40n; // the reward pool gets the remainder

// Dynamic fee multiplier, 100 = 1x
export const BASE_MULTIPLIER = 100n;
export const MULTIPLIER_STEP = 20n;
export const MAX_DYNAMIC_FEE_MULTIPLIER = 200n;
export const VOLUME_THRESHOLD = BigInt(process.env.VOLUME_THRESHOLD || "100000") * UNIT;

// Limits, in percent of total supply
export const MAX_TRANSACTION_PERCENT = 1n;
export const MAX_WALLET_PERCENT = 2n;
export const MAX_SELL_PERCENT = 1n;
export const MAX_LIMIT_PERCENT = 5n;
export const MAX_DAILY_SELLS = 10n;

// Rewards
export const REWARD_THRESHOLD = BigInt(process.env.REWARD_THRESHOLD || "100") * UNIT;

// Price impact, in parts per IMPACT_DENOMINATOR
export const IMPACT_DENOMINATOR = 10000n;
export const MAX_PRICE_IMPACT = BigInt(process.env.MAX_PRICE_IMPACT || "500"); // 5%
export const PRICE_PRECISION = UNIT;

// Time, in seconds
export const DAY = 86400n;
export const ANTI_BOT_DURATION = 60n;
export const TRADE_COOLDOWN = 60n;
export const MIN_LOCK_DURATION = DAY;
export const MAX_LOCK_DURATION = 365n * DAY;

export const VERBOSE = (process.env.VERBOSE || "").toLowerCase() == "true";
