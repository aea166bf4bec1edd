import { BASE_MULTIPLIER, FEE_DENOMINATOR } from "../constants/contracts";

/** What the recipient is credited once a fee of `rate` (per FEE_DENOMINATOR) is taken. */
export const debitFee = (amount: bigint, rate: bigint): bigint => {
  return amount - (amount * rate) / FEE_DENOMINATOR;
};

/** Fee rate after the dynamic multiplier (100 = 1x) is applied. */
export const adjustedRate = (rate: bigint, multiplier: bigint): bigint => (rate * multiplier) / BASE_MULTIPLIER;
