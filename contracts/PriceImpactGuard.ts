import { type Address, isAddressEqual } from "viem";
import { FEE_DENOMINATOR, IMPACT_DENOMINATOR, PRICE_PRECISION } from "../constants/contracts";
import { Log } from "../utils/log";
import { revert } from "./errors";
import type { Journal } from "./Journal";
import { type EventSink, StatefulModule } from "./StatefulModule";

/** Read-only view of the liquidity pool the token trades against. */
export interface PriceOracle {
    reserves(): readonly [bigint, bigint];
    firstAsset(): Address;
}

export interface OrientedReserves {
    token: bigint;
    counter: bigint;
}

interface GuardState {
    maxPriceImpact: bigint;
    oracle: PriceOracle | null;
}

/** Fails unless `maxPriceImpact` lies in (0, IMPACT_DENOMINATOR]. */
export const validateMaxPriceImpact = (maxPriceImpact: bigint) => {
    if (maxPriceImpact <= 0n || maxPriceImpact > IMPACT_DENOMINATOR) revert("LimitOutOfRange");
};

export class PriceImpactGuard extends StatefulModule<GuardState> {
    constructor(
        journal: Journal,
        private readonly token: Address,
        private readonly emit: EventSink,
        maxPriceImpact: bigint,
    ) {
        super(journal, { maxPriceImpact, oracle: null });
    }

    get maxPriceImpact() {
        return this.state.maxPriceImpact;
    }

    setOracle(oracle: PriceOracle | null) {
        this.update("oracle", oracle);
        this.emit({ name: "PriceOracleUpdated", args: { enabled: oracle !== null } });
    }

    setMaxPriceImpact(maxPriceImpact: bigint) {
        validateMaxPriceImpact(maxPriceImpact);
        this.update("maxPriceImpact", maxPriceImpact);
        this.emit({ name: "MaxPriceImpactUpdated", args: { maxPriceImpact } });
    }

    reserves(): OrientedReserves | null {
        const { oracle } = this.state;
        if (!oracle) return null;
        const [reserveA, reserveB] = oracle.reserves();
        return isAddressEqual(oracle.firstAsset(), this.token)
            ? { token: reserveA, counter: reserveB }
            : { token: reserveB, counter: reserveA };
    }

    /** Counter-asset per token, scaled by PRICE_PRECISION. 0 when unknown. */
    price() {
        const reserves = this.reserves();
        if (!reserves || reserves.token === 0n) return 0n;
        return (reserves.counter * PRICE_PRECISION) / reserves.token;
    }

    /**
     * Impact of the trade on the relevant side of the pool, in parts per
     * IMPACT_DENOMINATOR. `rate` is the fee rate charged on the trade.
     */
    impactOf(amount: bigint, rate: bigint, isSell: boolean) {
        const reserves = this.reserves();
        if (!reserves) return 0n;
        const reserve = isSell ? reserves.token : reserves.counter;
        if (reserve === 0n) return 0n;
        const amountAfterFee = (amount * (FEE_DENOMINATOR - rate)) / FEE_DENOMINATOR;
        return (amountAfterFee * IMPACT_DENOMINATOR) / reserve;
    }

    check(trader: Address, amount: bigint, rate: bigint, isSell: boolean) {
        const impact = this.impactOf(amount, rate, isSell);
        if (impact > this.state.maxPriceImpact) revert("PriceImpactTooHigh");
        if (impact > this.state.maxPriceImpact / 2n) {
            Log.dev(`High price impact: ${trader} moved the pool by ${impact}/${IMPACT_DENOMINATOR}`);
            this.emit({ name: "HighPriceImpact", args: { trader, impact } });
        }
        return impact;
    }
}
