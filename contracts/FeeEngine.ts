import { type Address, zeroAddress } from "viem";
import { BURN_SHARE, MAX_FEE, TREASURY_SHARE } from "../constants/contracts";
import { adjustedRate, debitFee } from "../utils/debit-fee";
import type { BalanceLedger } from "./BalanceLedger";
import { revert } from "./errors";
import type { Journal } from "./Journal";
import { type EventSink, StatefulModule } from "./StatefulModule";
import type { TradingControls } from "./TradingControls";

export interface FeeShares {
    burn: bigint;
    treasury: bigint;
    reward: bigint;
}

export interface FeeQuote {
    /** Multiplier-adjusted rate, in parts per FEE_DENOMINATOR */
    rate: bigint;
    fee: bigint;
    net: bigint;
}

interface FeeState {
    buyFee: bigint;
    sellFee: bigint;
    treasury: Address;
    totalBurned: bigint;
}

export const splitFee = (fee: bigint): FeeShares => {
    const burn = (fee * BURN_SHARE) / 100n;
    const treasury = (fee * TREASURY_SHARE) / 100n;
    return { burn, treasury, reward: fee - burn - treasury };
};

/** Fails unless both rates lie in [0, MAX_FEE]. */
export const validateFees = (buyFee: bigint, sellFee: bigint) => {
    if (buyFee < 0n || sellFee < 0n) revert("NegativeAmount");
    if (buyFee > MAX_FEE || sellFee > MAX_FEE) revert("FeeTooHigh");
};

export class FeeEngine extends StatefulModule<FeeState> {
    constructor(
        journal: Journal,
        private readonly ledger: BalanceLedger,
        private readonly controls: Pick<TradingControls, "isPair" | "isWhitelisted">,
        private readonly reserve: Address,
        private readonly emit: EventSink,
        initial: { buyFee: bigint; sellFee: bigint; treasury: Address },
    ) {
        super(journal, { ...initial, totalBurned: 0n });
    }

    get buyFee() {
        return this.state.buyFee;
    }

    get sellFee() {
        return this.state.sellFee;
    }

    get treasury() {
        return this.state.treasury;
    }

    get totalBurned() {
        return this.state.totalBurned;
    }

    setFees(buyFee: bigint, sellFee: bigint) {
        validateFees(buyFee, sellFee);
        this.update("buyFee", buyFee);
        this.update("sellFee", sellFee);
        this.emit({ name: "FeesUpdated", args: { buyFee, sellFee } });
    }

    setTreasury(treasury: Address) {
        if (treasury === zeroAddress) revert("ZeroAddress");
        this.update("treasury", treasury);
        this.emit({ name: "TreasuryUpdated", args: { account: treasury } });
    }

    rate(sender: Address, recipient: Address, multiplier: bigint) {
        if (this.controls.isWhitelisted(sender) || this.controls.isWhitelisted(recipient)) return 0n;

        let base = 0n;
        if (this.controls.isPair(sender)) {
            base = this.state.buyFee;
        } else if (this.controls.isPair(recipient)) {
            base = this.state.sellFee;
        }
        return adjustedRate(base, multiplier);
    }

    quote(sender: Address, recipient: Address, amount: bigint, multiplier: bigint): FeeQuote {
        const rate = this.rate(sender, recipient, multiplier);
        const net = debitFee(amount, rate);
        return { rate, fee: amount - net, net };
    }

    /**
     * Takes `fee` out of `sender`'s balance: 40% burned, 40% to the treasury,
     * the rest to the reserve account backing the reward pool.
     */
    collect(sender: Address, fee: bigint): FeeShares {
        const shares = splitFee(fee);
        if (fee === 0n) return shares;

        if (shares.burn > 0n) {
            this.ledger.burn(sender, shares.burn);
            this.update("totalBurned", this.state.totalBurned + shares.burn);
            this.emit({ name: "Transfer", args: { from: sender, to: zeroAddress, value: shares.burn } });
            this.emit({ name: "TokensBurned", args: { from: sender, amount: shares.burn } });
        }
        if (shares.treasury > 0n) {
            this.ledger.transfer(sender, this.state.treasury, shares.treasury);
            this.emit({ name: "Transfer", args: { from: sender, to: this.state.treasury, value: shares.treasury } });
        }
        if (shares.reward > 0n) {
            this.ledger.transfer(sender, this.reserve, shares.reward);
            this.emit({ name: "Transfer", args: { from: sender, to: this.reserve, value: shares.reward } });
            this.emit({ name: "RewardsDistributed", args: { amount: shares.reward } });
        }
        return shares;
    }
}
