import type { Address } from "viem";
import type { BalanceLedger } from "./BalanceLedger";
import { revert } from "./errors";
import type { Journal } from "./Journal";
import { type EventSink, StatefulModule } from "./StatefulModule";

interface RewardState {
    points: Map<Address, bigint>;
    pool: bigint;
}

/**
 * Points-based share of the reward pool. Claims are priced against the points
 * currently held by registered holders, recomputed on every claim, so the
 * order in which holders claim changes what each of them gets.
 */
export class RewardDistributor extends StatefulModule<RewardState> {
    constructor(
        journal: Journal,
        private readonly ledger: BalanceLedger,
        private readonly reserve: Address,
        private readonly threshold: bigint,
        private readonly emit: EventSink,
    ) {
        super(journal, { points: new Map(), pool: 0n });
    }

    get rewardThreshold() {
        return this.threshold;
    }

    get poolBalance() {
        return this.state.pool;
    }

    pointsOf(account: Address) {
        return this.state.points.get(account) ?? 0n;
    }

    totalPoints(holders: readonly Address[]) {
        return holders.reduce((sum, holder) => sum + this.pointsOf(holder), 0n);
    }

    accrue(account: Address, amount: bigint) {
        if (amount < this.threshold) return;
        this.journal.set(this.state.points, account, this.pointsOf(account) + amount / this.threshold);
    }

    deposit(amount: bigint) {
        this.update("pool", this.state.pool + amount);
    }

    claim(account: Address, holders: readonly Address[]) {
        const points = this.pointsOf(account);
        if (points === 0n) revert("NoPoints");
        if (this.state.pool === 0n) revert("EmptyPool");

        const total = this.totalPoints(holders);
        const reward = total === 0n ? 0n : (this.state.pool * points) / total;
        if (reward === 0n) revert("RewardTooSmall");
        // claimants who left the registry still hold points that `total` leaves out
        if (reward > this.state.pool) revert("InsufficientBalance");

        this.journal.set(this.state.points, account, 0n);
        this.update("pool", this.state.pool - reward);
        this.ledger.transfer(this.reserve, account, reward);
        this.emit({ name: "Transfer", args: { from: this.reserve, to: account, value: reward } });
        this.emit({ name: "RewardsClaimed", args: { account, amount: reward } });
        return reward;
    }
}
