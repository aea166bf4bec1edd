import type { Address } from "viem";
import { MAX_LOCK_DURATION, MIN_LOCK_DURATION } from "../constants/contracts";
import type { LiquidityLock } from "../types/trade";
import { requirePositive, revert } from "./errors";
import type { Journal } from "./Journal";
import { type EventSink, StatefulModule } from "./StatefulModule";

/** The pool's LP token, an external ledger the locker escrows into. */
export interface LiquidityToken {
    transfer(from: Address, to: Address, amount: bigint): void;
    balanceOf(account: Address): bigint;
}

interface LockerState {
    locks: Map<Address, LiquidityLock[]>;
}

export class LiquidityLocker extends StatefulModule<LockerState> {
    constructor(
        journal: Journal,
        private readonly lpToken: LiquidityToken,
        private readonly escrow: Address,
        private readonly emit: EventSink,
    ) {
        super(journal, { locks: new Map() });
    }

    locksOf(account: Address): LiquidityLock[] {
        return (this.state.locks.get(account) ?? []).map((lock) => ({ ...lock }));
    }

    totalLocked() {
        let total = 0n;
        for (const locks of this.state.locks.values()) {
            for (const lock of locks) {
                if (!lock.claimed) total += lock.amount;
            }
        }
        return total;
    }

    lock(account: Address, amount: bigint, duration: bigint, now: bigint) {
        requirePositive(amount);
        if (duration < MIN_LOCK_DURATION || duration > MAX_LOCK_DURATION) revert("InvalidDuration");

        const unlockTime = now + duration;
        let locks = this.state.locks.get(account);
        if (!locks) {
            locks = [];
            this.journal.set(this.state.locks, account, locks);
        }
        this.journal.push(locks, { amount, unlockTime, claimed: false });
        this.emit({ name: "LiquidityLocked", args: { account, amount, unlockTime } });

        this.lpToken.transfer(account, this.escrow, amount);
        return locks.length - 1;
    }

    unlock(account: Address, index: number, now: bigint) {
        const lock = this.state.locks.get(account)?.[index];
        if (!lock) return revert("LockNotFound");
        if (lock.claimed) revert("AlreadyClaimed");
        if (now < lock.unlockTime) revert("LockActive");

        this.journal.assign(lock, "claimed", true);
        this.emit({ name: "LiquidityUnlocked", args: { account, amount: lock.amount } });

        this.lpToken.transfer(this.escrow, account, lock.amount);
        return lock.amount;
    }
}
