export interface Clock {
    /** Current ledger time, in seconds. */
    now(): bigint;
}

export class SystemClock implements Clock {
    now() {
        return BigInt(Math.floor(Date.now() / 1000));
    }
}

/**
 * Clock driven by hand, the in-process counterpart of `time.increase` on a
 * development network.
 */
export class ManualClock implements Clock {
    private timestamp: bigint;

    constructor(start: bigint = 1_700_000_000n) {
        this.timestamp = start;
    }

    now() {
        return this.timestamp;
    }

    increase(seconds: bigint) {
        this.timestamp += seconds;
        return this.timestamp;
    }
}
