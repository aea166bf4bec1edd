import type { Address } from "viem";
import { DAY } from "../constants/contracts";
import type { TradeRecord } from "../types/trade";
import type { Journal } from "./Journal";
import { type EventSink, StatefulModule } from "./StatefulModule";

interface AnalyticsState {
    history: Map<Address, TradeRecord[]>;
    tradeCounts: Map<Address, bigint>;
    dailyVolume: Map<bigint, bigint>;
    totalTrades: bigint;
}

/** Trade log and volume counters. */
export class TradeAnalytics extends StatefulModule<AnalyticsState> {
    constructor(
        journal: Journal,
        private readonly emit: EventSink,
    ) {
        super(journal, { history: new Map(), tradeCounts: new Map(), dailyVolume: new Map(), totalTrades: 0n });
    }

    get totalTrades() {
        return this.state.totalTrades;
    }

    volumeOn(day: bigint) {
        return this.state.dailyVolume.get(day) ?? 0n;
    }

    tradeCountOf(account: Address) {
        return this.state.tradeCounts.get(account) ?? 0n;
    }

    record(trader: Address, trade: TradeRecord) {
        let records = this.state.history.get(trader);
        if (!records) {
            records = [];
            this.journal.set(this.state.history, trader, records);
        }
        this.journal.push(records, trade);
        this.journal.set(this.state.tradeCounts, trader, this.tradeCountOf(trader) + 1n);
        this.update("totalTrades", this.state.totalTrades + 1n);

        const day = trade.timestamp / DAY;
        const volume = this.volumeOn(day) + trade.amount;
        this.journal.set(this.state.dailyVolume, day, volume);

        this.emit({ name: "VolumeUpdated", args: { day, volume } });
        this.emit({
            name: "TradeExecuted",
            args: { trader, amount: trade.amount, isBuy: trade.isBuy, price: trade.price },
        });
    }

    /** The `limit` most recent trades of `account`, oldest first. */
    historyOf(account: Address, limit: number): TradeRecord[] {
        const records = this.state.history.get(account) ?? [];
        if (limit <= 0) return [];
        return records.slice(-limit).map((trade) => ({ ...trade }));
    }

    /** Volume of the last `days` days, today first. */
    volumes(now: bigint, days: number): bigint[] {
        const today = now / DAY;
        return Array.from({ length: Math.max(days, 0) }, (_, i) => {
            const day = today - BigInt(i);
            return day < 0n ? 0n : this.volumeOn(day);
        });
    }
}
