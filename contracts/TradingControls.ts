import { type Address, zeroAddress } from "viem";
import {
    ANTI_BOT_DURATION,
    DAY,
    MAX_LIMIT_PERCENT,
    MAX_WALLET_PERCENT,
    TRADE_COOLDOWN,
} from "../constants/contracts";
import type { Limits } from "../types/trade";
import type { BalanceLedger } from "./BalanceLedger";
import { revert } from "./errors";
import type { Journal } from "./Journal";
import { type EventSink, StatefulModule } from "./StatefulModule";

interface SellWindow {
    day: bigint;
    count: bigint;
}

interface ControlsState {
    tradingEnabled: boolean;
    tradingEnabledAt: bigint;
    tradingPermanentlyEnabled: boolean;
    paused: boolean;
    blacklist: Set<Address>;
    whitelist: Set<Address>;
    pairs: Set<Address>;
    limits: Limits;
    sells: Map<Address, SellWindow>;
    lastTrade: Map<Address, bigint>;
}

/**
 * Gate evaluated before any balance moves. Apart from the sell counters it
 * has no side effects.
 */
export class TradingControls extends StatefulModule<ControlsState> {
    constructor(
        journal: Journal,
        private readonly ledger: Pick<BalanceLedger, "balanceOf" | "totalSupply">,
        private readonly emit: EventSink,
        limits: Limits,
    ) {
        super(journal, {
            tradingEnabled: false,
            tradingEnabledAt: 0n,
            tradingPermanentlyEnabled: false,
            paused: false,
            blacklist: new Set(),
            whitelist: new Set(),
            pairs: new Set(),
            limits,
            sells: new Map(),
            lastTrade: new Map(),
        });
    }

    get tradingEnabled() {
        return this.state.tradingEnabled;
    }

    get tradingEnabledAt() {
        return this.state.tradingEnabledAt;
    }

    get tradingPermanentlyEnabled() {
        return this.state.tradingPermanentlyEnabled;
    }

    get paused() {
        return this.state.paused;
    }

    get limits(): Limits {
        return { ...this.state.limits };
    }

    isBlacklisted = (account: Address) => this.state.blacklist.has(account);

    isWhitelisted = (account: Address) => this.state.whitelist.has(account);

    isPair = (account: Address) => this.state.pairs.has(account);

    sellsToday(account: Address, now: bigint) {
        const window = this.state.sells.get(account);
        return window && window.day === now / DAY ? window.count : 0n;
    }

    enableTrading(now: bigint) {
        if (this.state.tradingEnabled) revert("TradingAlreadyEnabled");
        this.update("tradingEnabled", true);
        this.update("tradingEnabledAt", now);
        this.emit({ name: "TradingEnabled", args: { timestamp: now } });
    }

    disableTrading(now: bigint) {
        if (!this.state.tradingEnabled) revert("TradingNotEnabled");
        if (this.state.tradingPermanentlyEnabled) revert("TradingPermanentlyEnabled");
        this.update("tradingEnabled", false);
        this.emit({ name: "TradingDisabled", args: { timestamp: now } });
    }

    /** Opens trading (if still closed) and locks it open for good. */
    enableTradingPermanently(now: bigint) {
        if (!this.state.tradingEnabled) {
            this.enableTrading(now);
        }
        this.update("tradingPermanentlyEnabled", true);
    }

    pause() {
        if (this.state.paused) revert("AlreadyPaused");
        this.update("paused", true);
        this.emit({ name: "EmergencyPause", args: { paused: true } });
    }

    unpause() {
        if (!this.state.paused) revert("NotPaused");
        this.update("paused", false);
        this.emit({ name: "EmergencyPause", args: { paused: false } });
    }

    requireNotPaused() {
        if (this.state.paused) revert("Paused");
    }

    setBlacklist(account: Address, value: boolean) {
        this.toggle(this.state.blacklist, account, value);
        this.emit({ name: "BlacklistUpdated", args: { account, value } });
    }

    setWhitelist(account: Address, value: boolean) {
        this.toggle(this.state.whitelist, account, value);
        this.emit({ name: "WhitelistUpdated", args: { account, value } });
    }

    setPair(pair: Address, value: boolean) {
        if (pair === zeroAddress) revert("ZeroAddress");
        this.toggle(this.state.pairs, pair, value);
        this.emit({ name: "PairUpdated", args: { pair, value } });
    }

    setLimits(maxTransaction: bigint, maxWallet: bigint, maxSell: bigint) {
        const ceiling = (this.ledger.totalSupply() * MAX_LIMIT_PERCENT) / 100n;
        for (const limit of [maxTransaction, maxWallet, maxSell]) {
            if (limit <= 0n || limit > ceiling) revert("LimitOutOfRange");
        }
        this.applyLimits({
            ...this.state.limits,
            maxTransactionAmount: maxTransaction,
            maxWalletAmount: maxWallet,
            maxSellAmount: maxSell,
        });
    }

    setMaxDailySells(maxDailySells: bigint) {
        if (maxDailySells <= 0n) revert("LimitOutOfRange");
        this.applyLimits({ ...this.state.limits, maxDailySells });
    }

    private applyLimits(limits: Limits) {
        this.update("limits", limits);
        this.emit({
            name: "LimitsUpdated",
            args: {
                maxTransaction: limits.maxTransactionAmount,
                maxWallet: limits.maxWalletAmount,
                maxSell: limits.maxSellAmount,
                maxDailySells: limits.maxDailySells,
            },
        });
    }

    private toggle(set: Set<Address>, account: Address, value: boolean) {
        if (value) {
            this.journal.add(set, account);
        } else {
            this.journal.remove(set, account);
        }
    }

    /**
     * Fails the transfer if any trading rule forbids it. The max-transaction
     * cap covers every transfer towards a non-whitelisted recipient; the
     * remaining rules only apply when neither side is whitelisted.
     */
    check(sender: Address, recipient: Address, amount: bigint, now: bigint) {
        const { limits } = this.state;

        if (this.isBlacklisted(sender) || this.isBlacklisted(recipient)) revert("Blacklisted");

        const senderWhitelisted = this.isWhitelisted(sender);
        const recipientWhitelisted = this.isWhitelisted(recipient);

        if (!senderWhitelisted && !recipientWhitelisted && !this.state.tradingEnabled) revert("TradingDisabled");

        if (!recipientWhitelisted && amount > limits.maxTransactionAmount) revert("ExceedsMaxTransaction");

        if (senderWhitelisted || recipientWhitelisted) return;

        if (now < this.state.tradingEnabledAt + ANTI_BOT_DURATION) revert("AntiBotRestricted");

        const isBuy = this.isPair(sender);
        const trader = isBuy ? recipient : sender;
        const lastTrade = this.state.lastTrade.get(trader);
        if (lastTrade !== undefined && now < lastTrade + TRADE_COOLDOWN) revert("CooldownActive");

        if (this.isPair(recipient)) {
            if (amount > limits.maxSellAmount) revert("ExceedsMaxSell");

            const today = now / DAY;
            const window = this.state.sells.get(sender);
            const count = window && window.day === today ? window.count : 0n;
            if (count >= limits.maxDailySells) revert("DailySellLimitExceeded");
            this.journal.set(this.state.sells, sender, { day: today, count: count + 1n });
        } else if (this.ledger.balanceOf(recipient) + amount > limits.maxWalletAmount) {
            revert("ExceedsMaxWallet");
        }
    }

    /**
     * Hard wallet cap applied when balances move, a fixed share of the supply
     * no matter what the configurable max-wallet says.
     */
    enforceWalletCap(recipient: Address, credited: bigint) {
        if (this.isPair(recipient) || this.isWhitelisted(recipient)) return;
        const cap = (this.ledger.totalSupply() * MAX_WALLET_PERCENT) / 100n;
        if (this.ledger.balanceOf(recipient) + credited > cap) revert("ExceedsMaxWallet");
    }

    recordActivity(sender: Address, recipient: Address, now: bigint) {
        for (const account of [sender, recipient]) {
            if (!this.isPair(account)) {
                this.journal.set(this.state.lastTrade, account, now);
            }
        }
    }
}
