import { type Address, type Hex, getAddress, zeroAddress } from "viem";
import {
    BUY_FEE,
    DAY,
    INITIAL_SUPPLY,
    MAX_DAILY_SELLS,
    MAX_PRICE_IMPACT,
    MAX_SELL_PERCENT,
    MAX_TRANSACTION_PERCENT,
    MAX_WALLET_PERCENT,
    REWARD_THRESHOLD,
    SELL_FEE,
    VOLUME_THRESHOLD,
} from "../constants/contracts";
import { MAX_SIGNERS } from "../constants/governance";
import type { EventOf, TokenEvent, TokenEventName } from "../types/events";
import type { Operation, OperationInfo } from "../types/operation";
import type { Limits, LiquidityLock, TradeRecord, Tokenomics } from "../types/trade";
import { type Clock, SystemClock } from "../utils/clock";
import { InMemoryLedger } from "./BalanceLedger";
import { DynamicFeeController } from "./DynamicFeeController";
import { requirePositive, revert } from "./errors";
import { type FeeQuote, FeeEngine, validateFees } from "./FeeEngine";
import { Governance } from "./Governance";
import { HolderRegistry } from "./HolderRegistry";
import { Journal } from "./Journal";
import { type LiquidityToken, LiquidityLocker } from "./LiquidityLocker";
import { type PriceOracle, PriceImpactGuard, validateMaxPriceImpact } from "./PriceImpactGuard";
import { ReentrancyGuard } from "./ReentrancyGuard";
import { RewardDistributor } from "./RewardDistributor";
import type { EventSink } from "./StatefulModule";
import { TradeAnalytics } from "./TradeAnalytics";
import { TradingControls } from "./TradingControls";

export interface FeeTokenConfig {
    /** The token's own account; holds the reward pool and escrowed LP tokens. */
    address: Address;
    owner: Address;
    treasury: Address;
    lpToken: LiquidityToken;
    initialSupply?: bigint;
    clock?: Clock;
    buyFee?: bigint;
    sellFee?: bigint;
    rewardThreshold?: bigint;
    volumeThreshold?: bigint;
    maxPriceImpact?: bigint;
    /** Extra governance signers; the owner always signs. */
    signers?: Address[];
}

/**
 * Token ledger with trading controls, volume-reactive fees, reward points and
 * multisig governance. Every state-changing method takes the authenticated
 * caller first and either applies all of its effects or none of them.
 */
export class FeeToken {
    readonly address: Address;
    readonly owner: Address;
    readonly maxSupply: bigint;

    private readonly clock: Clock;
    private readonly journal = new Journal();
    private readonly ledger = new InMemoryLedger(this.journal);
    private readonly holders: HolderRegistry;
    private readonly controls: TradingControls;
    private readonly dynamicFees: DynamicFeeController;
    private readonly fees: FeeEngine;
    private readonly rewards: RewardDistributor;
    private readonly priceGuard: PriceImpactGuard;
    private readonly analytics: TradeAnalytics;
    private readonly governance: Governance;
    private readonly locker: LiquidityLocker;
    private readonly guard = new ReentrancyGuard();

    private events: TokenEvent[] = [];
    private pending: TokenEvent[] = [];
    private depth = 0;

    constructor(config: FeeTokenConfig) {
        const address = getAddress(config.address);
        const owner = getAddress(config.owner);
        const treasury = getAddress(config.treasury);
        if (address === zeroAddress || owner === zeroAddress || treasury === zeroAddress) revert("ZeroAddress");

        const initialSupply = config.initialSupply ?? INITIAL_SUPPLY;
        requirePositive(initialSupply);

        const buyFee = config.buyFee ?? BUY_FEE;
        const sellFee = config.sellFee ?? SELL_FEE;
        validateFees(buyFee, sellFee);

        const rewardThreshold = config.rewardThreshold ?? REWARD_THRESHOLD;
        const volumeThreshold = config.volumeThreshold ?? VOLUME_THRESHOLD;
        if (rewardThreshold <= 0n || volumeThreshold <= 0n) revert("LimitOutOfRange");

        const maxPriceImpact = config.maxPriceImpact ?? MAX_PRICE_IMPACT;
        validateMaxPriceImpact(maxPriceImpact);

        const signers = [...new Set([owner, ...(config.signers ?? []).map((signer) => getAddress(signer))])];
        if (signers.includes(zeroAddress)) revert("ZeroAddress");
        if (signers.length > MAX_SIGNERS) revert("MaxSignersReached");

        this.address = address;
        this.owner = owner;
        this.maxSupply = initialSupply;
        this.clock = config.clock ?? new SystemClock();

        const emit: EventSink = (event) => this.emit(event);

        const journal = this.journal;
        this.holders = new HolderRegistry(journal, this.ledger, address);
        this.controls = new TradingControls(journal, this.ledger, emit, {
            maxTransactionAmount: (initialSupply * MAX_TRANSACTION_PERCENT) / 100n,
            maxWalletAmount: (initialSupply * MAX_WALLET_PERCENT) / 100n,
            maxSellAmount: (initialSupply * MAX_SELL_PERCENT) / 100n,
            maxDailySells: MAX_DAILY_SELLS,
        });
        this.dynamicFees = new DynamicFeeController(journal, volumeThreshold, emit);
        this.fees = new FeeEngine(journal, this.ledger, this.controls, address, emit, { buyFee, sellFee, treasury });
        this.rewards = new RewardDistributor(journal, this.ledger, address, rewardThreshold, emit);
        this.priceGuard = new PriceImpactGuard(journal, address, emit, maxPriceImpact);
        this.analytics = new TradeAnalytics(journal, emit);
        this.locker = new LiquidityLocker(journal, config.lpToken, address, emit);
        this.governance = new Governance(journal, this.dispatch, emit, signers);

        this.atomic(() => {
            for (const account of [owner, treasury, address]) {
                this.controls.setWhitelist(account, true);
            }
            this.ledger.mint(owner, initialSupply);
            this.emit({ name: "Transfer", args: { from: zeroAddress, to: owner, value: initialSupply } });
            this.holders.add(owner);
        });
    }

    // ---------------------------------------------------------------------
    // Transfers
    // ---------------------------------------------------------------------

    /** Moves `amount` from `caller` to `to`, fees included. Returns what `to` received. */
    transfer(caller: Address, to: Address, amount: bigint): bigint {
        return this.atomic(() => this.executeTransfer(getAddress(caller), getAddress(to), amount));
    }

    private executeTransfer(sender: Address, recipient: Address, amount: bigint) {
        if (recipient === zeroAddress) revert("ZeroAddress");
        requirePositive(amount);
        this.controls.requireNotPaused();

        const now = this.clock.now();
        this.controls.check(sender, recipient, amount, now);

        const multiplier = this.dynamicFees.refresh(this.analytics.volumeOn(now / DAY));
        if (this.ledger.balanceOf(sender) < amount) revert("InsufficientBalance");

        const { rate, fee, net } = this.fees.quote(sender, recipient, amount, multiplier);
        this.controls.enforceWalletCap(recipient, net);
        this.ledger.transfer(sender, recipient, net);
        this.emit({ name: "Transfer", args: { from: sender, to: recipient, value: net } });

        const shares = this.fees.collect(sender, fee);
        this.rewards.deposit(shares.reward);
        this.rewards.accrue(sender, amount);

        const isBuy = this.controls.isPair(sender);
        const isSell = this.controls.isPair(recipient);
        const trader = isSell ? sender : recipient;
        this.analytics.record(trader, { timestamp: now, amount, isBuy: !isSell, price: this.priceGuard.price() });
        this.controls.recordActivity(sender, recipient, now);

        this.holders.sync(recipient);
        this.holders.sync(sender);
        this.holders.sync(this.fees.treasury);

        if (isBuy || isSell) {
            this.priceGuard.check(trader, amount, rate, isSell);
        }
        return net;
    }

    // ---------------------------------------------------------------------
    // Rewards
    // ---------------------------------------------------------------------

    claimRewards(caller: Address): bigint {
        const account = getAddress(caller);
        return this.atomic(() =>
            this.guard.run("claim", () => {
                this.controls.requireNotPaused();
                const reward = this.rewards.claim(account, this.holders.list());
                this.holders.sync(account);
                return reward;
            }),
        );
    }

    // ---------------------------------------------------------------------
    // Liquidity locks
    // ---------------------------------------------------------------------

    /** Escrows `amount` LP tokens for `duration` seconds. Returns the lock index. */
    lockLiquidity(caller: Address, amount: bigint, duration: bigint): number {
        const account = getAddress(caller);
        return this.atomic(() =>
            this.guard.run("liquidity", () => this.locker.lock(account, amount, duration, this.clock.now())),
        );
    }

    unlockLiquidity(caller: Address, index: number): bigint {
        const account = getAddress(caller);
        return this.atomic(() =>
            this.guard.run("liquidity", () => this.locker.unlock(account, index, this.clock.now())),
        );
    }

    // ---------------------------------------------------------------------
    // Owner
    // ---------------------------------------------------------------------

    enableTrading(caller: Address) {
        this.ownerCall(caller, () => this.controls.enableTrading(this.clock.now()));
    }

    disableTrading(caller: Address) {
        this.ownerCall(caller, () => this.controls.disableTrading(this.clock.now()));
    }

    setDexPair(caller: Address, pair: Address, value: boolean) {
        this.ownerCall(caller, () => this.controls.setPair(getAddress(pair), value));
    }

    setFees(caller: Address, buyFee: bigint, sellFee: bigint) {
        this.ownerCall(caller, () => this.fees.setFees(buyFee, sellFee));
    }

    setLimits(caller: Address, maxTransaction: bigint, maxWallet: bigint, maxSell: bigint) {
        this.ownerCall(caller, () => this.controls.setLimits(maxTransaction, maxWallet, maxSell));
    }

    setMaxDailySells(caller: Address, maxDailySells: bigint) {
        this.ownerCall(caller, () => this.controls.setMaxDailySells(maxDailySells));
    }

    setBlacklist(caller: Address, account: Address, value: boolean) {
        const target = getAddress(account);
        this.ownerCall(caller, () => {
            if (target === this.owner || target === this.fees.treasury || target === this.address) {
                revert("CannotBlacklist");
            }
            this.controls.setBlacklist(target, value);
        });
    }

    setWhitelist(caller: Address, account: Address, value: boolean) {
        this.ownerCall(caller, () => this.controls.setWhitelist(getAddress(account), value));
    }

    setPriceOracle(caller: Address, oracle: PriceOracle | null) {
        this.ownerCall(caller, () => this.priceGuard.setOracle(oracle));
    }

    setMaxPriceImpact(caller: Address, maxPriceImpact: bigint) {
        this.ownerCall(caller, () => this.priceGuard.setMaxPriceImpact(maxPriceImpact));
    }

    addSigner(caller: Address, signer: Address) {
        this.ownerCall(caller, () => this.governance.addSigner(getAddress(signer)));
    }

    removeSigner(caller: Address, signer: Address) {
        this.ownerCall(caller, () => this.governance.removeSigner(getAddress(signer)));
    }

    // ---------------------------------------------------------------------
    // Governance
    // ---------------------------------------------------------------------

    createOperation(caller: Address, kind: Hex, data: Hex): Hex {
        return this.atomic(() => this.governance.create(getAddress(caller), kind, data, this.clock.now()));
    }

    signOperation(caller: Address, id: Hex) {
        this.atomic(() => this.governance.sign(getAddress(caller), id, this.clock.now()));
    }

    executeOperation(caller: Address, id: Hex) {
        this.atomic(() => this.governance.execute(getAddress(caller), id, this.clock.now()));
    }

    cancelOperation(caller: Address, id: Hex) {
        this.atomic(() => this.governance.cancel(getAddress(caller), id));
    }

    emergencyPause(caller: Address) {
        this.signerCall(caller, () => this.controls.pause());
    }

    emergencyUnpause(caller: Address) {
        this.signerCall(caller, () => this.controls.unpause());
    }

    private dispatch = (operation: Operation) => {
        switch (operation.type) {
            case "SetTreasury":
                this.fees.setTreasury(operation.treasury);
                this.controls.setWhitelist(operation.treasury, true);
                this.holders.sync(operation.treasury);
                return;
            case "SetFees":
                this.fees.setFees(operation.buyFee, operation.sellFee);
                return;
            case "SetLimits":
                this.controls.setLimits(operation.maxTransaction, operation.maxWallet, operation.maxSell);
                return;
            case "PermanentTradingEnable":
                this.controls.enableTradingPermanently(this.clock.now());
                return;
            case "EmergencyPause":
                this.controls.pause();
                return;
            case "EmergencyUnpause":
                this.controls.unpause();
                return;
            default: {
                const unhandled: never = operation;
                return unhandled;
            }
        }
    };

    // ---------------------------------------------------------------------
    // Views
    // ---------------------------------------------------------------------

    balanceOf(account: Address) {
        return this.ledger.balanceOf(getAddress(account));
    }

    totalSupply() {
        return this.ledger.totalSupply();
    }

    getTokenomics(): Tokenomics {
        return {
            maxSupply: this.maxSupply,
            totalSupply: this.ledger.totalSupply(),
            buyFee: this.fees.buyFee,
            sellFee: this.fees.sellFee,
            dynamicFeeMultiplier: this.dynamicFees.multiplier,
            rewardPoolBalance: this.rewards.poolBalance,
            totalBurned: this.fees.totalBurned,
            holderCount: this.holders.count(),
            treasuryWallet: this.fees.treasury,
            tradingEnabled: this.controls.tradingEnabled,
            paused: this.controls.paused,
        };
    }

    getLimits(): Limits {
        return this.controls.limits;
    }

    /** Fee the next `from` → `to` transfer would pay at the current multiplier. */
    getFeeQuote(from: Address, to: Address, amount: bigint): FeeQuote {
        return this.fees.quote(getAddress(from), getAddress(to), amount, this.dynamicFees.multiplier);
    }

    getTradeHistory(account: Address, limit: number): TradeRecord[] {
        return this.analytics.historyOf(getAddress(account), limit);
    }

    getDailyVolume(days: number): bigint[] {
        return this.analytics.volumes(this.clock.now(), days);
    }

    getTradeCount(account: Address) {
        return this.analytics.tradeCountOf(getAddress(account));
    }

    get totalTrades() {
        return this.analytics.totalTrades;
    }

    getOperationInfo(id: Hex): OperationInfo | undefined {
        return this.governance.info(id);
    }

    getHolderCount() {
        return this.holders.count();
    }

    getHolders(): Address[] {
        return this.holders.list();
    }

    rewardPoints(account: Address) {
        return this.rewards.pointsOf(getAddress(account));
    }

    get rewardPoolBalance() {
        return this.rewards.poolBalance;
    }

    get rewardThreshold() {
        return this.rewards.rewardThreshold;
    }

    get dynamicFeeMultiplier() {
        return this.dynamicFees.multiplier;
    }

    get tradingEnabled() {
        return this.controls.tradingEnabled;
    }

    get tradingEnabledAt() {
        return this.controls.tradingEnabledAt;
    }

    get tradingPermanentlyEnabled() {
        return this.controls.tradingPermanentlyEnabled;
    }

    get paused() {
        return this.controls.paused;
    }

    get treasuryWallet() {
        return this.fees.treasury;
    }

    get maxPriceImpact() {
        return this.priceGuard.maxPriceImpact;
    }

    sellsToday(account: Address) {
        return this.controls.sellsToday(getAddress(account), this.clock.now());
    }

    isBlacklisted(account: Address) {
        return this.controls.isBlacklisted(getAddress(account));
    }

    isWhitelisted(account: Address) {
        return this.controls.isWhitelisted(getAddress(account));
    }

    isDexPair(account: Address) {
        return this.controls.isPair(getAddress(account));
    }

    isSigner(account: Address) {
        return this.governance.isSigner(getAddress(account));
    }

    getSigners(): Address[] {
        return this.governance.signers();
    }

    getLiquidityLocks(account: Address): LiquidityLock[] {
        return this.locker.locksOf(getAddress(account));
    }

    get totalLockedLiquidity() {
        return this.locker.totalLocked();
    }

    getEvents(): TokenEvent[];
    getEvents<N extends TokenEventName>(name: N): EventOf<N>[];
    getEvents(name?: TokenEventName): TokenEvent[] {
        return name ? this.events.filter((event) => event.name === name) : [...this.events];
    }

    // ---------------------------------------------------------------------
    // Internals
    // ---------------------------------------------------------------------

    private emit(event: TokenEvent) {
        this.pending.push(event);
    }

    private ownerCall(caller: Address, fn: () => void) {
        this.atomic(() => {
            if (getAddress(caller) !== this.owner) revert("NotOwner");
            fn();
        });
    }

    private signerCall(caller: Address, fn: () => void) {
        this.atomic(() => {
            this.governance.requireSigner(getAddress(caller));
            fn();
        });
    }

    /**
     * Runs `fn` as one unit: if it throws, the journal undoes every write it
     * made and its events are dropped. Events only become visible once the
     * outermost call returns.
     */
    private atomic<T>(fn: () => T): T {
        const mark = this.journal.begin();
        const eventMark = this.pending.length;
        this.depth++;
        try {
            const result = fn();
            this.journal.commit();
            if (this.depth === 1) {
                this.events.push(...this.pending);
                this.pending = [];
            }
            return result;
        } catch (error) {
            this.journal.rollback(mark);
            this.pending.length = eventMark;
            throw error;
        } finally {
            this.depth--;
        }
    }
}
