import { type Address, zeroAddress } from "viem";
import { revert } from "./errors";
import { Journal } from "./Journal";
import { StatefulModule } from "./StatefulModule";

export interface BalanceLedger {
    transfer(from: Address, to: Address, amount: bigint): void;
    mint(to: Address, amount: bigint): void;
    burn(from: Address, amount: bigint): void;
    balanceOf(account: Address): bigint;
    totalSupply(): bigint;
}

interface LedgerState {
    balances: Map<Address, bigint>;
    totalSupply: bigint;
}

/**
 * Plain balance ledger: no fees, no gates. Also serves as the LP token a
 * liquidity lock escrows.
 */
export class InMemoryLedger extends StatefulModule<LedgerState> implements BalanceLedger {
    constructor(journal: Journal = new Journal()) {
        super(journal, { balances: new Map(), totalSupply: 0n });
    }

    balanceOf(account: Address) {
        return this.state.balances.get(account) ?? 0n;
    }

    totalSupply() {
        return this.state.totalSupply;
    }

    transfer(from: Address, to: Address, amount: bigint) {
        if (from === zeroAddress || to === zeroAddress) revert("ZeroAddress");
        if (amount < 0n) revert("NegativeAmount");
        const fromBalance = this.balanceOf(from);
        if (fromBalance < amount) revert("InsufficientBalance");
        this.journal.set(this.state.balances, from, fromBalance - amount);
        this.journal.set(this.state.balances, to, this.balanceOf(to) + amount);
    }

    mint(to: Address, amount: bigint) {
        if (to === zeroAddress) revert("ZeroAddress");
        if (amount < 0n) revert("NegativeAmount");
        this.journal.set(this.state.balances, to, this.balanceOf(to) + amount);
        this.update("totalSupply", this.state.totalSupply + amount);
    }

    burn(from: Address, amount: bigint) {
        if (amount < 0n) revert("NegativeAmount");
        const fromBalance = this.balanceOf(from);
        if (fromBalance < amount) revert("InsufficientBalance");
        this.journal.set(this.state.balances, from, fromBalance - amount);
        this.update("totalSupply", this.state.totalSupply - amount);
    }
}
