import { type Address, zeroAddress } from "viem";
import type { BalanceLedger } from "./BalanceLedger";
import type { Journal } from "./Journal";
import { StatefulModule } from "./StatefulModule";

interface RegistryState {
    holders: Address[];
    index: Map<Address, number>;
}

/**
 * Set of accounts holding a non-zero balance. Backed by an array plus an
 * index map: lookups, inserts and removals are O(1). Iteration follows
 * insertion order until a removal moves the last holder into the freed slot.
 */
export class HolderRegistry extends StatefulModule<RegistryState> {
    constructor(
        journal: Journal,
        private readonly ledger: Pick<BalanceLedger, "balanceOf">,
        private readonly reserve: Address,
    ) {
        super(journal, { holders: [], index: new Map() });
    }

    add(account: Address) {
        if (account === zeroAddress || account === this.reserve) return;
        if (this.state.index.has(account)) return;
        this.journal.set(this.state.index, account, this.state.holders.length);
        this.journal.push(this.state.holders, account);
    }

    remove(account: Address) {
        const position = this.state.index.get(account);
        if (position === undefined || this.ledger.balanceOf(account) > 0n) return;

        const last = this.state.holders.length - 1;
        if (position !== last) {
            const moved = this.state.holders[last];
            this.journal.put(this.state.holders, position, moved);
            this.journal.set(this.state.index, moved, position);
        }
        this.journal.pop(this.state.holders);
        this.journal.delete(this.state.index, account);
    }

    /** Keeps membership in line with the ledger after `account`'s balance changed. */
    sync(account: Address) {
        if (this.ledger.balanceOf(account) > 0n) {
            this.add(account);
        } else {
            this.remove(account);
        }
    }

    count() {
        return this.state.holders.length;
    }

    list(): Address[] {
        return [...this.state.holders];
    }
}
