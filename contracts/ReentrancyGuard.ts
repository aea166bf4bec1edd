import { revert } from "./errors";

export type GuardedOperation = "claim" | "liquidity";

/**
 * One flag per class of guarded operation. While any flag is up, entering
 * another guarded operation fails instead of interleaving with it.
 */
export class ReentrancyGuard {
    private readonly entered = new Set<GuardedOperation>();

    run<T>(operation: GuardedOperation, fn: () => T): T {
        if (this.entered.size > 0) revert("ReentrantCall");
        this.entered.add(operation);
        try {
            return fn();
        } finally {
            this.entered.delete(operation);
        }
    }
}
