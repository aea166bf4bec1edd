import type { TokenEvent } from "../types/events";
import type { Journal } from "./Journal";

export type EventSink = (event: TokenEvent) => void;

/**
 * Base for every engine module. All mutable state lives in `state` and is
 * only written through the shared journal, so the engine can undo the writes
 * of an operation that fails.
 */
export abstract class StatefulModule<S extends object> {
    protected readonly state: S;

    constructor(
        protected readonly journal: Journal,
        initial: S,
    ) {
        this.state = initial;
    }

    protected update<K extends keyof S>(key: K, value: S[K]) {
        this.journal.assign(this.state, key, value);
    }
}
