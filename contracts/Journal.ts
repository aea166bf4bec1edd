type Undo = () => void;

/**
 * Undo log shared by the engine's modules. While a transaction is open, every
 * write records how to put the previous value back; `rollback` replays those
 * records newest first. Outside a transaction nothing is recorded.
 */
export class Journal {
    private entries: Undo[] = [];
    private depth = 0;

    /** Number of undo records kept for the open transaction. */
    get size() {
        return this.entries.length;
    }

    /** Opens a (possibly nested) transaction and returns its mark. */
    begin() {
        this.depth++;
        return this.entries.length;
    }

    commit() {
        this.depth--;
        if (this.depth === 0) {
            this.entries = [];
        }
    }

    /** Undoes every write made since `mark` and closes the transaction. */
    rollback(mark: number) {
        while (this.entries.length > mark) {
            this.entries.pop()?.();
        }
        this.depth--;
    }

    assign<T extends object, K extends keyof T>(target: T, key: K, value: T[K]) {
        const previous = target[key];
        target[key] = value;
        this.record(() => {
            target[key] = previous;
        });
    }

    set<K, V>(map: Map<K, V>, key: K, value: V) {
        const previous = map.get(key);
        map.set(key, value);
        this.record(
            previous === undefined
                ? () => {
                      map.delete(key);
                  }
                : () => {
                      map.set(key, previous);
                  },
        );
    }

    delete<K, V>(map: Map<K, V>, key: K) {
        const previous = map.get(key);
        if (previous === undefined) return;
        map.delete(key);
        this.record(() => {
            map.set(key, previous);
        });
    }

    add<T>(set: Set<T>, value: T) {
        if (set.has(value)) return;
        set.add(value);
        this.record(() => {
            set.delete(value);
        });
    }

    remove<T>(set: Set<T>, value: T) {
        if (!set.delete(value)) return;
        this.record(() => {
            set.add(value);
        });
    }

    push<T>(array: T[], value: T) {
        array.push(value);
        this.record(() => {
            array.pop();
        });
    }

    pop<T>(array: T[]) {
        if (array.length === 0) return;
        const value = array[array.length - 1];
        array.pop();
        this.record(() => {
            array.push(value);
        });
    }

    put<T>(array: T[], index: number, value: T) {
        const previous = array[index];
        array[index] = value;
        this.record(() => {
            array[index] = previous;
        });
    }

    private record(undo: Undo) {
        if (this.depth > 0) {
            this.entries.push(undo);
        }
    }
}
