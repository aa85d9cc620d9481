/**
 * @fileoverview Build-once, read-only memo
 *
 * Process-scoped values (compiled extractors, lookup tables) are computed
 * before the pipeline is built and then shared by every capsule and every bag
 * worker. Freezing the memo turns any late write into an error instead of a
 * silent race.
 *
 * @module @capsulepipe/engine/utils/FrozenMemo
 */

/**
 * FrozenMemo - a memoizing factory that can be sealed.
 *
 * @example
 * ```typescript
 * const extractors = new FrozenMemo(compileSpec);
 * extractors.get("245ab");
 * extractors.freeze();
 *
 * extractors.get("245ab"); // cached
 * extractors.get("650a");  // throws: not prepared before freeze()
 * ```
 */
export class FrozenMemo<K, V> {
    private readonly entries: Map<K, { readonly value: V }> = new Map();
    private frozen = false;

    constructor(private readonly factory: (key: K) => V) {}

    /**
     * The value for `key`, built on first use while the memo is open.
     *
     * @throws Error for a key that was not built before {@link freeze}
     */
    get(key: K): V {
        const entry = this.entries.get(key);
        if (entry) {
            return entry.value;
        }
        if (this.frozen) {
            throw new Error(`FrozenMemo is frozen; no entry for ${String(key)}`);
        }

        const value = this.factory(key);
        this.entries.set(key, { value });
        return value;
    }

    /**
     * Build the value for every key up front.
     */
    prepare(keys: Iterable<K>): this {
        for (const key of keys) {
            this.get(key);
        }
        return this;
    }

    has(key: K): boolean {
        return this.entries.has(key);
    }

    keys(): K[] {
        return Array.from(this.entries.keys());
    }

    get size(): number {
        return this.entries.size;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    /**
     * Seal the memo. Known keys keep resolving; unknown keys throw.
     */
    freeze(): this {
        this.frozen = true;
        return this;
    }
}
