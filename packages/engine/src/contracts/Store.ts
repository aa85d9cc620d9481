/**
 * Store Contract
 *
 * The simplest of key/value caches. Used as the private cache of each capsule
 * and, with the same contract, as the batch cache of a capsule stream.
 * Nothing in a store outlives its owner.
 */

/**
 * Key/value scratch space.
 */
export interface Store {
    /**
     * Store a value under `key`, replacing any previous value.
     */
    set(key: string, value: unknown): void;

    /**
     * The stored value, or `undefined` when the key is absent.
     */
    get(key: string): unknown;

    /**
     * Push a value onto the sequence under `key`. An absent key becomes a
     * one-element sequence; an existing non-sequence value is coerced into one.
     */
    append(key: string, value: unknown): void;

    /**
     * Remove the key.
     */
    drop(key: string): void;

    /**
     * Alias of `drop`.
     */
    delete(key: string): void;

    has(key: string): boolean;

    keys(): string[];

    clear(): void;
}
