/**
 * @fileoverview Capsule Stream
 *
 * One batch of capsules. Steps either walk the batch capsule by capsule or
 * compute something over the whole batch once and share it through
 * {@link CapsuleStream.memoize}.
 *
 * @module @capsulepipe/engine/core/CapsuleStream
 */

import type { Store } from "../contracts/Store.js";
import { PipelineError } from "../contracts/errors.js";
import { SimpleStore } from "../impl/SimpleStore.js";
import type { Capsule } from "./Capsule.js";

/**
 * Batch identity handed to a stream on construction.
 */
export interface BatchInfo {
    /** Zero-based position of the batch within the run */
    readonly batchIndex: number;

    /** Trace ID shared by every event and log line of this batch */
    readonly traceId: string;
}

/**
 * Builds the stream for a batch. Deployments pass a factory returning
 * their own subclass to get batch-specific accessors.
 */
export type StreamFactory<TInput, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> = (
    capsules: readonly Capsule<TInput>[],
    batch: BatchInfo
) => TStream;

/**
 * Prefix of memoized entries in the batch cache.
 */
const kMEMO_PREFIX = "memo:";

/**
 * Capsule Stream - a rewindable batch with batch-scoped memoization.
 *
 * @example
 * ```typescript
 * class HoldingsStream extends CapsuleStream<BibRecord> {
 *     async holdingsFor(id: string): Promise<string[]> {
 *         const table = await this.memoize("holdings", async (stream) => {
 *             const ids = Array.from(stream.each(), (capsule) => capsule.id);
 *             return lookup.byIds(ids);
 *         });
 *         return table.get(id) ?? [];
 *     }
 * }
 * ```
 */
export class CapsuleStream<TInput = unknown> {
    readonly batchIndex: number;
    readonly traceId: string;

    private readonly members: Capsule<TInput>[];
    private readonly cache: Store = new SimpleStore();
    private cursor = 0;
    private retired = false;

    constructor(capsules: Iterable<Capsule<TInput>>, batch: BatchInfo = { batchIndex: 0, traceId: "" }) {
        this.members = Array.from(capsules);
        this.batchIndex = batch.batchIndex;
        this.traceId = batch.traceId;
    }

    /**
     * Number of capsules in the batch, errored ones included.
     */
    get size(): number {
        return this.members.length;
    }

    /**
     * The batch-scoped cache shared by every capsule and step of this batch.
     */
    get batchCache(): Store {
        return this.cache;
    }

    get isRetired(): boolean {
        return this.retired;
    }

    /**
     * Lazily walk the active capsules from the stream's cursor.
     * The traversal resumes where the last one stopped until {@link rewind} is called.
     */
    *each(): Generator<Capsule<TInput>, void, undefined> {
        while (this.cursor < this.members.length) {
            const capsule = this.members[this.cursor];
            this.cursor += 1;
            if (!capsule.isErrored) {
                yield capsule;
            }
        }
    }

    /**
     * Reset the cursor to the first capsule.
     */
    rewind(): this {
        this.cursor = 0;
        return this;
    }

    /**
     * An independent traversal of the active capsules from the start.
     */
    *[Symbol.iterator](): Generator<Capsule<TInput>, void, undefined> {
        for (const capsule of this.members) {
            if (!capsule.isErrored) {
                yield capsule;
            }
        }
    }

    /**
     * Every capsule, errored ones included, in batch order.
     */
    capsules(): readonly Capsule<TInput>[] {
        return this.members;
    }

    active(): Capsule<TInput>[] {
        return this.members.filter((capsule) => !capsule.isErrored);
    }

    errored(): Capsule<TInput>[] {
        return this.members.filter((capsule) => capsule.isErrored);
    }

    /**
     * Compute a batch-wide value once and share it.
     *
     * The first call for `key` runs `compute` and caches its promise in the batch
     * cache; every later or concurrent call within the batch gets the same promise.
     * A rejected computation stays cached and rejects every caller.
     */
    memoize<T>(key: string, compute: (stream: this) => T | Promise<T>): Promise<T> {
        if (this.retired) {
            return Promise.reject(
                new PipelineError("BATCH_RETIRED", `Cannot memoize "${key}": batch ${this.batchIndex} is retired`)
            );
        }

        const cacheKey = `${kMEMO_PREFIX}${key}`;
        const cached = this.cache.get(cacheKey);
        if (cached instanceof Promise) {
            // Each key is only ever paired with the compute that produced it.
            return cached as Promise<T>;
        }

        const pending = new Promise<T>((resolve) => {
            resolve(compute(this));
        });
        this.cache.set(cacheKey, pending);
        return pending;
    }

    /**
     * Whether `key` has been memoized in this batch.
     */
    isMemoized(key: string): boolean {
        return this.cache.has(`${kMEMO_PREFIX}${key}`);
    }

    /**
     * Invalidate the batch cache and release every capsule.
     * Called once the batch has left the pipeline.
     */
    retire(): void {
        if (this.retired) {
            return;
        }
        this.retired = true;
        this.cache.clear();
        for (const capsule of this.members) {
            capsule.release();
        }
    }
}
