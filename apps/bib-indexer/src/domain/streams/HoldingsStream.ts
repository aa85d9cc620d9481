/**
 * @fileoverview Holdings Stream
 *
 * A capsule stream with a batch-wide holdings lookup: the first
 * `holdingsFor` call of a batch queries every capsule id at once, later
 * calls read the memoized table.
 *
 * @module domain/streams/HoldingsStream
 */

import { CapsuleStream, type BatchInfo, type Capsule, type StreamFactory } from "@capsulepipe/engine";
import type { BibRecord } from "../entities/BibRecord.js";

/**
 * Source of holdings locations, keyed by record id.
 */
export interface HoldingsLookup {
    lookup(ids: readonly string[]): Map<string, string[]> | Promise<Map<string, string[]>>;
}

/**
 * Lookup for runs without a holdings database.
 */
export const kNO_HOLDINGS: HoldingsLookup = {
    lookup: () => new Map(),
};

/**
 * HoldingsStream - one batch of bibliographic capsules.
 *
 * @example
 * ```typescript
 * builder.withStreams(HoldingsStream.factory(holdingsDatabase));
 *
 * const holdingsStep = defineStep<BibRecord, HoldingsStream>("holdings", async (capsule, { stream }) => {
 *     capsule.set("holdings", await stream.holdingsFor(capsule.id));
 * });
 * ```
 */
export class HoldingsStream extends CapsuleStream<BibRecord> {
    private readonly holdings: HoldingsLookup;

    constructor(capsules: Iterable<Capsule<BibRecord>>, batch: BatchInfo, holdings: HoldingsLookup) {
        super(capsules, batch);
        this.holdings = holdings;
    }

    /**
     * Stream factory binding every batch to `holdings`.
     */
    static factory(holdings: HoldingsLookup): StreamFactory<BibRecord, HoldingsStream> {
        return (capsules, batch) => new HoldingsStream(capsules, batch, holdings);
    }

    /**
     * Holdings locations of one record. Ids outside the batch get none.
     */
    async holdingsFor(id: string): Promise<string[]> {
        const table = await this.memoize("holdings", (stream) =>
            stream.holdings.lookup(Array.from(stream, (capsule) => capsule.id))
        );
        return table.get(id) ?? [];
    }
}
