/**
 * @fileoverview Holdings step
 *
 * @module domain/steps/holdingsStep
 */

import { defineStep, type Step } from "@capsulepipe/engine";
import type { BibRecord } from "../entities/BibRecord.js";
import type { HoldingsStream } from "../streams/HoldingsStream.js";

/**
 * Writes `holdings` from the batch-wide holdings lookup.
 */
export function holdingsStep(): Step<BibRecord, HoldingsStream> {
    return defineStep<BibRecord, HoldingsStream>("holdings", async (capsule, { stream }) => {
        const locations = await stream.holdingsFor(capsule.id);
        if (locations.length > 0) {
            capsule.set("holdings", locations);
        }
    }, { description: "Holdings locations" });
}
