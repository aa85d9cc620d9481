/**
 * @fileoverview Main entry author step
 *
 * @module domain/steps/authorStep
 */

import { defineStep, type Step } from "@capsulepipe/engine";
import type { BibRecord } from "../entities/BibRecord.js";
import { BibCapsule } from "../capsules/BibCapsule.js";
import type { ExtractorCache } from "../extraction/extractorCache.js";
import { collapseWhitespace, trimPunctuation, unique } from "../extraction/processors.js";
import { kAUTHOR_SPEC } from "./specs.js";

/**
 * Writes `author` from the personal, corporate or meeting name main entry.
 */
export function authorStep(extractors: ExtractorCache): Step<BibRecord> {
    return defineStep<BibRecord>("author", (capsule) => {
        const bib = new BibCapsule(capsule, extractors);
        bib.setIfPresent("author", bib.extract(kAUTHOR_SPEC, {
            postProcess: [collapseWhitespace, trimPunctuation, unique],
        }));
    }, { description: "Main entry author" });
}
