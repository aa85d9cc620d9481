/**
 * @fileoverview Title steps
 *
 * `filingTitleStep` reads the `title` field written by `titleStep`; run
 * them in that order, in one subpipe.
 *
 * @module domain/steps/titleSteps
 */

import { defineStep, type Step } from "@capsulepipe/engine";
import type { BibRecord } from "../entities/BibRecord.js";
import { BibCapsule } from "../capsules/BibCapsule.js";
import type { ExtractorCache } from "../extraction/extractorCache.js";
import { collapseWhitespace, first, trimPunctuation } from "../extraction/processors.js";
import { kTITLE_SPEC } from "./specs.js";

/**
 * Writes `title`: 245 $a $b, whitespace collapsed, trailing punctuation removed.
 */
export function titleStep(extractors: ExtractorCache): Step<BibRecord> {
    return defineStep<BibRecord>("title", (capsule) => {
        const bib = new BibCapsule(capsule, extractors);
        bib.setIfPresent("title", bib.extract(kTITLE_SPEC, {
            postProcess: [collapseWhitespace, trimPunctuation, first],
        }));
    }, { description: "Normalized title proper" });
}

/**
 * Writes `title_sort`: the title without its non-filing characters, lowercased.
 */
export function filingTitleStep(extractors: ExtractorCache): Step<BibRecord> {
    return defineStep<BibRecord>("filing-title", (capsule, { logger }) => {
        const [title] = capsule.get("title");
        if (typeof title !== "string") {
            logger.debug("No title to file", { capsuleId: capsule.id });
            return;
        }

        const bib = new BibCapsule(capsule, extractors);
        const [field] = bib.dataFields("245");
        const skip = field ? Number.parseInt(field.ind2, 10) : 0;
        const filing = Number.isNaN(skip) || skip >= title.length ? title : title.slice(skip);

        capsule.set("title_sort", filing.trim().toLowerCase());
    }, { description: "Title for sorting, leading article removed" });
}
