/**
 * @fileoverview Language step
 *
 * @module domain/steps/languageStep
 */

import { defineStep, type Step } from "@capsulepipe/engine";
import type { BibRecord } from "../entities/BibRecord.js";
import { BibCapsule } from "../capsules/BibCapsule.js";
import type { ExtractorCache } from "../extraction/extractorCache.js";
import { unique, type ValueProcessor } from "../extraction/processors.js";
import { kLANGUAGE_SPEC } from "./specs.js";

const languageCodes: ValueProcessor = (values) =>
    values.map((value) => value.trim().toLowerCase()).filter((value) => /^[a-z]{3}$/.test(value));

/**
 * Writes `language`: the code in 008/35-37, or the 041 $a codes when
 * 008 has none.
 */
export function languageStep(extractors: ExtractorCache): Step<BibRecord> {
    return defineStep<BibRecord>("language", (capsule) => {
        const bib = new BibCapsule(capsule, extractors);
        const fixed = bib.extract(kLANGUAGE_SPEC, { postProcess: [languageCodes] });
        const languages = fixed.length > 0
            ? fixed
            : unique(languageCodes(bib.subfields("041", "a")));

        bib.setIfPresent("language", languages);
    }, { description: "MARC language codes" });
}
