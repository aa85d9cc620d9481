/**
 * @fileoverview ISBN step
 *
 * @module domain/steps/isbnStep
 */

import { defineStep, type Step } from "@capsulepipe/engine";
import type { BibRecord } from "../entities/BibRecord.js";
import { BibCapsule } from "../capsules/BibCapsule.js";
import type { ExtractorCache } from "../extraction/extractorCache.js";
import { unique } from "../extraction/processors.js";
import { kISBN_SPEC } from "./specs.js";

/**
 * Reduce a 020 $a value ("0-14-039084-7 (pbk.)") to a bare ISBN-10 or
 * ISBN-13, or `undefined` if it holds neither.
 */
export function normalizeIsbn(value: string): string | undefined {
    const [candidate = ""] = value.trim().split(/\s+/);
    const digits = candidate.replace(/-/g, "").toUpperCase();
    return /^(\d{9}[\dX]|\d{13})$/.test(digits) ? digits : undefined;
}

/**
 * Writes `isbn`, normalized and without duplicates.
 */
export function isbnStep(extractors: ExtractorCache): Step<BibRecord> {
    return defineStep<BibRecord>("isbn", (capsule, { logger }) => {
        const bib = new BibCapsule(capsule, extractors);
        const isbns: string[] = [];

        for (const value of bib.extract(kISBN_SPEC)) {
            const isbn = normalizeIsbn(value);
            if (isbn === undefined) {
                logger.debug("Ignoring malformed ISBN", { capsuleId: capsule.id, value });
                continue;
            }
            isbns.push(isbn);
        }

        bib.setIfPresent("isbn", unique(isbns));
    }, { description: "Normalized ISBNs" });
}
