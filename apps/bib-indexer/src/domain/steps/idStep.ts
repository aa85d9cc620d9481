/**
 * @fileoverview Record id step
 *
 * @module domain/steps/idStep
 */

import { CapsuleError, defineStep, type Step } from "@capsulepipe/engine";
import type { BibRecord } from "../entities/BibRecord.js";
import { BibCapsule } from "../capsules/BibCapsule.js";
import type { ExtractorCache } from "../extraction/extractorCache.js";

/**
 * Writes `id` from the 001 control number, or `record.id`.
 * A record with neither fails its capsule.
 */
export function idStep(extractors: ExtractorCache): Step<BibRecord> {
    return defineStep<BibRecord>("id", (capsule) => {
        const id = new BibCapsule(capsule, extractors).controlNumber ?? capsule.input.id;
        if (id === undefined) {
            throw new CapsuleError("Record has no control number (001) and no id");
        }
        capsule.set("id", id);
    }, { description: "Record id" });
}
