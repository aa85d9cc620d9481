/**
 * @fileoverview Bibliographic capsule adapter
 *
 * Record-specific accessors over a `Capsule<BibRecord>`. Steps wrap the
 * capsule they are given; the engine never sees this type.
 *
 * @module domain/capsules/BibCapsule
 */

import { randomUUID } from "crypto";
import type { Capsule, CapsuleOptions } from "@capsulepipe/engine";
import { isControlField, isDataField, type BibRecord, type DataField } from "../entities/BibRecord.js";
import type { ExtractorCache } from "../extraction/extractorCache.js";
import type { ValueProcessor } from "../extraction/processors.js";

/**
 * Options for {@link BibCapsule.extract}.
 */
export interface ExtractOptions {
    /** Applied in order to the extracted values */
    readonly postProcess?: readonly ValueProcessor[];
}

/**
 * The record's 001 value, trimmed, if it has one.
 */
export function controlNumberOf(record: BibRecord): string | undefined {
    for (const field of record.fields) {
        if (field.tag === "001" && isControlField(field) && field.value.trim() !== "") {
            return field.value.trim();
        }
    }
    return undefined;
}

/**
 * Capsule options for bibliographic records: the capsule id is the 001
 * control number, then `record.id`, then a random UUID.
 */
export function bibCapsuleOptions(): CapsuleOptions<BibRecord> {
    return {
        idFn: (record) => controlNumberOf(record) ?? record.id ?? randomUUID(),
    };
}

/**
 * BibCapsule - a capsule seen as a bibliographic record.
 *
 * @example
 * ```typescript
 * const titleStep = defineStep<BibRecord>("title", (capsule) => {
 *     const bib = new BibCapsule(capsule, extractors);
 *     capsule.set("title", bib.extract("245ab", { postProcess: [trimPunctuation] }));
 * });
 * ```
 */
export class BibCapsule {
    constructor(
        readonly capsule: Capsule<BibRecord>,
        private readonly extractors: ExtractorCache
    ) {}

    get record(): BibRecord {
        return this.capsule.input;
    }

    get id(): string {
        return this.capsule.id;
    }

    get controlNumber(): string | undefined {
        return controlNumberOf(this.record);
    }

    /**
     * Values for an extraction spec. Post-processors run in order; empty
     * strings are dropped from the result.
     *
     * @throws Error if the spec was not compiled before the cache was frozen
     */
    extract(spec: string, options: ExtractOptions = {}): string[] {
        const values = this.extractors.get(spec)(this.record);
        const processed = (options.postProcess ?? []).reduce((current, process) => process(current), values);
        return processed.filter((value) => value !== "");
    }

    dataFields(tag: string): DataField[] {
        return this.record.fields.filter((field): field is DataField => field.tag === tag && isDataField(field));
    }

    /**
     * Every value of subfield `code` across fields tagged `tag`.
     */
    subfields(tag: string, code: string): string[] {
        return this.dataFields(tag).flatMap((field) =>
            field.subfields.filter((subfield) => subfield.code === code).map((subfield) => subfield.value)
        );
    }

    /**
     * Write `values` to `field` unless there are none.
     */
    setIfPresent(field: string, values: readonly string[]): void {
        if (values.length > 0) {
            this.capsule.set(field, values);
        }
    }
}
