/**
 * @fileoverview Extraction spec compiler
 *
 * Spec syntax, alternatives separated by `:`:
 * - `245ab`      subfields a and b of every 245, joined per field
 * - `041a`       every 041 $a, one value each (a single code is never joined)
 * - `650`        every subfield of every 650, joined per field
 * - `245|*0|a`   only 245s whose indicators match (`*` matches any)
 * - `008[35-37]` bytes 35 to 37 (inclusive) of a control field
 * - `100a:110a`  values of every alternative, in alternative order
 *
 * @module domain/extraction/compileSpec
 */

import {
    isControlField,
    isControlTag,
    isDataField,
    type BibRecord,
    type DataField,
} from "../entities/BibRecord.js";

/**
 * Compiled spec: record in, values out.
 */
export type Extractor = (record: BibRecord) => string[];

/**
 * One alternative of a spec, parsed.
 */
export interface SpecPart {
    readonly tag: string;
    readonly indicators?: readonly [string, string];
    readonly range?: { readonly start: number; readonly end: number };
    readonly codes: string;
}

/**
 * Raised for a spec that cannot be compiled.
 */
export class ExtractionSpecError extends Error {
    readonly spec: string;

    constructor(spec: string, reason: string) {
        super(`Invalid extraction spec "${spec}": ${reason}`);
        this.name = "ExtractionSpecError";
        this.spec = spec;
    }
}

const kPART_PATTERN = /^(\d{3})(?:\|([0-9a-z* ])([0-9a-z* ])\|)?(?:\[(\d+)(?:-(\d+))?\])?([0-9a-z]*)$/;

/**
 * Parse a spec into its alternatives.
 *
 * @throws ExtractionSpecError
 */
export function parseSpec(spec: string): SpecPart[] {
    if (spec.trim() === "") {
        throw new ExtractionSpecError(spec, "empty spec");
    }

    return spec.split(":").map((raw): SpecPart => {
        const match = kPART_PATTERN.exec(raw.trim());
        if (!match) {
            throw new ExtractionSpecError(spec, `cannot parse "${raw}"`);
        }

        const [, tag, ind1, ind2, start, end, codes] = match;
        const control = isControlTag(tag);

        if (control && (codes !== "" || ind1 !== undefined)) {
            throw new ExtractionSpecError(spec, `control field ${tag} has no indicators or subfields`);
        }
        if (!control && start !== undefined) {
            throw new ExtractionSpecError(spec, `byte ranges apply to control fields only, not ${tag}`);
        }

        const part: SpecPart = { tag, codes };
        if (ind1 !== undefined && ind2 !== undefined) {
            return { ...part, indicators: [ind1, ind2] };
        }
        if (start !== undefined) {
            const range = { start: Number(start), end: Number(end ?? start) };
            if (range.end < range.start) {
                throw new ExtractionSpecError(spec, `range ${start}-${end} ends before it starts`);
            }
            return { ...part, range };
        }
        return part;
    });
}

function matchesIndicators(field: DataField, indicators: readonly [string, string] | undefined): boolean {
    if (!indicators) {
        return true;
    }
    const [ind1, ind2] = indicators;
    return (ind1 === "*" || ind1 === field.ind1) && (ind2 === "*" || ind2 === field.ind2);
}

function compilePart(part: SpecPart): Extractor {
    if (isControlTag(part.tag)) {
        return (record) => {
            const values: string[] = [];
            for (const field of record.fields) {
                if (field.tag !== part.tag || !isControlField(field)) {
                    continue;
                }
                const value = part.range ? field.value.slice(part.range.start, part.range.end + 1) : field.value;
                if (value.length > 0) {
                    values.push(value);
                }
            }
            return values;
        };
    }

    return (record) => {
        const values: string[] = [];
        for (const field of record.fields) {
            if (field.tag !== part.tag || !isDataField(field) || !matchesIndicators(field, part.indicators)) {
                continue;
            }
            const selected = part.codes === ""
                ? field.subfields
                : field.subfields.filter((subfield) => part.codes.includes(subfield.code));
            if (part.codes.length === 1) {
                values.push(...selected.map((subfield) => subfield.value));
            }
            else if (selected.length > 0) {
                values.push(selected.map((subfield) => subfield.value).join(" "));
            }
        }
        return values;
    };
}

/**
 * Compile a spec into an extractor.
 *
 * @example
 * ```typescript
 * const title = compileSpec("245ab");
 * title(record); // ["Moby Dick : or, The whale /"]
 * ```
 *
 * @throws ExtractionSpecError
 */
export function compileSpec(spec: string): Extractor {
    const parts = parseSpec(spec).map(compilePart);
    return (record) => parts.flatMap((extract) => extract(record));
}
