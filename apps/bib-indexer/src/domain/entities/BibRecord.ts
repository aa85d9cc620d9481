/**
 * @fileoverview Bibliographic Record Entity
 *
 * A MARC-style record: an optional leader plus control fields (tags 001-009,
 * a single value each) and data fields (two indicators and coded subfields).
 *
 * @module domain/entities/BibRecord
 */

/**
 * Control field, e.g. `001` (control number) or `008` (fixed-length data).
 */
export interface ControlField {
    readonly tag: string;
    readonly value: string;
}

/**
 * One coded value of a data field.
 */
export interface Subfield {
    readonly code: string;
    readonly value: string;
}

/**
 * Data field with indicators and subfields.
 */
export interface DataField {
    readonly tag: string;
    readonly ind1: string;
    readonly ind2: string;
    readonly subfields: readonly Subfield[];
}

export type BibField = ControlField | DataField;

/**
 * Bibliographic record as read from NDJSON.
 *
 * @example
 * ```json
 * {
 *   "fields": [
 *     { "tag": "001", "value": "b1000001" },
 *     { "tag": "245", "ind1": "1", "ind2": "4", "subfields": [{ "code": "a", "value": "The whale /" }] }
 *   ]
 * }
 * ```
 */
export interface BibRecord {
    /** Identifier used when the record has no 001 field */
    readonly id?: string;

    /** 24-character leader */
    readonly leader?: string;

    /** Fields in record order */
    readonly fields: readonly BibField[];
}

/**
 * Control tags are 001 through 009.
 */
export function isControlTag(tag: string): boolean {
    return /^00[1-9]$/.test(tag);
}

export function isControlField(field: BibField): field is ControlField {
    return "value" in field;
}

export function isDataField(field: BibField): field is DataField {
    return "subfields" in field;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSubfield(value: unknown): value is Subfield {
    return isObject(value) && typeof value.code === "string" && typeof value.value === "string";
}

function isBibField(value: unknown): value is BibField {
    if (!isObject(value) || typeof value.tag !== "string" || !/^\d{3}$/.test(value.tag)) {
        return false;
    }
    if (isControlTag(value.tag)) {
        return typeof value.value === "string";
    }
    return (
        typeof value.ind1 === "string" &&
        typeof value.ind2 === "string" &&
        Array.isArray(value.subfields) &&
        value.subfields.every(isSubfield)
    );
}

/**
 * Type guard for parsed JSON.
 */
export function isBibRecord(value: unknown): value is BibRecord {
    if (!isObject(value)) {
        return false;
    }
    if (value.id !== undefined && typeof value.id !== "string") {
        return false;
    }
    if (value.leader !== undefined && typeof value.leader !== "string") {
        return false;
    }
    return Array.isArray(value.fields) && value.fields.every(isBibField);
}
