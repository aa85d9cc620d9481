/**
 * @fileoverview Map-backed output record
 *
 * @module @capsulepipe/engine/impl/DocumentRecord
 */

import type { FieldInput, FieldValue, OutputDocument, OutputRecord } from "../contracts/OutputRecord.js";
import { InvalidFieldError } from "../contracts/errors.js";

/**
 * Turn a `set`/`append` argument into a flat sequence.
 * Scalars become one-element sequences; arrays are flattened one level.
 */
export function normalizeFieldInput(value: FieldInput): FieldValue[] {
    if (!Array.isArray(value)) {
        return [value];
    }

    const values: FieldValue[] = [];
    for (const item of value) {
        if (Array.isArray(item)) {
            values.push(...item);
        }
        else {
            values.push(item);
        }
    }
    return values;
}

/**
 * Throw `InvalidFieldError` unless `field` is a non-empty string.
 */
export function assertFieldName(field: unknown): asserts field is string {
    if (typeof field !== "string" || field.length === 0) {
        throw new InvalidFieldError(field);
    }
}

/**
 * Default output record: an insertion-ordered map of field sequences.
 *
 * @example
 * ```typescript
 * const record = new DocumentRecord();
 * record.set("id", 1).append("holdings", ["A", "B"]);
 * record.toObject(); // { id: [1], holdings: ["A", "B"] }
 * ```
 */
export class DocumentRecord implements OutputRecord {
    private readonly values: Map<string, FieldValue[]> = new Map();

    /**
     * Build a record from field sequences stored exactly as given (no flattening).
     */
    static fromEntries(entries: Iterable<readonly [string, readonly FieldValue[]]>): DocumentRecord {
        const record = new DocumentRecord();
        for (const [field, values] of entries) {
            assertFieldName(field);
            record.values.set(field, [...values]);
        }
        return record;
    }

    constructor(initial?: OutputDocument) {
        if (initial) {
            for (const [field, values] of Object.entries(initial)) {
                assertFieldName(field);
                this.values.set(field, [...values]);
            }
        }
    }

    set(field: string, value: FieldInput): this {
        assertFieldName(field);
        this.values.set(field, normalizeFieldInput(value));
        return this;
    }

    append(field: string, value: FieldInput): this {
        assertFieldName(field);
        this.push(field, normalizeFieldInput(value));
        return this;
    }

    delete(field: string): this {
        assertFieldName(field);
        this.values.delete(field);
        return this;
    }

    get(field: string): FieldValue[] {
        assertFieldName(field);
        return [...(this.values.get(field) ?? [])];
    }

    has(field: string): boolean {
        assertFieldName(field);
        return this.values.has(field);
    }

    fields(): string[] {
        return Array.from(this.values.keys());
    }

    merge(other: OutputRecord): this {
        for (const field of other.fields()) {
            // Values are already flat; push them as-is so nested arrays survive.
            this.push(field, other.get(field));
        }
        return this;
    }

    clone(): DocumentRecord {
        const copy = new DocumentRecord();
        copy.merge(this);
        return copy;
    }

    toObject(): OutputDocument {
        const document: OutputDocument = {};
        for (const [field, values] of this.values) {
            document[field] = [...values];
        }
        return document;
    }

    private push(field: string, values: readonly FieldValue[]): void {
        if (values.length === 0) {
            return;
        }

        const existing = this.values.get(field);
        if (existing) {
            existing.push(...values);
        }
        else {
            this.values.set(field, [...values]);
        }
    }
}
