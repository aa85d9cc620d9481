/**
 * @fileoverview Forked output record
 *
 * The view of a capsule's output record handed to one bag member. Reads fall
 * through to the capsule's record; writes are collected in a private delta
 * so that members never touch the shared record while the bag is running.
 * The bag applies each delta once every member has finished.
 *
 * @module @capsulepipe/engine/impl/ForkedRecord
 */

import type { FieldInput, FieldValue, OutputDocument, OutputRecord } from "../contracts/OutputRecord.js";
import { DocumentRecord, assertFieldName, normalizeFieldInput } from "./DocumentRecord.js";

/**
 * How a fork changed one field relative to its base.
 */
export type FieldWriteMode = "set" | "append" | "delete";

export class ForkedRecord implements OutputRecord {
    private readonly delta = new DocumentRecord();
    private readonly modes: Map<string, FieldWriteMode> = new Map();

    constructor(private readonly base: OutputRecord) {}

    set(field: string, value: FieldInput): this {
        assertFieldName(field);
        this.modes.set(field, "set");
        this.delta.set(field, value);
        return this;
    }

    append(field: string, value: FieldInput): this {
        this.appendValues(field, normalizeFieldInput(value));
        return this;
    }

    delete(field: string): this {
        assertFieldName(field);
        this.modes.set(field, "delete");
        this.delta.delete(field);
        return this;
    }

    get(field: string): FieldValue[] {
        assertFieldName(field);

        switch (this.modes.get(field)) {
            case undefined:
                return this.base.get(field);
            case "append":
                return [...this.base.get(field), ...this.delta.get(field)];
            case "set":
                return this.delta.get(field);
            case "delete":
                return [];
        }
    }

    has(field: string): boolean {
        assertFieldName(field);

        switch (this.modes.get(field)) {
            case undefined:
                return this.base.has(field);
            case "delete":
                return false;
            default:
                return true;
        }
    }

    fields(): string[] {
        const fields = this.base.fields().filter((field) => this.has(field));
        for (const field of this.modes.keys()) {
            if (!fields.includes(field) && this.has(field)) {
                fields.push(field);
            }
        }
        return fields;
    }

    merge(other: OutputRecord): this {
        for (const field of other.fields()) {
            this.appendValues(field, other.get(field));
        }
        return this;
    }

    clone(): DocumentRecord {
        return DocumentRecord.fromEntries(this.fields().map((field) => [field, this.get(field)] as const));
    }

    toObject(): OutputDocument {
        return this.clone().toObject();
    }

    /**
     * Fields this fork wrote, with the kind of write.
     */
    writes(): ReadonlyMap<string, FieldWriteMode> {
        return this.modes;
    }

    /**
     * Apply this fork's writes to `target`: appended values are merged after the
     * target's own, set fields replace, deleted fields are removed.
     */
    applyTo(target: OutputRecord): void {
        for (const [field, mode] of this.modes) {
            const values = this.delta.get(field);

            if (mode === "delete") {
                target.delete(field);
            }
            else if (mode === "set") {
                target.set(field, []);
                target.merge(DocumentRecord.fromEntries([[field, values]]));
            }
            else {
                target.merge(DocumentRecord.fromEntries([[field, values]]));
            }
        }
    }

    private appendValues(field: string, values: readonly FieldValue[]): void {
        assertFieldName(field);
        if (values.length === 0) {
            return;
        }

        const patch = DocumentRecord.fromEntries([[field, values]]);
        const mode = this.modes.get(field);

        if (mode === "delete") {
            this.modes.set(field, "set");
            this.delta.set(field, []);
        }
        else if (mode === undefined) {
            this.modes.set(field, "append");
        }
        this.delta.merge(patch);
    }
}
