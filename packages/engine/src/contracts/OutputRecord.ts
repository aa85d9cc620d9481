/**
 * Output Record Contract
 *
 * The accumulating result document of a capsule. Every field holds a flat,
 * ordered sequence of values, even when the value is logically singular.
 */

/**
 * A value as stored in a field sequence.
 */
export type FieldValue = unknown;

/**
 * Argument accepted by `set` and `append`: a scalar, or a sequence that is
 * flattened one level before it is stored.
 */
export type FieldInput = FieldValue | readonly FieldValue[];

/**
 * Plain-object rendering of an output record.
 */
export type OutputDocument = Record<string, FieldValue[]>;

/**
 * Field-level document operations.
 *
 * Rules:
 * - `get` on an absent field returns an empty sequence
 * - `set` replaces the sequence, `append` concatenates onto it
 * - `append` with an empty sequence is a no-op
 * - `merge` appends the other record's sequences, field by field
 *
 * @example
 * ```typescript
 * record.set("title", "Moby Dick");
 * record.append("subject", ["Whales", "Sea stories"]);
 * record.get("subject"); // ["Whales", "Sea stories"]
 * record.get("missing"); // []
 * ```
 */
export interface OutputRecord {
    /**
     * Replace the field's sequence.
     */
    set(field: string, value: FieldInput): this;

    /**
     * Concatenate values onto the field's sequence.
     */
    append(field: string, value: FieldInput): this;

    /**
     * Remove the field entirely.
     */
    delete(field: string): this;

    /**
     * The field's values, or `[]` when absent. The result is a copy.
     */
    get(field: string): FieldValue[];

    /**
     * Whether the field is present.
     */
    has(field: string): boolean;

    /**
     * Present field names, in first-written order.
     */
    fields(): string[];

    /**
     * Append every field of `other` after this record's values and return this record.
     */
    merge(other: OutputRecord): this;

    /**
     * An independent copy of this record.
     */
    clone(): OutputRecord;

    /**
     * Plain-object rendering, suitable for serialization.
     */
    toObject(): OutputDocument;
}
