/**
 * @fileoverview Capsule
 *
 * The unit of work: one input record, the output record being built from
 * it, and a private cache. The output record and cache belong to the capsule
 * until the writers have consumed it.
 *
 * @module @capsulepipe/engine/core/Capsule
 */

import { randomUUID } from "crypto";
import type { FieldInput, FieldValue, OutputRecord } from "../contracts/OutputRecord.js";
import type { Store } from "../contracts/Store.js";
import type { CapsuleError } from "../contracts/errors.js";
import { DocumentRecord } from "../impl/DocumentRecord.js";
import { ForkedRecord } from "../impl/ForkedRecord.js";
import { SimpleStore } from "../impl/SimpleStore.js";

/**
 * Pluggable parts of a capsule.
 */
export interface CapsuleOptions<TInput> {
    /** Builds the output record for an input record (default: empty DocumentRecord) */
    readonly outputRecordFactory?: (input: TInput) => OutputRecord;

    /** Builds the private cache (default: empty SimpleStore) */
    readonly cacheFactory?: () => Store;

    /** Derives the capsule id from the input record */
    readonly idFn?: (input: TInput) => string;
}

/**
 * Capsule - input record, output record, cache.
 *
 * Record-specific conveniences belong in adapter types that wrap a capsule,
 * not in subclasses that forward to the input record. Subclasses may
 * override {@link Capsule.computeId} to derive the id lazily.
 *
 * @example
 * ```typescript
 * const capsule = new Capsule({ id: 1, title: "Moby Dick" }, {
 *     idFn: (input) => String(input.id),
 * });
 *
 * capsule.set("title", capsule.input.title);
 * capsule.get("title"); // ["Moby Dick"]
 * capsule.id;           // "1"
 * ```
 */
export class Capsule<TInput = unknown> {
    readonly input: TInput;

    protected outputRecord: OutputRecord;
    protected store: Store;

    private readonly idFn?: (input: TInput) => string;
    private cachedId?: string;
    private failure?: CapsuleError;

    constructor(input: TInput, options: CapsuleOptions<TInput> = {}) {
        this.input = input;
        this.outputRecord = options.outputRecordFactory?.(input) ?? new DocumentRecord();
        this.store = options.cacheFactory?.() ?? new SimpleStore();
        this.idFn = options.idFn;
    }

    /**
     * Stable identifier, computed on first access and memoized.
     */
    get id(): string {
        if (this.cachedId === undefined) {
            this.cachedId = this.idFn ? this.idFn(this.input) : this.computeId();
        }
        return this.cachedId;
    }

    get output(): OutputRecord {
        return this.outputRecord;
    }

    get cache(): Store {
        return this.store;
    }

    get error(): CapsuleError | undefined {
        return this.failure;
    }

    get isErrored(): boolean {
        return this.failure !== undefined;
    }

    set(field: string, value: FieldInput): this {
        this.outputRecord.set(field, value);
        return this;
    }

    append(field: string, value: FieldInput): this {
        this.outputRecord.append(field, value);
        return this;
    }

    delete(field: string): this {
        this.outputRecord.delete(field);
        return this;
    }

    get(field: string): FieldValue[] {
        return this.outputRecord.get(field);
    }

    merge(other: OutputRecord): this {
        this.outputRecord.merge(other);
        return this;
    }

    /**
     * Flag the capsule as errored. The first failure wins.
     */
    fail(error: CapsuleError): void {
        if (this.failure) {
            return;
        }
        error.capsuleId ??= this.id;
        this.failure = error;
    }

    /**
     * A capsule sharing this capsule's input, id and cache whose writes are
     * collected in a {@link ForkedRecord} over this capsule's output record.
     */
    fork(): ForkedCapsule<TInput> {
        return new ForkedCapsule(this);
    }

    /**
     * Drop the output record and cache once the capsule has left the pipeline.
     */
    release(): void {
        this.outputRecord = new DocumentRecord();
        this.store = new SimpleStore();
    }

    /**
     * Id used when no `idFn` was given. Deployment capsule variants override this.
     */
    protected computeId(): string {
        return randomUUID();
    }
}

/**
 * The view of a capsule given to one bag member.
 */
export class ForkedCapsule<TInput = unknown> extends Capsule<TInput> {
    readonly parent: Capsule<TInput>;
    readonly record: ForkedRecord;

    constructor(parent: Capsule<TInput>) {
        const record = new ForkedRecord(parent.output);
        super(parent.input, {
            outputRecordFactory: () => record,
            cacheFactory       : () => parent.cache,
            idFn               : () => parent.id,
        });
        this.parent = parent;
        this.record = record;
    }

    /**
     * Failures on a fork are recorded on the capsule it was forked from.
     */
    override fail(error: CapsuleError): void {
        this.parent.fail(error);
    }

    override get error(): CapsuleError | undefined {
        return this.parent.error;
    }

    override get isErrored(): boolean {
        return this.parent.isErrored;
    }
}
