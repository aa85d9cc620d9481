/**
 * @fileoverview Shared test doubles for stage and pipeline tests
 *
 * @module @capsulepipe/engine/__tests__/fixtures
 */

import { vi } from "vitest";
import type { PipelineLogger } from "../contracts/Logger.js";
import type { RecordReader, ReadOptions, ReadResult } from "../contracts/RecordReader.js";
import type { RecordWriter, WriteContext, WriteResult } from "../contracts/RecordWriter.js";
import type { StageContext } from "../contracts/Stage.js";
import type { OutputDocument } from "../contracts/OutputRecord.js";
import { Capsule } from "../core/Capsule.js";
import { CapsuleStream } from "../core/CapsuleStream.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

export interface Item {
    id: number;
}

/**
 * Create a logger whose methods are all mocks
 */
export function createMockLogger(): PipelineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Create a stream of capsules identified by their input id
 */
export function createItemStream(ids: number[], batchIndex = 0): CapsuleStream<Item> {
    const capsules = ids.map((id) => new Capsule<Item>({ id }, { idFn: (input) => String(input.id) }));
    return new CapsuleStream(capsules, { batchIndex, traceId: "tr_test" });
}

/**
 * Create a stage context with sensible test defaults
 */
export function createStageContext(overrides: Partial<StageContext> = {}): StageContext {
    return {
        parentPath     : "",
        settings       : {},
        logger         : createMockLogger(),
        eventBus       : new InMemoryEventBus(),
        signal         : new AbortController().signal,
        workerPoolSize : 1,
        onCapsuleError : "skip",
        onFieldConflict: "warn",
        ...overrides,
    };
}

/**
 * Reader returning the given records in batches
 */
export class ArrayReader<T> implements RecordReader<T> {
    readonly id = "array";
    readonly name = "Array Reader";
    readonly initialize = vi.fn(async (): Promise<void> => {});
    readonly shutdown = vi.fn(async (): Promise<void> => {});
    private offset = 0;

    constructor(private readonly items: readonly T[]) {}

    async read({ batchSize }: ReadOptions): Promise<ReadResult<T>> {
        const records = this.items.slice(this.offset, this.offset + batchSize);
        this.offset += records.length;
        return { records, hasMore: this.offset < this.items.length };
    }
}

/**
 * Writer collecting the output documents of every batch, keyed by capsule id
 */
export class CollectingWriter<T> implements RecordWriter<T> {
    readonly id: string;
    readonly documents = new Map<string, OutputDocument>();
    readonly batches: number[] = [];
    readonly contexts: WriteContext[] = [];
    readonly shutdown = vi.fn(async (): Promise<void> => {});

    constructor(id = "collect") {
        this.id = id;
    }

    async write(stream: CapsuleStream<T>, context: WriteContext): Promise<WriteResult> {
        this.batches.push(context.batchIndex);
        this.contexts.push(context);
        for (const capsule of stream) {
            this.documents.set(capsule.id, capsule.output.toObject());
        }
        return {
            writerId: this.id,
            success : true,
            written : stream.active().length,
            skipped : stream.errored().length,
        };
    }
}
