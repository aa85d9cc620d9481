/**
 * @fileoverview Unit tests for Pipeline
 *
 * Tests cover:
 * - End-to-end: bag, then a subpipe with a batch-wide memoized lookup
 * - Capsule-scoped failures reaching neither later steps nor writers
 * - Batching, empty pages, oversized pages, end of input, lifecycle events
 * - Aborts on reader, stage and writer failures
 * - Reader/writer initialize and shutdown
 *
 * @module @capsulepipe/engine/__tests__/Pipeline
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { PipelineBuilder } from "../engine/PipelineBuilder.js";
import { defineStep } from "../contracts/Step.js";
import { CapsuleError } from "../contracts/errors.js";
import type { EventPayload } from "../contracts/EventBus.js";
import type { PipelineLogger } from "../contracts/Logger.js";
import type { CapsuleStream } from "../core/CapsuleStream.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { type Item, ArrayReader, CollectingWriter, createMockLogger } from "./fixtures.js";

/**
 * Create `count` items with ids 1..count
 */
function createItems(count: number): Item[] {
    return Array.from({ length: count }, (_, index) => ({ id: index + 1 }));
}

const idStep = defineStep<Item>("id", (capsule) => {
    capsule.set("id", capsule.input.id);
});

describe("Pipeline", () => {
    let logger: PipelineLogger;
    let eventBus: InMemoryEventBus;
    let events: EventPayload[];

    beforeEach(() => {
        logger = createMockLogger();
        eventBus = new InMemoryEventBus({ logger });
        events = [];
        eventBus.subscribe("*", (event) => {
            events.push(event);
        });
    });

    describe("end to end", () => {
        // Scenario: ids [1,2,3], bag sets id, subpipe sets holdings from one memoized lookup
        it("should build each record from a bag and a memoized batch lookup", async () => {
            const lookup = vi.fn(async (ids: string[]): Promise<Record<string, string>> => {
                const table: Record<string, string> = { 1: "A", 2: "B", 3: "C" };
                return Object.fromEntries(ids.map((id) => [id, table[id]]));
            });
            const holdingsStep = defineStep<Item>("holdings", async (capsule, { stream }) => {
                const table = await stream.memoize("holdings", (batch) =>
                    lookup(Array.from(batch.rewind().each(), (member) => member.id))
                );
                capsule.set("holdings", table[capsule.id]);
            });
            const writer = new CollectingWriter<Item>();

            const pipeline = PipelineBuilder.create<Item>({ logger, eventBus })
                .withCapsules({ idFn: (input) => String(input.id) })
                .readFrom(new ArrayReader(createItems(3)))
                .addBag("fields", idStep)
                .addSubpipe("holdings", holdingsStep)
                .writeTo(writer)
                .build();

            const report = await pipeline.run();

            expect(Object.fromEntries(writer.documents)).toEqual({
                1: { id: [1], holdings: ["A"] },
                2: { id: [2], holdings: ["B"] },
                3: { id: [3], holdings: ["C"] },
            });
            expect(lookup).toHaveBeenCalledTimes(1);
            expect(lookup).toHaveBeenCalledWith(["1", "2", "3"]);
            expect(report).toMatchObject({
                state  : "completed",
                batches: 1,
                read   : 3,
                written: 3,
                errored: 0,
                stages : { fields: "completed", holdings: "completed" },
            });
            expect(report.failure).toBeUndefined();
            expect(pipeline.state).toBe("completed");
        });

        // Scenario: step 2 of a 2-step subpipe fails capsule #2 of 3
        it("should keep a capsule-scoped failure out of the writer", async () => {
            const second = defineStep<Item>("second", (capsule) => {
                if (capsule.input.id === 2) {
                    throw new CapsuleError("record 2 cannot be indexed");
                }
                capsule.set("indexed", true);
            });
            const writer = new CollectingWriter<Item>();
            const write = vi.spyOn(writer, "write");

            const report = await PipelineBuilder.create<Item>({ logger, eventBus })
                .withCapsules({ idFn: (input) => String(input.id) })
                .readFrom(new ArrayReader(createItems(3)))
                .addSubpipe("index", idStep, second)
                .writeTo(writer)
                .build()
                .run();

            expect(report.state).toBe("completed");
            expect(report).toMatchObject({ read: 3, written: 2, errored: 1 });
            expect(Array.from(writer.documents.keys())).toEqual(["1", "3"]);
            expect(writer.documents.get("1")).toEqual({ id: [1], indexed: [true] });
            expect(await write.mock.results[0].value).toEqual({
                writerId: "collect",
                success : true,
                written : 2,
                skipped : 1,
            });
            expect(events.filter((event) => event.type === "capsule:error")).toHaveLength(1);
        });
    });

    describe("batching", () => {
        it("should read in batches of batchSize until the reader is exhausted", async () => {
            const reader = new ArrayReader(createItems(5));
            const read = vi.spyOn(reader, "read");
            const writer = new CollectingWriter<Item>();

            const report = await PipelineBuilder.create<Item>({ logger, eventBus, batchSize: 2 })
                .withCapsules({ idFn: (input) => String(input.id) })
                .readFrom(reader)
                .addBag("fields", idStep)
                .writeTo(writer)
                .build()
                .run();

            expect(read).toHaveBeenCalledTimes(3);
            expect(read).toHaveBeenCalledWith({ batchSize: 2 });
            expect(writer.batches).toEqual([0, 1, 2]);
            expect(report).toMatchObject({ state: "completed", batches: 3, read: 5, written: 5 });
        });

        // Scenario: an empty first read completes without touching stages or writers
        it("should complete with no batches for empty input", async () => {
            const step = vi.fn();
            const writer = new CollectingWriter<Item>();

            const report = await PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(new ArrayReader<Item>([]))
                .addBag("fields", defineStep<Item>("noop", step))
                .writeTo(writer)
                .build()
                .run();

            expect(report).toMatchObject({ state: "completed", batches: 0, read: 0, written: 0, stages: {} });
            expect(step).not.toHaveBeenCalled();
            expect(writer.batches).toEqual([]);
        });

        // Scenario: the reader has nothing yet but says more may follow
        it("should skip an empty page that is not the end of input", async () => {
            const reader = new ArrayReader(createItems(1));
            const read = vi.spyOn(reader, "read").mockResolvedValueOnce({ records: [], hasMore: true });
            const writer = new CollectingWriter<Item>();

            const report = await PipelineBuilder.create<Item>({ logger, eventBus })
                .withCapsules({ idFn: (input) => String(input.id) })
                .readFrom(reader)
                .addBag("fields", idStep)
                .writeTo(writer)
                .build()
                .run();

            expect(read).toHaveBeenCalledTimes(2);
            expect(report).toMatchObject({ state: "completed", batches: 1, read: 1, written: 1 });
            expect(writer.batches).toEqual([0]);
            expect(writer.documents.get("1")).toEqual({ id: [1] });
        });

        it("should abort when the reader returns more than batchSize records", async () => {
            const reader = new ArrayReader(createItems(5));
            vi.spyOn(reader, "read").mockResolvedValueOnce({ records: createItems(5), hasMore: false });
            const writer = new CollectingWriter<Item>();

            const report = await PipelineBuilder.create<Item>({ logger, eventBus, batchSize: 2 })
                .readFrom(reader)
                .addBag("fields", idStep)
                .writeTo(writer)
                .build()
                .run();

            expect(report.state).toBe("aborted");
            expect(report.failure).toEqual({
                batchIndex: 0,
                code      : "READER_ERROR",
                message   : 'Reader "array" returned 5 records for batch 0; batch size is 2',
            });
            expect(report.batches).toBe(0);
            expect(writer.batches).toEqual([]);
        });

        it("should retire every stream after its writers ran", async () => {
            const streams: CapsuleStream<Item>[] = [];
            const writer = new CollectingWriter<Item>();
            const write = writer.write.bind(writer);
            vi.spyOn(writer, "write").mockImplementation(async (stream, context) => {
                streams.push(stream);
                expect(stream.isRetired).toBe(false);
                return write(stream, context);
            });

            await PipelineBuilder.create<Item>({ logger, eventBus, batchSize: 1 })
                .readFrom(new ArrayReader(createItems(2)))
                .addBag("fields", idStep)
                .writeTo(writer)
                .build()
                .run();

            expect(streams).toHaveLength(2);
            expect(streams.every((stream) => stream.isRetired)).toBe(true);
        });

        it("should hand settings to steps and writers", async () => {
            const seen: unknown[] = [];
            const writer = new CollectingWriter<Item>();

            await PipelineBuilder.create<Item>({ logger, eventBus, settings: { index: "books" } })
                .readFrom(new ArrayReader(createItems(1)))
                .addBag("fields", defineStep<Item>("settings", (_capsule, context) => {
                    seen.push(context.settings.index);
                }))
                .writeTo(writer)
                .build()
                .run();

            expect(seen).toEqual(["books"]);
            expect(writer.contexts[0].settings).toEqual({ index: "books" });
            expect(writer.contexts[0].batchIndex).toBe(0);
        });

        it("should call writers in registration order", async () => {
            const calls: string[] = [];
            const first = new CollectingWriter<Item>("first");
            const second = new CollectingWriter<Item>("second");
            for (const writer of [second, first]) {
                const write = writer.write.bind(writer);
                vi.spyOn(writer, "write").mockImplementation(async (stream, context) => {
                    calls.push(writer.id);
                    return write(stream, context);
                });
            }

            await PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(new ArrayReader(createItems(1)))
                .addBag("fields", idStep)
                .writeTo(first)
                .writeTo(second)
                .build()
                .run();

            expect(calls).toEqual(["first", "second"]);
        });
    });

    describe("lifecycle", () => {
        it("should emit lifecycle and batch events in order", async () => {
            await PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(new ArrayReader(createItems(2)))
                .addBag("fields", idStep)
                .writeTo(new CollectingWriter<Item>())
                .build()
                .run();

            expect(events.map((event) => event.type)).toEqual([
                "pipeline:starting",
                "pipeline:started",
                "batch:read",
                "stage:started",
                "stage:completed",
                "batch:written",
                "batch:retired",
                "pipeline:completed",
            ]);

            const batchEvents = events.slice(2, 7);
            const traceId = batchEvents[0].traceId;
            expect(traceId).toMatch(/^tr_[0-9a-z]+_[0-9a-z]+$/);
            expect(batchEvents.every((event) => event.traceId === traceId)).toBe(true);
        });

        it("should initialize and shut down the reader and writers", async () => {
            const reader = new ArrayReader(createItems(1));
            const writer = new CollectingWriter<Item>();

            await PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(reader)
                .addBag("fields", idStep)
                .writeTo(writer)
                .build()
                .run();

            expect(reader.initialize).toHaveBeenCalledTimes(1);
            expect(reader.shutdown).toHaveBeenCalledTimes(1);
            expect(writer.shutdown).toHaveBeenCalledTimes(1);
        });

        it("should run only once", async () => {
            const pipeline = PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(new ArrayReader(createItems(1)))
                .addBag("fields", idStep)
                .build();

            await pipeline.run();

            await expect(pipeline.run()).rejects.toThrow("Pipeline cannot run: it is completed");
        });

        it("should log shutdown failures without changing the outcome", async () => {
            const reader = new ArrayReader(createItems(1));
            reader.shutdown.mockRejectedValue(new Error("handle already closed"));

            const report = await PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(reader)
                .addBag("fields", idStep)
                .build()
                .run();

            expect(report.state).toBe("completed");
            expect(logger.error).toHaveBeenCalledWith("Shutdown error", {
                component: "array",
                error    : "handle already closed",
            });
        });
    });

    describe("aborts", () => {
        it("should abort on a reader failure", async () => {
            const reader = new ArrayReader(createItems(3));
            vi.spyOn(reader, "read").mockRejectedValue(new Error("disk gone"));
            const writer = new CollectingWriter<Item>();

            const pipeline = PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(reader)
                .addBag("fields", idStep)
                .writeTo(writer)
                .build();
            const report = await pipeline.run();

            expect(pipeline.state).toBe("aborted");
            expect(report.state).toBe("aborted");
            expect(report.failure).toEqual({
                batchIndex: 0,
                code      : "READER_ERROR",
                message   : 'Reader "array" failed on batch 0: disk gone',
            });
            expect(reader.shutdown).toHaveBeenCalledTimes(1);
            expect(writer.shutdown).toHaveBeenCalledTimes(1);
            expect(events.at(-1)?.type).toBe("pipeline:aborted");
        });

        it("should abort on a reader that cannot initialize", async () => {
            const reader = new ArrayReader(createItems(1));
            reader.initialize.mockRejectedValue(new Error("no such file"));

            const report = await PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(reader)
                .addBag("fields", idStep)
                .build()
                .run();

            expect(report.failure).toEqual({
                batchIndex: 0,
                code      : "READER_ERROR",
                message   : 'Reader "array" failed to initialize: no such file',
            });
            expect(report.batches).toBe(0);
        });

        // Scenario: a non-capsule error in batch 1 aborts after batch 0 was written
        it("should abort on a stage failure and keep earlier batches", async () => {
            const fragile = defineStep<Item>("fragile", (capsule) => {
                if (capsule.input.id === 2) {
                    throw new Error("boom");
                }
            });
            const writer = new CollectingWriter<Item>();

            const report = await PipelineBuilder.create<Item>({ logger, eventBus, batchSize: 1 })
                .withCapsules({ idFn: (input) => String(input.id) })
                .readFrom(new ArrayReader(createItems(3)))
                .addBag("fields", idStep, fragile)
                .writeTo(writer)
                .build()
                .run();

            expect(report).toMatchObject({
                state  : "aborted",
                batches: 2,
                read   : 2,
                written: 1,
                stages : { fields: "failed" },
                failure: {
                    batchIndex: 1,
                    stage     : "fields",
                    step      : "fragile",
                    code      : "STAGE_FAILURE",
                    message   : 'Step "fragile" failed on capsule 2: boom',
                },
            });
            expect(writer.batches).toEqual([0]);
        });

        it("should abort when a capsule error is fatal under onCapsuleError abort", async () => {
            const strict = defineStep<Item>("strict", () => {
                throw new CapsuleError("missing title");
            });

            const report = await PipelineBuilder.create<Item>({ logger, eventBus, onCapsuleError: "abort" })
                .withCapsules({ idFn: (input) => String(input.id) })
                .readFrom(new ArrayReader(createItems(1)))
                .addSubpipe("titles", strict)
                .build()
                .run();

            expect(report.failure).toMatchObject({
                stage  : "titles",
                step   : "strict",
                code   : "STAGE_FAILURE",
                message: 'Capsule 1 failed in step "strict": missing title',
            });
        });

        it("should abort when a writer reports failure", async () => {
            const writer = new CollectingWriter<Item>();
            vi.spyOn(writer, "write").mockResolvedValue({
                writerId: "collect",
                success : false,
                written : 0,
                skipped : 0,
                error   : "disk full",
            });

            const report = await PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(new ArrayReader(createItems(2)))
                .addBag("fields", idStep)
                .writeTo(writer)
                .build()
                .run();

            expect(report.failure).toEqual({
                batchIndex: 0,
                code      : "WRITER_ERROR",
                message   : 'Writer "collect" rejected batch 0: disk full',
            });
            expect(report.written).toBe(0);
        });

        it("should abort when a writer throws", async () => {
            const writer = new CollectingWriter<Item>();
            vi.spyOn(writer, "write").mockRejectedValue(new Error("connection reset"));

            const report = await PipelineBuilder.create<Item>({ logger, eventBus })
                .readFrom(new ArrayReader(createItems(1)))
                .addBag("fields", idStep)
                .writeTo(writer)
                .build()
                .run();

            expect(report.failure).toEqual({
                batchIndex: 0,
                code      : "WRITER_ERROR",
                message   : 'Writer "collect" failed on batch 0: connection reset',
            });
            expect(logger.error).toHaveBeenCalledWith("Pipeline aborted", report.failure);
        });
    });
});
