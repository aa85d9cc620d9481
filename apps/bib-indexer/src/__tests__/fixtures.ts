/**
 * @fileoverview Record builders and test doubles
 *
 * @module __tests__/fixtures
 */

import { vi } from "vitest";
import {
    Capsule,
    CapsuleStream,
    type OutputDocument,
    type PipelineLogger,
    type ReadOptions,
    type ReadResult,
    type RecordReader,
    type RecordWriter,
    type Step,
    type WriteContext,
    type WriteResult,
} from "@capsulepipe/engine";
import type { BibRecord, ControlField, DataField } from "../domain/entities/BibRecord.js";
import { bibCapsuleOptions } from "../domain/capsules/BibCapsule.js";

export function control(tag: string, value: string): ControlField {
    return { tag, value };
}

/**
 * Data field from `[code, value]` pairs
 */
export function data(tag: string, ind1: string, ind2: string, ...subfields: [string, string][]): DataField {
    return { tag, ind1, ind2, subfields: subfields.map(([code, value]) => ({ code, value })) };
}

/**
 * 40-character 008 with `language` at bytes 35-37
 */
export function fixedField(language: string): ControlField {
    return control("008", `${"".padEnd(35, "x")}${language}  `);
}

export const kMOBY_DICK: BibRecord = {
    fields: [
        control("001", "b1000001"),
        fixedField("eng"),
        data("020", " ", " ", ["a", "0-14-039084-7 (pbk.)"]),
        data("020", " ", " ", ["a", "9780140390841"]),
        data("100", "1", " ", ["a", "Melville, Herman,"], ["d", "1819-1891."]),
        data("245", "1", "0", ["a", "Moby Dick :"], ["b", "or, The whale /"], ["c", "Herman Melville."]),
        data("260", " ", " ", ["a", "New York :"], ["b", "Harper & Brothers,"], ["c", "1851."]),
        data("650", " ", "0", ["a", "Whales"], ["v", "Fiction."]),
        data("650", " ", "0", ["a", "Sea stories."]),
    ],
};

export const kTHE_PRAIRIE: BibRecord = {
    id    : "rec-2",
    fields: [
        control("008", "short"),
        data("041", "0", " ", ["a", "eng"], ["a", "FRE"]),
        data("110", "2", " ", ["a", "Prairie   Society."]),
        data("245", "0", "4", ["a", "The prairie."]),
        data("264", " ", "1", ["a", "Boston :"], ["b", "Ticknor,"]),
        data("651", " ", "0", ["a", "Great Plains."]),
    ],
};

export function createMockLogger(): PipelineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

export function bibCapsule(record: BibRecord): Capsule<BibRecord> {
    return new Capsule(record, bibCapsuleOptions());
}

/**
 * Run a step over one capsule of its own stream
 */
export async function runStep(step: Step<BibRecord>, capsule: Capsule<BibRecord>, logger = createMockLogger()): Promise<void> {
    await step.process(capsule, {
        stream  : new CapsuleStream([capsule]),
        stage   : "test",
        settings: {},
        logger,
        traceId : "tr_test",
        signal  : new AbortController().signal,
    });
}

/**
 * Reader returning the given records in batches
 */
export class ArrayRecordReader implements RecordReader<BibRecord> {
    readonly id = "array";
    readonly name = "Array Reader";
    private offset = 0;

    constructor(private readonly records: readonly BibRecord[]) {}

    async read({ batchSize }: ReadOptions): Promise<ReadResult<BibRecord>> {
        const records = this.records.slice(this.offset, this.offset + batchSize);
        this.offset += records.length;
        return { records, hasMore: this.offset < this.records.length };
    }
}

/**
 * Writer collecting output documents by capsule id
 */
export class CollectingWriter implements RecordWriter<BibRecord> {
    readonly id = "collect";
    readonly documents = new Map<string, OutputDocument>();

    async write(stream: CapsuleStream<BibRecord>): Promise<WriteResult> {
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

export function writeContext(batchIndex = 0, logger = createMockLogger()): WriteContext {
    return { batchIndex, traceId: "tr_test", settings: {}, logger };
}
