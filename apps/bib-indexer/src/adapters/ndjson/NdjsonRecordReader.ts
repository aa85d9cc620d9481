/**
 * @fileoverview NDJSON Record Reader
 *
 * Reads bibliographic records from a newline-delimited JSON file, one record
 * per line. Blank lines are skipped. A line that is not a valid record stops
 * the run with an {@link NdjsonLineError} naming the line.
 *
 * @module adapters/ndjson/NdjsonRecordReader
 */

import { createReadStream, existsSync, type ReadStream } from "fs";
import { createInterface, type Interface } from "readline";
import {
    ReaderError,
    describeError,
    type ReadOptions,
    type ReadResult,
    type RecordReader,
} from "@capsulepipe/engine";
import { isBibRecord, type BibRecord } from "../../domain/entities/BibRecord.js";

/**
 * A line of the input that is not a bibliographic record.
 */
export class NdjsonLineError extends ReaderError {
    readonly line: number;

    constructor(message: string, options: { readerId: string; line: number; cause?: unknown }) {
        super(`Line ${options.line}: ${message}`, { readerId: options.readerId, cause: options.cause });
        this.name = "NdjsonLineError";
        this.line = options.line;
    }
}

/**
 * NDJSON reader
 *
 * @example
 * ```typescript
 * const reader = new NdjsonRecordReader("./data/records.ndjson");
 * await reader.initialize();
 *
 * const { records, hasMore, cursor } = await reader.read({ batchSize: 100 });
 * // cursor is the number of lines consumed so far
 * ```
 */
export class NdjsonRecordReader implements RecordReader<BibRecord> {
    readonly id = "ndjson-records";
    readonly name = "NDJSON Record Reader";
    readonly description = "Reads one bibliographic record per line of a JSON lines file";

    private readonly filePath: string;
    private input: ReadStream | null = null;
    private lineReader: Interface | null = null;
    private lines: AsyncIterator<string> | null = null;
    private lineNumber = 0;
    private exhausted = false;

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    async initialize(): Promise<void> {
        if (this.lineReader) {
            return;
        }
        if (!existsSync(this.filePath)) {
            throw new ReaderError(`Input file not found: ${this.filePath}`, { readerId: this.id });
        }

        this.input = createReadStream(this.filePath, { encoding: "utf-8" });
        this.lineReader = createInterface({
            input    : this.input,
            crlfDelay: Infinity,
        });
        this.lines = this.lineReader[Symbol.asyncIterator]();
    }

    async read({ batchSize }: ReadOptions): Promise<ReadResult<BibRecord>> {
        if (!this.lines) {
            throw new ReaderError("Reader not initialized. Call initialize() first.", { readerId: this.id });
        }

        const records: BibRecord[] = [];
        while (!this.exhausted && records.length < batchSize) {
            const next = await this.lines.next();
            if (next.done) {
                this.exhausted = true;
                break;
            }

            this.lineNumber += 1;
            const line = next.value.trim();
            if (line !== "") {
                records.push(this.parseLine(line));
            }
        }

        return {
            records,
            hasMore: !this.exhausted,
            cursor : String(this.lineNumber),
        };
    }

    /**
     * Close the line reader and the file behind it, also mid-file.
     */
    async shutdown(): Promise<void> {
        this.lineReader?.close();
        this.input?.destroy();
        this.input = null;
        this.lineReader = null;
        this.lines = null;
    }

    private parseLine(line: string): BibRecord {
        let parsed: unknown;
        try {
            parsed = JSON.parse(line);
        }
        catch (error) {
            throw new NdjsonLineError(`malformed JSON (${describeError(error)})`, {
                readerId: this.id,
                line    : this.lineNumber,
                cause   : error,
            });
        }

        if (!isBibRecord(parsed)) {
            throw new NdjsonLineError("not a bibliographic record", {
                readerId: this.id,
                line    : this.lineNumber,
            });
        }
        return parsed;
    }
}
