/**
 * @fileoverview NDJSON Document Writer
 *
 * Appends one `{ "id": ..., "document": {...} }` line per finished capsule.
 *
 * @module adapters/ndjson/NdjsonDocumentWriter
 */

import { appendFile, writeFile } from "fs/promises";
import type {
    CapsuleStream,
    RecordWriter,
    WriteContext,
    WriteResult,
} from "@capsulepipe/engine";
import type { BibRecord } from "../../domain/entities/BibRecord.js";

/**
 * Configuration for the NDJSON writer
 */
export interface NdjsonDocumentWriterConfig {
    /** Keep what the file already holds instead of truncating it (default: false) */
    append?: boolean;
}

export class NdjsonDocumentWriter implements RecordWriter<BibRecord> {
    readonly id = "ndjson-documents";
    readonly name = "NDJSON Document Writer";

    private readonly filePath: string;
    private readonly append: boolean;

    constructor(filePath: string, config: NdjsonDocumentWriterConfig = {}) {
        this.filePath = filePath;
        this.append = config.append ?? false;
    }

    async initialize(): Promise<void> {
        if (!this.append) {
            await writeFile(this.filePath, "", "utf-8");
        }
    }

    async write(stream: CapsuleStream<BibRecord>, context: WriteContext): Promise<WriteResult> {
        const lines: string[] = [];
        for (const capsule of stream) {
            lines.push(JSON.stringify({ id: capsule.id, document: capsule.output.toObject() }));
        }

        if (lines.length > 0) {
            await appendFile(this.filePath, `${lines.join("\n")}\n`, "utf-8");
        }
        context.logger.debug("Batch appended", { batchIndex: context.batchIndex, lines: lines.length });

        return {
            writerId: this.id,
            success : true,
            written : lines.length,
            skipped : stream.errored().length,
        };
    }
}
