/**
 * @fileoverview SQLite Document Writer
 *
 * Upserts one row per finished capsule: `(id, document JSON, batch_index)`.
 * Each batch is written in a single transaction, so a batch is either
 * fully stored or not at all.
 *
 * @module adapters/sqlite/SqliteDocumentWriter
 */

import Database from "better-sqlite3";
import type {
    CapsuleStream,
    RecordWriter,
    WriteContext,
    WriteResult,
} from "@capsulepipe/engine";
import type { BibRecord } from "../../domain/entities/BibRecord.js";

/**
 * Stored document row
 */
export interface DocumentRow {
    id: string;
    document: string;
    batch_index: number;
}

/**
 * SQLite writer for output documents.
 *
 * @example
 * ```typescript
 * builder.writeTo(new SqliteDocumentWriter("./data/index.db"));
 * ```
 */
export class SqliteDocumentWriter implements RecordWriter<BibRecord> {
    readonly id = "sqlite-documents";
    readonly name = "SQLite Document Writer";
    readonly description = "Upserts output documents into a SQLite table";

    private db: Database.Database | null = null;
    private readonly source: string | Database.Database;

    /**
     * @param source - Path to the database file, or an open connection the caller closes
     */
    constructor(source: string | Database.Database) {
        this.source = source;
    }

    /**
     * Open the database and create the documents table.
     */
    async initialize(): Promise<void> {
        if (this.db) {
            return;
        }

        this.db = typeof this.source === "string" ? new Database(this.source) : this.source;
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS documents (
                id          TEXT PRIMARY KEY,
                document    TEXT NOT NULL,
                batch_index INTEGER NOT NULL
            )
        `);
    }

    async write(stream: CapsuleStream<BibRecord>, context: WriteContext): Promise<WriteResult> {
        if (!this.db) {
            throw new Error("Writer not initialized. Call initialize() first.");
        }

        const upsert = this.db.prepare(`
            INSERT INTO documents (id, document, batch_index)
            VALUES (@id, @document, @batchIndex)
            ON CONFLICT(id) DO UPDATE SET
                document    = excluded.document,
                batch_index = excluded.batch_index
        `);

        const capsules = stream.active();
        const writeBatch = this.db.transaction(() => {
            for (const capsule of capsules) {
                upsert.run({
                    id        : capsule.id,
                    document  : JSON.stringify(capsule.output.toObject()),
                    batchIndex: context.batchIndex,
                });
            }
        });
        writeBatch();

        context.logger.debug("Batch stored", { batchIndex: context.batchIndex, documents: capsules.length });

        return {
            writerId: this.id,
            success : true,
            written : capsules.length,
            skipped : stream.errored().length,
        };
    }

    /**
     * Close the database if this writer opened it.
     */
    async shutdown(): Promise<void> {
        if (this.db && typeof this.source === "string") {
            this.db.close();
        }
        this.db = null;
    }
}
