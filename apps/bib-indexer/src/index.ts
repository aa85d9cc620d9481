/**
 * @fileoverview Bib Indexer - Main Entry Point
 *
 * Reads bibliographic records from NDJSON, builds one output document per
 * record and stores the documents in SQLite and/or NDJSON.
 *
 * Step loading order:
 * 1. Built-in field steps (id, author, language, ISBN)
 * 2. System steps (./plugins/system) - YAML field mappings
 * 3. User steps (settings.userStepsDir) - custom mappings and code steps
 *
 * @module bib-indexer
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

// Engine
import { consoleLogger, type PipelineReport, type RecordWriter } from "@capsulepipe/engine";

// Domain components
import { kNO_HOLDINGS, type BibRecord } from "./domain/index.js";
import {
    HoldingsDatabase,
    NdjsonDocumentWriter,
    NdjsonRecordReader,
    SqliteDocumentWriter,
} from "./adapters/index.js";
import { createIndexerPipeline } from "./pipeline.js";

// Config loader
import { loadSettings, type IndexerSettings } from "./config/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Writers named by the settings.
 */
function createWriters(settings: IndexerSettings): RecordWriter<BibRecord>[] {
    const writers: RecordWriter<BibRecord>[] = [];
    if (settings.sqliteOutputPath) {
        writers.push(new SqliteDocumentWriter(settings.sqliteOutputPath));
    }
    if (settings.ndjsonOutputPath) {
        writers.push(new NdjsonDocumentWriter(settings.ndjsonOutputPath));
    }
    return writers;
}

/**
 * Index every record of the configured input.
 *
 * @param settingsPath - Path to settings.yml
 * @returns Report of the run
 */
async function runIndexer(settingsPath: string): Promise<PipelineReport> {
    const settings = loadSettings(settingsPath);
    const writers = createWriters(settings);
    if (writers.length === 0) {
        console.warn("[WARN] No output configured; documents will be built and discarded");
    }

    const holdings = settings.holdingsDbPath ? new HoldingsDatabase(settings.holdingsDbPath) : null;
    holdings?.open();

    try {
        const stepDirs = [join(__dirname, "..", "plugins", "system")];
        if (settings.userStepsDir) {
            stepDirs.push(settings.userStepsDir);
        }

        const pipeline = await createIndexerPipeline({
            settings,
            reader  : new NdjsonRecordReader(settings.inputPath),
            writers,
            holdings: holdings ?? kNO_HOLDINGS,
            stepDirs,
            logger  : consoleLogger,
        });

        // Subscribe to pipeline events for observability
        pipeline.eventBus.subscribe("batch:written", (event) => {
            console.log(`[BATCH] ${String(event.data?.batchIndex)} written by ${String(event.data?.writerId)}`);
        });

        pipeline.eventBus.subscribe("capsule:error", (event) => {
            console.warn(`[SKIPPED] ${String(event.data?.capsuleId)} at ${String(event.data?.stage)}: ${String(event.data?.error)}`);
        });

        pipeline.eventBus.subscribe("contract:violation", (event) => {
            console.warn("[CONFLICT]", event.data);
        });

        pipeline.eventBus.subscribe("pipeline:aborted", (event) => {
            console.error("[PIPELINE ABORTED]", event.data);
        });

        return await pipeline.run();
    }
    finally {
        holdings?.close();
    }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    console.log("=".repeat(60));
    console.log("Bib Indexer v0.1.0");
    console.log("=".repeat(60));

    // Parse CLI args
    const [settingsArg] = process.argv.slice(2);
    const settingsPath = settingsArg ?? join(__dirname, "..", "config", "settings.yml");

    const report = await runIndexer(settingsPath);

    console.log(
        `\n[DONE] ${report.state}: ${report.read} read, ${report.written} written, ` +
        `${report.errored} skipped in ${report.batches} batches (${report.duration}ms)`
    );
    process.exitCode = report.state === "completed" ? 0 : 1;
}

main().catch((error: unknown) => {
    console.error("[FATAL] Failed to run indexer:", error);
    process.exitCode = 1;
});
