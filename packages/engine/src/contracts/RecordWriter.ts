/**
 * RecordWriter Contract
 *
 * Writers consume finished batches and persist their output records.
 * Writers own their idempotence: the pipeline never retries a write.
 */

import type { CapsuleStream } from "../core/CapsuleStream.js";
import type { PipelineLogger } from "./Logger.js";

/**
 * Context provided to a writer for one batch.
 */
export interface WriteContext {
    /** Zero-based index of the batch */
    readonly batchIndex: number;

    /** Trace ID of the batch */
    readonly traceId: string;

    /** Read-only settings passed to the pipeline at build time */
    readonly settings: Readonly<Record<string, unknown>>;

    /** Logger scoped to the writer */
    readonly logger: PipelineLogger;
}

/**
 * Result of writing one batch.
 */
export interface WriteResult {
    /** Identifier of the writer */
    readonly writerId: string;

    /** Whether the batch was persisted */
    readonly success: boolean;

    /** Capsules persisted */
    readonly written: number;

    /** Errored capsules left out */
    readonly skipped: number;

    /** Error message if the write failed */
    readonly error?: string;
}

/**
 * RecordWriter interface.
 *
 * Rules:
 * - Skip capsules flagged as errored (`stream.errored()`)
 * - Return `success: false` or throw to abort the pipeline
 *
 * @example
 * ```typescript
 * const consoleWriter: RecordWriter = {
 *     id: "console",
 *     async write(stream) {
 *         for (const capsule of stream) {
 *             console.log(capsule.id, capsule.output.toObject());
 *         }
 *         return { writerId: "console", success: true, written: stream.active().length, skipped: stream.errored().length };
 *     },
 * };
 * ```
 */
export interface RecordWriter<TInput = unknown> {
    /** Unique identifier for this writer */
    readonly id: string;

    /** Optional human-readable name */
    readonly name?: string;

    /** Optional description */
    readonly description?: string;

    /**
     * Open the destination. Called once before the first batch.
     */
    initialize?(): Promise<void>;

    /**
     * Persist one finished batch.
     *
     * @param stream - The batch; iterate it to get the non-errored capsules
     * @param context - Batch identity, settings and logger
     */
    write(stream: CapsuleStream<TInput>, context: WriteContext): Promise<WriteResult>;

    /**
     * Close the destination. Called once when the run ends, completed or aborted.
     */
    shutdown?(): Promise<void>;
}
