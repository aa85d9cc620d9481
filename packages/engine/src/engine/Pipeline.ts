/**
 * @fileoverview Pipeline
 *
 * The top-level orchestrator.
 *
 * Pipeline flow, per batch:
 * 1. Pull the next batch of records from the reader
 * 2. Wrap each record in a capsule and the batch in a capsule stream
 * 3. Run the stream through every stage, in declared order
 * 4. Hand the stream to every writer, in declared order
 * 5. Retire the stream
 *
 * Empty pages are skipped; only `hasMore: false` ends the input.
 * The run ends when the reader is exhausted (completed) or on the first
 * stage, reader or writer failure (aborted). Nothing is retried here.
 *
 * @module @capsulepipe/engine/engine/Pipeline
 */

import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import type { RecordReader, ReadResult } from "../contracts/RecordReader.js";
import type { RecordWriter, WriteResult } from "../contracts/RecordWriter.js";
import type { Stage, StageContext } from "../contracts/Stage.js";
import { createEvent } from "../contracts/EventBus.js";
import {
    type PipelineErrorCode,
    PipelineError,
    ReaderError,
    StageFailure,
    WriterError,
    describeError,
} from "../contracts/errors.js";
import type { Capsule } from "../core/Capsule.js";
import type { CapsuleStream, StreamFactory } from "../core/CapsuleStream.js";
import type { StageStatus } from "../core/StageRun.js";
import { scopeLogger } from "../impl/logging.js";
import type { ResolvedPipelineConfig } from "./PipelineConfig.js";

export type PipelineState = "idle" | "running" | "completed" | "aborted";

/**
 * Builds the capsule for one input record.
 */
export type CapsuleFactory<TInput> = (input: TInput) => Capsule<TInput>;

/**
 * Everything a pipeline runs, fixed at build time.
 */
export interface PipelineDefinition<TInput, TStream extends CapsuleStream<TInput>> {
    readonly reader: RecordReader<TInput>;
    readonly stages: readonly Stage<TInput, TStream>[];
    readonly writers: readonly RecordWriter<TInput>[];
    readonly capsuleFactory: CapsuleFactory<TInput>;
    readonly streamFactory: StreamFactory<TInput, TStream>;
}

/**
 * Where and why a run aborted.
 */
export interface PipelineFailure {
    readonly batchIndex: number;
    readonly stage?: string;
    readonly step?: string;
    readonly code: PipelineErrorCode;
    readonly message: string;
}

/**
 * Outcome of a run.
 */
export interface PipelineReport {
    readonly state: "completed" | "aborted";

    /** Batches read, including the one that failed */
    readonly batches: number;

    /** Capsules created from input records */
    readonly read: number;

    /** Capsules handed to the writers */
    readonly written: number;

    /** Capsules excluded by a CapsuleError */
    readonly errored: number;

    /** Last status of each top-level stage */
    readonly stages: Readonly<Record<string, StageStatus>>;

    readonly failure?: PipelineFailure;

    /** Wall-clock duration in milliseconds */
    readonly duration: number;
}

interface RunTally {
    batches: number;
    read: number;
    written: number;
    errored: number;
    stages: Record<string, StageStatus>;
}

/**
 * Generate a unique trace ID for one batch.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * Pipeline - pulls batches, runs stages, hands batches to writers.
 *
 * Built with {@link PipelineBuilder}; runs once.
 *
 * @example
 * ```typescript
 * const pipeline = PipelineBuilder.create<BibRecord>({ batchSize: 50 })
 *     .readFrom(reader)
 *     .addBag("fields", authorStep, languageStep)
 *     .addSubpipe("titles", titleStep, filingTitleStep)
 *     .writeTo(writer)
 *     .build();
 *
 * pipeline.eventBus.subscribe("capsule:error", (event) => {
 *     console.warn("Capsule failed:", event.data);
 * });
 *
 * const report = await pipeline.run();
 * ```
 */
export class Pipeline<TInput, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> {
    /** Public access to the event bus for external subscriptions */
    readonly eventBus: EventBus;

    private readonly definition: PipelineDefinition<TInput, TStream>;
    private readonly config: ResolvedPipelineConfig;
    private current: PipelineState = "idle";

    constructor(definition: PipelineDefinition<TInput, TStream>, config: ResolvedPipelineConfig) {
        this.definition = Object.freeze({
            ...definition,
            stages : Object.freeze([...definition.stages]),
            writers: Object.freeze([...definition.writers]),
        });
        this.config = config;
        this.eventBus = config.eventBus;
    }

    get state(): PipelineState {
        return this.current;
    }

    get stages(): readonly Stage<TInput, TStream>[] {
        return this.definition.stages;
    }

    /**
     * Run the pipeline until the reader is exhausted or a fatal failure occurs.
     *
     * @returns Report of the run; an aborted run resolves with `state: "aborted"`
     * @throws Error if the pipeline has already run
     */
    async run(): Promise<PipelineReport> {
        if (this.current !== "idle") {
            throw new Error(`Pipeline cannot run: it is ${this.current}`);
        }

        const startTime = Date.now();
        const { logger } = this.config;
        const tally: RunTally = { batches: 0, read: 0, written: 0, errored: 0, stages: {} };
        let failure: PipelineFailure | undefined;
        let batchIndex = 0;

        this.current = "running";
        this.emit(createEvent("pipeline:starting", {
            reader : this.definition.reader.id,
            stages : this.definition.stages.map((stage) => stage.name),
            writers: this.definition.writers.map((writer) => writer.id),
        }));

        try {
            await this.openAll();
            this.emit(createEvent("pipeline:started", {
                batchSize     : this.config.batchSize,
                workerPoolSize: this.config.workerPoolSize,
            }));
            logger.info("Pipeline started", {
                stages        : this.definition.stages.length,
                batchSize     : this.config.batchSize,
                workerPoolSize: this.config.workerPoolSize,
            });

            let hasMore = true;
            while (hasMore) {
                const result = await this.readBatch(batchIndex);
                hasMore = result.hasMore;
                if (result.records.length === 0) {
                    continue;
                }

                tally.batches += 1;
                await this.processBatch(result.records, batchIndex, tally);
                batchIndex += 1;
            }

            this.current = "completed";
        }
        catch (error) {
            this.current = "aborted";
            failure = this.describeFailure(error, batchIndex);
            logger.error("Pipeline aborted", { ...failure });
        }
        finally {
            await this.closeAll();
        }

        const report: PipelineReport = {
            state   : this.current === "completed" ? "completed" : "aborted",
            batches : tally.batches,
            read    : tally.read,
            written : tally.written,
            errored : tally.errored,
            stages  : { ...tally.stages },
            failure,
            duration: Date.now() - startTime,
        };

        if (report.state === "completed") {
            this.emit(createEvent("pipeline:completed", {
                batches : report.batches,
                read    : report.read,
                written : report.written,
                errored : report.errored,
                duration: report.duration,
            }));
            logger.info("Pipeline completed", {
                batches : report.batches,
                written : report.written,
                errored : report.errored,
                duration: report.duration,
            });
        }
        else {
            this.emit(createEvent("pipeline:aborted", { ...failure }));
        }

        return report;
    }

    /**
     * Run one batch through every stage and writer, then retire it.
     */
    private async processBatch(records: readonly TInput[], batchIndex: number, tally: RunTally): Promise<void> {
        const traceId = generateTraceId();
        const stream = this.createStream(records, batchIndex, traceId);
        const controller = new AbortController();

        tally.read += stream.size;
        this.emit(createEvent("batch:read", { batchIndex, records: stream.size }, traceId));

        const context: StageContext = {
            parentPath     : "",
            settings       : this.config.settings,
            logger         : this.config.logger,
            eventBus       : this.eventBus,
            signal         : controller.signal,
            workerPoolSize : this.config.workerPoolSize,
            onCapsuleError : this.config.onCapsuleError,
            onFieldConflict: this.config.onFieldConflict,
        };

        try {
            for (const stage of this.definition.stages) {
                try {
                    const run = await stage.run(stream, context);
                    tally.stages[stage.name] = run.status;
                }
                catch (error) {
                    tally.stages[stage.name] = "failed";
                    controller.abort(error);
                    throw error;
                }
            }

            for (const writer of this.definition.writers) {
                await this.writeBatch(writer, stream);
            }

            tally.written += stream.active().length;
            tally.errored += stream.errored().length;
        }
        finally {
            stream.retire();
            this.emit(createEvent("batch:retired", { batchIndex }, traceId));
        }
    }

    private createStream(records: readonly TInput[], batchIndex: number, traceId: string): TStream {
        try {
            const capsules = records.map((record) => this.definition.capsuleFactory(record));
            return this.definition.streamFactory(capsules, { batchIndex, traceId });
        }
        catch (error) {
            throw new ReaderError(`Could not build batch ${batchIndex}: ${describeError(error)}`, {
                readerId: this.definition.reader.id,
                cause   : error,
            });
        }
    }

    /**
     * Pull the next page from the reader.
     *
     * @throws ReaderError if the reader fails or returns more than `batchSize` records
     */
    private async readBatch(batchIndex: number): Promise<ReadResult<TInput>> {
        const { reader } = this.definition;
        const { batchSize } = this.config;
        let result: ReadResult<TInput>;

        try {
            result = await reader.read({ batchSize });
        }
        catch (error) {
            if (error instanceof ReaderError) {
                throw error;
            }
            throw new ReaderError(`Reader "${reader.id}" failed on batch ${batchIndex}: ${describeError(error)}`, {
                readerId: reader.id,
                cause   : error,
            });
        }

        if (result.records.length > batchSize) {
            throw new ReaderError(
                `Reader "${reader.id}" returned ${result.records.length} records for batch ${batchIndex}; batch size is ${batchSize}`,
                { readerId: reader.id }
            );
        }
        return result;
    }

    private async writeBatch(writer: RecordWriter<TInput>, stream: TStream): Promise<void> {
        const { batchIndex, traceId } = stream;
        let result: WriteResult;

        try {
            result = await writer.write(stream, {
                batchIndex,
                traceId,
                settings: this.config.settings,
                logger  : scopeLogger(this.config.logger, `writer:${writer.id}`, { traceId }),
            });
        }
        catch (error) {
            if (error instanceof WriterError) {
                throw error;
            }
            throw new WriterError(`Writer "${writer.id}" failed on batch ${batchIndex}: ${describeError(error)}`, {
                writerId: writer.id,
                batchIndex,
                cause   : error,
            });
        }

        if (!result.success) {
            throw new WriterError(`Writer "${writer.id}" rejected batch ${batchIndex}: ${result.error ?? "no reason given"}`, {
                writerId: writer.id,
                batchIndex,
            });
        }

        this.emit(createEvent("batch:written", {
            batchIndex,
            writerId: writer.id,
            written : result.written,
            skipped : result.skipped,
        }, traceId));
    }

    private async openAll(): Promise<void> {
        const { reader, writers } = this.definition;

        try {
            await reader.initialize?.();
        }
        catch (error) {
            throw new ReaderError(`Reader "${reader.id}" failed to initialize: ${describeError(error)}`, {
                readerId: reader.id,
                cause   : error,
            });
        }

        for (const writer of writers) {
            try {
                await writer.initialize?.();
            }
            catch (error) {
                throw new WriterError(`Writer "${writer.id}" failed to initialize: ${describeError(error)}`, {
                    writerId: writer.id,
                    cause   : error,
                });
            }
        }
    }

    /**
     * Shut down reader and writers. Failures are logged; they do not change the outcome.
     */
    private async closeAll(): Promise<void> {
        const { reader, writers } = this.definition;
        const closers: { id: string; shutdown?: () => Promise<void> }[] = [
            { id: reader.id, shutdown: reader.shutdown?.bind(reader) },
            ...writers.map((writer) => ({ id: writer.id, shutdown: writer.shutdown?.bind(writer) })),
        ];

        for (const closer of closers) {
            try {
                await closer.shutdown?.();
            }
            catch (error) {
                this.config.logger.error("Shutdown error", {
                    component: closer.id,
                    error    : describeError(error),
                });
            }
        }
    }

    private describeFailure(error: unknown, batchIndex: number): PipelineFailure {
        if (error instanceof StageFailure) {
            return {
                batchIndex: error.batchIndex ?? batchIndex,
                stage     : error.stage,
                step      : error.step,
                code      : error.code,
                message   : error.message,
            };
        }

        if (error instanceof WriterError) {
            return {
                batchIndex: error.batchIndex ?? batchIndex,
                code      : error.code,
                message   : error.message,
            };
        }

        return {
            batchIndex,
            code   : error instanceof PipelineError ? error.code : "STAGE_FAILURE",
            message: describeError(error),
        };
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
