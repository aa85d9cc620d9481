/**
 * @fileoverview Pipeline builder
 *
 * Build-time composition: construct → register reader, stages and writers
 * → build. The built pipeline is frozen; the builder is spent.
 *
 * @module @capsulepipe/engine/engine/PipelineBuilder
 */

import type { RecordReader } from "../contracts/RecordReader.js";
import type { RecordWriter } from "../contracts/RecordWriter.js";
import type { Stage } from "../contracts/Stage.js";
import { Bag, type BagMember } from "../core/Bag.js";
import { Capsule, type CapsuleOptions } from "../core/Capsule.js";
import { CapsuleStream, type StreamFactory } from "../core/CapsuleStream.js";
import { Subpipe, type SubpipeMember } from "../core/Subpipe.js";
import { Pipeline, type CapsuleFactory } from "./Pipeline.js";
import { type PipelineConfig, resolvePipelineConfig } from "./PipelineConfig.js";

interface BuilderParts<TInput, TStream extends CapsuleStream<TInput>> {
    reader?: RecordReader<TInput>;
    stages: Stage<TInput, TStream>[];
    writers: RecordWriter<TInput>[];
    capsuleFactory: CapsuleFactory<TInput>;
}

/**
 * PipelineBuilder - assembles a {@link Pipeline}.
 *
 * @example
 * ```typescript
 * const pipeline = PipelineBuilder.create<BibRecord>({ batchSize: 100, workerPoolSize: 4 })
 *     .withCapsules(bibCapsuleOptions())
 *     .withStreams((capsules, batch) => new HoldingsStream(capsules, batch, holdings))
 *     .readFrom(new NdjsonRecordReader({ path: "records.ndjson" }))
 *     .addBag("fields", idStep, authorStep, languageStep)
 *     .addSubpipe("titles", titleStep, filingTitleStep)
 *     .addSubpipe("holdings", holdingsStep)
 *     .writeTo(new SqliteDocumentWriter({ path: "index.sqlite" }))
 *     .build();
 * ```
 */
export class PipelineBuilder<TInput, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> {
    private readonly config: PipelineConfig;
    private readonly streamFactory: StreamFactory<TInput, TStream>;
    private readonly parts: BuilderParts<TInput, TStream>;
    private built = false;

    private constructor(
        config: PipelineConfig,
        streamFactory: StreamFactory<TInput, TStream>,
        parts: BuilderParts<TInput, TStream>
    ) {
        this.config = config;
        this.streamFactory = streamFactory;
        this.parts = parts;
    }

    /**
     * Start a builder producing plain {@link CapsuleStream} batches.
     */
    static create<TInput>(config: PipelineConfig = {}): PipelineBuilder<TInput, CapsuleStream<TInput>> {
        return new PipelineBuilder<TInput, CapsuleStream<TInput>>(
            config,
            (capsules, batch) => new CapsuleStream(capsules, batch),
            {
                stages        : [],
                writers       : [],
                capsuleFactory: (input) => new Capsule(input),
            }
        );
    }

    /**
     * Use a stream subclass for every batch. Must come before any stage is added,
     * since stages are typed against the stream they receive.
     */
    withStreams<TNext extends CapsuleStream<TInput>>(factory: StreamFactory<TInput, TNext>): PipelineBuilder<TInput, TNext> {
        this.assertOpen();
        if (this.parts.stages.length > 0) {
            throw new Error("withStreams() must be called before any stage is added");
        }

        this.built = true;
        return new PipelineBuilder<TInput, TNext>(this.config, factory, {
            reader        : this.parts.reader,
            stages        : [],
            writers       : [...this.parts.writers],
            capsuleFactory: this.parts.capsuleFactory,
        });
    }

    /**
     * Capsule construction: options for the default {@link Capsule}, or a
     * factory returning a deployment's capsule variant.
     */
    withCapsules(capsules: CapsuleOptions<TInput> | CapsuleFactory<TInput>): this {
        this.assertOpen();
        this.parts.capsuleFactory = typeof capsules === "function"
            ? capsules
            : (input) => new Capsule(input, capsules);
        return this;
    }

    readFrom(reader: RecordReader<TInput>): this {
        this.assertOpen();
        this.parts.reader = reader;
        return this;
    }

    /**
     * Append an ordered stage.
     */
    addSubpipe(name: string, ...members: SubpipeMember<TInput, TStream>[]): this {
        return this.addStage(new Subpipe<TInput, TStream>(name, members));
    }

    /**
     * Append an unordered stage of independent steps.
     */
    addBag(name: string, ...members: BagMember<TInput, TStream>[]): this {
        return this.addStage(new Bag<TInput, TStream>(name, members));
    }

    addStage(stage: Stage<TInput, TStream>): this {
        this.assertOpen();
        if (this.parts.stages.some((existing) => existing.name === stage.name)) {
            throw new Error(`Stage already registered: ${stage.name}`);
        }
        this.parts.stages.push(stage);
        return this;
    }

    /**
     * Append a writer. Writers receive each finished batch in registration order.
     */
    writeTo(writer: RecordWriter<TInput>): this {
        this.assertOpen();
        if (this.parts.writers.some((existing) => existing.id === writer.id)) {
            throw new Error(`Writer already registered: ${writer.id}`);
        }
        this.parts.writers.push(writer);
        return this;
    }

    /**
     * Validate and freeze the pipeline.
     *
     * @throws Error when no reader or no stage was registered
     * @throws PipelineError with code INVALID_CONFIG for bad configuration
     */
    build(): Pipeline<TInput, TStream> {
        this.assertOpen();

        const { reader } = this.parts;
        if (!reader) {
            throw new Error("A pipeline needs a reader: call readFrom() before build()");
        }
        if (this.parts.stages.length === 0) {
            throw new Error("A pipeline needs at least one stage");
        }

        const config = resolvePipelineConfig(this.config);
        this.built = true;

        return new Pipeline<TInput, TStream>({
            reader,
            stages        : this.parts.stages,
            writers       : this.parts.writers,
            capsuleFactory: this.parts.capsuleFactory,
            streamFactory : this.streamFactory,
        }, config);
    }

    private assertOpen(): void {
        if (this.built) {
            throw new Error("This builder has already been used; start a new one");
        }
    }
}
