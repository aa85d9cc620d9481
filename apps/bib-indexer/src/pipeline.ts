/**
 * @fileoverview Indexer pipeline assembly
 *
 * Stage layout:
 * 1. `fields`   (bag)     - independent field steps, built-in and YAML
 * 2. `titles`   (subpipe) - title, then the filing title derived from it
 * 3. `holdings` (subpipe) - batch-wide holdings lookup
 *
 * @module pipeline
 */

import {
    PipelineBuilder,
    StepLoader,
    type Pipeline,
    type PipelineLogger,
    type RecordReader,
    type RecordWriter,
} from "@capsulepipe/engine";
import type { IndexerSettings } from "./config/index.js";
import {
    HoldingsStream,
    authorStep,
    bibCapsuleOptions,
    createExtractorCache,
    extractorResolver,
    filingTitleStep,
    holdingsStep,
    idStep,
    isbnStep,
    kBIB_FIELD_SPECS,
    languageStep,
    titleStep,
    type BibRecord,
    type HoldingsLookup,
} from "./domain/index.js";

/**
 * Everything the indexer pipeline is built from
 */
export interface IndexerPipelineOptions {
    settings: IndexerSettings;
    reader: RecordReader<BibRecord>;
    writers: readonly RecordWriter<BibRecord>[];
    holdings: HoldingsLookup;

    /** Directories of YAML/code field steps, added to the `fields` bag in order */
    stepDirs?: readonly string[];

    logger?: PipelineLogger;
}

/**
 * Build the indexer pipeline.
 *
 * Extraction specs of the built-in steps and of every YAML step are compiled
 * up front; the cache is frozen before the pipeline exists.
 *
 * @throws ExtractionSpecError if a YAML step names a spec that does not compile
 */
export async function createIndexerPipeline(
    options: IndexerPipelineOptions
): Promise<Pipeline<BibRecord, HoldingsStream>> {
    const { settings, logger } = options;

    const extractors = createExtractorCache(kBIB_FIELD_SPECS);
    const loader = new StepLoader<BibRecord, HoldingsStream>({
        logger,
        resolver: extractorResolver(extractors),
    });
    const loaded = await loader.loadFromDirectories([...(options.stepDirs ?? [])]);
    extractors.prepare(loaded.sources).freeze();

    const builder = PipelineBuilder.create<BibRecord>({
        batchSize      : settings.batchSize,
        workerPoolSize : settings.workerPoolSize,
        onCapsuleError : settings.onCapsuleError,
        onFieldConflict: settings.onFieldConflict,
        logger,
    })
        .withStreams(HoldingsStream.factory(options.holdings))
        .withCapsules(bibCapsuleOptions())
        .readFrom(options.reader)
        .addBag(
            "fields",
            idStep(extractors),
            authorStep(extractors),
            languageStep(extractors),
            isbnStep(extractors),
            ...loaded.steps
        )
        .addSubpipe("titles", titleStep(extractors), filingTitleStep(extractors))
        .addSubpipe("holdings", holdingsStep());

    for (const writer of options.writers) {
        builder.writeTo(writer);
    }

    return builder.build();
}
