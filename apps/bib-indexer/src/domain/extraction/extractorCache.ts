/**
 * @fileoverview Run-wide cache of compiled extraction specs
 *
 * Specs are compiled once before the pipeline is built. Once frozen the
 * cache is read-only and safe to share between bag workers.
 *
 * @module domain/extraction/extractorCache
 */

import type { SourceResolver } from "@capsulepipe/engine";
import { FrozenMemo } from "@capsulepipe/engine";
import type { BibRecord } from "../entities/BibRecord.js";
import { compileSpec, type Extractor } from "./compileSpec.js";

export type ExtractorCache = FrozenMemo<string, Extractor>;

/**
 * Create a cache with `specs` compiled. The cache stays open so specs found
 * later (in YAML step files) can be added before {@link FrozenMemo.freeze}.
 *
 * @example
 * ```typescript
 * const extractors = createExtractorCache(kBIB_FIELD_SPECS);
 * const loaded = await new StepLoader({ resolver: extractorResolver(extractors) }).loadFromDirectory(dir);
 * extractors.prepare(loaded.sources).freeze();
 * ```
 *
 * @throws ExtractionSpecError for a spec that does not compile
 */
export function createExtractorCache(specs: Iterable<string> = []): ExtractorCache {
    return new FrozenMemo<string, Extractor>(compileSpec).prepare(specs);
}

/**
 * YAML `from` expressions read as extraction specs.
 */
export function extractorResolver(extractors: ExtractorCache): SourceResolver<BibRecord> {
    return (record, from) => extractors.get(from)(record);
}
