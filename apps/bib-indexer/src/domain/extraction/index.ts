/**
 * @fileoverview Extraction barrel exports
 *
 * @module domain/extraction
 */

export {
    compileSpec,
    parseSpec,
    ExtractionSpecError,
    type Extractor,
    type SpecPart,
} from "./compileSpec.js";
export {
    createExtractorCache,
    extractorResolver,
    type ExtractorCache,
} from "./extractorCache.js";
export {
    collapseWhitespace,
    first,
    trimPunctuation,
    unique,
    type ValueProcessor,
} from "./processors.js";
