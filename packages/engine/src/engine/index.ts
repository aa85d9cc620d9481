/**
 * @fileoverview Engine barrel exports
 *
 * @module @capsulepipe/engine/engine
 */

export {
    Pipeline,
    type PipelineState,
    type PipelineDefinition,
    type PipelineFailure,
    type PipelineReport,
    type CapsuleFactory,
} from "./Pipeline.js";
export { PipelineBuilder } from "./PipelineBuilder.js";
export {
    resolvePipelineConfig,
    kDEFAULT_BATCH_SIZE,
    kDEFAULT_WORKER_POOL_SIZE,
    type PipelineConfig,
    type ResolvedPipelineConfig,
} from "./PipelineConfig.js";
