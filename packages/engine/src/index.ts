/**
 * @fileoverview Capsule Pipeline Engine
 *
 * Record-agnostic batch transformation engine.
 *
 * The engine provides:
 * - Capsules pairing an input record with the output record built from it
 * - Rewindable capsule streams with batch-scoped, single-flight memoization
 * - Ordered (subpipe) and unordered, parallel (bag) composition of steps
 * - A pull-based pipeline from one reader to any number of writers
 *
 * @module @capsulepipe/engine
 * @example
 * ```typescript
 * import { PipelineBuilder, defineStep } from "@capsulepipe/engine";
 *
 * const pipeline = PipelineBuilder.create<{ id: number }>()
 *     .readFrom(reader)
 *     .addBag("fields", defineStep("id", (capsule) => {
 *         capsule.set("id", capsule.input.id);
 *     }))
 *     .writeTo(writer)
 *     .build();
 *
 * const report = await pipeline.run();
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    FieldValue,
    FieldInput,
    OutputDocument,
    OutputRecord,
    Store,
    Step,
    StepContext,
    Stage,
    StageContext,
    StageKind,
    CapsuleErrorPolicy,
    FieldConflictPolicy,
    RecordReader,
    ReadOptions,
    ReadResult,
    RecordWriter,
    WriteContext,
    WriteResult,
    PipelineLogger,
    PipelineErrorCode,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./contracts/index.js";
export {
    defineStep,
    isStep,
    PipelineError,
    InvalidFieldError,
    CapsuleError,
    StageFailure,
    ReaderError,
    WriterError,
    ContractViolation,
    isPipelineError,
    describeError,
    createEvent,
} from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    DocumentRecord,
    ForkedRecord,
    SimpleStore,
    InMemoryEventBus,
    consoleLogger,
    silentLogger,
    scopeLogger,
    type FieldWriteMode,
    type InMemoryEventBusOptions,
} from "./impl/index.js";

// ============================================================================
// Core exports
// ============================================================================

export {
    Capsule,
    ForkedCapsule,
    CapsuleStream,
    Subpipe,
    Bag,
    StageRun,
    runBounded,
    type CapsuleOptions,
    type BatchInfo,
    type StreamFactory,
    type SubpipeMember,
    type BagMember,
    type StageStatus,
} from "./core/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    Pipeline,
    PipelineBuilder,
    resolvePipelineConfig,
    kDEFAULT_BATCH_SIZE,
    kDEFAULT_WORKER_POOL_SIZE,
    type PipelineState,
    type PipelineDefinition,
    type PipelineFailure,
    type PipelineReport,
    type CapsuleFactory,
    type PipelineConfig,
    type ResolvedPipelineConfig,
} from "./engine/index.js";

// ============================================================================
// Plugin exports
// ============================================================================

export {
    StepLoader,
    createStepFromYaml,
    resolveDottedPath,
    type SourceResolver,
    type YamlFieldStepDefinition,
    type FieldTransform,
    type LoadedSteps,
} from "./plugins/index.js";

// ============================================================================
// Utilities
// ============================================================================

export { FrozenMemo } from "./utils/FrozenMemo.js";
