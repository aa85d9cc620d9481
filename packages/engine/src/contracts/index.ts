/**
 * @fileoverview Contract barrel exports
 *
 * All record-agnostic interfaces and types that define
 * the capsule pipeline contract.
 *
 * @module @capsulepipe/engine/contracts
 */

// Output record and store
export type {
    FieldValue,
    FieldInput,
    OutputDocument,
    OutputRecord,
} from "./OutputRecord.js";
export type { Store } from "./Store.js";

// Steps and stages
export type { Step, StepContext } from "./Step.js";
export { defineStep, isStep } from "./Step.js";
export type {
    Stage,
    StageContext,
    StageKind,
    CapsuleErrorPolicy,
    FieldConflictPolicy,
} from "./Stage.js";

// Reader and writer contracts
export type {
    RecordReader,
    ReadOptions,
    ReadResult,
} from "./RecordReader.js";
export type {
    RecordWriter,
    WriteContext,
    WriteResult,
} from "./RecordWriter.js";

// Logger contract
export type { PipelineLogger } from "./Logger.js";

// Errors
export {
    PipelineError,
    InvalidFieldError,
    CapsuleError,
    StageFailure,
    ReaderError,
    WriterError,
    ContractViolation,
    isPipelineError,
    describeError,
    type PipelineErrorCode,
} from "./errors.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
