/**
 * @fileoverview Pipeline error taxonomy
 *
 * Capsule-scoped failures stay inside the stage that raised them.
 * Stage, reader and writer failures abort the pipeline.
 *
 * @module @capsulepipe/engine/contracts/errors
 */

/**
 * Machine-readable error codes.
 */
export type PipelineErrorCode =
    | "INVALID_FIELD"
    | "INVALID_CONFIG"
    | "CAPSULE_ERROR"
    | "STAGE_FAILURE"
    | "READER_ERROR"
    | "WRITER_ERROR"
    | "CONTRACT_VIOLATION"
    | "BATCH_RETIRED";

/**
 * Base class for every error the engine raises.
 */
export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "PipelineError";
        this.code = code;
    }
}

/**
 * An output record was addressed with an empty or non-string field name.
 */
export class InvalidFieldError extends PipelineError {
    constructor(field: unknown) {
        super("INVALID_FIELD", `Invalid field name: ${JSON.stringify(field) ?? String(field)}`);
        this.name = "InvalidFieldError";
    }
}

/**
 * Fails a single capsule. The capsule is flagged and excluded from later
 * steps and from the writers; the rest of the batch carries on.
 *
 * @example
 * ```typescript
 * const isbnStep = defineStep("isbn", (capsule) => {
 *     if (!capsule.input.isbn) {
 *         throw new CapsuleError("record has no ISBN");
 *     }
 *     capsule.set("isbn", capsule.input.isbn);
 * });
 * ```
 */
export class CapsuleError extends PipelineError {
    capsuleId?: string;
    stepId?: string;

    constructor(message: string, options: { capsuleId?: string; stepId?: string; cause?: unknown } = {}) {
        super("CAPSULE_ERROR", message, { cause: options.cause });
        this.name = "CapsuleError";
        this.capsuleId = options.capsuleId;
        this.stepId = options.stepId;
    }
}

/**
 * A subpipe or bag could not complete.
 */
export class StageFailure extends PipelineError {
    readonly stage: string;
    readonly step?: string;
    readonly batchIndex?: number;

    constructor(
        message: string,
        options: { stage: string; step?: string; batchIndex?: number; cause?: unknown }
    ) {
        super("STAGE_FAILURE", message, { cause: options.cause });
        this.name = "StageFailure";
        this.stage = options.stage;
        this.step = options.step;
        this.batchIndex = options.batchIndex;
    }
}

/**
 * The reader could not produce the next batch.
 */
export class ReaderError extends PipelineError {
    readonly readerId?: string;

    constructor(message: string, options: { readerId?: string; cause?: unknown } = {}) {
        super("READER_ERROR", message, { cause: options.cause });
        this.name = "ReaderError";
        this.readerId = options.readerId;
    }
}

/**
 * A writer could not persist a finished batch.
 */
export class WriterError extends PipelineError {
    readonly writerId?: string;
    readonly batchIndex?: number;

    constructor(message: string, options: { writerId?: string; batchIndex?: number; cause?: unknown } = {}) {
        super("WRITER_ERROR", message, { cause: options.cause });
        this.name = "WriterError";
        this.writerId = options.writerId;
        this.batchIndex = options.batchIndex;
    }
}

/**
 * Two members of the same bag wrote the same field of one capsule.
 */
export class ContractViolation extends PipelineError {
    readonly stage: string;
    readonly field: string;
    readonly capsuleId: string;
    readonly steps: readonly string[];

    constructor(options: { stage: string; field: string; capsuleId: string; steps: readonly string[] }) {
        super(
            "CONTRACT_VIOLATION",
            `Bag "${options.stage}" members ${options.steps.join(", ")} all wrote field "${options.field}" of capsule ${options.capsuleId}`
        );
        this.name = "ContractViolation";
        this.stage = options.stage;
        this.field = options.field;
        this.capsuleId = options.capsuleId;
        this.steps = options.steps;
    }
}

/**
 * Type guard for engine errors.
 */
export function isPipelineError(error: unknown): error is PipelineError {
    return error instanceof PipelineError;
}

/**
 * Message text for any thrown value, for logs and event payloads.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
