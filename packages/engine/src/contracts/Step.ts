/**
 * Step Contract
 *
 * The atomic transformation: a capsule goes in and comes out transformed.
 * Steps read the capsule's input record and write its output record and
 * cache; batch-wide work goes through the stream's memoization.
 *
 * Rules:
 * - Must not mutate the input record
 * - Must not keep a reference to the capsule after `process` returns
 * - Throw `CapsuleError` to fail only the current capsule
 * - Any other thrown error fails the whole stage
 */

import type { Capsule } from "../core/Capsule.js";
import type { CapsuleStream } from "../core/CapsuleStream.js";
import type { PipelineLogger } from "./Logger.js";

/**
 * Context provided to a step for every capsule it processes.
 */
export interface StepContext<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> {
    /**
     * The batch being processed. Use it for batch-wide memoized lookups.
     */
    readonly stream: TStream;

    /**
     * Path of the stage running the step, e.g. "titles" or "titles/filing".
     */
    readonly stage: string;

    /**
     * Read-only settings passed to the pipeline at build time.
     */
    readonly settings: Readonly<Record<string, unknown>>;

    /**
     * Logger scoped to the stage and step.
     */
    readonly logger: PipelineLogger;

    /**
     * Trace ID of the batch.
     */
    readonly traceId: string;

    /**
     * Aborted when a fatal failure cancels the batch.
     */
    readonly signal: AbortSignal;
}

/**
 * Step interface.
 *
 * @example
 * ```typescript
 * const idStep: Step<{ id: number }> = {
 *     id: "id",
 *     process(capsule) {
 *         capsule.set("id", capsule.input.id);
 *     },
 * };
 *
 * const holdingsStep: Step<BibRecord, HoldingsStream> = {
 *     id: "holdings",
 *     async process(capsule, context) {
 *         capsule.set("holdings", await context.stream.holdingsFor(capsule.id));
 *     },
 * };
 * ```
 */
export interface Step<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> {
    /**
     * Unique identifier for this step.
     */
    readonly id: string;

    /**
     * Optional human-readable name.
     */
    readonly name?: string;

    /**
     * Optional description of what this step produces.
     */
    readonly description?: string;

    /**
     * Transform one capsule in place.
     *
     * @param capsule - The capsule to transform
     * @param context - Stream, logger, settings and cancellation signal
     */
    process(capsule: Capsule<TInput>, context: StepContext<TInput, TStream>): void | Promise<void>;
}

/**
 * Build a step from an id and a function.
 */
export function defineStep<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>>(
    id: string,
    process: (capsule: Capsule<TInput>, context: StepContext<TInput, TStream>) => void | Promise<void>,
    details: { name?: string; description?: string } = {}
): Step<TInput, TStream> {
    return {
        id,
        ...details,
        process,
    };
}

/**
 * Type guard to check if an object is a Step.
 *
 * Only the shape is checked; the input and stream types are the caller's claim.
 *
 * @param obj - The object to check
 * @returns True if the object implements Step
 */
export function isStep<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>>(
    obj: unknown
): obj is Step<TInput, TStream> {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "process" in obj &&
        typeof obj.process === "function"
    );
}
