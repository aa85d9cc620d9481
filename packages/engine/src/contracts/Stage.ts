/**
 * Stage Contract
 *
 * A stage runs over a whole batch: subpipes in declared order, bags with no
 * ordering between their members. The pipeline runs its stages one after
 * the other for each batch.
 */

import type { CapsuleStream } from "../core/CapsuleStream.js";
import type { StageRun } from "../core/StageRun.js";
import type { EventBus } from "./EventBus.js";
import type { PipelineLogger } from "./Logger.js";

export type StageKind = "subpipe" | "bag";

/**
 * What to do when a step throws `CapsuleError`.
 * - skip: flag the capsule and keep going with the rest of the batch
 * - abort: treat it as a stage failure
 */
export type CapsuleErrorPolicy = "skip" | "abort";

/**
 * What to do when two bag members write the same field of one capsule.
 * - warn: log and emit `contract:violation`, apply both writes in member order
 * - error: fail the bag
 */
export type FieldConflictPolicy = "warn" | "error";

/**
 * Everything a stage needs from the pipeline for one batch.
 */
export interface StageContext {
    /** Path of the enclosing stage, empty at the top level */
    readonly parentPath: string;

    readonly settings: Readonly<Record<string, unknown>>;
    readonly logger: PipelineLogger;
    readonly eventBus: EventBus;

    /** Aborted when a fatal failure cancels the batch */
    readonly signal: AbortSignal;

    /** Upper bound on concurrently running bag work (1 = sequential) */
    readonly workerPoolSize: number;

    readonly onCapsuleError: CapsuleErrorPolicy;
    readonly onFieldConflict: FieldConflictPolicy;
}

/**
 * Stage interface.
 */
export interface Stage<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> {
    /** Name, unique within its parent */
    readonly name: string;

    readonly kind: StageKind;

    /**
     * Run the stage over every active capsule of the batch.
     *
     * @returns The completed run
     * @throws StageFailure when the stage cannot complete
     */
    run(stream: TStream, context: StageContext): Promise<StageRun>;
}
