/**
 * @fileoverview Pipeline configuration
 *
 * @module @capsulepipe/engine/engine/PipelineConfig
 */

import type { EventBus } from "../contracts/EventBus.js";
import type { PipelineLogger } from "../contracts/Logger.js";
import type { CapsuleErrorPolicy, FieldConflictPolicy } from "../contracts/Stage.js";
import { PipelineError } from "../contracts/errors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { consoleLogger } from "../impl/logging.js";

/**
 * Pipeline configuration options.
 */
export interface PipelineConfig {
    /** Maximum records per batch (default: 100) */
    readonly batchSize?: number;

    /** Concurrent bag work; 1 means no parallelism (default: 1) */
    readonly workerPoolSize?: number;

    /** What a CapsuleError does (default: "skip") */
    readonly onCapsuleError?: CapsuleErrorPolicy;

    /** What overlapping bag writes do (default: "warn") */
    readonly onFieldConflict?: FieldConflictPolicy;

    /** Read-only values handed to every step and writer */
    readonly settings?: Readonly<Record<string, unknown>>;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for pipeline operations (default: console) */
    readonly logger?: PipelineLogger;
}

/**
 * Configuration with every default applied.
 */
export type ResolvedPipelineConfig = Required<PipelineConfig>;

export const kDEFAULT_BATCH_SIZE = 100;
export const kDEFAULT_WORKER_POOL_SIZE = 1;

const kCAPSULE_ERROR_POLICIES: readonly CapsuleErrorPolicy[] = ["skip", "abort"];
const kFIELD_CONFLICT_POLICIES: readonly FieldConflictPolicy[] = ["warn", "error"];

function assertPositiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new PipelineError("INVALID_CONFIG", `${name} must be a positive integer, got ${String(value)}`);
    }
}

/**
 * Apply defaults and validate.
 *
 * @throws PipelineError with code INVALID_CONFIG
 */
export function resolvePipelineConfig(config: PipelineConfig = {}): ResolvedPipelineConfig {
    const logger = config.logger ?? consoleLogger;
    const resolved: ResolvedPipelineConfig = {
        batchSize      : config.batchSize ?? kDEFAULT_BATCH_SIZE,
        workerPoolSize : config.workerPoolSize ?? kDEFAULT_WORKER_POOL_SIZE,
        onCapsuleError : config.onCapsuleError ?? "skip",
        onFieldConflict: config.onFieldConflict ?? "warn",
        settings       : Object.freeze({ ...config.settings }),
        eventBus       : config.eventBus ?? new InMemoryEventBus({ logger }),
        logger,
    };

    assertPositiveInteger("batchSize", resolved.batchSize);
    assertPositiveInteger("workerPoolSize", resolved.workerPoolSize);

    if (!kCAPSULE_ERROR_POLICIES.includes(resolved.onCapsuleError)) {
        throw new PipelineError("INVALID_CONFIG", `onCapsuleError must be one of ${kCAPSULE_ERROR_POLICIES.join(", ")}`);
    }
    if (!kFIELD_CONFLICT_POLICIES.includes(resolved.onFieldConflict)) {
        throw new PipelineError("INVALID_CONFIG", `onFieldConflict must be one of ${kFIELD_CONFLICT_POLICIES.join(", ")}`);
    }

    return resolved;
}
