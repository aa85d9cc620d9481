/**
 * @fileoverview Shared stage lifecycle
 *
 * Tracks the {@link StageRun} of each batch, emits the stage events, and
 * classifies what a step throws: `CapsuleError` stays with its capsule,
 * everything else becomes a {@link StageFailure}.
 *
 * @module @capsulepipe/engine/core/BaseStage
 */

import type { Stage, StageContext, StageKind } from "../contracts/Stage.js";
import type { Step, StepContext } from "../contracts/Step.js";
import { createEvent } from "../contracts/EventBus.js";
import { CapsuleError, StageFailure, describeError } from "../contracts/errors.js";
import { scopeLogger } from "../impl/logging.js";
import type { Capsule } from "./Capsule.js";
import type { CapsuleStream } from "./CapsuleStream.js";
import { StageRun } from "./StageRun.js";

/**
 * Join a parent stage path and a stage name.
 */
export function joinStagePath(parentPath: string, name: string): string {
    return parentPath ? `${parentPath}/${name}` : name;
}

export abstract class BaseStage<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>>
implements Stage<TInput, TStream> {
    abstract readonly kind: StageKind;
    readonly name: string;

    constructor(name: string) {
        if (!name || name.includes("/")) {
            throw new Error(`Invalid stage name: "${name}"`);
        }
        this.name = name;
    }

    async run(stream: TStream, context: StageContext): Promise<StageRun> {
        const path = joinStagePath(context.parentPath, this.name);
        const run = new StageRun(path, stream.batchIndex);

        run.start();
        context.eventBus.emit(createEvent("stage:started", {
            stage     : path,
            kind      : this.kind,
            batchIndex: stream.batchIndex,
            capsules  : stream.active().length,
        }, stream.traceId));

        try {
            await this.execute(stream, context, path);
        }
        catch (error) {
            const failure = error instanceof StageFailure
                ? error
                : new StageFailure(`Stage "${path}" failed: ${describeError(error)}`, {
                    stage     : path,
                    batchIndex: stream.batchIndex,
                    cause     : error,
                });

            run.fail(failure);
            context.logger.error("Stage failed", {
                stage     : path,
                step      : failure.step,
                batchIndex: stream.batchIndex,
                traceId   : stream.traceId,
                error     : failure.message,
            });
            context.eventBus.emit(createEvent("stage:failed", {
                stage     : path,
                step      : failure.step,
                batchIndex: stream.batchIndex,
                error     : failure.message,
            }, stream.traceId));
            throw failure;
        }

        run.complete();
        context.eventBus.emit(createEvent("stage:completed", {
            stage     : path,
            batchIndex: stream.batchIndex,
            duration  : run.duration,
            errored   : stream.errored().length,
        }, stream.traceId));

        return run;
    }

    /**
     * Run the stage's members over the batch.
     */
    protected abstract execute(stream: TStream, context: StageContext, path: string): Promise<void>;

    /**
     * Context handed to `step` for every capsule it processes in this batch.
     */
    protected createStepContext(
        step: Step<TInput, TStream>,
        stream: TStream,
        context: StageContext,
        path: string
    ): StepContext<TInput, TStream> {
        return {
            stream,
            stage   : path,
            settings: context.settings,
            logger  : scopeLogger(context.logger, `${path}:${step.id}`, { traceId: stream.traceId }),
            traceId : stream.traceId,
            signal  : context.signal,
        };
    }

    /**
     * Apply one step to one capsule.
     *
     * @throws StageFailure for anything but a skipped CapsuleError
     */
    protected async applyStep(
        step: Step<TInput, TStream>,
        capsule: Capsule<TInput>,
        stepContext: StepContext<TInput, TStream>,
        context: StageContext,
        path: string
    ): Promise<void> {
        try {
            await step.process(capsule, stepContext);
        }
        catch (error) {
            const batchIndex = stepContext.stream.batchIndex;

            if (error instanceof StageFailure) {
                throw error;
            }

            if (!(error instanceof CapsuleError)) {
                throw new StageFailure(`Step "${step.id}" failed on capsule ${capsule.id}: ${describeError(error)}`, {
                    stage: path,
                    step : step.id,
                    batchIndex,
                    cause: error,
                });
            }

            error.stepId ??= step.id;
            if (context.onCapsuleError === "abort") {
                throw new StageFailure(`Capsule ${capsule.id} failed in step "${step.id}": ${error.message}`, {
                    stage: path,
                    step : step.id,
                    batchIndex,
                    cause: error,
                });
            }

            capsule.fail(error);
            stepContext.logger.warn("Capsule failed", {
                capsuleId: capsule.id,
                error    : error.message,
            });
            context.eventBus.emit(createEvent("capsule:error", {
                stage    : path,
                step     : step.id,
                capsuleId: capsule.id,
                batchIndex,
                error    : error.message,
            }, stepContext.traceId));
        }
    }
}
