/**
 * @fileoverview Bag
 *
 * Unordered composition of steps declared independent of one another.
 * Every member is applied to its own fork of each active capsule; the work
 * is spread over a bounded worker pool. Once all members are done, the forks
 * are folded back into each capsule in declared member order, so the result
 * does not depend on scheduling or on the pool size.
 *
 * @module @capsulepipe/engine/core/Bag
 */

import type { StageContext } from "../contracts/Stage.js";
import type { Step } from "../contracts/Step.js";
import { createEvent } from "../contracts/EventBus.js";
import { ContractViolation, StageFailure } from "../contracts/errors.js";
import { BaseStage } from "./BaseStage.js";
import type { Capsule, ForkedCapsule } from "./Capsule.js";
import type { CapsuleStream } from "./CapsuleStream.js";
import { runBounded } from "./workerPool.js";

export type BagMember<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> =
    | Step<TInput, TStream>
    | Bag<TInput, TStream>;

interface BagTask<TInput> {
    readonly member: number;
    readonly capsule: Capsule<TInput>;
}

/**
 * Bag - independent steps, any order, optionally in parallel.
 *
 * Members must write disjoint fields. A field written by two members on the
 * same capsule is reported as a {@link ContractViolation}.
 *
 * @example
 * ```typescript
 * const fields = new Bag("fields", [authorStep, languageStep, isbnStep]);
 * ```
 */
export class Bag<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>>
    extends BaseStage<TInput, TStream> {
    readonly kind = "bag" as const;
    readonly members: readonly BagMember<TInput, TStream>[];

    constructor(name: string, members: readonly BagMember<TInput, TStream>[]) {
        super(name);
        if (members.length === 0) {
            throw new Error(`Bag "${name}" has no members`);
        }
        this.members = Object.freeze([...members]);

        const seen = new Set<string>();
        for (const step of this.steps()) {
            if (seen.has(step.id)) {
                throw new Error(`Bag "${name}" contains step "${step.id}" more than once`);
            }
            seen.add(step.id);
        }
    }

    /**
     * Member steps with nested bags flattened, in declared order.
     */
    steps(): Step<TInput, TStream>[] {
        return this.members.flatMap((member) => (member instanceof Bag ? member.steps() : [member]));
    }

    protected async execute(stream: TStream, context: StageContext, path: string): Promise<void> {
        context.signal.throwIfAborted();

        const steps = this.steps();
        const capsules = stream.active();
        const forks = steps.map(() => new Map<Capsule<TInput>, ForkedCapsule<TInput>>());

        // Cancels this bag's workers on the first fatal failure, or when the batch is cancelled.
        const controller = new AbortController();
        const cancel = (): void => controller.abort(context.signal.reason);
        context.signal.addEventListener("abort", cancel, { once: true });

        const workerContext: StageContext = { ...context, signal: controller.signal };
        const stepContexts = steps.map((step) => this.createStepContext(step, stream, workerContext, path));
        const tasks: BagTask<TInput>[] = steps.flatMap((_, member) => capsules.map((capsule) => ({ member, capsule })));

        try {
            await runBounded(tasks, context.workerPoolSize, async ({ member, capsule }) => {
                if (capsule.isErrored) {
                    return;
                }

                const fork = capsule.fork();
                forks[member].set(capsule, fork);

                try {
                    await this.applyStep(steps[member], fork, stepContexts[member], workerContext, path);
                }
                catch (error) {
                    controller.abort(error);
                    throw error;
                }
            }, controller.signal);
        }
        finally {
            context.signal.removeEventListener("abort", cancel);
        }

        this.reconcile(stream, capsules, steps, forks, context, path);
    }

    /**
     * Fold every member's fork back into its capsule, in member order.
     * Errored capsules keep nothing from this bag.
     */
    private reconcile(
        stream: TStream,
        capsules: readonly Capsule<TInput>[],
        steps: readonly Step<TInput, TStream>[],
        forks: readonly Map<Capsule<TInput>, ForkedCapsule<TInput>>[],
        context: StageContext,
        path: string
    ): void {
        const finished = capsules.filter((capsule) => !capsule.isErrored);

        for (const capsule of finished) {
            for (const violation of this.findConflicts(capsule, steps, forks, path)) {
                if (context.onFieldConflict === "error") {
                    throw new StageFailure(violation.message, {
                        stage     : path,
                        batchIndex: stream.batchIndex,
                        cause     : violation,
                    });
                }

                context.logger.warn("Bag members wrote the same field", {
                    stage    : path,
                    field    : violation.field,
                    capsuleId: violation.capsuleId,
                    steps    : violation.steps,
                    traceId  : stream.traceId,
                });
                context.eventBus.emit(createEvent("contract:violation", {
                    stage     : path,
                    field     : violation.field,
                    capsuleId : violation.capsuleId,
                    steps     : violation.steps,
                    batchIndex: stream.batchIndex,
                }, stream.traceId));
            }
        }

        for (const capsule of finished) {
            for (const memberForks of forks) {
                memberForks.get(capsule)?.record.applyTo(capsule.output);
            }
        }
    }

    private findConflicts(
        capsule: Capsule<TInput>,
        steps: readonly Step<TInput, TStream>[],
        forks: readonly Map<Capsule<TInput>, ForkedCapsule<TInput>>[],
        path: string
    ): ContractViolation[] {
        const writers = new Map<string, string[]>();

        forks.forEach((memberForks, member) => {
            const fork = memberForks.get(capsule);
            if (!fork) {
                return;
            }
            for (const field of fork.record.writes().keys()) {
                const ids = writers.get(field) ?? [];
                ids.push(steps[member].id);
                writers.set(field, ids);
            }
        });

        const violations: ContractViolation[] = [];
        for (const [field, ids] of writers) {
            if (ids.length > 1) {
                violations.push(new ContractViolation({ stage: path, field, capsuleId: capsule.id, steps: ids }));
            }
        }
        return violations;
    }
}
