/**
 * @fileoverview Subpipe
 *
 * Ordered composition: members run one after the other, and each step sees
 * every capsule, in batch order, before the next member starts. Use a
 * subpipe whenever one step reads a field another step writes.
 *
 * @module @capsulepipe/engine/core/Subpipe
 */

import type { StageContext } from "../contracts/Stage.js";
import type { Step } from "../contracts/Step.js";
import { BaseStage } from "./BaseStage.js";
import type { CapsuleStream } from "./CapsuleStream.js";

export type SubpipeMember<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> =
    | Step<TInput, TStream>
    | Subpipe<TInput, TStream>;

/**
 * Subpipe - steps and nested subpipes in declared order.
 *
 * @example
 * ```typescript
 * const titles = new Subpipe("titles", [titleStep, filingTitleStep]);
 * await titles.run(stream, context); // every capsule has "title" before filing titles are built
 * ```
 */
export class Subpipe<TInput = unknown, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>>
    extends BaseStage<TInput, TStream> {
    readonly kind = "subpipe" as const;
    readonly members: readonly SubpipeMember<TInput, TStream>[];

    constructor(name: string, members: readonly SubpipeMember<TInput, TStream>[]) {
        super(name);
        if (members.length === 0) {
            throw new Error(`Subpipe "${name}" has no members`);
        }
        this.members = Object.freeze([...members]);
    }

    protected async execute(stream: TStream, context: StageContext, path: string): Promise<void> {
        for (const member of this.members) {
            context.signal.throwIfAborted();

            if (member instanceof Subpipe) {
                await member.run(stream, { ...context, parentPath: path });
                continue;
            }

            const stepContext = this.createStepContext(member, stream, context, path);

            // Own traversal, so that steps can rewind the stream's cursor for memoized work.
            for (const capsule of stream) {
                await this.applyStep(member, capsule, stepContext, context, path);
            }
        }
    }
}
