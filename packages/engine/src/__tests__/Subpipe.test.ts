/**
 * @fileoverview Unit tests for Subpipe
 *
 * Tests cover:
 * - Declared-order execution and happens-before between steps
 * - Nested subpipes and stage paths
 * - CapsuleError handling under skip and abort
 * - Non-capsule errors becoming StageFailure
 * - Stage events and StageRun status
 *
 * @module @capsulepipe/engine/__tests__/Subpipe
 */

import { describe, it, expect, vi } from "vitest";
import { Subpipe } from "../core/Subpipe.js";
import { defineStep } from "../contracts/Step.js";
import { CapsuleError, StageFailure } from "../contracts/errors.js";
import type { EventPayload } from "../contracts/EventBus.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { type Item, createItemStream, createStageContext } from "./fixtures.js";

const idStep = defineStep<Item>("id", (capsule) => {
    capsule.set("id", capsule.input.id);
});

describe("Subpipe", () => {
    it("should reject an empty member list and bad names", () => {
        expect(() => new Subpipe<Item>("empty", [])).toThrow('Subpipe "empty" has no members');
        expect(() => new Subpipe<Item>("a/b", [idStep])).toThrow('Invalid stage name: "a/b"');
    });

    // Scenario: B observes every mutation A made on the same capsule
    it("should let later steps see earlier steps' writes", async () => {
        const observed: unknown[][] = [];
        const doubled = defineStep<Item>("doubled", (capsule) => {
            const ids = capsule.get("id");
            observed.push(ids);
            capsule.set("doubled", ids.map((id) => Number(id) * 2));
        });
        const stream = createItemStream([1, 2, 3]);

        await new Subpipe<Item>("numbers", [idStep, doubled]).run(stream, createStageContext());

        expect(observed).toEqual([[1], [2], [3]]);
        expect(stream.capsules().map((capsule) => capsule.output.toObject())).toEqual([
            { id: [1], doubled: [2] },
            { id: [2], doubled: [4] },
            { id: [3], doubled: [6] },
        ]);
    });

    // Scenario: each step sees the whole batch before the next one starts
    it("should run each member over the whole batch before the next", async () => {
        const calls: string[] = [];
        const first = defineStep<Item>("first", (capsule) => {
            calls.push(`first:${capsule.id}`);
        });
        const second = defineStep<Item>("second", async (capsule) => {
            await Promise.resolve();
            calls.push(`second:${capsule.id}`);
        });

        await new Subpipe<Item>("ordered", [first, second]).run(createItemStream([1, 2]), createStageContext());

        expect(calls).toEqual(["first:1", "first:2", "second:1", "second:2"]);
    });

    it("should run nested subpipes under the parent's path", async () => {
        const stages: string[] = [];
        const record = defineStep<Item>("record", (_capsule, context) => {
            stages.push(context.stage);
        });
        const inner = new Subpipe<Item>("inner", [record]);
        const outer = new Subpipe<Item>("outer", [record, inner]);

        await outer.run(createItemStream([1]), createStageContext());

        expect(stages).toEqual(["outer", "outer/inner"]);
    });

    describe("capsule errors", () => {
        // Scenario: step 2 fails capsule #2; #1 and #3 carry on
        it("should flag the capsule and keep the rest of the batch", async () => {
            const eventBus = new InMemoryEventBus();
            const capsuleErrors: EventPayload[] = [];
            eventBus.subscribe("capsule:error", (event) => {
                capsuleErrors.push(event);
            });
            const picky = defineStep<Item>("picky", (capsule) => {
                if (capsule.input.id === 2) {
                    throw new CapsuleError("record 2 is incomplete");
                }
                capsule.set("checked", true);
            });
            const after = vi.fn();
            const afterStep = defineStep<Item>("after", (capsule) => {
                after(capsule.id);
            });
            const stream = createItemStream([1, 2, 3]);

            const run = await new Subpipe<Item>("checks", [idStep, picky, afterStep])
                .run(stream, createStageContext({ eventBus }));

            expect(run.status).toBe("completed");
            expect(stream.errored().map((capsule) => capsule.id)).toEqual(["2"]);
            expect(stream.capsules()[1].error?.stepId).toBe("picky");
            expect(stream.capsules()[1].error?.capsuleId).toBe("2");
            expect(after.mock.calls).toEqual([["1"], ["3"]]);
            expect(capsuleErrors).toHaveLength(1);
            expect(capsuleErrors[0].data).toEqual({
                stage     : "checks",
                step      : "picky",
                capsuleId : "2",
                batchIndex: 0,
                error     : "record 2 is incomplete",
            });
            expect(capsuleErrors[0].traceId).toBe("tr_test");
        });

        it("should fail the stage under onCapsuleError abort", async () => {
            const failing = defineStep<Item>("failing", () => {
                throw new CapsuleError("nope");
            });

            const run = new Subpipe<Item>("strict", [failing])
                .run(createItemStream([1]), createStageContext({ onCapsuleError: "abort" }));

            await expect(run).rejects.toBeInstanceOf(StageFailure);
            await expect(run).rejects.toMatchObject({ stage: "strict", step: "failing", code: "STAGE_FAILURE" });
        });
    });

    describe("stage failures", () => {
        it("should wrap other errors as StageFailure and stop", async () => {
            const eventBus = new InMemoryEventBus();
            const failed = vi.fn();
            eventBus.subscribe("stage:failed", failed);
            const broken = defineStep<Item>("broken", () => {
                throw new TypeError("undefined is not a function");
            });
            const after = vi.fn();

            const run = new Subpipe<Item>("fragile", [broken, defineStep<Item>("after", after)])
                .run(createItemStream([1, 2], 4), createStageContext({ eventBus }));

            await expect(run).rejects.toMatchObject({
                name      : "StageFailure",
                stage     : "fragile",
                step      : "broken",
                batchIndex: 4,
                message   : "Step \"broken\" failed on capsule 1: undefined is not a function",
            });
            expect(after).not.toHaveBeenCalled();
            expect(failed).toHaveBeenCalledTimes(1);
        });

        it("should not start when the batch is already cancelled", async () => {
            const controller = new AbortController();
            controller.abort(new Error("cancelled"));
            const step = vi.fn();

            const run = new Subpipe<Item>("late", [defineStep<Item>("step", step)])
                .run(createItemStream([1]), createStageContext({ signal: controller.signal }));

            await expect(run).rejects.toMatchObject({ stage: "late", message: 'Stage "late" failed: cancelled' });
            expect(step).not.toHaveBeenCalled();
        });
    });

    it("should emit stage:started and stage:completed", async () => {
        const eventBus = new InMemoryEventBus();
        const types: string[] = [];
        eventBus.subscribe("*", (event) => {
            types.push(event.type);
        });

        await new Subpipe<Item>("ids", [idStep]).run(createItemStream([1]), createStageContext({ eventBus }));

        expect(types).toEqual(["stage:started", "stage:completed"]);
    });
});
