/**
 * @fileoverview Stage run state machine
 *
 * pending → running → completed | failed
 *
 * @module @capsulepipe/engine/core/StageRun
 */

export type StageStatus = "pending" | "running" | "completed" | "failed";

const kTRANSITIONS: Readonly<Record<StageStatus, readonly StageStatus[]>> = {
    pending  : ["running"],
    running  : ["completed", "failed"],
    completed: [],
    failed   : [],
};

/**
 * One execution of a stage over one batch.
 */
export class StageRun {
    readonly stage: string;
    readonly batchIndex: number;

    private current: StageStatus = "pending";
    private started?: number;
    private finished?: number;
    private failure?: unknown;

    constructor(stage: string, batchIndex: number) {
        this.stage = stage;
        this.batchIndex = batchIndex;
    }

    get status(): StageStatus {
        return this.current;
    }

    get error(): unknown {
        return this.failure;
    }

    /**
     * Milliseconds between start and finish, or undefined while not finished.
     */
    get duration(): number | undefined {
        if (this.started === undefined || this.finished === undefined) {
            return undefined;
        }
        return this.finished - this.started;
    }

    start(): void {
        this.transition("running");
        this.started = Date.now();
    }

    complete(): void {
        this.transition("completed");
        this.finished = Date.now();
    }

    fail(error: unknown): void {
        this.transition("failed");
        this.finished = Date.now();
        this.failure = error;
    }

    private transition(to: StageStatus): void {
        if (!kTRANSITIONS[this.current].includes(to)) {
            throw new Error(`Stage "${this.stage}" cannot move from ${this.current} to ${to}`);
        }
        this.current = to;
    }
}
