/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow of a pipeline run: lifecycle of the run, and the
 * progress of every batch through its stages and writers.
 *
 * - Dispatch is synchronous
 * - Ordering is preserved within a single event type
 * - Every batch-level event carries the batch's trace ID
 *
 * @module @capsulepipe/engine/contracts/EventBus
 */

/**
 * One notification from a pipeline run. Batch-level events carry the trace id
 * of their batch; `data` holds the event's own fields (batch index, stage,
 * capsule id and so on).
 */
export interface EventPayload {
    readonly type: string;

    /** ISO 8601 */
    readonly timestamp: string;

    readonly traceId?: string;
    readonly data?: Record<string, unknown>;
}

/**
 * Run lifecycle, emitted once each per `Pipeline.run()`.
 */
export type LifecycleEventType =
    | "pipeline:starting"
    | "pipeline:started"
    | "pipeline:completed"
    | "pipeline:aborted";

/**
 * Per-batch progress, from the read through the stages to the writers.
 */
export type ProcessingEventType =
    | "batch:read"
    | "stage:started"
    | "stage:completed"
    | "stage:failed"
    | "capsule:error"
    | "contract:violation"
    | "batch:written"
    | "batch:retired";

/**
 * Pipeline event names; applications may emit their own.
 */
export type EventType = LifecycleEventType | ProcessingEventType | string;

/**
 * Listener. A returned promise is not awaited; its rejection is logged like a
 * thrown error and never reaches the stage that emitted.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

export interface Subscription {
    unsubscribe(): void;
}

/**
 * Where stages, writers and the pipeline report progress.
 *
 * Listeners run synchronously inside `emit`, in subscription order. `"*"`
 * receives every event after the listeners of its type.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const errors = bus.subscribe("capsule:error", (event) => {
 *     console.log(`batch ${event.data?.batchIndex}:`, event.data?.capsuleId, event.data?.error);
 * });
 *
 * bus.once("pipeline:completed", (event) => console.log("done", event.data));
 *
 * // after the run
 * errors.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Deliver `event` to the listeners of its type, then to `"*"` listeners.
     */
    emit(event: EventPayload): void;

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Like {@link subscribe}, dropped after the first delivery.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Drop the listeners of one event type, or every listener without an argument
     * (or with `"*"`).
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Stamp an event with the current time.
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
