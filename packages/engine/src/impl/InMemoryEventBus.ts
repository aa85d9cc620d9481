/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process pub/sub for pipeline observability.
 *
 * @module @capsulepipe/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { PipelineLogger } from "../contracts/Logger.js";
import { describeError } from "../contracts/errors.js";

/**
 * Options for the in-memory bus.
 */
export interface InMemoryEventBusOptions {
    /** Receives handler failures (default: console.error) */
    readonly logger?: Pick<PipelineLogger, "error">;
}

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A failing handler, sync or async, is logged and never reaches the emitter
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("batch:written", (event) => {
 *     console.log("Batch written:", event.data);
 * });
 *
 * bus.emit(createEvent("batch:written", { batchIndex: 0, written: 100 }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: Pick<PipelineLogger, "error">;

    constructor(options: InMemoryEventBusOptions = {}) {
        this.logger = options.logger ?? {
            error: (msg, data) => console.error(`[EventBus] ${msg}`, data ?? ""),
        };
    }

    /**
     * Emit an event to all subscribers: handlers of its type first, then wildcard handlers.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void {
        for (const key of [event.type, "*"]) {
            const handlers = this.handlers.get(key);
            if (!handlers) {
                continue;
            }

            // Copy so that once() handlers can unsubscribe mid-dispatch.
            for (const handler of Array.from(handlers)) {
                this.invoke(handler, event, key);
            }
        }
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     *
     * @param eventType - The event type to subscribe to
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for manual unsubscription if needed
     */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" for all, undefined clears everything)
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for a specific event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private invoke(handler: EventHandler, event: EventPayload, subscribedTo: string): void {
        const report = (error: unknown): void => {
            this.logger.error("Event handler failed", {
                eventType: event.type,
                subscribedTo,
                error    : describeError(error),
            });
        };

        try {
            const result = handler(event);
            if (result instanceof Promise) {
                result.catch(report);
            }
        }
        catch (error) {
            report(error);
        }
    }
}
