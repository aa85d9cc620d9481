/**
 * @fileoverview Console logger and scoped loggers
 *
 * @module @capsulepipe/engine/impl/logging
 */

import type { PipelineLogger } from "../contracts/Logger.js";

/**
 * Default console logger.
 */
export const consoleLogger: PipelineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that discards everything.
 */
export const silentLogger: PipelineLogger = {
    debug: () => {},
    info : () => {},
    warn : () => {},
    error: () => {},
};

/**
 * Wrap a logger so every message is prefixed with `[scope]` and every
 * record carries `fields`.
 *
 * @example
 * ```typescript
 * const log = scopeLogger(consoleLogger, "titles:filing-title", { traceId });
 * log.warn("No title"); // [WARN] [titles:filing-title] No title { traceId: ... }
 * ```
 */
export function scopeLogger(
    logger: PipelineLogger,
    scope: string,
    fields: Record<string, unknown> = {}
): PipelineLogger {
    return {
        debug: (msg, data) => logger.debug(`[${scope}] ${msg}`, { ...data, ...fields }),
        info : (msg, data) => logger.info(`[${scope}] ${msg}`, { ...data, ...fields }),
        warn : (msg, data) => logger.warn(`[${scope}] ${msg}`, { ...data, ...fields }),
        error: (msg, data) => logger.error(`[${scope}] ${msg}`, { ...data, ...fields }),
    };
}
