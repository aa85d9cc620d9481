/**
 * Logger Contract
 *
 * Structured logger used by the engine, its stages, steps and writers.
 * Implementations receive a message plus a flat bag of context fields.
 */

/**
 * Logger interface shared by the engine and every plugin it hosts.
 *
 * @example
 * ```typescript
 * const logger: PipelineLogger = {
 *     debug: () => {},
 *     info : (msg, data) => process.stdout.write(`${msg} ${JSON.stringify(data)}\n`),
 *     warn : (msg, data) => process.stderr.write(`${msg} ${JSON.stringify(data)}\n`),
 *     error: (msg, data) => process.stderr.write(`${msg} ${JSON.stringify(data)}\n`),
 * };
 * ```
 */
export interface PipelineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}
