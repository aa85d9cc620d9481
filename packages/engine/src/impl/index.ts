/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @capsulepipe/engine/impl
 */

export { DocumentRecord, normalizeFieldInput, assertFieldName } from "./DocumentRecord.js";
export { ForkedRecord, type FieldWriteMode } from "./ForkedRecord.js";
export { SimpleStore } from "./SimpleStore.js";
export { InMemoryEventBus, type InMemoryEventBusOptions } from "./InMemoryEventBus.js";
export { consoleLogger, silentLogger, scopeLogger } from "./logging.js";
