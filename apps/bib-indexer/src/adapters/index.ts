/**
 * @fileoverview Adapter barrel exports
 *
 * @module adapters
 */

export * from "./sqlite/index.js";
export * from "./ndjson/index.js";
