/**
 * @fileoverview Domain barrel exports
 *
 * All domain-specific implementations for the bibliographic indexer.
 *
 * @module domain
 */

export * from "./entities/index.js";
export * from "./extraction/index.js";
export * from "./capsules/index.js";
export * from "./streams/index.js";
export * from "./steps/index.js";
