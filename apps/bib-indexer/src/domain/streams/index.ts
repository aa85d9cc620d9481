/**
 * @fileoverview Stream barrel exports
 *
 * @module domain/streams
 */

export { HoldingsStream, kNO_HOLDINGS, type HoldingsLookup } from "./HoldingsStream.js";
