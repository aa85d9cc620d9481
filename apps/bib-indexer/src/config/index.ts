/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadSettings,
    getDefaultSettings,
    kENV_OVERRIDES,
    type IndexerSettings,
} from "./loadSettings.js";
