/**
 * @fileoverview Extraction specs used by the built-in steps
 *
 * @module domain/steps/specs
 */

export const kTITLE_SPEC = "245ab";
export const kAUTHOR_SPEC = "100a:110a:111a";
export const kLANGUAGE_SPEC = "008[35-37]";
export const kISBN_SPEC = "020a";

/**
 * Every spec the built-in steps extract; compile these before freezing the cache.
 */
export const kBIB_FIELD_SPECS: readonly string[] = [
    kTITLE_SPEC,
    kAUTHOR_SPEC,
    kLANGUAGE_SPEC,
    kISBN_SPEC,
];
