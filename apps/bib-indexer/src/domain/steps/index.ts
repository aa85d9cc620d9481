/**
 * @fileoverview Step barrel exports
 *
 * @module domain/steps
 */

export { idStep } from "./idStep.js";
export { titleStep, filingTitleStep } from "./titleSteps.js";
export { authorStep } from "./authorStep.js";
export { languageStep } from "./languageStep.js";
export { isbnStep, normalizeIsbn } from "./isbnStep.js";
export { holdingsStep } from "./holdingsStep.js";
export {
    kBIB_FIELD_SPECS,
    kAUTHOR_SPEC,
    kISBN_SPEC,
    kLANGUAGE_SPEC,
    kTITLE_SPEC,
} from "./specs.js";
