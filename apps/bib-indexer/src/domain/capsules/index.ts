/**
 * @fileoverview Capsule adapter barrel exports
 *
 * @module domain/capsules
 */

export {
    BibCapsule,
    bibCapsuleOptions,
    controlNumberOf,
    type ExtractOptions,
} from "./BibCapsule.js";
