/**
 * @fileoverview Entity barrel exports
 *
 * @module domain/entities
 */

export {
    isBibRecord,
    isControlField,
    isControlTag,
    isDataField,
    type BibField,
    type BibRecord,
    type ControlField,
    type DataField,
    type Subfield,
} from "./BibRecord.js";
