/**
 * @fileoverview Post-processors for extracted values
 *
 * @module domain/extraction/processors
 */

/**
 * Maps the values of one extraction to new values.
 */
export type ValueProcessor = (values: string[]) => string[];

/**
 * Strip surrounding whitespace and trailing ISBD punctuation (`/ : ; , = .`).
 */
export const trimPunctuation: ValueProcessor = (values) =>
    values.map((value) => value.trim().replace(/\s*[/:;,=.]+$/, ""));

export const collapseWhitespace: ValueProcessor = (values) =>
    values.map((value) => value.replace(/\s+/g, " ").trim());

export const unique: ValueProcessor = (values) => Array.from(new Set(values));

export const first: ValueProcessor = (values) => values.slice(0, 1);
