/**
 * @fileoverview Unit tests for DocumentRecord
 *
 * Tests cover:
 * - set/append/delete/get semantics
 * - Input normalization (scalars, one-level flattening)
 * - merge: concatenation, field union, associativity, order
 * - Field name validation
 *
 * @module @capsulepipe/engine/__tests__/DocumentRecord
 */

import { describe, it, expect } from "vitest";
import { DocumentRecord, normalizeFieldInput } from "../impl/DocumentRecord.js";
import { InvalidFieldError } from "../contracts/errors.js";

describe("normalizeFieldInput", () => {
    it("should wrap a scalar in a one-element sequence", () => {
        expect(normalizeFieldInput("Moby Dick")).toEqual(["Moby Dick"]);
        expect(normalizeFieldInput(null)).toEqual([null]);
    });

    it("should flatten exactly one level", () => {
        expect(normalizeFieldInput(["a", ["b", "c"], [["d"]]])).toEqual(["a", "b", "c", ["d"]]);
    });
});

describe("DocumentRecord", () => {
    describe("set and get", () => {
        // Scenario: set stores exactly one value
        it("should return [v] after set(field, v)", () => {
            const record = new DocumentRecord();
            record.set("title", "Moby Dick");

            expect(record.get("title")).toEqual(["Moby Dick"]);
        });

        // Scenario: set replaces what was there
        it("should replace the previous sequence", () => {
            const record = new DocumentRecord();
            record.append("subject", ["Whales", "Sea stories"]);
            record.set("subject", "Fiction");

            expect(record.get("subject")).toEqual(["Fiction"]);
        });

        // Scenario: absent fields read as empty sequences
        it("should return [] for an absent field", () => {
            const record = new DocumentRecord();

            expect(record.get("missing")).toEqual([]);
            expect(record.has("missing")).toBe(false);
        });

        // Scenario: callers cannot reach into the record through get()
        it("should return a copy of the stored sequence", () => {
            const record = new DocumentRecord();
            record.set("holdings", ["A"]);

            record.get("holdings").push("B");

            expect(record.get("holdings")).toEqual(["A"]);
        });
    });

    describe("append", () => {
        // Scenario: append preserves call order
        it("should keep values in call order", () => {
            const record = new DocumentRecord();
            record.append("isbn", "0140390847");
            record.append("isbn", "9780140390841");

            expect(record.get("isbn")).toEqual(["0140390847", "9780140390841"]);
        });

        // Scenario: appending an empty sequence changes nothing
        it("should treat append(field, []) as a no-op", () => {
            const record = new DocumentRecord();
            record.set("title", "Typee");
            record.append("title", []);
            record.append("subject", []);

            expect(record.get("title")).toEqual(["Typee"]);
            expect(record.has("subject")).toBe(false);
            expect(record.fields()).toEqual(["title"]);
        });
    });

    describe("delete", () => {
        it("should remove the field", () => {
            const record = new DocumentRecord({ title: ["Omoo"], author: ["Melville, Herman"] });
            record.delete("title");

            expect(record.has("title")).toBe(false);
            expect(record.toObject()).toEqual({ author: ["Melville, Herman"] });
        });
    });

    describe("merge", () => {
        // Scenario: merge(a, b).get(f) == a.get(f) ++ b.get(f)
        it("should concatenate sequences field by field", () => {
            const a = new DocumentRecord({ subject: ["Whales"], title: ["Moby Dick"] });
            const b = new DocumentRecord({ subject: ["Sea stories"], language: ["eng"] });

            const merged = a.clone().merge(b);

            expect(merged.get("subject")).toEqual(["Whales", "Sea stories"]);
            expect(merged.get("title")).toEqual(["Moby Dick"]);
            expect(merged.get("language")).toEqual(["eng"]);
        });

        // Scenario: order matters
        it("should not be commutative", () => {
            const a = new DocumentRecord({ subject: ["Whales"] });
            const b = new DocumentRecord({ subject: ["Sea stories"] });

            expect(a.clone().merge(b).get("subject")).toEqual(["Whales", "Sea stories"]);
            expect(b.clone().merge(a).get("subject")).toEqual(["Sea stories", "Whales"]);
        });

        // Scenario: (a ⊕ b) ⊕ c == a ⊕ (b ⊕ c)
        it("should be associative", () => {
            const a = new DocumentRecord({ f: [1], g: ["x"] });
            const b = new DocumentRecord({ f: [2] });
            const c = new DocumentRecord({ f: [3], h: [true] });

            const left = a.clone().merge(b).merge(c);
            const right = a.clone().merge(b.clone().merge(c));

            expect(left.toObject()).toEqual(right.toObject());
            expect(left.toObject()).toEqual({ f: [1, 2, 3], g: ["x"], h: [true] });
        });

        // Scenario: merge mutates the receiver only
        it("should leave the other record untouched", () => {
            const a = new DocumentRecord({ f: [1] });
            const b = new DocumentRecord({ f: [2] });

            const result = a.merge(b);

            expect(result).toBe(a);
            expect(b.toObject()).toEqual({ f: [2] });
        });

        // Scenario: nested values survive a merge unflattened
        it("should keep nested arrays stored in the other record", () => {
            const a = new DocumentRecord();
            const b = new DocumentRecord();
            b.set("pairs", [[["x", 1]]]);

            a.merge(b);

            expect(a.get("pairs")).toEqual([["x", 1]]);
        });
    });

    describe("field names", () => {
        it("should throw InvalidFieldError for an empty field name", () => {
            const record = new DocumentRecord();

            expect(() => record.set("", "x")).toThrow(InvalidFieldError);
            expect(() => record.get("")).toThrow(InvalidFieldError);
        });

        it("should reject invalid names in the constructor", () => {
            expect(() => new DocumentRecord({ "": ["x"] })).toThrow(InvalidFieldError);
        });
    });

    describe("clone and toObject", () => {
        it("should produce an independent copy", () => {
            const original = new DocumentRecord({ title: ["Mardi"] });
            const copy = original.clone();
            copy.append("title", "and a Voyage Thither");

            expect(original.get("title")).toEqual(["Mardi"]);
            expect(copy.get("title")).toEqual(["Mardi", "and a Voyage Thither"]);
        });

        it("should list fields in first-written order", () => {
            const record = new DocumentRecord();
            record.set("b", 1).set("a", 2).append("b", 3);

            expect(record.fields()).toEqual(["b", "a"]);
            expect(record.toObject()).toEqual({ b: [1, 3], a: [2] });
        });
    });
});
