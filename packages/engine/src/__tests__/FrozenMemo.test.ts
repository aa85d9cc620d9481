/**
 * @fileoverview Unit tests for FrozenMemo
 *
 * @module @capsulepipe/engine/__tests__/FrozenMemo
 */

import { describe, it, expect, vi } from "vitest";
import { FrozenMemo } from "../utils/FrozenMemo.js";

describe("FrozenMemo", () => {
    it("should build each value once", () => {
        const factory = vi.fn((key: string) => key.toUpperCase());
        const memo = new FrozenMemo(factory);

        expect(memo.get("245ab")).toBe("245AB");
        expect(memo.get("245ab")).toBe("245AB");
        expect(factory).toHaveBeenCalledTimes(1);
    });

    it("should prepare keys up front", () => {
        const memo = new FrozenMemo((key: string) => key.length).prepare(["245ab", "008"]);

        expect(memo.keys()).toEqual(["245ab", "008"]);
        expect(memo.size).toBe(2);
        expect(memo.has("008")).toBe(true);
    });

    // Scenario: after freeze, known keys resolve and unknown keys throw
    it("should refuse new keys once frozen", () => {
        const factory = vi.fn((key: string) => key.length);
        const memo = new FrozenMemo(factory).prepare(["245ab"]).freeze();

        expect(memo.isFrozen).toBe(true);
        expect(memo.get("245ab")).toBe(5);
        expect(() => memo.get("650a")).toThrow("FrozenMemo is frozen; no entry for 650a");
        expect(factory).toHaveBeenCalledTimes(1);
    });

    it("should cache undefined values", () => {
        const factory = vi.fn((): string | undefined => undefined);
        const memo = new FrozenMemo<string, string | undefined>(factory).prepare(["x"]).freeze();

        expect(memo.get("x")).toBeUndefined();
        expect(factory).toHaveBeenCalledTimes(1);
    });
});
