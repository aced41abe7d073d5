import { describe, it, expect } from "vitest";
import { parseServerTime } from "./timestamps.js";

const MAY_FIRST_NOON = Date.UTC(2024, 4, 1, 12, 0, 0);

describe("parseServerTime", () => {
    it("reads RFC 3339 with nanosecond fractions", () => {
        expect(parseServerTime("2024-05-01T12:00:00.500000000Z")).toBe(MAY_FIRST_NOON + 500);
        expect(parseServerTime("2024-05-01T12:00:00Z")).toBe(MAY_FIRST_NOON);
        expect(parseServerTime("2024-05-01T12:00:00.25Z")).toBe(MAY_FIRST_NOON + 250);
    });

    it("keeps sub-millisecond precision", () => {
        const parsed = parseServerTime("2024-05-01T12:00:00.123456789Z");
        expect(parsed).not.toBeNull();
        expect((parsed ?? 0) - MAY_FIRST_NOON).toBeCloseTo(123.456789, 5);
    });

    it("applies numeric offsets", () => {
        expect(parseServerTime("2024-05-01T14:00:00+02:00")).toBe(MAY_FIRST_NOON);
        expect(parseServerTime("2024-05-01T07:30:00-04:30")).toBe(MAY_FIRST_NOON);
    });

    it("reads UNIX seconds strings", () => {
        expect(parseServerTime("1714564800")).toBe(1_714_564_800_000);
        expect(parseServerTime("1714564800.5")).toBe(1_714_564_800_500);
    });

    it("returns null for anything else", () => {
        expect(parseServerTime(null)).toBeNull();
        expect(parseServerTime("")).toBeNull();
        expect(parseServerTime("yesterday")).toBeNull();
        expect(parseServerTime("2024-05-01T12:00:00")).toBeNull();
        expect(parseServerTime("2024-02-30T12:00:00Z")).toBeNull();
        expect(parseServerTime("2024-05-01T12:00:00.1234567890Z")).toBeNull();
    });
});
