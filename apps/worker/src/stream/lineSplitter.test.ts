import { describe, it, expect } from "vitest";
import { LineSplitter } from "./lineSplitter.js";

describe("LineSplitter", () => {
    it("splits complete lines and holds back the partial tail", () => {
        const splitter = new LineSplitter();

        expect(splitter.push('{"a":1}\n{"b":')).toEqual(['{"a":1}']);
        expect(splitter.push('2}\n{"c":3}\n')).toEqual(['{"b":2}', '{"c":3}']);
        expect(splitter.flush()).toBeNull();
    });

    it("drops blank lines and carriage returns", () => {
        const splitter = new LineSplitter();

        expect(splitter.push("one\r\n\r\n\ntwo\n")).toEqual(["one", "two"]);
    });

    it("decodes multi-byte characters split across chunks", () => {
        const splitter = new LineSplitter();
        const bytes = new TextEncoder().encode('{"x":"é"}\n');
        // "é" is two bytes; cut between them
        const cut = bytes.indexOf(0xc3) + 1;

        expect(splitter.push(bytes.slice(0, cut))).toEqual([]);
        expect(splitter.push(bytes.slice(cut))).toEqual(['{"x":"é"}']);
    });

    it("returns the trailing line without a newline on flush", () => {
        const splitter = new LineSplitter();

        expect(splitter.push('{"a":1}\n{"b":2}')).toEqual(['{"a":1}']);
        expect(splitter.flush()).toBe('{"b":2}');
        expect(splitter.flush()).toBeNull();
    });
});
