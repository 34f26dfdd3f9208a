import { describe, it, expect } from "vitest";
import { RecordFilter } from "./record-filter.service.js";
import { record } from "../../../test/fixtures.js";

const records = [
  record({ reference: "NI1025M", partNumber: "110445RB0A", client: "ACME" }),
  record({ reference: "NI1026", partNumber: "110445RB0A", client: "Globex" }),
  record({ reference: null, partNumber: "A-1", client: null }),
  record({ reference: "ni1025-b", partNumber: "B-2", client: "acme corp" }),
];

describe("RecordFilter", () => {
  it("matches case-insensitive substrings", () => {
    const refs = (q: string) =>
      RecordFilter.filter(records, { reference: q }).map((r) => r.reference);
    expect(refs("ni1025")).toEqual(["NI1025M", "ni1025-b"]);
    expect(refs("1025m")).toEqual(["NI1025M"]);
    expect(refs("NI1026")).toEqual(["NI1026"]);
  });

  it("does not match NI1025M for NI1026", () => {
    const matched = RecordFilter.filter([records[0]], { reference: "NI1026" });
    expect(matched).toEqual([]);
  });

  it("ANDs every supplied criterion", () => {
    const matched = RecordFilter.filter(records, {
      partNumber: "110445rb0a",
      client: "acme",
    });
    expect(matched).toEqual([records[0]]);
  });

  it("ignores blank criteria", () => {
    const matched = RecordFilter.filter(records, {
      reference: "   ",
      partNumber: "",
      client: "ACME",
    });
    expect(matched).toEqual([records[0], records[3]]);
  });

  it("trims the criterion before matching", () => {
    expect(RecordFilter.filter(records, { partNumber: "  a-1 " })).toEqual([records[2]]);
  });

  it("never matches a missing field against a non-empty query", () => {
    expect(RecordFilter.filter([records[2]], { client: "a" })).toEqual([]);
  });

  it("treats regex characters literally", () => {
    expect(RecordFilter.filter(records, { partNumber: "A.1" })).toEqual([]);
  });

  it("keeps source order", () => {
    const matched = RecordFilter.filter(records, { client: "c" });
    expect(matched).toEqual([records[0], records[3]]);
  });

  it("refuses to run without criteria", () => {
    expect(RecordFilter.hasCriteria({ reference: " ", client: "\t" })).toBe(false);
    expect(RecordFilter.hasCriteria({})).toBe(false);
    expect(RecordFilter.hasCriteria({ client: "x" })).toBe(true);
    expect(() => RecordFilter.filter(records, { reference: "  " })).toThrow(
      "At least one search criterion is required",
    );
  });
});
