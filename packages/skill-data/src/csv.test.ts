import { describe, expect, it } from "vitest";
import { parseCsv, parseCsvRecords, trimEmptyRows } from "./csv";

describe("parseCsv", () => {
  it("splits rows and trims cells", () => {
    expect(parseCsv("a , b\r\n c,d \n")).toEqual([
      ["a", "b"],
      ["c", "d"]
    ]);
  });

  it("reports malformed input", () => {
    expect(() => parseCsv('a,"b\nc,d')).toThrow(/^Malformed CSV: /);
  });
});

describe("parseCsvRecords", () => {
  it("keys cells by the trimmed header", () => {
    expect(parseCsvRecords(" skillId , name \n10, Navigation ")).toEqual([
      { skillId: "10", name: "Navigation" }
    ]);
  });
});

describe("trimEmptyRows", () => {
  it("drops rows whose cells are all blank", () => {
    expect(trimEmptyRows([["a"], ["", " "], ["b", ""]])).toEqual([["a"], ["b", ""]]);
  });
});
