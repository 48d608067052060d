import { afterEach, describe, expect, it } from "vitest";
import {
  applyResolverConstantsCsv,
  getResolverConstants,
  parseResolverConstantsCsv,
  resetResolverConstants,
  updateResolverConstants
} from "./constants";

afterEach(() => {
  resetResolverConstants();
});

describe("resolver constants", () => {
  it("starts from the defaults", () => {
    expect(getResolverConstants()).toEqual({
      cacheClosures: true,
      logLevel: "warn",
      unknownSkillLabel: "Unknown Skill"
    });
  });

  it("parses every supported entry", () => {
    const updates = parseResolverConstantsCsv(
      [
        "Category,Key,Value",
        "resolver,cacheClosures,false",
        "logging,level,DEBUG",
        "names,unknown_skill,Mystery Skill"
      ].join("\n")
    );

    expect(updates).toEqual({
      cacheClosures: false,
      logLevel: "debug",
      unknownSkillLabel: "Mystery Skill"
    });
  });

  it("rejects a header that is not category,key,value", () => {
    expect(() => parseResolverConstantsCsv("name,value\nlogging,debug")).toThrow(
      'Constants CSV header must start with "category,key,value" (case insensitive).'
    );
  });

  it("rejects unknown entries", () => {
    expect(() =>
      parseResolverConstantsCsv("category,key,value\nresolver,depthLimit,4")
    ).toThrow('Unknown constants entry "resolver,depthLimit" on row 2.');
  });

  it("rejects values that are not booleans", () => {
    expect(() =>
      parseResolverConstantsCsv("category,key,value\nresolver,cacheClosures,maybe")
    ).toThrow('Cache closures must be true or false, got "maybe".');
  });

  it("rejects unknown log levels", () => {
    expect(() =>
      parseResolverConstantsCsv("category,key,value\nlogging,level,verbose")
    ).toThrow('Unknown log level "verbose" on row 2.');
  });

  it("applies a CSV on top of the current values", () => {
    updateResolverConstants({ logLevel: "error" });

    const applied = applyResolverConstantsCsv(
      "category,key,value\nnames,unknownSkill,  Unnamed  "
    );

    expect(applied).toEqual({
      cacheClosures: true,
      logLevel: "error",
      unknownSkillLabel: "Unnamed"
    });
    expect(getResolverConstants()).toEqual(applied);
  });

  it("rejects an empty unknown-skill label", () => {
    expect(() => updateResolverConstants({ unknownSkillLabel: "  " })).toThrow(
      "Unknown skill label must not be empty."
    );
  });

  it("resets to the defaults", () => {
    updateResolverConstants({ cacheClosures: false, logLevel: "silent" });

    expect(resetResolverConstants()).toEqual({
      cacheClosures: true,
      logLevel: "warn",
      unknownSkillLabel: "Unknown Skill"
    });
  });
});
