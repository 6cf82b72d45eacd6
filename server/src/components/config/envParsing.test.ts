import { describe, expect, it } from "vitest";
import { integerSetting, parseFlag, parseList } from "./envParsing.js";

describe("parseFlag", () => {
  it("returns the fallback when the value is unset or blank", () => {
    expect(parseFlag(undefined, true)).toBe(true);
    expect(parseFlag(undefined, false)).toBe(false);
    expect(parseFlag("   ", true)).toBe(true);
  });

  it.each(["false", "FALSE", " off ", "No", "0", "disabled"])("treats %j as off", (value) => {
    expect(parseFlag(value, true)).toBe(false);
  });

  it.each(["true", "True", "1", "yes", "ON", "enabled"])("treats %j as on", (value) => {
    expect(parseFlag(value, false)).toBe(true);
  });

  it("keeps the fallback for unrecognized values", () => {
    expect(parseFlag("maybe", true)).toBe(true);
    expect(parseFlag("maybe", false)).toBe(false);
  });
});

describe("parseList", () => {
  it("splits, trims and drops empty entries", () => {
    expect(parseList(" a, b ,,c ")).toEqual(["a", "b", "c"]);
  });

  it("removes duplicates keeping the first occurrence", () => {
    expect(parseList("b,a,b")).toEqual(["b", "a"]);
  });

  it("splits on a custom separator", () => {
    expect(parseList("a, b | c", "|")).toEqual(["a, b", "c"]);
  });

  it("returns an empty list for unset values", () => {
    expect(parseList(undefined)).toEqual([]);
  });
});

describe("integerSetting", () => {
  const timeout = integerSetting(30, 1);

  it("parses integers and ignores surrounding whitespace", () => {
    expect(timeout.parse("45")).toBe(45);
    expect(timeout.parse(" 7 ")).toBe(7);
  });

  it.each([undefined, "", "abc", "12.5", "0", "-5"])("falls back for %j", (value) => {
    expect(timeout.parse(value)).toBe(30);
  });

  it("falls back above the maximum", () => {
    const bounded = integerSetting(30, 1, 100);

    expect(bounded.parse("100")).toBe(100);
    expect(bounded.parse("101")).toBe(30);
  });

  it("accepts zero when the minimum allows it", () => {
    expect(integerSetting(3, 0).parse("0")).toBe(0);
  });
});
