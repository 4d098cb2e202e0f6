import { describe, expect, test } from "vitest";
import { infoValueForKey, parseInfoString, removeInfoKey, setInfoValueForKey } from "./info-string.js";

describe("parseInfoString", () => {
  test("should split into ordered pairs", () => {
    expect(parseInfoString("\\name\\bob\\rate\\25000")).toEqual([
      ["name", "bob"],
      ["rate", "25000"],
    ]);
  });

  test("should give a trailing key an empty value", () => {
    expect(parseInfoString("\\a")).toEqual([["a", ""]]);
    expect(parseInfoString("")).toEqual([]);
  });
});

describe("infoValueForKey", () => {
  test("should look keys up case-insensitively", () => {
    expect(infoValueForKey("\\Name\\bob", "NAME")).toBe("bob");
  });

  test("should return empty string for missing keys", () => {
    expect(infoValueForKey("\\name\\bob", "rate")).toBe("");
  });
});

describe("setInfoValueForKey", () => {
  test("should place new keys first", () => {
    expect(setInfoValueForKey("\\name\\bob", "rate", "9000")).toBe("\\rate\\9000\\name\\bob");
  });

  test("should replace an existing key", () => {
    expect(setInfoValueForKey("\\name\\bob\\rate\\1", "name", "alice")).toBe("\\name\\alice\\rate\\1");
  });

  test("should remove the key for an empty value", () => {
    expect(setInfoValueForKey("\\name\\bob\\rate\\1", "name", "")).toBe("\\rate\\1");
  });

  test("should refuse forbidden characters", () => {
    expect(setInfoValueForKey("\\name\\bob", "name", "a;b")).toBe("\\name\\bob");
    expect(setInfoValueForKey("\\name\\bob", "na\"me", "x")).toBe("\\name\\bob");
  });

  test("should refuse results at or over the length limit", () => {
    expect(setInfoValueForKey("", "k", "v", 5)).toBe("\\k\\v");
    expect(setInfoValueForKey("", "k", "v", 4)).toBe("");
  });
});

describe("removeInfoKey", () => {
  test("should drop every occurrence of the key", () => {
    expect(removeInfoKey("\\a\\1\\b\\2\\A\\3", "a")).toBe("\\b\\2");
  });
});
