import { describe, it, expect } from "vitest";
import { editDistance, findSimilar } from "./similarity.js";

describe("editDistance", () => {
  it("computes Levenshtein distance", () => {
    expect(editDistance("hello", "hello")).toBe(0);
    expect(editDistance("hello", "helo")).toBe(1);
    expect(editDistance("hello", "helloo")).toBe(1);
    expect(editDistance("hello", "bell")).toBe(2);
    expect(editDistance("hello", "world")).toBe(4);
  });

  it("handles empty strings", () => {
    expect(editDistance("", "abc")).toBe(3);
    expect(editDistance("abc", "")).toBe(3);
  });
});

describe("findSimilar", () => {
  const commands = ["list", "search", "create", "delete", "status"];

  it("suggests close matches, closest first", () => {
    expect(findSimilar("serach", commands)).toEqual(["search"]);
    expect(findSimilar("lst", commands)).toEqual(["list"]);
  });

  it("orders ties by candidate order", () => {
    expect(findSimilar("cat", ["bat", "hat", "rat", "mat"], { limit: 2 })).toEqual(["bat", "hat"]);
  });

  it("returns nothing for distant or empty input", () => {
    expect(findSimilar("zzzzzzzz", commands)).toEqual([]);
    expect(findSimilar("", commands)).toEqual([]);
  });

  it("does not suggest when the distance reaches the input length", () => {
    // two edits away, but the input is a single character
    expect(findSimilar("x", ["ls"])).toEqual([]);
  });
});
