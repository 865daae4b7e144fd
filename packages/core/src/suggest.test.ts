import { describe, it, expect } from "vitest";
import { editDistance, suggest } from "./suggest.js";

describe("editDistance", () => {
  it("should count insertions, deletions and substitutions", () => {
    expect(editDistance("verbose", "verbose")).toBe(0);
    expect(editDistance("verbos", "verbose")).toBe(1);
    expect(editDistance("kitten", "sitting")).toBe(3);
    expect(editDistance("", "abc")).toBe(3);
  });
});

describe("suggest", () => {
  it("should return the nearest candidate", () => {
    expect(suggest("verbos", ["version", "verbose"])).toBe("verbose");
  });

  it("should prefer the earlier candidate on a tie", () => {
    expect(suggest("bat", ["cat", "hat"])).toBe("cat");
  });

  it("should return undefined when nothing is close enough", () => {
    expect(suggest("xyz", ["verbose", "name"])).toBeUndefined();
    expect(suggest("verbse", ["verbose"], 0)).toBeUndefined();
  });

  it("should not suggest a candidate that shares nothing with a short input", () => {
    expect(suggest("x", ["y"])).toBeUndefined();
  });
});
