import { describe, expect, it } from "vitest";
import { dependencySetKey, normalizeNeeds } from "./needs.js";

describe("normalizeNeeds", () => {
  it("wraps a single name", () => {
    expect(normalizeNeeds("build")).toEqual(["build"]);
  });

  it("reads names and structured entries from a list", () => {
    expect(normalizeNeeds(["build", { job: "lint", artifacts: false }])).toEqual(["build", "lint"]);
  });

  it("reads the keys of a mapping", () => {
    expect(normalizeNeeds({ build: { artifacts: true }, lint: null })).toEqual(["build", "lint"]);
  });

  it("treats an absent declaration as no dependencies", () => {
    expect(normalizeNeeds(undefined)).toEqual([]);
    expect(normalizeNeeds(null)).toEqual([]);
    expect(normalizeNeeds([])).toEqual([]);
  });

  it("drops duplicates, keeping the first occurrence", () => {
    expect(normalizeNeeds(["lint", "build", { job: "lint" }])).toEqual(["lint", "build"]);
  });
});

describe("dependencySetKey", () => {
  it("ignores order and duplicates", () => {
    expect(dependencySetKey(["b", "a", "b"])).toBe(dependencySetKey(["a", "b"]));
    expect(dependencySetKey(["a"])).not.toBe(dependencySetKey(["a", "b"]));
  });
});
