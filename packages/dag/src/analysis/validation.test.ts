import { describe, expect, it } from "vitest";
import { buildDependencyGraph } from "./graph-builder.js";
import { findCycles, findRedundantDependencies, validateGraph } from "./validation.js";

const graphOf = (dependencies: Record<string, string[]>) => buildDependencyGraph(dependencies).graph;

describe("validateGraph", () => {
  it("reports a two-job cycle", () => {
    const issues = validateGraph(graphOf({ x: ["y"], y: ["x"] }));
    expect(issues).toEqual([
      {
        type: "circular_dependency",
        severity: "high",
        cycle: ["x", "y"],
        message: "Circular dependency detected: x -> y -> x",
        suggestion: "Remove or restructure dependencies to eliminate the cycle",
      },
    ]);
  });

  it("reports each simple cycle separately", () => {
    // edges: c -> a, a -> b, b -> c, a -> c
    const cycles = findCycles(graphOf({ a: ["c"], b: ["a"], c: ["b", "a"] }));
    expect(cycles).toEqual([
      ["a", "b", "c"],
      ["a", "c"],
    ]);
  });

  it("is empty for a DAG", () => {
    expect(validateGraph(graphOf({ a: [], b: ["a"], c: ["a", "b"] }))).toEqual([]);
  });
});

describe("findRedundantDependencies", () => {
  it("reports the ancestor edge with its witness", () => {
    const issues = findRedundantDependencies(graphOf({ a: [], b: ["a"], c: ["a", "b"] }));
    expect(issues).toEqual([
      {
        type: "redundant_dependency",
        severity: "low",
        job: "c",
        dependency: "a",
        impliedBy: ["b"],
        message: "Job 'c' has redundant dependency on 'a'",
        suggestion: "Remove 'a' from needs as it's implied by 'b'",
      },
    ]);
  });

  it("lists every witness, not just the first", () => {
    const issues = findRedundantDependencies(
      graphOf({ base: [], left: ["base"], right: ["base"], top: ["base", "left", "right"] })
    );
    expect(issues).toHaveLength(1);
    expect(issues[0].impliedBy).toEqual(["left", "right"]);
  });

  it("detects transitive implication through intermediate jobs", () => {
    const issues = findRedundantDependencies(
      graphOf({ a: [], b: ["a"], c: ["b"], d: ["a", "b", "c"] })
    );
    expect(issues.map((issue) => [issue.job, issue.dependency, issue.impliedBy])).toEqual([
      ["d", "a", ["b", "c"]],
      ["d", "b", ["c"]],
    ]);
  });

  it("does not report unrelated dependencies", () => {
    const issues = findRedundantDependencies(
      graphOf({ build: [], lint: [], test: ["build"], package: ["build", "lint"] })
    );
    expect(issues).toEqual([]);
  });

  it("ignores dependencies that are not jobs", () => {
    expect(findRedundantDependencies(graphOf({ a: [], b: ["a", "ghost"] }))).toEqual([]);
  });
});
