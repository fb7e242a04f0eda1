import { describe, expect, it } from "vitest";
import { buildDependencyGraph } from "./graph-builder.js";
import {
  findIdenticalDependencyGroups,
  findLongestChain,
  findParallelGroups,
  parallelizeJobs,
  suggestIndependentPairs,
  suggestLargeJobs,
  suggestLongChain,
} from "./parallelization.js";
import { computeExecutionStages } from "./scheduling.js";

const fanIn = { build: [], lint: [], test: ["build"], package: ["build", "lint"] };

describe("findParallelGroups", () => {
  it("reports each stage with two or more independent jobs", () => {
    const { graph } = buildDependencyGraph(fanIn);
    expect(findParallelGroups(graph, computeExecutionStages(graph), fanIn)).toEqual([
      { jobs: ["build", "lint"], source: "same_stage", serialized: false },
      { jobs: ["test", "package"], source: "same_stage", serialized: false },
    ]);
  });

  it("adds identical-dependency groups not already reported", () => {
    const dependencies = { x: ["ghost"], y: ["ghost"], z: [] };
    const { graph } = buildDependencyGraph(dependencies);
    expect(findParallelGroups(graph, computeExecutionStages(graph), dependencies)).toEqual([
      { jobs: ["x", "y", "z"], source: "same_stage", serialized: false },
      { jobs: ["x", "y"], source: "identical_dependencies", serialized: false },
    ]);
  });

  it("marks a group serialized when an edge joins two members", () => {
    const dependencies = { a: ["a", "k"], c: ["a", "k"], k: ["a"] };
    const { graph } = buildDependencyGraph(dependencies);
    expect(findParallelGroups(graph, computeExecutionStages(graph), dependencies)).toEqual([
      { jobs: ["a", "c"], source: "identical_dependencies", serialized: true },
    ]);
  });
});

describe("findIdenticalDependencyGroups", () => {
  it("ignores declaration order and duplicates", () => {
    expect(
      findIdenticalDependencyGroups({ a: [], b: [], c: ["a", "b"], d: ["b", "a", "a"], e: ["a"] })
    ).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });
});

describe("suggestIndependentPairs", () => {
  it("skips pairs that converge on a shared dependent", () => {
    const { graph } = buildDependencyGraph(fanIn);
    expect(suggestIndependentPairs(graph, computeExecutionStages(graph))).toEqual([
      {
        type: "parallelize_independent_jobs",
        severity: "medium",
        jobs: ["package", "test"],
        message: "Jobs 'package' and 'test' could potentially run in parallel",
        suggestion: "Review if these jobs truly need to run sequentially",
      },
    ]);
  });

  it("orders each pair by name", () => {
    const { graph } = buildDependencyGraph({ zeta: [], alpha: [], mid: [] });
    const pairs = suggestIndependentPairs(graph, computeExecutionStages(graph)).map((s) => s.jobs);
    expect(pairs).toEqual([
      ["alpha", "mid"],
      ["alpha", "zeta"],
      ["mid", "zeta"],
    ]);
  });
});

describe("findLongestChain", () => {
  it("returns the first longest chain in topological order", () => {
    const { graph } = buildDependencyGraph({ a: [], b: ["a"], c: ["b"], x: [], y: ["x"], z: ["y"] });
    expect(findLongestChain(graph)).toEqual(["a", "b", "c"]);
  });

  it("counts hops, not durations", () => {
    const { graph } = buildDependencyGraph({ a: [], b: ["a"], c: ["a", "b"] });
    expect(findLongestChain(graph)).toEqual(["a", "b", "c"]);
  });

  it("is empty for a cyclic graph", () => {
    const { graph } = buildDependencyGraph({ x: ["y"], y: ["x"] });
    expect(findLongestChain(graph)).toEqual([]);
  });
});

describe("suggestLongChain", () => {
  it("flags a chain of five jobs", () => {
    const { graph } = buildDependencyGraph({ a: [], b: ["a"], c: ["b"], d: ["c"], e: ["d"] });
    expect(suggestLongChain(graph)).toEqual([
      {
        type: "long_dependency_chain",
        severity: "low",
        path: ["a", "b", "c", "d", "e"],
        message: "Long dependency chain: a -> b -> c -> d -> e",
        suggestion: "Consider restructuring to reduce sequential dependencies",
      },
    ]);
  });

  it("ignores a chain of four jobs", () => {
    const { graph } = buildDependencyGraph({ a: [], b: ["a"], c: ["b"], d: ["c"] });
    expect(suggestLongChain(graph)).toEqual([]);
  });
});

describe("suggestLargeJobs", () => {
  it("flags jobs with more than ten steps", () => {
    const steps = (count: number) => Array.from({ length: count }, () => "echo");
    expect(
      suggestLargeJobs([
        { name: "huge", steps: steps(11) },
        { name: "fine", steps: steps(10) },
      ])
    ).toEqual([
      {
        type: "large_job",
        severity: "low",
        job: "huge",
        stepCount: 11,
        message: "Job 'huge' has 11 steps",
        suggestion: "Consider splitting into smaller, parallel jobs for faster execution",
      },
    ]);
  });
});

describe("parallelizeJobs", () => {
  it("drops an intra-group edge that another dependency implies", () => {
    const result = parallelizeJobs({ a: ["a", "k"], c: ["a", "k"], k: ["a"] });
    expect(result.dependencies).toEqual({ a: ["a", "k"], c: ["k"], k: ["a"] });
    expect(result.changes).toEqual([
      {
        job: "c",
        removed: ["a"],
        reason: "enable_parallelization",
        message: "Enabled parallel execution for job 'c'",
      },
    ]);
  });

  it("changes nothing when no group is serialized", () => {
    const result = parallelizeJobs(fanIn);
    expect(result.dependencies).toEqual(fanIn);
    expect(result.changes).toEqual([]);
  });
});
