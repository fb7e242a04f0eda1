import { describe, expect, it } from "vitest";
import { buildDependencyGraph } from "./graph-builder.js";
import {
  buildWeightMap,
  calculateParallelTime,
  calculateSerialTime,
  computeExecutionStages,
  findCriticalPath,
  identifyBottlenecks,
  suggestBottleneckSplits,
} from "./scheduling.js";

const graphOf = (dependencies: Record<string, string[]>) => buildDependencyGraph(dependencies).graph;

describe("computeExecutionStages", () => {
  it("places each job one stage after its latest dependency", () => {
    const graph = graphOf({ build: [], lint: [], test: ["build"], package: ["build", "lint"] });
    expect(computeExecutionStages(graph)).toEqual([
      ["build", "lint"],
      ["test", "package"],
    ]);
  });

  it("is empty for a cyclic graph", () => {
    expect(computeExecutionStages(graphOf({ x: ["y"], y: ["x"], z: [] }))).toEqual([]);
  });

  it("is empty for an empty graph", () => {
    expect(computeExecutionStages(graphOf({}))).toEqual([]);
  });
});

describe("buildWeightMap", () => {
  it("falls back to the default for zero estimates", () => {
    const weights = buildWeightMap(
      [
        { name: "a", estimatedDuration: 0 },
        { name: "b", estimatedDuration: 45 },
      ],
      60
    );
    expect([...weights]).toEqual([
      ["a", 60],
      ["b", 45],
    ]);
  });
});

describe("findCriticalPath", () => {
  it("ends at the job with the heaviest path leading into it", () => {
    const graph = graphOf({ build: [], lint: [], test: ["build"], package: ["build", "lint"] });
    const weights = new Map([
      ["build", 100],
      ["lint", 40],
      ["test", 70],
      ["package", 90],
    ]);
    expect(findCriticalPath(graph, weights)).toEqual({ path: ["build", "test"], duration: 170 });
  });

  it("picks the end by the time its job can start, not its finish", () => {
    const graph = graphOf({ a: [], b: ["a"], c: [] });
    const weights = new Map([
      ["a", 60],
      ["b", 10],
      ["c", 200],
    ]);
    expect(findCriticalPath(graph, weights)).toEqual({ path: ["a", "b"], duration: 70 });
  });

  it("starts from the first job when nothing depends on anything", () => {
    const graph = graphOf({ light: [], heavy: [] });
    const weights = new Map([
      ["light", 5],
      ["heavy", 500],
    ]);
    expect(findCriticalPath(graph, weights)).toEqual({ path: ["light"], duration: 5 });
  });

  it("breaks ties by topological order", () => {
    const graph = graphOf({ a: [], x: [], b: ["a"], y: ["x"] });
    expect(findCriticalPath(graph, new Map())).toEqual({ path: ["a", "b"], duration: 120 });
  });

  it("uses the default weight for jobs missing from the map", () => {
    const graph = graphOf({ a: [], b: ["a"] });
    expect(findCriticalPath(graph, new Map([["a", 10]]), 5)).toEqual({ path: ["a", "b"], duration: 15 });
  });

  it("is empty for a cyclic graph", () => {
    expect(findCriticalPath(graphOf({ x: ["y"], y: ["x"] }), new Map())).toEqual({ path: [], duration: 0 });
  });
});

describe("time bounds", () => {
  const graph = graphOf({ build: [], lint: [], test: ["build"], package: ["build", "lint"] });
  const weights = new Map([
    ["build", 100],
    ["lint", 40],
    ["test", 70],
    ["package", 90],
  ]);

  it("sums every weight for the serial time", () => {
    expect(calculateSerialTime(graph, weights)).toBe(300);
  });

  it("sums each stage's slowest job for the parallel time", () => {
    expect(calculateParallelTime(computeExecutionStages(graph), weights)).toBe(190);
  });

  it("gives zero parallel time without stages", () => {
    expect(calculateParallelTime([], weights)).toBe(0);
  });
});

describe("identifyBottlenecks", () => {
  it("flags high fan-out jobs and jobs alone in a gating stage, once each", () => {
    const graph = graphOf({
      setup: [],
      unit: ["setup"],
      e2e: ["setup"],
      lint: ["setup"],
      report: ["unit", "e2e", "lint"],
    });
    const stages = computeExecutionStages(graph);
    expect(stages).toEqual([["setup"], ["unit", "e2e", "lint"], ["report"]]);
    expect(identifyBottlenecks(graph, stages)).toEqual(["setup"]);
  });

  it("does not flag a lone final job", () => {
    const graph = graphOf({ build: [], test: ["build"], deploy: ["build", "test"] });
    expect(identifyBottlenecks(graph, computeExecutionStages(graph))).toEqual(["build", "test"]);
  });

  it("honours a custom out-degree threshold", () => {
    const graph = graphOf({ build: [], lint: [], test: ["build"], package: ["build", "lint"] });
    expect(identifyBottlenecks(graph, computeExecutionStages(graph), 2)).toEqual(["build"]);
  });

  it("still flags fan-out on a cyclic graph", () => {
    const graph = graphOf({ hub: ["c"], a: ["hub"], b: ["hub"], c: ["hub"] });
    expect(identifyBottlenecks(graph, computeExecutionStages(graph))).toEqual(["hub"]);
  });
});

describe("suggestBottleneckSplits", () => {
  const steps = (count: number) => Array.from({ length: count }, (_, i) => ({ run: `echo ${i}` }));

  it("suggests splitting bottlenecks with more than five steps", () => {
    const suggestions = suggestBottleneckSplits(["big", "small"], {
      big: { steps: steps(6) },
      small: { steps: steps(5) },
    });
    expect(suggestions).toEqual([
      {
        type: "split_bottleneck_job",
        severity: "medium",
        job: "big",
        stepCount: 6,
        message: "Job 'big' is a bottleneck with 6 steps",
        suggestion: "Consider splitting this job into smaller, parallel jobs",
      },
    ]);
  });
});
