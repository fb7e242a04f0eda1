import { describe, expect, it } from "vitest";
import { canParallelizeJob, estimateJobDuration, estimateStepBonus } from "./duration-estimator.js";

describe("estimateJobDuration", () => {
  it("adds keyword bonuses to the per-step base", () => {
    const steps = [
      { uses: "actions/checkout@v4" },
      { uses: "actions/setup-node@v4" },
      { run: "npm install" },
      { run: "npm run build" },
      { run: "npm test" },
    ];
    // 5 * 30 + 0 + 30 + 60 + 120 + 90
    expect(estimateJobDuration(steps)).toBe(450);
  });

  it("gives action-style build and test references 120 seconds", () => {
    expect(estimateStepBonus({ uses: "docker/build-push-action@v5" })).toBe(120);
    expect(estimateStepBonus({ uses: "example/test-reporter@v1" })).toBe(120);
  });

  it("gives command-style test keywords 90 seconds", () => {
    expect(estimateStepBonus({ run: "pytest --maxfail=1 tests/" })).toBe(90);
  });

  it("prefers setup and cache over build for action references", () => {
    expect(estimateStepBonus({ uses: "actions/cache@v4" })).toBe(30);
    expect(estimateStepBonus({ uses: "example/setup-build-tools@v2" })).toBe(30);
  });

  it("matches action references case-sensitively and commands case-insensitively", () => {
    expect(estimateStepBonus({ uses: "example/Build-action@v1" })).toBe(0);
    expect(estimateStepBonus({ run: "NPM INSTALL" })).toBe(60);
  });

  it("counts an install command once even when it also builds", () => {
    expect(estimateJobDuration([{ run: "yarn install --frozen-lockfile && yarn build" }])).toBe(90);
  });

  it("ignores the command text when an action reference is present", () => {
    expect(estimateStepBonus({ uses: "actions/checkout@v4", run: "npm test" })).toBe(0);
  });

  it("counts bare script lines toward the base only", () => {
    expect(estimateJobDuration(["make build", "make test"])).toBe(60);
  });

  it("is zero for a job without steps", () => {
    expect(estimateJobDuration([])).toBe(0);
  });
});

describe("canParallelizeJob", () => {
  it("is true for ordinary steps", () => {
    expect(canParallelizeJob([{ uses: "actions/checkout@v4" }, { run: "npm test" }])).toBe(true);
  });

  it("is false when any step mentions deploy, in any case", () => {
    expect(canParallelizeJob([{ run: "npm ci" }, { run: "./scripts/Deploy.sh" }])).toBe(false);
  });

  it("inspects every field of the step, not just the command", () => {
    expect(canParallelizeJob([{ name: "Publish RELEASE notes", run: "echo done" }])).toBe(false);
  });

  it("does not inspect bare script lines", () => {
    expect(canParallelizeJob(["deploy"])).toBe(true);
  });
});
