/**
 * Human-readable summaries of engine results
 */

import chalk, { type ChalkInstance } from "chalk";
import type { AnalysisResult, IssueSeverity, OptimizeResult } from "@jobgraph/dag";

const severityColor = (colors: ChalkInstance, severity: IssueSeverity): ChalkInstance => {
  switch (severity) {
    case "high":
      return colors.red;
    case "medium":
      return colors.yellow;
    case "low":
      return colors.gray;
  }
};

const listOrNone = (names: readonly string[]): string => (names.length > 0 ? names.join(", ") : "none");

export function formatAnalysisSummary(result: AnalysisResult, colors: ChalkInstance = chalk): string[] {
  const lines: string[] = [];

  lines.push(
    `Jobs: ${Object.keys(result.jobs).length} | Edges: ${result.edges.length} | Stages: ${result.executionStages.length}`
  );

  if (result.hasCycles) {
    lines.push(colors.red("Cycles detected: stages, critical path and parallel time were skipped"));
  } else {
    const path = result.criticalPath.length > 0 ? result.criticalPath.join(" -> ") : "none";
    lines.push(`Critical path: ${path} (${result.criticalPathDuration}s)`);
  }
  lines.push(`Serial time: ${result.totalSerialTime}s | Parallel time: ${result.optimalParallelTime}s`);
  lines.push(`Bottlenecks: ${listOrNone(result.bottlenecks)}`);

  if (result.executionStages.length > 0) {
    lines.push("");
    lines.push(colors.bold("Stages:"));
    result.executionStages.forEach((stage, index) => {
      lines.push(`  ${index + 1}. ${stage.join(", ")}`);
    });
  }

  lines.push("");
  lines.push(colors.bold(`Issues (${result.issues.length}):`));
  for (const issue of result.issues) {
    lines.push(`  ${severityColor(colors, issue.severity)(`[${issue.severity}]`)} ${issue.message}`);
    lines.push(`    ${colors.dim(issue.suggestion)}`);
  }

  lines.push("");
  lines.push(colors.bold(`Suggestions (${result.suggestions.length}):`));
  for (const suggestion of result.suggestions) {
    lines.push(`  ${severityColor(colors, suggestion.severity)(`[${suggestion.severity}]`)} ${suggestion.message}`);
    lines.push(`    ${colors.dim(suggestion.suggestion)}`);
  }

  return lines;
}

export function formatOptimizeSummary(result: OptimizeResult, colors: ChalkInstance = chalk): string[] {
  const lines: string[] = [];

  if (result.changes.length === 0) {
    lines.push(colors.green("No changes: dependencies are already minimal"));
  } else {
    lines.push(colors.bold(`Changes (${result.changes.length}):`));
    for (const change of result.changes) {
      lines.push(`  ${change.job}: removed ${change.removed.join(", ")} ${colors.dim(`(${change.reason})`)}`);
    }
  }

  lines.push("");
  lines.push(colors.bold("Dependencies:"));
  for (const [job, needs] of Object.entries(result.dependencies)) {
    lines.push(`  ${job}: ${listOrNone(needs)}`);
  }

  return lines;
}
