/**
 * Needs Normalization
 *
 * The single place that understands the three shapes a `needs`
 * declaration can take. Everything downstream sees plain name lists.
 */

import type { NeedsDeclaration } from "../schemas/index.js";

/**
 * Normalize a raw `needs` declaration into dependency names
 *
 * - `"build"` → `["build"]`
 * - `["build", { job: "lint", artifacts: true }]` → `["build", "lint"]`
 * - `{ build: { artifacts: true }, lint: {} }` → `["build", "lint"]`
 *
 * Declaration order is kept and duplicates are dropped; the order
 * carries no meaning.
 */
export function normalizeNeeds(declaration: NeedsDeclaration | null | undefined): string[] {
  if (declaration === undefined || declaration === null) {
    return [];
  }

  let names: string[];
  if (typeof declaration === "string") {
    names = [declaration];
  } else if (Array.isArray(declaration)) {
    names = declaration.map((entry) => (typeof entry === "string" ? entry : entry.job));
  } else {
    names = Object.keys(declaration);
  }

  return [...new Set(names)];
}

/**
 * Order-independent key of a dependency-name list; two lists share a key
 * exactly when they name the same set of jobs
 */
export function dependencySetKey(names: readonly string[]): string {
  return JSON.stringify([...new Set(names)].sort());
}
