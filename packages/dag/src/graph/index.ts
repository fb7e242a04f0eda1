/**
 * Graph primitives
 */

export { DependencyGraph, type GraphEdge } from "./dependency-graph.js";
