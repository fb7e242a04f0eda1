export type * from "./issues.js";
export type * from "./suggestions.js";
export type * from "./results.js";
