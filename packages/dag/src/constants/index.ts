export * from "./thresholds.js";
