export * from "./errors.js";
export * from "./formatters.js";
export * from "./stats.js";
