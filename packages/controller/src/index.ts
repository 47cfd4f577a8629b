export * from "./config.js";
export * from "./logger.js";
export * from "./audit.js";
export * from "./runtime.js";
export * from "./cli.js";
