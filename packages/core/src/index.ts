export * from "./types.js";
export * from "./errors.js";
export * from "./canonical.js";
export * from "./cidr.js";
export * from "./ports.js";
export * from "./rules.js";
export * from "./diff.js";
export * from "./address-book.js";
export * from "./reconcile.js";
export * from "./scheduler.js";
