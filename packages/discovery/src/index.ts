export * from "./http-discovery.js";
