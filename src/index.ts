/**
 * Library entry point.
 */

export * from "./types/index.js";
export * from "./plan/index.js";
export * from "./formatter/index.js";
export * from "./source/index.js";
export { VERSION } from "./version.js";
