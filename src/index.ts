/**
 * objdb: config-driven object loading into a shared namespace.
 *
 * A YAML config names categories of objects; each category's loader builds
 * them; the results are published in a namespace any later code can import
 * by module path, with a text manifest of what was loaded.
 */

export * from "./constants.js";
export * from "./errors.js";
export * from "./logging/index.js";
export * from "./namespace/index.js";
export * from "./cache/index.js";
export * from "./loaders/index.js";
export * from "./config/index.js";
export * from "./dispatch/index.js";
export * from "./schemas/index.js";
export * from "./session/index.js";
