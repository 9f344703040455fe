export type { Loader } from "./types.js";
export { LoaderRegistry, loaderId, createDefaultRegistry } from "./registry.js";
export { valuesLoader } from "./values-loader.js";
export { toObjectMap } from "./normalize.js";
