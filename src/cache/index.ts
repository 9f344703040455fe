export { LoadCache } from "./load-cache.js";
export type { LoadCacheOptions } from "./load-cache.js";
export { manifestPath, describeType, formatEntry, renderManifest, NAME_COLUMN_WIDTH } from "./manifest.js";
