export { createConsoleLogger, consoleLogger, noopLogger, errorMeta } from "./logger.js";
export type { Logger, LogMeta } from "./logger.js";
