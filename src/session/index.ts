export { startSession } from "./startup.js";
export type { Session, SessionOptions } from "./startup.js";
