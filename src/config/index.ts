export { parseConfigDocument, readConfigDocument } from "./document.js";
export type { ConfigDocument } from "./document.js";
