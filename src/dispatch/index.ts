export { dispatchDocument, loadDocument, collectObjects } from "./dispatcher.js";
export type { HeaderOutcome, HeaderStatus, DispatchOptions } from "./dispatcher.js";
