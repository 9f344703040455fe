export { Namespace } from "./namespace.js";
export type { ObjectSource, ObjectMap } from "./namespace.js";
export { ModuleTable, getModuleTable, setModuleTable, importNamespace } from "./module-table.js";
export { OBJECT_NAME_PATTERN, MODULE_PATH_PATTERN, isObjectName, isModulePath } from "./names.js";
