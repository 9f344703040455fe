/**
 * Name rules for namespace entries and module paths.
 */

export const OBJECT_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** Dotted identifier path, e.g. "xpp.db". */
export const MODULE_PATH_PATTERN = /^[A-Za-z_]\w*(\.[A-Za-z_]\w*)*$/;

export function isObjectName(name: string): boolean {
  return OBJECT_NAME_PATTERN.test(name);
}

export function isModulePath(path: string): boolean {
  return MODULE_PATH_PATTERN.test(path);
}
