/** Package-level names shared across modules. */

export const PACKAGE_NAME = "objdb";

/** Fixed alias every load cache is also published under. */
export const DB_ALIAS = `${PACKAGE_NAME}.db`;

/** Loader identifiers are this prefix followed by the config header. */
export const LOADER_PREFIX = `${PACKAGE_NAME}.yaml_`;
