/**
 * Error types raised by objdb.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text. Underlying failures travel as `cause`.
 */

export type ObjdbErrorCode =
  | "INVALID_NAME"
  | "UNKNOWN_NAME"
  | "MODULE_NOT_FOUND"
  | "LOADER_NOT_FOUND"
  | "LOADER_FAILED"
  | "MANIFEST_WRITE_FAILED"
  | "INVALID_CONFIG"
  | "INVALID_SETTINGS";

export class ObjdbError extends Error {
  readonly code: ObjdbErrorCode;

  constructor(code: ObjdbErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ObjdbError";
    this.code = code;
  }
}

/** An object name or module path that is not a valid identifier path. */
export class InvalidNameError extends ObjdbError {
  readonly kind: "object" | "module";
  readonly value: string;

  constructor(kind: "object" | "module", value: string) {
    super(
      "INVALID_NAME",
      kind === "object"
        ? `Invalid object name "${value}": names must be identifiers`
        : `Invalid module path "${value}": expected dotted identifiers (e.g. "xpp.db")`,
    );
    this.name = "InvalidNameError";
    this.kind = kind;
    this.value = value;
  }
}

export class UnknownNameError extends ObjdbError {
  readonly objectName: string;

  constructor(objectName: string) {
    super("UNKNOWN_NAME", `Namespace has no object named "${objectName}"`);
    this.name = "UnknownNameError";
    this.objectName = objectName;
  }
}

export class ModuleNotFoundError extends ObjdbError {
  readonly modulePath: string;

  constructor(modulePath: string) {
    super("MODULE_NOT_FOUND", `No namespace registered under "${modulePath}"`);
    this.name = "ModuleNotFoundError";
    this.modulePath = modulePath;
  }
}

/** No loader is registered for a config header. */
export class LoaderNotFoundError extends ObjdbError {
  readonly header: string;
  readonly loaderId: string;

  constructor(header: string, loaderId: string) {
    super("LOADER_NOT_FOUND", `No loader "${loaderId}" registered for header "${header}"`);
    this.name = "LoaderNotFoundError";
    this.header = header;
    this.loaderId = loaderId;
  }
}

/** A loader was found but failed while building its objects. */
export class LoaderExecutionError extends ObjdbError {
  readonly header: string;

  constructor(header: string, cause: unknown) {
    super("LOADER_FAILED", `Loader for header "${header}" failed: ${describeCause(cause)}`, { cause });
    this.name = "LoaderExecutionError";
    this.header = header;
  }
}

export class ManifestWriteError extends ObjdbError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("MANIFEST_WRITE_FAILED", `Failed to write manifest ${path}: ${describeCause(cause)}`, { cause });
    this.name = "ManifestWriteError";
    this.path = path;
  }
}

export class ConfigDocumentError extends ObjdbError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIG", `${source}: ${message}`, options);
    this.name = "ConfigDocumentError";
    this.source = source;
  }
}

export class InvalidSettingsError extends ObjdbError {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super(
      "INVALID_SETTINGS",
      `Invalid settings: ${issues.map(i => `${i.path || "(root)"}: ${i.message}`).join("; ")}`,
    );
    this.name = "InvalidSettingsError";
    this.issues = issues;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
