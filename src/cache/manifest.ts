/**
 * Manifest helpers - path derivation and text rendering for the
 * "what got loaded" file written next to a session's configuration.
 */

import { join } from "node:path";
import { DB_ALIAS } from "../constants.js";

/** Column width reserved for object names. */
export const NAME_COLUMN_WIDTH = 20;

/**
 * Manifest location for a module path: the last dotted segment becomes
 * "<segment>.txt" and every segment is a path component under root.
 *
 * e.g. ("xpp.db", "/cds/xpp") → "/cds/xpp/xpp/db.txt"
 */
export function manifestPath(modulePath: string, root: string): string {
  const parts = modulePath.split(".");
  parts[parts.length - 1] = `${parts[parts.length - 1]}.txt`;
  return join(root, ...parts);
}

/**
 * Runtime type name used in the manifest.
 *
 * Primitives report their typeof, objects and functions the name of the
 * constructor on their prototype.
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object" && typeof value !== "function") return typeof value;

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || (typeof proto !== "object" && typeof proto !== "function")) return "Object";
  const ctor: unknown = Reflect.get(proto, "constructor");
  if (typeof ctor === "function" && ctor.name) return ctor.name;
  return "Object";
}

export function formatEntry(name: string, value: unknown): string {
  return `${name.padEnd(NAME_COLUMN_WIDTH)} ${describeType(value)}`;
}

export function renderManifest(
  modulePath: string,
  entries: Iterable<readonly [string, unknown]>,
  loadedAt: Date,
): string {
  const top = modulePath.split(".")[0] ?? modulePath;
  const lines = [
    `The objects referenced in this file are populated by the ${top} startup`,
    `script. To use objects from this file, import them from ${modulePath}`,
    `(or ${DB_ALIAS}) after the ${top} startup script has run.`,
    "",
    `${top} last loaded on ${loadedAt.toISOString()}`,
    "with the following objects:",
    "",
  ];
  for (const [name, value] of entries) {
    lines.push(formatEntry(name, value));
  }
  return lines.join("\n") + "\n";
}
