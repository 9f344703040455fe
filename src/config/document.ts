/**
 * Config document loader: reads the session's YAML configuration.
 *
 * The document maps each header to the info block its loader receives.
 * When the file's top level is a sequence, its first item is the document.
 * Header order is kept, and duplicate headers are rejected.
 */

import { readFile } from "node:fs/promises";
import { parseDocument, isMap, isNode, isScalar, isSeq } from "yaml";
import { ConfigDocumentError, describeCause } from "../errors.js";

/** Header → info block, in file order. */
export type ConfigDocument = ReadonlyMap<string, unknown>;

/**
 * Parse YAML text into a config document.
 *
 * @param source - Label used in error messages (usually the file path).
 */
export function parseConfigDocument(text: string, source = "<inline>"): ConfigDocument {
  const doc = parseDocument(text);
  const [firstError] = doc.errors;
  if (firstError) {
    throw new ConfigDocumentError(source, `YAML parse error: ${firstError.message}`, { cause: firstError });
  }

  let root: unknown = doc.contents;
  if (isSeq(root)) root = root.items[0];
  if (root === null || root === undefined) {
    throw new ConfigDocumentError(source, "no configuration found");
  }
  if (!isMap(root)) {
    throw new ConfigDocumentError(source, "expected a mapping of header to loader info");
  }

  const headers = new Map<string, unknown>();
  for (const pair of root.items) {
    const key = pair.key;
    if (!isScalar(key) || typeof key.value !== "string") {
      throw new ConfigDocumentError(source, `header ${String(key)} is not a string`);
    }
    const value: unknown = isNode(pair.value) ? pair.value.toJS(doc) : pair.value;
    headers.set(key.value, value ?? null);
  }
  return headers;
}

/** Read and parse a config file. */
export async function readConfigDocument(path: string): Promise<ConfigDocument> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigDocumentError(path, `cannot read file: ${describeCause(err)}`, { cause: err });
  }
  return parseConfigDocument(text, path);
}
