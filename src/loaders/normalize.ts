/**
 * Coerce a loader's return value into an ordered name → object map.
 *
 * Accepted shapes: a Map, a sync iterable of [name, object] pairs, or a plain
 * record. Anything else (class instances, dates, async iterables) is a
 * TypeError, so the header is reported as failed instead of loading nothing.
 */

import { InvalidNameError } from "../errors.js";
import type { ObjectMap } from "../namespace/namespace.js";
import { isObjectName } from "../namespace/names.js";
import { describeType } from "../cache/manifest.js";

export function toObjectMap(result: unknown): ObjectMap {
  const objects: ObjectMap = new Map();

  if (isIterable(result)) {
    let index = 0;
    for (const pair of result) {
      const name: unknown = Array.isArray(pair) && pair.length === 2 ? pair[0] : undefined;
      if (!Array.isArray(pair) || typeof name !== "string") {
        throw new TypeError(`Loader result item #${index} is not a [name, object] pair`);
      }
      const value: unknown = pair[1];
      addChecked(objects, name, value);
      index++;
    }
    return objects;
  }

  if (isPlainRecord(result)) {
    for (const [name, value] of Object.entries(result)) {
      addChecked(objects, name, value);
    }
    return objects;
  }

  if (isAsyncIterable(result)) {
    throw new TypeError("Loader returned an async iterable; resolve the objects before returning them");
  }
  throw new TypeError(`Loader returned ${describeType(result)}, expected a mapping of objects`);
}

function addChecked(objects: ObjectMap, name: string, value: unknown): void {
  if (!isObjectName(name)) throw new InvalidNameError("object", name);
  objects.set(name, value);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === "function"
  );
}

function isAsyncIterable(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, Symbol.asyncIterator) === "function"
  );
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
