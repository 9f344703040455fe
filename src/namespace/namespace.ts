/**
 * Namespace — ordered, attribute-addressable container of loaded objects.
 *
 * A namespace is shared by reference: whoever resolved it earlier sees
 * every later `setMany` immediately.
 */

import { InvalidNameError, UnknownNameError } from "../errors.js";
import { isObjectName } from "./names.js";

/** Anything that can be read as name → object pairs. */
export type ObjectSource =
  | ReadonlyMap<string, unknown>
  | Readonly<Record<string, unknown>>
  | Iterable<readonly [string, unknown]>;

export type ObjectMap = Map<string, unknown>;

export class Namespace implements Iterable<unknown> {
  private readonly objects: ObjectMap = new Map();

  /**
   * Live, read-only attribute view. Reading an absent name throws
   * UnknownNameError, so destructuring a missing object fails loudly.
   */
  readonly attrs: Readonly<Record<string, unknown>>;

  constructor(objects?: ObjectSource) {
    if (objects !== undefined) this.setMany(objects);
    this.attrs = createAttributeView(this);
  }

  /**
   * Insert or overwrite entries. Names are checked up front; one bad name
   * rejects the whole batch.
   */
  setMany(objects: ObjectSource): void {
    const pairs = pairsOf(objects);
    for (const [name] of pairs) {
      if (!isObjectName(name)) throw new InvalidNameError("object", name);
    }
    for (const [name, value] of pairs) {
      this.objects.set(name, value);
    }
  }

  get(name: string): unknown {
    if (!this.objects.has(name)) throw new UnknownNameError(name);
    return this.objects.get(name);
  }

  has(name: string): boolean {
    return this.objects.has(name);
  }

  get size(): number {
    return this.objects.size;
  }

  names(): IterableIterator<string> {
    return this.objects.keys();
  }

  values(): IterableIterator<unknown> {
    return this.objects.values();
  }

  items(): IterableIterator<[string, unknown]> {
    return this.objects.entries();
  }

  [Symbol.iterator](): IterableIterator<unknown> {
    return this.values();
  }

  /** Plain-object snapshot of the current contents. */
  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.objects);
  }
}

function pairsOf(objects: ObjectSource): Array<readonly [string, unknown]> {
  if (!isPairIterable(objects)) return Object.entries(objects);
  const pairs: Array<readonly [string, unknown]> = [];
  for (const pair of objects) pairs.push(pair);
  return pairs;
}

function isPairIterable(
  objects: ObjectSource,
): objects is ReadonlyMap<string, unknown> | Iterable<readonly [string, unknown]> {
  return Symbol.iterator in objects;
}

function createAttributeView(ns: Namespace): Readonly<Record<string, unknown>> {
  const target: Record<string, unknown> = Object.create(null);
  return new Proxy(target, {
    get(_target, prop) {
      if (typeof prop !== "string") return undefined;
      // Keep the view from looking like a thenable to `await` or a custom
      // serialiser to JSON.stringify.
      if ((prop === "then" || prop === "toJSON") && !ns.has(prop)) return undefined;
      return ns.get(prop);
    },
    has(_target, prop) {
      return typeof prop === "string" && ns.has(prop);
    },
    ownKeys() {
      return Array.from(ns.names());
    },
    getOwnPropertyDescriptor(_target, prop) {
      if (typeof prop !== "string" || !ns.has(prop)) return undefined;
      return { value: ns.get(prop), enumerable: true, configurable: true, writable: false };
    },
    set() {
      return false;
    },
    deleteProperty() {
      return false;
    },
  });
}
