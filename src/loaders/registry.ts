/**
 * Loader registry — maps config headers to loader plugins.
 *
 * Loaders are registered explicitly at startup. Each is addressed by the
 * identifier `objdb.yaml_<header>`; lookups that miss raise
 * LoaderNotFoundError for the dispatcher to log and skip.
 */

import { LOADER_PREFIX } from "../constants.js";
import { LoaderNotFoundError } from "../errors.js";
import type { Loader } from "./types.js";
import { valuesLoader } from "./values-loader.js";

export function loaderId(header: string): string {
  return LOADER_PREFIX + header;
}

export class LoaderRegistry {
  private readonly loaders = new Map<string, Loader>();

  /**
   * Register the loader for a header. Replaces any loader already
   * registered for it.
   */
  register(header: string, loader: Loader): this {
    this.loaders.set(loaderId(header), loader);
    return this;
  }

  unregister(header: string): boolean {
    return this.loaders.delete(loaderId(header));
  }

  has(header: string): boolean {
    return this.loaders.has(loaderId(header));
  }

  /** @throws LoaderNotFoundError when nothing is registered for the header. */
  resolve(header: string): Loader {
    const id = loaderId(header);
    const loader = this.loaders.get(id);
    if (!loader) throw new LoaderNotFoundError(header, id);
    return loader;
  }

  /** Registered loader identifiers, in registration order. */
  ids(): string[] {
    return Array.from(this.loaders.keys());
  }
}

/** Registry with the built-in loaders already registered. */
export function createDefaultRegistry(): LoaderRegistry {
  return new LoaderRegistry().register("values", valuesLoader);
}
