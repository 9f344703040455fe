/**
 * Config dispatcher — routes each config header to its loader.
 *
 * Headers run one at a time in document order. A header whose loader is
 * missing or fails contributes no objects; the failure goes to the log and
 * the next header proceeds. Dispatch itself never throws for a header.
 *
 * Feeding the results into a LoadCache is left to the caller.
 */

import type { ConfigDocument } from "../config/document.js";
import { LoaderExecutionError, LoaderNotFoundError } from "../errors.js";
import { consoleLogger, errorMeta, type Logger } from "../logging/logger.js";
import type { LoaderRegistry } from "../loaders/registry.js";
import { toObjectMap } from "../loaders/normalize.js";
import type { ObjectMap } from "../namespace/namespace.js";
import type { Loader } from "../loaders/types.js";

export type HeaderOutcome =
  | { header: string; status: "succeeded"; objects: ObjectMap }
  | { header: string; status: "unresolved"; error: LoaderNotFoundError }
  | { header: string; status: "failed"; error: LoaderExecutionError };

export type HeaderStatus = HeaderOutcome["status"];

export interface DispatchOptions {
  registry: LoaderRegistry;
  logger?: Logger;
}

/**
 * Run every header's loader and report one outcome per header, in
 * document order.
 */
export async function dispatchDocument(
  document: ConfigDocument,
  options: DispatchOptions,
): Promise<HeaderOutcome[]> {
  const logger = options.logger ?? consoleLogger;
  const outcomes: HeaderOutcome[] = [];

  for (const [header, info] of document) {
    let loader: Loader;
    try {
      loader = options.registry.resolve(header);
    } catch (err) {
      if (!(err instanceof LoaderNotFoundError)) throw err;
      logger.warn(`No loader when including "${header}". Skipping.`, {
        header,
        loaderId: err.loaderId,
      });
      outcomes.push({ header, status: "unresolved", error: err });
      continue;
    }

    try {
      const objects = toObjectMap(await loader.loadObjs(info));
      outcomes.push({ header, status: "succeeded", objects });
    } catch (err) {
      logger.error(`Exception thrown when building "${header}" objects. Skipping.`, {
        header,
        ...errorMeta(err),
      });
      outcomes.push({ header, status: "failed", error: new LoaderExecutionError(header, err) });
    }
  }

  return outcomes;
}

/**
 * Load every header and collect its objects. Headers that were skipped are
 * present with an empty map.
 */
export async function loadDocument(
  document: ConfigDocument,
  options: DispatchOptions,
): Promise<Map<string, ObjectMap>> {
  const outcomes = await dispatchDocument(document, options);
  return collectObjects(outcomes);
}

export function collectObjects(outcomes: readonly HeaderOutcome[]): Map<string, ObjectMap> {
  const results = new Map<string, ObjectMap>();
  for (const outcome of outcomes) {
    results.set(outcome.header, outcome.status === "succeeded" ? outcome.objects : new Map());
  }
  return results;
}
