/**
 * Session startup: the full load sequence for one process.
 *
 * Reads the config document, publishes a LoadCache, runs every header's
 * loader, merges the results into the cache in document order and writes
 * the manifest. Header failures are logged and skipped; config and
 * manifest failures propagate.
 */

import { LoadCache } from "../cache/load-cache.js";
import { readConfigDocument } from "../config/document.js";
import { collectObjects, dispatchDocument } from "../dispatch/dispatcher.js";
import { createDefaultRegistry, type LoaderRegistry } from "../loaders/registry.js";
import { consoleLogger, type Logger } from "../logging/logger.js";
import type { ModuleTable } from "../namespace/module-table.js";
import type { ObjectMap, ObjectSource } from "../namespace/namespace.js";
import type { SessionSettings } from "../schemas/settings.js";

export interface SessionOptions {
  /** Loaders to dispatch to (default: the built-in registry). */
  registry?: LoaderRegistry;
  table?: ModuleTable;
  logger?: Logger;
  /** Objects placed in the namespace before any loader runs. */
  objects?: ObjectSource;
  now?: () => Date;
}

export interface Session {
  cache: LoadCache;
  /** Objects per header; skipped headers map to an empty collection. */
  results: Map<string, ObjectMap>;
  /** Where the manifest was written, if one was. */
  manifestPath?: string;
}

export async function startSession(settings: SessionSettings, options: SessionOptions = {}): Promise<Session> {
  const logger = options.logger ?? consoleLogger;
  const document = await readConfigDocument(settings.configPath);

  const cache = new LoadCache(settings.module, {
    manifestRoot: settings.manifestRoot,
    objects: options.objects,
    table: options.table,
    now: options.now,
  });

  const outcomes = await dispatchDocument(document, {
    registry: options.registry ?? createDefaultRegistry(),
    logger,
  });

  // Skipped headers were already reported by the dispatcher.
  for (const outcome of outcomes) {
    if (outcome.status !== "succeeded") continue;
    cache.add(outcome.objects);
    logger.info(`Loaded ${outcome.objects.size} object(s) from "${outcome.header}"`, {
      header: outcome.header,
      names: Array.from(outcome.objects.keys()),
    });
  }

  const results = collectObjects(outcomes);

  const manifestPath = await cache.writeManifest();
  return { cache, results, manifestPath };
}
