/**
 * Load cache — accumulates loaded objects in a published namespace.
 *
 * The namespace is bound in the module table under the caller's module path
 * and under the fixed `objdb.db` alias, so both spellings resolve to the same
 * live object. A real binding already at either path is shadowed for the
 * rest of the process.
 */

import writeFileAtomic from "write-file-atomic";
import { DB_ALIAS } from "../constants.js";
import { InvalidNameError, ManifestWriteError } from "../errors.js";
import { Namespace, type ObjectSource } from "../namespace/namespace.js";
import { getModuleTable, type ModuleTable } from "../namespace/module-table.js";
import { isModulePath } from "../namespace/names.js";
import { manifestPath as resolveManifestPath, renderManifest } from "./manifest.js";

export interface LoadCacheOptions {
  /** Directory the manifest is written under. No manifest without it. */
  manifestRoot?: string;
  /** Initial objects. */
  objects?: ObjectSource;
  /** Module table to publish into (default: the process-wide table). */
  table?: ModuleTable;
  /** Clock for the manifest timestamp. */
  now?: () => Date;
}

export class LoadCache {
  readonly module: string;
  readonly objs: Namespace;
  readonly manifestRoot?: string;
  private readonly now: () => Date;

  constructor(module: string, options: LoadCacheOptions = {}) {
    if (!isModulePath(module)) throw new InvalidNameError("module", module);

    this.module = module;
    this.objs = new Namespace(options.objects);
    this.manifestRoot = options.manifestRoot;
    this.now = options.now ?? (() => new Date());

    const table = options.table ?? getModuleTable();
    table.register(module, this.objs);
    table.register(DB_ALIAS, this.objs);
  }

  /** Add or overwrite objects; existing holders of the namespace see them at once. */
  add(objects: ObjectSource): void {
    this.objs.setMany(objects);
  }

  /** Manifest path for this cache, or undefined when no root is configured. */
  get manifestPath(): string | undefined {
    return this.manifestRoot === undefined ? undefined : resolveManifestPath(this.module, this.manifestRoot);
  }

  /**
   * Write the manifest listing every current object and its type.
   *
   * Resolves to the written path, or undefined without touching the disk
   * when no manifest root is set. The parent directory must already exist.
   *
   * @throws ManifestWriteError when the file cannot be written.
   */
  async writeManifest(): Promise<string | undefined> {
    const path = this.manifestPath;
    if (path === undefined) return undefined;

    const text = renderManifest(this.module, this.objs.items(), this.now());
    try {
      await writeFileAtomic(path, text, "utf-8");
    } catch (err) {
      throw new ManifestWriteError(path, err);
    }
    return path;
  }
}
