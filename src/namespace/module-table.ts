/**
 * Module table: process-wide lookup of namespaces by module path.
 *
 * Loaded objects are published here so any later code can acquire them by a
 * well-known path. Registering an occupied path replaces the old binding
 * for the rest of the process; that is accepted, not reported.
 *
 * The process-wide table is reached through getModuleTable(); tests swap in
 * an isolated instance with setModuleTable() or pass a table explicitly.
 */

import { ModuleNotFoundError } from "../errors.js";
import type { Namespace } from "./namespace.js";

export class ModuleTable {
  private readonly modules = new Map<string, Namespace>();

  /**
   * Bind a namespace to a module path.
   *
   * @returns The namespace previously bound to the path, if any.
   */
  register(path: string, namespace: Namespace): Namespace | undefined {
    const previous = this.modules.get(path);
    this.modules.set(path, namespace);
    return previous;
  }

  unregister(path: string): boolean {
    return this.modules.delete(path);
  }

  get(path: string): Namespace | undefined {
    return this.modules.get(path);
  }

  /** Like get(), but throws ModuleNotFoundError for an unbound path. */
  resolve(path: string): Namespace {
    const namespace = this.modules.get(path);
    if (!namespace) throw new ModuleNotFoundError(path);
    return namespace;
  }

  has(path: string): boolean {
    return this.modules.has(path);
  }

  paths(): string[] {
    return Array.from(this.modules.keys());
  }
}

let processTable: ModuleTable | undefined;

/** The process-wide table, created on first use. */
export function getModuleTable(): ModuleTable {
  processTable ??= new ModuleTable();
  return processTable;
}

/**
 * Replace the process-wide table. Passing nothing resets it so the next
 * getModuleTable() starts empty.
 *
 * @returns The table that was installed before.
 */
export function setModuleTable(table?: ModuleTable): ModuleTable | undefined {
  const previous = processTable;
  processTable = table;
  return previous;
}

/** Import-style access to a published namespace. */
export function importNamespace(path: string, table: ModuleTable = getModuleTable()): Namespace {
  return table.resolve(path);
}
