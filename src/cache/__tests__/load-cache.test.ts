/**
 * Tests for LoadCache: namespace publication, accumulation and manifests.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, access } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { LoadCache } from "../load-cache.js";
import { ModuleTable, importNamespace } from "../../namespace/module-table.js";
import { Namespace } from "../../namespace/namespace.js";
import { InvalidNameError, ManifestWriteError } from "../../errors.js";

class Robot {}

describe("LoadCache", () => {
  let table: ModuleTable;

  beforeEach(() => {
    table = new ModuleTable();
  });

  describe("registration", () => {
    it("publishes one namespace under the module path and the db alias", () => {
      const cache = new LoadCache("pkg.sub", { table });

      expect(table.resolve("pkg.sub")).toBe(cache.objs);
      expect(table.resolve("objdb.db")).toBe(cache.objs);
    });

    it("makes mutations visible through both paths", () => {
      const cache = new LoadCache("pkg.sub", { table });
      const viaAlias = importNamespace("objdb.db", table);

      cache.add({ motor: "m1" });
      importNamespace("pkg.sub", table).setMany({ slit: "s1" });

      expect(viaAlias.get("motor")).toBe("m1");
      expect(cache.objs.get("slit")).toBe("s1");
    });

    it("shadows a namespace already bound at either path", () => {
      const existing = new Namespace({ old: 1 });
      table.register("pkg.sub", existing);
      table.register("objdb.db", existing);

      const cache = new LoadCache("pkg.sub", { table });

      expect(table.resolve("pkg.sub")).toBe(cache.objs);
      expect(table.resolve("objdb.db")).toBe(cache.objs);
      expect(cache.objs.has("old")).toBe(false);
    });

    it("seeds the namespace with initial objects", () => {
      const cache = new LoadCache("pkg.sub", { table, objects: { seed: 1 } });
      expect(cache.objs.get("seed")).toBe(1);
    });

    it("rejects a module path that is not dotted identifiers", () => {
      expect(() => new LoadCache("pkg..sub", { table })).toThrow(InvalidNameError);
      expect(() => new LoadCache("", { table })).toThrow(InvalidNameError);
      expect(table.paths()).toEqual([]);
    });
  });

  describe("add", () => {
    it("accumulates and overwrites objects", () => {
      const cache = new LoadCache("pkg.sub", { table });

      cache.add({ a: 1 });
      cache.add({ b: 2 });
      expect(cache.objs.toRecord()).toEqual({ a: 1, b: 2 });

      cache.add({ a: 3 });
      expect(cache.objs.toRecord()).toEqual({ a: 3, b: 2 });
      expect(cache.objs.size).toBe(2);
    });

    it("reaches code that imported the namespace before the add", () => {
      const cache = new LoadCache("pkg.sub", { table });
      const early = importNamespace("pkg.sub", table);

      cache.add({ late: "value" });

      expect(early.attrs["late"]).toBe("value");
    });
  });

  describe("writeManifest", () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), "objdb-cache-test-"));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it("is a no-op without a manifest root", async () => {
      const cache = new LoadCache("pkg.sub", { table, objects: { a: 1 } });

      await expect(cache.writeManifest()).resolves.toBeUndefined();
      expect(cache.manifestPath).toBeUndefined();
    });

    it("writes the manifest under the derived path", async () => {
      await mkdir(join(root, "xpp"));
      const cache = new LoadCache("xpp.db", {
        table,
        manifestRoot: root,
        now: () => new Date("2026-03-01T12:00:00.000Z"),
      });
      cache.add({ x: 5, robot: new Robot() });

      const written = await cache.writeManifest();

      expect(written).toBe(join(root, "xpp", "db.txt"));
      const text = await readFile(join(root, "xpp", "db.txt"), "utf-8");
      const lines = text.split("\n");
      expect(lines).toContain("xpp last loaded on 2026-03-01T12:00:00.000Z");
      expect(lines.slice(-3)).toEqual(["x                    number", "robot                Robot", ""]);
    });

    it("produces identical output apart from the timestamp line", async () => {
      await mkdir(join(root, "xpp"));
      const stamps = [new Date("2026-03-01T12:00:00.000Z"), new Date("2026-03-01T12:05:00.000Z")];
      let call = 0;
      const cache = new LoadCache("xpp.db", {
        table,
        manifestRoot: root,
        objects: { a: 1, b: "two" },
        now: () => stamps[call++] ?? new Date(0),
      });

      const path = await cache.writeManifest();
      const first = await readFile(join(root, "xpp", "db.txt"), "utf-8");
      await cache.writeManifest();
      const second = await readFile(join(root, "xpp", "db.txt"), "utf-8");

      expect(path).toBe(join(root, "xpp", "db.txt"));
      const firstLines = first.split("\n");
      const secondLines = second.split("\n");
      const differing = firstLines
        .map((line, i) => (line === secondLines[i] ? -1 : i))
        .filter(i => i >= 0);
      expect(differing).toEqual([4]);
      expect(secondLines[4]).toBe("xpp last loaded on 2026-03-01T12:05:00.000Z");
      expect(secondLines).toHaveLength(firstLines.length);
    });

    it("overwrites an existing manifest", async () => {
      await mkdir(join(root, "xpp"));
      const cache = new LoadCache("xpp.db", { table, manifestRoot: root, objects: { a: 1 } });

      await cache.writeManifest();
      cache.add({ b: 2 });
      await cache.writeManifest();

      const text = await readFile(join(root, "xpp", "db.txt"), "utf-8");
      expect(text.endsWith("a                    number\nb                    number\n")).toBe(true);
    });

    it("rejects with ManifestWriteError when the directory is missing", async () => {
      const cache = new LoadCache("xpp.db", { table, manifestRoot: root });

      const failure = cache.writeManifest();

      await expect(failure).rejects.toBeInstanceOf(ManifestWriteError);
      await expect(failure).rejects.toMatchObject({
        code: "MANIFEST_WRITE_FAILED",
        path: join(root, "xpp", "db.txt"),
      });
      await expect(access(join(root, "xpp"))).rejects.toThrow();
    });
  });
});
