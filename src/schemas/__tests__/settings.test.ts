import { describe, it, expect } from "vitest";
import { resolveSettings, SessionSettings } from "../settings.js";
import { InvalidSettingsError } from "../../errors.js";

describe("SessionSettings", () => {
  it("defaults the module path to the db alias", () => {
    const settings = SessionSettings.parse({ configPath: "conf.yml" });
    expect(settings).toEqual({ configPath: "conf.yml", module: "objdb.db" });
  });
});

describe("resolveSettings", () => {
  it("reads OBJDB_* environment variables", () => {
    const settings = resolveSettings(
      {},
      { OBJDB_CONFIG: "/srv/conf.yml", OBJDB_MODULE: "xpp.db", OBJDB_MANIFEST_ROOT: "/srv" },
    );

    expect(settings).toEqual({ configPath: "/srv/conf.yml", module: "xpp.db", manifestRoot: "/srv" });
  });

  it("prefers explicit input over the environment", () => {
    const settings = resolveSettings(
      { module: "mfx.db", manifestRoot: undefined },
      { OBJDB_CONFIG: "/srv/conf.yml", OBJDB_MODULE: "xpp.db", OBJDB_MANIFEST_ROOT: "/srv" },
    );

    expect(settings.module).toBe("mfx.db");
    expect(settings.manifestRoot).toBe("/srv");
  });

  it("ignores empty environment variables", () => {
    const settings = resolveSettings({ configPath: "conf.yml" }, { OBJDB_MODULE: "" });
    expect(settings.module).toBe("objdb.db");
  });

  it("lists every issue when validation fails", () => {
    let caught: unknown;
    try {
      resolveSettings({ module: "bad-path" }, {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InvalidSettingsError);
    if (caught instanceof InvalidSettingsError) {
      expect(caught.issues.map(i => i.path)).toEqual(["configPath", "module"]);
      expect(caught.issues[1]?.message).toBe("must be dotted identifiers");
    }
  });
});
