import { describe, it, expect } from "vitest";
import path from "path";
import { loadConfig, ROOT } from "../src/shared/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      outDir: path.join(ROOT, "out"),
      templatesDir: null,
      mapDoctype: { publicId: "-//OASIS//DTD DITA Map//EN", systemId: "map.dtd" },
      zipLevel: 9,
      maxItemsPerType: 100,
    });
  });

  it("coerces numbers and resolves directories against the repo root", () => {
    const config = loadConfig({
      PORT: "8080",
      DITA_TEMPLATES_DIR: "templates_store",
      DITA_OUT_DIR: "/tmp/dita-out",
      DITA_ZIP_LEVEL: "0",
    });
    expect(config.port).toBe(8080);
    expect(config.templatesDir).toBe(path.join(ROOT, "templates_store"));
    expect(config.outDir).toBe("/tmp/dita-out");
    expect(config.zipLevel).toBe(0);
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ DITA_ZIP_LEVEL: "12" })).toThrow(/Invalid configuration: DITA_ZIP_LEVEL/);
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(/Invalid configuration: PORT/);
  });

  it("rejects DOCTYPE identifiers that would break the map's quoting", () => {
    expect(() => loadConfig({ DITA_MAP_DOCTYPE_PUBLIC: '-//ACME//DTD "Map"//EN' })).toThrow(
      "Invalid configuration: DITA_MAP_DOCTYPE_PUBLIC: must not contain double quotes",
    );
    expect(() => loadConfig({ DITA_MAP_DOCTYPE_SYSTEM: 'map".dtd' })).toThrow(
      "Invalid configuration: DITA_MAP_DOCTYPE_SYSTEM: must not contain double quotes",
    );
  });
});
