/**
 * Template Registry — Unit Tests
 *
 * Tests:
 *   - Builtin template resolution
 *   - Custom directory overlay
 *   - register() replaces resolved text
 *   - Errors on unknown types and missing files
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { TemplateRegistry } from "../../src/templates/registry.js";
import { BUILTIN_TEMPLATES_DIR } from "../../src/templates/builtins/dita_ct/manifest.js";
import { MissingTemplateError } from "../../src/shared/errors.js";

describe("TemplateRegistry", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(path.join(os.tmpdir(), "dita-registry-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("resolves builtin templates", () => {
    const resolved = new TemplateRegistry().resolve("task");
    expect(resolved.source).toBe("builtin");
    expect(resolved.path).toBe(path.join(BUILTIN_TEMPLATES_DIR, "ct-task.xml"));
    expect(resolved.definition.rootElement).toBe("ct_task");
    expect(resolved.text).toContain('<ct_task id="{{id}}"');
  });

  it("lists content types in canonical order", () => {
    const types = new TemplateRegistry().list().map((d) => d.type);
    expect(types).toEqual(["concept", "task", "process", "principle", "reference"]);
  });

  it("maps references onto the concept root element", () => {
    const registry = new TemplateRegistry();
    expect(registry.get("reference")?.rootElement).toBe("ct_concept");
    expect(registry.get("reference")?.prefix).toBe("r-");
    expect(registry.get("glossary")).toBeUndefined();
  });

  it("prefers files from a custom templates directory", () => {
    const custom = '<ct_task id="{{id}}"><title>{{title}}</title></ct_task>';
    writeFileSync(path.join(tmpDir, "ct-task.xml"), custom);

    const registry = new TemplateRegistry({ templatesDir: tmpDir });
    const task = registry.resolve("task");
    expect(task.source).toBe("custom");
    expect(task.text).toBe(custom);
    expect(registry.resolve("concept").source).toBe("builtin");
  });

  it("register() overrides the resolved template", () => {
    const registry = new TemplateRegistry();
    registry.resolve("principle");
    registry.register("principle", "<ct_principle/>");
    const resolved = registry.resolve("principle");
    expect(resolved.text).toBe("<ct_principle/>");
    expect(resolved.path).toBe("(inline)");
  });

  it("throws MissingTemplateError for unknown types", () => {
    expect(() => new TemplateRegistry().resolve("glossary")).toThrow(
      'No template registered for content type "glossary"',
    );
  });

  it("throws MissingTemplateError when the template file is absent", () => {
    const registry = new TemplateRegistry({ builtinDir: tmpDir });
    expect(() => registry.resolve("concept")).toThrow(MissingTemplateError);
  });
});
