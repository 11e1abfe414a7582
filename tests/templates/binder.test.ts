/**
 * Template Binder — Unit Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TemplateBinder, renderTemplate } from "../../src/templates/binder.js";
import { TemplateRegistry } from "../../src/templates/registry.js";
import { normalize } from "../../src/naming/normalizer.js";
import { MissingFieldError, MissingTemplateError } from "../../src/shared/errors.js";

describe("TemplateBinder", () => {
  let registry: TemplateRegistry;
  let binder: TemplateBinder;

  beforeEach(() => {
    registry = new TemplateRegistry();
    binder = new TemplateBinder(registry);
  });

  it("binds id and title into the concept template", () => {
    const id = normalize("concept", "My First Concept!");
    const xml = binder.bind("concept", { id, title: "My First Concept!" });

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n')).toBe(true);
    expect(xml).toContain('<ct_concept id="c-my-first-concept" xml:lang="en_US">');
    expect(xml).toContain("    <title>My First Concept!</title>\n");
    expect(xml).not.toContain("{{");
  });

  it("places the derived id exactly once, in the root id attribute", () => {
    const id = normalize("task", "Install the Agent");
    const xml = binder.bind("task", { id, title: "Install the Agent" });
    expect(xml.split(id).length - 1).toBe(1);
    expect(xml).toMatch(new RegExp(`<ct_task id="${id}"`));
  });

  it("leaves optional placeholders blank when no value is given", () => {
    const xml = binder.bind("process", { id: "pr-review", title: "Review" });
    expect(xml).toContain("    <shortdesc></shortdesc>\n");
    expect(xml).toContain("        <p></p>\n");
  });

  it("substitutes optional body fields", () => {
    const xml = binder.bind("task", {
      id: "t-restart",
      title: "Restart",
      step: "Run the restart command.",
      result: "The service is back online.",
    });
    expect(xml).toContain("                <cmd>Run the restart command.</cmd>\n");
    expect(xml).toContain("            <p>The service is back online.</p>\n");
  });

  it("XML-escapes field values", () => {
    const xml = binder.bind("concept", { id: "c-tips", title: `Tips & <Tricks> "quoted"` });
    expect(xml).toContain("<title>Tips &amp; &lt;Tricks&gt; &quot;quoted&quot;</title>");
  });

  it("reports every missing required field", () => {
    try {
      binder.bind("principle", { title: "  " });
      expect.unreachable("bind should throw");
    } catch (err) {
      if (!(err instanceof MissingFieldError)) throw err;
      expect(err.fields).toEqual(["id", "title"]);
      expect(err.code).toBe("MISSING_FIELD");
    }
  });

  it("throws MissingTemplateError for unknown content types", () => {
    expect(() => binder.bind("glossary", { id: "g-x", title: "X" })).toThrow(MissingTemplateError);
  });

  it("blanks placeholders the definition does not declare", () => {
    const template = registry.register(
      "concept",
      '<ct_concept id="{{id}}"><title>{{title}}</title><p>{{ owner }}</p></ct_concept>',
    );
    expect(renderTemplate(template, { id: "c-a", title: "A" })).toBe(
      '<ct_concept id="c-a"><title>A</title><p></p></ct_concept>',
    );
  });
});
