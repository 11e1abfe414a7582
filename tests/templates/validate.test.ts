/**
 * Template Validation — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { TemplateRegistry } from "../../src/templates/registry.js";
import { validateRegistry, validateTemplate } from "../../src/templates/validate.js";

describe("validateTemplate", () => {
  it("passes every builtin template without warnings", () => {
    const results = validateRegistry(new TemplateRegistry());
    expect(results).toHaveLength(5);
    for (const result of results) {
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.valid).toBe(true);
    }
  });

  it("reports a root element without the id placeholder", () => {
    const registry = new TemplateRegistry();
    const template = registry.register(
      "concept",
      "<ct_concept><title>{{title}}</title><p>{{owner}}</p></ct_concept>",
    );

    const result = validateTemplate(template);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      '<ct_concept> must carry id="{{id}}"',
      "Required placeholder {{id}} is missing",
    ]);
    expect(result.missingPlaceholders).toEqual(["id"]);
    expect(result.unknownPlaceholders).toEqual(["owner"]);
    expect(result.warnings).toEqual([
      "Placeholder {{owner}} is not declared and will bind blank",
      "Template has no XML declaration",
    ]);
  });

  it("reports a root element that does not match the content type", () => {
    const registry = new TemplateRegistry();
    const template = registry.register(
      "task",
      '<?xml version="1.0"?><ct_concept id="{{id}}"><title>{{title}}</title></ct_concept>',
    );
    expect(validateTemplate(template).errors).toEqual(["Root element <ct_task> not found"]);
  });

  it("rejects a template that repeats the id placeholder", () => {
    const registry = new TemplateRegistry();
    const template = registry.register(
      "process",
      '<?xml version="1.0"?><ct_process id="{{id}}"><title>{{title}}</title><p>{{id}}</p></ct_process>',
    );
    expect(validateTemplate(template).errors).toEqual([
      "{{id}} must appear exactly once (found 2)",
    ]);
  });

  it("requires a <title> element holding {{title}}", () => {
    const registry = new TemplateRegistry();
    const template = registry.register(
      "principle",
      '<?xml version="1.0"?><ct_principle id="{{id}}"><p>{{title}}</p></ct_principle>',
    );
    expect(validateTemplate(template).errors).toEqual(["No <title> element holds {{title}}"]);
  });
});
