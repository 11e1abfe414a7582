/**
 * Template Validation — Verify that a template honors the binder contract.
 *
 * Checks:
 * 1. Root element matches the definition and carries id="{{id}}"
 * 2. {{id}} occurs exactly once
 * 3. A <title> element holds {{title}}
 * 4. Every required placeholder appears in the text
 * 5. Placeholders not declared by the definition (warning: they bind blank)
 */

import type { TemplateRegistry } from "./registry.js";
import { countPlaceholder, scanPlaceholders } from "./placeholders.js";
import type { ResolvedTemplate, TemplateValidationResult } from "./types.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function validateTemplate(template: ResolvedTemplate): TemplateValidationResult {
  const { definition, text } = template;
  const errors: string[] = [];
  const warnings: string[] = [];

  const placeholders = scanPlaceholders(text);
  const present = new Set(placeholders);
  const declared = new Set([...definition.requiredFields, ...definition.optionalFields]);

  const root = escapeRegExp(definition.rootElement);
  const rootWithId = new RegExp(`<${root}\\b[^>]*\\bid="\\{\\{\\s*id\\s*\\}\\}"`);
  if (!new RegExp(`<${root}\\b`).test(text)) {
    errors.push(`Root element <${definition.rootElement}> not found`);
  } else if (!rootWithId.test(text)) {
    errors.push(`<${definition.rootElement}> must carry id="{{id}}"`);
  }

  const idCount = countPlaceholder(text, "id");
  if (idCount > 1) {
    errors.push(`{{id}} must appear exactly once (found ${idCount})`);
  }

  if (!/<title>\s*\{\{\s*title\s*\}\}\s*<\/title>/.test(text)) {
    errors.push("No <title> element holds {{title}}");
  }

  const missingPlaceholders = definition.requiredFields.filter((name) => !present.has(name));
  for (const name of missingPlaceholders) {
    errors.push(`Required placeholder {{${name}}} is missing`);
  }

  const unknownPlaceholders = placeholders.filter((name) => !declared.has(name));
  for (const name of unknownPlaceholders) {
    warnings.push(`Placeholder {{${name}}} is not declared and will bind blank`);
  }

  if (!text.trimStart().startsWith("<?xml")) {
    warnings.push("Template has no XML declaration");
  }

  return {
    type: definition.type,
    valid: errors.length === 0,
    missingPlaceholders,
    unknownPlaceholders,
    errors,
    warnings,
  };
}

/** Validate every registered content type. Unresolvable types report as errors. */
export function validateRegistry(registry: TemplateRegistry): TemplateValidationResult[] {
  return registry.list().map((definition) => {
    try {
      return validateTemplate(registry.resolve(definition.type));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        type: definition.type,
        valid: false,
        missingPlaceholders: [...definition.requiredFields],
        unknownPlaceholders: [],
        errors: [message],
        warnings: [],
      };
    }
  });
}
