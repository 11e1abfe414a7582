/**
 * Template Binder
 *
 * Substitutes `{{name}}` placeholders in a content-type template with
 * XML-escaped field values. Pure: the registry supplies the template text,
 * nothing is written anywhere.
 */

import { MissingFieldError } from "../shared/errors.js";
import type { FieldValues } from "../shared/types.js";
import { escapeXml } from "../shared/xml.js";
import { PLACEHOLDER_RE } from "./placeholders.js";
import type { TemplateRegistry } from "./registry.js";
import type { ResolvedTemplate } from "./types.js";

function fieldValue(fields: FieldValues, name: string): string | undefined {
  return Object.hasOwn(fields, name) ? fields[name] : undefined;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

/** Required fields of the template's definition that have no usable value. */
export function findMissingFields(template: ResolvedTemplate, fields: FieldValues): string[] {
  return template.definition.requiredFields.filter((name) => isBlank(fieldValue(fields, name)));
}

/**
 * Bind fields into already-resolved template text.
 * Placeholders without a value render as empty text.
 */
export function renderTemplate(template: ResolvedTemplate, fields: FieldValues): string {
  const missing = findMissingFields(template, fields);
  if (missing.length > 0) {
    throw new MissingFieldError(template.definition.type, missing);
  }

  return template.text.replace(PLACEHOLDER_RE, (_match, name: string) => {
    const value = fieldValue(fields, name);
    return value === undefined ? "" : escapeXml(value);
  });
}

export class TemplateBinder {
  constructor(private readonly registry: TemplateRegistry) {}

  /** bind(type, fields) → complete XML document text. */
  bind(type: string, fields: FieldValues): string {
    return renderTemplate(this.registry.resolve(type), fields);
  }
}
