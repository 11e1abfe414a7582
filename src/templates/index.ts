/**
 * Template System — Barrel Export
 */

export type {
  ContentTypeDefinition,
  ResolvedTemplate,
  TemplateSource,
  TemplateValidationResult,
} from "./types.js";

export { TemplateRegistry } from "./registry.js";
export type { TemplateRegistryOptions } from "./registry.js";
export { TemplateBinder, renderTemplate, findMissingFields } from "./binder.js";
export { scanPlaceholders, countPlaceholder } from "./placeholders.js";
export { validateTemplate, validateRegistry } from "./validate.js";
export {
  CONTENT_TYPE_DEFINITIONS,
  BUILTIN_TEMPLATES_DIR,
  CORE_FIELDS,
} from "./builtins/dita_ct/manifest.js";
