/**
 * Template System Types
 *
 * Defines the content-type table and the resolved-template shape used by
 * the binder, the registry and template validation.
 */

import type { ContentType } from "../shared/types.js";

// ── Content Type Definitions ────────────────────────────────────────

export interface ContentTypeDefinition {
  type: ContentType;
  /** Plural label shown in listings, e.g. "Tasks". */
  label: string;
  /** File-name and id prefix, e.g. "t-". */
  prefix: string;
  /** Root element of the topic, also the topicref `type` in maps. */
  rootElement: string;
  /** File name of the template, e.g. "ct-task.xml". */
  templateFile: string;
  /** Placeholders that must receive a non-blank value. */
  requiredFields: string[];
  /** Placeholders that are left blank when no value is given. */
  optionalFields: string[];
}

// ── Template Resolution ─────────────────────────────────────────────

export type TemplateSource = "builtin" | "custom";

export interface ResolvedTemplate {
  definition: ContentTypeDefinition;
  /** Absolute path the text was read from. */
  path: string;
  source: TemplateSource;
  text: string;
}

// ── Template Validation Result ──────────────────────────────────────

export interface TemplateValidationResult {
  type: ContentType;
  valid: boolean;
  /** Required placeholders that the template text never mentions. */
  missingPlaceholders: string[];
  /** Placeholders in the text that the definition does not declare. */
  unknownPlaceholders: string[];
  errors: string[];
  warnings: string[];
}
