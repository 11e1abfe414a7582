/**
 * Builtin DITA Content Type Manifest
 *
 * The prefix table and root-element mapping for the five content types.
 * Template text lives in /templates/dita_ct/ at the repository root.
 */

import { fileURLToPath } from "url";
import path from "path";
import type { ContentType } from "../../../shared/types.js";
import type { ContentTypeDefinition } from "../../types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Directory holding the builtin ct-*.xml files. */
export const BUILTIN_TEMPLATES_DIR = path.resolve(
  __dirname, "..", "..", "..", "..", "templates", "dita_ct",
);

/** Placeholders every template must bind. */
export const CORE_FIELDS = ["id", "title"] as const;

export const CONTENT_TYPE_DEFINITIONS: Record<ContentType, ContentTypeDefinition> = {
  concept: {
    type: "concept",
    label: "Concepts",
    prefix: "c-",
    rootElement: "ct_concept",
    templateFile: "ct-concept.xml",
    requiredFields: [...CORE_FIELDS],
    optionalFields: ["shortdesc", "body"],
  },
  task: {
    type: "task",
    label: "Tasks",
    prefix: "t-",
    rootElement: "ct_task",
    templateFile: "ct-task.xml",
    requiredFields: [...CORE_FIELDS],
    optionalFields: ["shortdesc", "prereq", "context", "step", "result"],
  },
  process: {
    type: "process",
    label: "Processes",
    prefix: "pr-",
    rootElement: "ct_process",
    templateFile: "ct-process.xml",
    requiredFields: [...CORE_FIELDS],
    optionalFields: ["shortdesc", "body"],
  },
  principle: {
    type: "principle",
    label: "Principles",
    prefix: "pl-",
    rootElement: "ct_principle",
    templateFile: "ct-principle.xml",
    requiredFields: [...CORE_FIELDS],
    optionalFields: ["shortdesc", "body"],
  },
  // References share the concept root element; the "r-" prefix tells them apart.
  reference: {
    type: "reference",
    label: "References",
    prefix: "r-",
    rootElement: "ct_concept",
    templateFile: "ct-reference.xml",
    requiredFields: [...CORE_FIELDS],
    optionalFields: ["shortdesc", "sectionTitle", "body"],
  },
};
