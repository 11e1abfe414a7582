/**
 * Identifier Normalizer
 *
 * Turns a human-entered title into the prefixed kebab-case id used as both
 * the generated file's base name and the topic's DITA `id` attribute.
 *
 *   normalize("concept", "My First Concept!")  →  "c-my-first-concept"
 */

import { EmptyTitleError, MissingTemplateError } from "../shared/errors.js";
import type { ContentType } from "../shared/types.js";
import { CONTENT_TYPE_DEFINITIONS } from "../templates/builtins/dita_ct/manifest.js";

/**
 * Lower-case kebab form of arbitrary text.
 * Diacritics are folded ("Café" → "cafe"); letters and digits of any script
 * are kept and every other run of characters collapses to one hyphen.
 * May return "".
 */
export function toKebabCase(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
}

/** File-name prefix for a content type, e.g. "t-" for tasks. */
export function prefixFor(type: ContentType): string {
  const def = CONTENT_TYPE_DEFINITIONS[type];
  if (!def) throw new MissingTemplateError(type);
  return def.prefix;
}

/**
 * Derive the canonical id for a title.
 *
 * Text that already carries the type prefix is not prefixed again, so the
 * function is idempotent on its own output.
 */
export function normalize(type: ContentType, title: string): string {
  const prefix = prefixFor(type);
  const kebab = toKebabCase(title);
  if (!kebab) throw new EmptyTitleError();
  return kebab.startsWith(prefix) ? kebab : `${prefix}${kebab}`;
}

/** File name for a normalized id. */
export function topicFileName(id: string): string {
  return `${id}.xml`;
}
