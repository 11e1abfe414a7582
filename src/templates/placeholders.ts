/**
 * Placeholder scanning for `{{name}}` tags in template text.
 */

/** Matches `{{name}}` with optional inner whitespace. */
export const PLACEHOLDER_RE = /\{\{\s*([A-Za-z][\w.-]*)\s*\}\}/g;

/** Unique placeholder names in a template, sorted. */
export function scanPlaceholders(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_RE)) {
    found.add(match[1]);
  }
  return [...found].sort();
}

/** Number of times a placeholder occurs in the text. */
export function countPlaceholder(text: string, name: string): number {
  let count = 0;
  for (const match of text.matchAll(PLACEHOLDER_RE)) {
    if (match[1] === name) count++;
  }
  return count;
}
