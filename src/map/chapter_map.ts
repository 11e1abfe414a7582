/**
 * Chapter Map Builder
 *
 * Builds the .ditamap that references every topic in a session. The map is
 * regenerated in full on each call.
 *
 * Layout:
 *   - With at least one concept, the first concept (by file name) becomes
 *     the parent topicref. Nested under it: the remaining concepts, then
 *     principles, processes, tasks, references.
 *   - Without concepts, every topic sits at root level in the order
 *     concept, task, process, principle, reference.
 */

import { toKebabCase } from "../naming/normalizer.js";
import { EmptyMapError, EmptyTitleError } from "../shared/errors.js";
import type { ChapterMap, ContentItem, ContentType, MapEntry } from "../shared/types.js";
import { escapeXml } from "../shared/xml.js";
import { CONTENT_TYPE_DEFINITIONS } from "../templates/builtins/dita_ct/manifest.js";

/** Order of child groups under the parent concept. */
const NESTED_ORDER: ContentType[] = ["concept", "principle", "process", "task", "reference"];

/** Order of root-level groups when the chapter has no concept. */
const FLAT_ORDER: ContentType[] = ["concept", "task", "process", "principle", "reference"];

const INDENT = "    ";

export interface MapDoctype {
  publicId: string;
  systemId: string;
}

export const DEFAULT_MAP_DOCTYPE: MapDoctype = {
  publicId: "-//OASIS//DTD DITA Map//EN",
  systemId: "map.dtd",
};

export interface ChapterMapOptions {
  doctype?: MapDoctype;
}

type MapItem = Pick<ContentItem, "type" | "title" | "fileName">;

function byFileName(a: MapEntry, b: MapEntry): number {
  if (a.href < b.href) return -1;
  if (a.href > b.href) return 1;
  return 0;
}

export function toMapEntry(item: MapItem): MapEntry {
  return {
    href: item.fileName,
    topicType: CONTENT_TYPE_DEFINITIONS[item.type].rootElement,
    navtitle: item.title,
    contentType: item.type,
  };
}

/** Group entries by content type, each group sorted by file name. */
export function groupEntries(items: MapItem[]): Map<ContentType, MapEntry[]> {
  const groups = new Map<ContentType, MapEntry[]>();
  for (const type of FLAT_ORDER) groups.set(type, []);
  for (const item of items) {
    groups.get(item.type)?.push(toMapEntry(item));
  }
  for (const entries of groups.values()) entries.sort(byFileName);
  return groups;
}

function topicref(entry: MapEntry, depth: number, selfClosing: boolean): string {
  const attrs = [
    `href="${escapeXml(entry.href)}"`,
    `format="dita"`,
    `scope="local"`,
    `type="${escapeXml(entry.topicType)}"`,
    `navtitle="${escapeXml(entry.navtitle)}"`,
  ].join(" ");
  return `${INDENT.repeat(depth)}<topicref ${attrs}${selfClosing ? "/>" : ">"}\n`;
}

export function buildChapterMap(
  chapterName: string,
  items: MapItem[],
  options: ChapterMapOptions = {},
): ChapterMap {
  const name = chapterName.trim();
  const kebab = toKebabCase(name);
  if (!kebab) throw new EmptyTitleError("Chapter name");
  if (items.length === 0) throw new EmptyMapError();

  const doctype = options.doctype ?? DEFAULT_MAP_DOCTYPE;
  const groups = groupEntries(items);
  const concepts = groups.get("concept") ?? [];

  let parent: MapEntry | null = null;
  let entries: MapEntry[];
  if (concepts.length > 0) {
    parent = concepts[0];
    entries = NESTED_ORDER.flatMap((type) =>
      type === "concept" ? concepts.slice(1) : groups.get(type) ?? [],
    );
  } else {
    entries = FLAT_ORDER.flatMap((type) => groups.get(type) ?? []);
  }

  const id = `map_${kebab}`;
  const title = escapeXml(name);

  let xml = '<?xml version="1.0" encoding="UTF-8"?>\n';
  xml += `<!DOCTYPE map PUBLIC "${doctype.publicId}" "${doctype.systemId}">\n`;
  xml += "<!-- Keep the title attribute of <map> in sync with its <title> text. -->\n";
  xml += `<map xml:lang="en_US" title="${title}" id="${id}">\n`;
  xml += `${INDENT}<title>${title}</title>\n`;

  if (parent) {
    xml += topicref(parent, 1, false);
    for (const entry of entries) xml += topicref(entry, 2, true);
    xml += `${INDENT}</topicref>\n`;
  } else {
    for (const entry of entries) xml += topicref(entry, 1, true);
  }

  xml += "</map>\n";

  return {
    chapterName: name,
    id,
    fileName: `${kebab}.ditamap`,
    parent,
    entries,
    xml,
  };
}
