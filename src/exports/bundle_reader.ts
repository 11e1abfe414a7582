/**
 * Bundle Reader — Recover topics from a previously exported archive.
 *
 * Each .xml entry is classified by its root element and file-name prefix;
 * its title comes from the first <title> element (comments stripped),
 * falling back to the file stem. .ditamap entries are returned as-is.
 */

import path from "path";
import PizZip from "pizzip";
import { InvalidBundleError } from "../shared/errors.js";
import type { ContentType } from "../shared/types.js";
import { unescapeXml } from "../shared/xml.js";
import { CONTENT_TYPE_DEFINITIONS } from "../templates/builtins/dita_ct/manifest.js";
import type { ContentTypeDefinition } from "../templates/types.js";

export interface TopicInfo {
  type: ContentType;
  rootElement: string;
  title: string;
}

export interface BundleTopic extends TopicInfo {
  fileName: string;
  id: string;
  xml: string;
}

export interface BundleMap {
  fileName: string;
  xml: string;
}

export interface BundleContents {
  topics: BundleTopic[];
  maps: BundleMap[];
  /** Entries that are neither topics nor maps. */
  skipped: string[];
}

// Longest prefix first so "pr-" wins over any shorter prefix it contains.
const DEFINITIONS_BY_PREFIX: ContentTypeDefinition[] = Object.values(CONTENT_TYPE_DEFINITIONS)
  .sort((a, b) => b.prefix.length - a.prefix.length);

const ROOT_RE = /<(ct_\w+)[\s>/]/;
const TITLE_RE = /<title>(.*?)<\/title>/s;
const COMMENT_RE = /<!--.*?-->/gs;

function classify(fileName: string, rootElement: string | null): ContentType {
  const byPrefix = DEFINITIONS_BY_PREFIX.find((def) => fileName.startsWith(def.prefix));
  if (byPrefix && (rootElement === null || byPrefix.rootElement === rootElement)) {
    return byPrefix.type;
  }
  const byRoot = Object.values(CONTENT_TYPE_DEFINITIONS).find(
    (def) => def.rootElement === rootElement,
  );
  return byRoot?.type ?? "concept";
}

/** Determine type and title of a topic from its file name and XML. */
export function inspectTopic(fileName: string, xml: string): TopicInfo {
  const rootMatch = ROOT_RE.exec(xml);
  const rootElement = rootMatch ? rootMatch[1] : null;
  const type = classify(fileName, rootElement);

  const stem = path.posix.basename(fileName, ".xml");
  const titleMatch = TITLE_RE.exec(xml);
  const title = titleMatch
    ? unescapeXml(titleMatch[1].replace(COMMENT_RE, "").trim())
    : "";

  return {
    type,
    rootElement: rootElement ?? CONTENT_TYPE_DEFINITIONS[type].rootElement,
    title: title || stem,
  };
}

export function readBundle(zipBuffer: Buffer): BundleContents {
  let zip: PizZip;
  try {
    zip = new PizZip(zipBuffer);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidBundleError(reason);
  }

  const topics: BundleTopic[] = [];
  const maps: BundleMap[] = [];
  const skipped: string[] = [];

  const names = Object.keys(zip.files).sort();
  for (const name of names) {
    const entry = zip.files[name];
    if (entry.dir) continue;

    const fileName = path.posix.basename(name);
    if (name.startsWith("__MACOSX/") || fileName.startsWith(".")) {
      skipped.push(name);
    } else if (fileName.endsWith(".ditamap")) {
      maps.push({ fileName, xml: entry.asText() });
    } else if (fileName.endsWith(".xml")) {
      const xml = entry.asText();
      topics.push({
        ...inspectTopic(fileName, xml),
        fileName,
        id: path.posix.basename(fileName, ".xml"),
        xml,
      });
    } else {
      skipped.push(name);
    }
  }

  return { topics, maps, skipped };
}
