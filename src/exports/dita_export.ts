/**
 * DITA Export Bundler
 *
 * Produces the downloadable archive for a session:
 * - <id>.xml for every topic, in submission order
 * - <chapter>.ditamap when a chapter name is given
 */

import { buildChapterMap, type MapDoctype } from "../map/chapter_map.js";
import { sha256Bytes } from "../shared/hash.js";
import type { BundleFile, ChapterMap, ContentItem } from "../shared/types.js";
import { createZipBundle } from "./bundle.js";

export interface DitaExportInput {
  items: ContentItem[];
  /** When set, the chapter map is built and included. */
  chapterName?: string;
  doctype?: MapDoctype;
  zipLevel?: number;
}

export interface DitaExportResult {
  zip: Buffer;
  sha256: string;
  /** Names of the entries in the archive, in write order. */
  fileNames: string[];
  map: ChapterMap | null;
}

/**
 * Build the complete list of export files for the bundle.
 */
export function buildDitaExportFiles(input: DitaExportInput): {
  files: BundleFile[];
  map: ChapterMap | null;
} {
  const files: BundleFile[] = input.items.map((item) => ({
    name: item.fileName,
    content: item.xml,
  }));

  let map: ChapterMap | null = null;
  if (input.chapterName !== undefined) {
    map = buildChapterMap(input.chapterName, input.items, { doctype: input.doctype });
    files.push({ name: map.fileName, content: map.xml });
  }

  return { files, map };
}

/**
 * Create the export zip bundle.
 */
export async function createDitaExportZip(input: DitaExportInput): Promise<DitaExportResult> {
  const { files, map } = buildDitaExportFiles(input);
  const zip = await createZipBundle(files, { level: input.zipLevel });
  return {
    zip,
    sha256: sha256Bytes(zip),
    fileNames: files.map((f) => f.name),
    map,
  };
}
