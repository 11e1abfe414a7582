#!/usr/bin/env tsx
/**
 * CLI: dita:generate
 *
 * Usage: npm run dita:generate -- --concept "Title" [--task "Title" ...]
 *          [--chapter "Chapter Name"] [--out <dir>] [--zip <file>] [--clean]
 *
 * Each --<type> flag may repeat. Topics already in the output directory are
 * kept and included in the chapter map; a new title that maps onto an
 * existing file is rejected (use --clean to start over).
 */

import { mkdirSync, readdirSync, readFileSync, writeFileSync, existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { inspectTopic } from "../exports/bundle_reader.js";
import { createDitaExportZip } from "../exports/dita_export.js";
import { buildChapterMap } from "../map/chapter_map.js";
import { AuthoringSession, type RestoredTopic } from "../session/session.js";
import { loadConfig, type AppConfig } from "../shared/config.js";
import { isDitaScaffoldError } from "../shared/errors.js";
import { CONTENT_TYPES, isContentType, type ContentItemRequest } from "../shared/types.js";
import { TemplateBinder } from "../templates/binder.js";
import { TemplateRegistry } from "../templates/registry.js";
import { cleanOutputDir } from "./out_clean.js";

export interface GenerateOptions {
  requests: ContentItemRequest[];
  chapterName?: string;
  outDir: string;
  zipPath?: string;
  clean: boolean;
}

export interface GenerateResult {
  /** Topic files written by this run. */
  written: string[];
  /** Topics that were already in the output directory. */
  existing: string[];
  mapFile: string | null;
  zipFile: string | null;
  sha256: string | null;
}

export function parseGenerateArgs(args: string[], defaultOutDir: string): GenerateOptions {
  const options: GenerateOptions = { requests: [], outDir: defaultOutDir, clean: false };

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = i + 1 < args.length ? args[i + 1] : undefined;
    const name = flag.replace(/^--/, "");

    if (flag === "--clean") {
      options.clean = true;
      continue;
    }
    if (value === undefined) {
      throw new Error(`Missing value for ${flag}`);
    }

    if (flag.startsWith("--") && isContentType(name)) {
      options.requests.push({ type: name, title: value });
    } else if (flag === "--chapter") {
      options.chapterName = value;
    } else if (flag === "--out") {
      options.outDir = path.resolve(value);
    } else if (flag === "--zip") {
      options.zipPath = path.resolve(value);
    } else {
      throw new Error(`Unknown option: ${flag}`);
    }
    i++;
  }

  return options;
}

/** Topics already present in a directory, as restorable entries. */
export function loadExistingTopics(dir: string): RestoredTopic[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((name) => name.endsWith(".xml"))
    .sort()
    .map((fileName) => {
      const xml = readFileSync(path.join(dir, fileName), "utf-8");
      const { type, title } = inspectTopic(fileName, xml);
      return { type, title, id: path.basename(fileName, ".xml"), xml };
    });
}

export async function runGenerate(
  options: GenerateOptions,
  config: AppConfig = loadConfig(),
): Promise<GenerateResult> {
  const registry = new TemplateRegistry({ templatesDir: config.templatesDir });
  const session = new AuthoringSession(new TemplateBinder(registry), {
    maxItemsPerType: config.maxItemsPerType,
  });

  // Everything is bound and checked before the output directory is touched.
  const existing = session.restore(options.clean ? [] : loadExistingTopics(options.outDir));
  const created = session.addBatch(options.requests);
  const map =
    options.chapterName !== undefined
      ? buildChapterMap(options.chapterName, session.list(), { doctype: config.mapDoctype })
      : null;
  const bundle = options.zipPath
    ? await createDitaExportZip({
        items: session.list(),
        chapterName: options.chapterName,
        doctype: config.mapDoctype,
        zipLevel: config.zipLevel,
      })
    : null;

  if (options.clean) cleanOutputDir(options.outDir);
  mkdirSync(options.outDir, { recursive: true });
  for (const item of created) {
    writeFileSync(path.join(options.outDir, item.fileName), item.xml, "utf-8");
  }
  if (map) {
    writeFileSync(path.join(options.outDir, map.fileName), map.xml, "utf-8");
  }
  if (bundle && options.zipPath) {
    mkdirSync(path.dirname(options.zipPath), { recursive: true });
    writeFileSync(options.zipPath, bundle.zip);
  }

  return {
    written: created.map((item) => item.fileName),
    existing: existing.map((item) => item.fileName),
    mapFile: map ? map.fileName : null,
    zipFile: bundle && options.zipPath ? options.zipPath : null,
    sha256: bundle ? bundle.sha256 : null,
  };
}

async function main() {
  const config = loadConfig();
  const options = parseGenerateArgs(process.argv.slice(2), config.outDir);

  if (options.requests.length === 0 && options.chapterName === undefined) {
    const flags = CONTENT_TYPES.map((t) => `--${t} "Title"`).join(" | ");
    console.error(
      `Usage: npm run dita:generate -- (${flags})... [--chapter "Name"] [--out <dir>] [--zip <file>] [--clean]`,
    );
    process.exit(1);
  }

  const result = await runGenerate(options, config);

  console.log(`  Output:   ${options.outDir}`);
  if (result.existing.length > 0) {
    console.log(`  Kept:     ${result.existing.length} existing topic(s)`);
  }
  console.log(`  Created:  ${result.written.length} topic(s)`);
  for (const name of result.written) {
    console.log(`    ✓ ${name}`);
  }
  if (result.mapFile) {
    console.log(`  Map:      ${result.mapFile}`);
  }
  if (result.zipFile) {
    console.log(`  Archive:  ${result.zipFile}`);
    console.log(`  SHA-256:  ${result.sha256}`);
  }
}

if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(isDitaScaffoldError(err) ? `  ✗ ${message}` : `  ✗ Unexpected error: ${message}`);
    process.exit(1);
  });
}
