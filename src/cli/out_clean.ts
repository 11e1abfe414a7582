#!/usr/bin/env tsx
/**
 * Output Cleanup Utility
 *
 * Removes generated .xml and .ditamap files from the output directory.
 * Other files and subdirectories are left alone.
 *
 * Usage:
 *   npm run out:clean                 — clean DITA_OUT_DIR
 *   npm run out:clean -- --out <dir>  — clean another directory
 *   dita:generate -- --clean          — clean before generating
 */

import { readdirSync, rmSync, existsSync, statSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { loadConfig } from "../shared/config.js";
import { BUILTIN_TEMPLATES_DIR } from "../templates/builtins/dita_ct/manifest.js";

export interface CleanResult {
  xml: number;
  ditamap: number;
}

/**
 * Delete topic and map files directly inside `outDir`.
 * A missing directory counts as already clean.
 */
export function cleanOutputDir(outDir: string): CleanResult {
  const resolved = path.resolve(outDir);
  if (resolved === BUILTIN_TEMPLATES_DIR) {
    throw new Error(`Safety: cleanOutputDir refuses to clean the builtin templates at "${resolved}".`);
  }

  const result: CleanResult = { xml: 0, ditamap: 0 };
  if (!existsSync(resolved)) return result;

  for (const entry of readdirSync(resolved)) {
    const full = path.join(resolved, entry);
    if (!statSync(full).isFile()) continue;
    if (entry.endsWith(".xml")) {
      rmSync(full);
      result.xml++;
    } else if (entry.endsWith(".ditamap")) {
      rmSync(full);
      result.ditamap++;
    }
  }
  return result;
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) ===
    path.resolve(fileURLToPath(import.meta.url))
) {
  const args = process.argv.slice(2);
  const outIdx = args.indexOf("--out");
  const outDir = outIdx >= 0 && outIdx + 1 < args.length
    ? path.resolve(args[outIdx + 1])
    : loadConfig().outDir;

  console.log(`Cleaning output directory: ${outDir}`);
  const { xml, ditamap } = cleanOutputDir(outDir);
  console.log(`Done. Deleted ${xml} XML file(s) and ${ditamap} DITAMAP file(s).`);
}
