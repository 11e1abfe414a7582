/**
 * Runtime Configuration
 *
 * Read from the environment (optionally seeded by a .env file) and checked
 * with zod when loaded.
 */

import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { MapDoctype } from "../map/chapter_map.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const ROOT = path.resolve(__dirname, "..", "..");

/** Written between double quotes in the map's DOCTYPE. */
const DoctypeLiteral = z.string().min(1).regex(/^[^"]*$/, "must not contain double quotes");

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DITA_OUT_DIR: z.string().min(1).default("out"),
  DITA_TEMPLATES_DIR: z.string().min(1).optional(),
  DITA_MAP_DOCTYPE_PUBLIC: DoctypeLiteral.default("-//OASIS//DTD DITA Map//EN"),
  DITA_MAP_DOCTYPE_SYSTEM: DoctypeLiteral.default("map.dtd"),
  DITA_ZIP_LEVEL: z.coerce.number().int().min(0).max(9).default(9),
  DITA_MAX_ITEMS_PER_TYPE: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  port: number;
  /** Absolute path of the directory the CLI writes into. */
  outDir: string;
  /** Absolute path of a directory whose ct-*.xml files override the builtins. */
  templatesDir: string | null;
  mapDoctype: MapDoctype;
  zipLevel: number;
  maxItemsPerType: number;
}

/**
 * Parse configuration from an environment record.
 * Relative directories resolve against the repository root.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    outDir: path.resolve(ROOT, parsed.DITA_OUT_DIR),
    templatesDir: parsed.DITA_TEMPLATES_DIR
      ? path.resolve(ROOT, parsed.DITA_TEMPLATES_DIR)
      : null,
    mapDoctype: {
      publicId: parsed.DITA_MAP_DOCTYPE_PUBLIC,
      systemId: parsed.DITA_MAP_DOCTYPE_SYSTEM,
    },
    zipLevel: parsed.DITA_ZIP_LEVEL,
    maxItemsPerType: parsed.DITA_MAX_ITEMS_PER_TYPE,
  };
}
