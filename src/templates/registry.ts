/**
 * Template Registry — Loads, caches, and resolves content-type templates.
 *
 * Resolution order for a content type:
 *   1. Template registered in-process via register()
 *   2. <templatesDir>/<templateFile> when a custom directory is configured
 *   3. Builtin /templates/dita_ct/<templateFile>
 */

import { readFileSync, existsSync } from "fs";
import path from "path";
import { MissingTemplateError } from "../shared/errors.js";
import { CONTENT_TYPES, isContentType, type ContentType } from "../shared/types.js";
import type { ContentTypeDefinition, ResolvedTemplate } from "./types.js";
import {
  BUILTIN_TEMPLATES_DIR,
  CONTENT_TYPE_DEFINITIONS,
} from "./builtins/dita_ct/manifest.js";

export interface TemplateRegistryOptions {
  /** Directory whose ct-*.xml files override the builtins. */
  templatesDir?: string | null;
  /** Builtin directory; only tests point this elsewhere. */
  builtinDir?: string;
}

export class TemplateRegistry {
  private cache = new Map<ContentType, ResolvedTemplate>();
  private templatesDir: string | null;
  private builtinDir: string;

  constructor(options: TemplateRegistryOptions = {}) {
    this.templatesDir = options.templatesDir ?? null;
    this.builtinDir = options.builtinDir ?? BUILTIN_TEMPLATES_DIR;
  }

  // ── Public API ─────────────────────────────────────────────

  /**
   * Resolve a content type to its definition and template text.
   * Throws MissingTemplateError for unknown types or unreadable files.
   */
  resolve(type: string): ResolvedTemplate {
    if (!isContentType(type)) {
      throw new MissingTemplateError(type);
    }

    const cached = this.cache.get(type);
    if (cached) return cached;

    const resolved = this.load(CONTENT_TYPE_DEFINITIONS[type]);
    this.cache.set(type, resolved);
    return resolved;
  }

  /** Definition for a content type, or undefined when unknown. */
  get(type: string): ContentTypeDefinition | undefined {
    return isContentType(type) ? CONTENT_TYPE_DEFINITIONS[type] : undefined;
  }

  /** Register template text for a type, replacing whatever was resolved. */
  register(type: ContentType, text: string, sourcePath = "(inline)"): ResolvedTemplate {
    const resolved: ResolvedTemplate = {
      definition: CONTENT_TYPE_DEFINITIONS[type],
      path: sourcePath,
      source: "custom",
      text,
    };
    this.cache.set(type, resolved);
    return resolved;
  }

  /** All content-type definitions in canonical order. */
  list(): ContentTypeDefinition[] {
    return CONTENT_TYPES.map((type) => CONTENT_TYPE_DEFINITIONS[type]);
  }

  // ── Internals ──────────────────────────────────────────────

  private load(definition: ContentTypeDefinition): ResolvedTemplate {
    if (this.templatesDir) {
      const customPath = path.join(this.templatesDir, definition.templateFile);
      if (existsSync(customPath)) {
        return {
          definition,
          path: customPath,
          source: "custom",
          text: readFileSync(customPath, "utf-8"),
        };
      }
    }

    const builtinPath = path.join(this.builtinDir, definition.templateFile);
    if (!existsSync(builtinPath)) {
      throw new MissingTemplateError(definition.type);
    }
    return {
      definition,
      path: builtinPath,
      source: "builtin",
      text: readFileSync(builtinPath, "utf-8"),
    };
  }
}
