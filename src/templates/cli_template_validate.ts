#!/usr/bin/env tsx
/**
 * CLI: dita:template:validate
 *
 * Usage: npm run dita:template:validate [-- --type <contentType>]
 *
 * Checks that each template honors the binder contract (root id, title,
 * required placeholders). Exits 1 when any template fails.
 */

import { loadConfig } from "../shared/config.js";
import { TemplateRegistry } from "./registry.js";
import { validateRegistry, validateTemplate } from "./validate.js";
import type { TemplateValidationResult } from "./types.js";

async function main() {
  const args = process.argv.slice(2);
  let type = "";

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--type" && i + 1 < args.length) {
      type = args[i + 1];
      i++;
    }
  }

  const config = loadConfig();
  const registry = new TemplateRegistry({ templatesDir: config.templatesDir });
  const results: TemplateValidationResult[] = type
    ? [validateTemplate(registry.resolve(type))]
    : validateRegistry(registry);

  for (const result of results) {
    console.log(`  ${result.valid ? "✓" : "✗"} ${result.type}`);
    for (const e of result.errors) {
      console.log(`      error:   ${e}`);
    }
    for (const w of result.warnings) {
      console.log(`      warning: ${w}`);
    }
  }

  const failed = results.filter((r) => !r.valid).length;
  console.log();
  if (failed === 0) {
    console.log("  ✓ Template validation PASSED");
  } else {
    console.log(`  ✗ Template validation FAILED (${failed} of ${results.length})`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
